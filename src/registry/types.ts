/**
 * Registry types
 */

import { RegistrationError, assertConfidence } from "../errors.js";
import { isVersion } from "./version.js";

/** Prompt in, structured value (or JSON text) out */
export type CompletionFn = (prompt: string, options?: { system?: string }) => Promise<unknown>;

/** The capability every loadable artifact implements */
export interface Extractor {
  extract(input: unknown): Promise<unknown>;
}

export type ExtractorClass = new (complete: CompletionFn) => Extractor;

export interface ArtifactMetadata {
  readonly name: string;
  /** Namespace-qualified symbol, e.g. exemplar.artifacts.invoice.InvoiceExtractor */
  readonly symbolPath: string;
  readonly version: string;
  readonly description: string;
  readonly domain: string;
  readonly confidence: number;
  readonly exampleCount: number;
  readonly tags: readonly string[];
  /** ISO 8601 */
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface RegisterInput {
  name: string;
  symbolPath: string;
  version: string;
  description?: string;
  domain?: string;
  confidence?: number;
  exampleCount?: number;
  tags?: string[];
}

/** Fields update() may change */
export type MetadataUpdate = Partial<
  Pick<ArtifactMetadata, "symbolPath" | "version" | "description" | "domain" | "confidence" | "exampleCount" | "tags">
>;

export interface ListFilter {
  domain?: string;
  /** Matches artifacts carrying any of these tags */
  tags?: readonly string[];
  minConfidence?: number;
}

export const ARTIFACT_NAME_PATTERN = /^[a-z][a-z0-9_-]*$/;

export function isExtractorClass(value: unknown): value is ExtractorClass {
  return typeof value === "function" && typeof value.prototype?.extract === "function";
}

/**
 * Validated, frozen metadata. Confidence outside [0, 1] is a RangeError.
 */
export function createMetadata(fields: ArtifactMetadata): ArtifactMetadata {
  if (!ARTIFACT_NAME_PATTERN.test(fields.name)) {
    throw new RegistrationError("invalid", `Invalid artifact name '${fields.name}'`);
  }
  if (!isVersion(fields.version)) {
    throw new RegistrationError("invalid", `Invalid version '${fields.version}' for '${fields.name}'; expected MAJOR.MINOR.PATCH`);
  }
  assertConfidence(fields.confidence);
  if (!Number.isInteger(fields.exampleCount) || fields.exampleCount < 0) {
    throw new RegistrationError("invalid", `Invalid example count ${fields.exampleCount} for '${fields.name}'`);
  }
  return Object.freeze({
    name: fields.name,
    symbolPath: fields.symbolPath,
    version: fields.version,
    description: fields.description,
    domain: fields.domain,
    confidence: fields.confidence,
    exampleCount: fields.exampleCount,
    tags: Object.freeze([...fields.tags]),
    createdAt: fields.createdAt,
    updatedAt: fields.updatedAt,
  });
}
