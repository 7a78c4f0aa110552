/**
 * Catalog persistence
 *
 * The catalog is one JSON document: { formatVersion: 2, artifacts: {...} }.
 * Documents written by the first format ({ version: "1.0.0", extractors })
 * are read transparently and come back in the current format on the next
 * write.
 */

import { readFile } from "node:fs/promises";
import { CatalogError, errorMessage } from "../errors.js";
import { writeFileAtomic } from "../io/atomic-file.js";
import { isPlainRecord } from "../schema/values.js";
import { createMetadata, type ArtifactMetadata } from "./types.js";

export const CATALOG_FORMAT_VERSION = 2;
const LEGACY_VERSION = "1.0.0";

export interface CatalogDocument {
  formatVersion: typeof CATALOG_FORMAT_VERSION;
  artifacts: Record<string, ArtifactMetadata>;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);
const isStringList = (v: unknown): v is string[] => Array.isArray(v) && v.every(isString);

function parseEntry(name: string, raw: unknown, legacy: boolean, path: string): ArtifactMetadata {
  if (!isPlainRecord(raw)) throw new CatalogError(path, `Entry '${name}' is not an object`);
  const record = raw;
  const key = (current: string, old: string): unknown => record[legacy ? old : current];

  const symbolPath = key("symbolPath", "class_path");
  if (!isString(symbolPath)) throw new CatalogError(path, `Entry '${name}' has no symbol path`);
  if (!isString(raw.version)) throw new CatalogError(path, `Entry '${name}' has no version`);
  const exampleCount = key("exampleCount", "examples_count");
  const createdAt = key("createdAt", "created_at");
  const updatedAt = key("updatedAt", "updated_at");
  const epoch = new Date(0).toISOString();

  try {
    return createMetadata({
      name,
      symbolPath,
      version: raw.version,
      description: isString(raw.description) ? raw.description : "",
      domain: isString(raw.domain) ? raw.domain : "generic",
      confidence: isNumber(raw.confidence) ? raw.confidence : 0,
      exampleCount: isNumber(exampleCount) ? exampleCount : 0,
      tags: isStringList(raw.tags) ? raw.tags : [],
      createdAt: isString(createdAt) ? createdAt : epoch,
      updatedAt: isString(updatedAt) ? updatedAt : isString(createdAt) ? createdAt : epoch,
    });
  } catch (error) {
    throw new CatalogError(path, `Invalid entry '${name}': ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Parse a catalog document. Unknown formats raise CatalogError.
 */
export function parseCatalog(text: string, path: string): Map<string, ArtifactMetadata> {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new CatalogError(path, `Catalog is not valid JSON (${errorMessage(error)})`, { cause: error });
  }
  if (!isPlainRecord(document)) throw new CatalogError(path, "Catalog is not a JSON object");

  let raw: unknown;
  let legacy = false;
  if (document.formatVersion === CATALOG_FORMAT_VERSION) {
    raw = document.artifacts;
  } else if (document.version === LEGACY_VERSION && "extractors" in document) {
    raw = document.extractors;
    legacy = true;
  } else {
    throw new CatalogError(path, "Unknown catalog format");
  }
  if (!isPlainRecord(raw)) throw new CatalogError(path, "Catalog has no artifact table");

  const entries = new Map<string, ArtifactMetadata>();
  for (const [name, entry] of Object.entries(raw)) {
    entries.set(name, parseEntry(name, entry, legacy, path));
  }
  return entries;
}

/** Missing file -> empty catalog */
export async function readCatalog(path: string): Promise<Map<string, ArtifactMetadata>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return new Map();
    throw new CatalogError(path, `Cannot read catalog (${errorMessage(error)})`, { cause: error });
  }
  return parseCatalog(text, path);
}

export function serializeCatalog(entries: Iterable<ArtifactMetadata>): string {
  const document: CatalogDocument = { formatVersion: CATALOG_FORMAT_VERSION, artifacts: {} };
  for (const entry of entries) document.artifacts[entry.name] = entry;
  return `${JSON.stringify(document, null, 2)}\n`;
}

/** Whole-catalog atomic replacement */
export async function writeCatalog(path: string, entries: Iterable<ArtifactMetadata>): Promise<void> {
  await writeFileAtomic(path, serializeCatalog(entries));
}
