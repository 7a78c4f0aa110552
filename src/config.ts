import { readFile } from "fs/promises";
import { resolve } from "path";
import { isPlainRecord } from "./schema/values.js";

/**
 * Configuration file types
 *
 * Every field is optional in the JSON file; missing fields take the defaults
 * below, section by section.
 */

export interface RegistryConfig {
  /** Catalog file */
  path: string;
  /** Symbol path prefixes artifacts may live under; each ends with "." */
  namespaces: string[];
}

export interface DetectionConfig {
  baselineConfidence: number;
  /** null keeps every candidate */
  maxCandidatesPerField: number | null;
  /** Jaccard similarity of sample values above which a field counts as renamed */
  renameSimilarity: number;
  maxSamples: number;
}

export interface RefinementConfig {
  targetAccuracy: number;
  maxIterations: number;
  minImprovement: number;
  minPatternFrequency: number;
  minFieldFailures: number;
}

export interface HistoryConfig {
  /** SQLite file, or ":memory:" */
  path: string;
}

export interface Config {
  registry: RegistryConfig;
  detection: DetectionConfig;
  refinement: RefinementConfig;
  history: HistoryConfig;
}

export const DEFAULT_CONFIG: Config = {
  registry: {
    path: "./registry.json",
    namespaces: ["exemplar.artifacts."],
  },
  detection: {
    baselineConfidence: 0.5,
    maxCandidatesPerField: null,
    renameSimilarity: 0.5,
    maxSamples: 5,
  },
  refinement: {
    targetAccuracy: 0.9,
    maxIterations: 5,
    minImprovement: 0.01,
    minPatternFrequency: 0.2,
    minFieldFailures: 2,
  },
  history: {
    path: ":memory:",
  },
};

export const DEFAULT_CONFIG_FILE = "exemplar.config.json";

type Section = Record<string, unknown>;

function section(raw: Section, name: keyof Config): Section {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isPlainRecord(value)) throw new TypeError(`Config section '${name}' must be an object`);
  return value;
}

function number(raw: Section, key: string, fallback: number, where: string): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`Config '${where}.${key}' must be a number`);
  }
  return value;
}

function optionalNumber(raw: Section, key: string, fallback: number | null, where: string): number | null {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (value === null) return null;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`Config '${where}.${key}' must be a number or null`);
  }
  return value;
}

function string(raw: Section, key: string, fallback: string, where: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") throw new TypeError(`Config '${where}.${key}' must be a string`);
  return value;
}

function strings(raw: Section, key: string, fallback: string[], where: string): string[] {
  const value = raw[key];
  if (value === undefined) return [...fallback];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new TypeError(`Config '${where}.${key}' must be a list of strings`);
  }
  return value;
}

/**
 * Merge a parsed config document over the defaults.
 */
export function resolveConfig(document: unknown): Config {
  if (!isPlainRecord(document)) throw new TypeError("Config file must contain a JSON object");
  const defaults = DEFAULT_CONFIG;

  const registry = section(document, "registry");
  const detection = section(document, "detection");
  const refinement = section(document, "refinement");
  const history = section(document, "history");

  return {
    registry: {
      path: string(registry, "path", defaults.registry.path, "registry"),
      namespaces: strings(registry, "namespaces", defaults.registry.namespaces, "registry"),
    },
    detection: {
      baselineConfidence: number(detection, "baselineConfidence", defaults.detection.baselineConfidence, "detection"),
      maxCandidatesPerField: optionalNumber(
        detection,
        "maxCandidatesPerField",
        defaults.detection.maxCandidatesPerField,
        "detection"
      ),
      renameSimilarity: number(detection, "renameSimilarity", defaults.detection.renameSimilarity, "detection"),
      maxSamples: number(detection, "maxSamples", defaults.detection.maxSamples, "detection"),
    },
    refinement: {
      targetAccuracy: number(refinement, "targetAccuracy", defaults.refinement.targetAccuracy, "refinement"),
      maxIterations: number(refinement, "maxIterations", defaults.refinement.maxIterations, "refinement"),
      minImprovement: number(refinement, "minImprovement", defaults.refinement.minImprovement, "refinement"),
      minPatternFrequency: number(
        refinement,
        "minPatternFrequency",
        defaults.refinement.minPatternFrequency,
        "refinement"
      ),
      minFieldFailures: number(refinement, "minFieldFailures", defaults.refinement.minFieldFailures, "refinement"),
    },
    history: {
      path: string(history, "path", defaults.history.path, "history"),
    },
  };
}

export async function loadConfig(configPath?: string): Promise<Config> {
  const path = configPath || resolve(process.cwd(), DEFAULT_CONFIG_FILE);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      // Config file not found, use defaults
      return resolveConfig({});
    }
    throw error;
  }
  return resolveConfig(JSON.parse(content));
}
