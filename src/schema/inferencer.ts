/**
 * Schema Inferencer
 *
 * Walks example values and builds a path -> field schema. Types observed at the
 * same path are joined rather than rejected; nulls only mark a field nullable.
 */

import { SchemaInferenceError } from "../errors.js";
import {
  ROOT_PATH,
  childPath,
  elementPath,
  isElementPath,
  pathDepth,
  pathName,
} from "./paths.js";
import type {
  ExampleValue,
  FieldType,
  Schema,
  SchemaDifference,
  SchemaField,
} from "./types.js";
import { isPlainRecord, joinTypes, stableKey, valueType } from "./values.js";

export interface InferSchemaOptions {
  /** Distinct samples kept per field (default 5) */
  maxSamples?: number;
}

interface FieldAccumulator {
  types: FieldType[];
  itemTypes: FieldType[];
  nullable: boolean;
  presentIn: Set<number>;
  samples: Map<string, ExampleValue>;
}

function describeUnsupported(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (
      typeof proto === "object" &&
      proto !== null &&
      "constructor" in proto &&
      typeof proto.constructor === "function" &&
      proto.constructor.name
    ) {
      return proto.constructor.name;
    }
    return "object";
  }
  return typeof value;
}

/**
 * Check a single node (not its children) against the value model.
 */
function classify(value: unknown, path: string): FieldType {
  if (value === null) return "null";
  switch (typeof value) {
    case "string":
      return "string";
    case "boolean":
      return "boolean";
    case "bigint":
      return "decimal";
    case "number":
      if (!Number.isFinite(value)) {
        throw new SchemaInferenceError(path, `Non-finite number ${value}`);
      }
      return Number.isInteger(value) ? "integer" : "float";
    case "object":
      break;
    default:
      throw new SchemaInferenceError(path, `Unsupported ${describeUnsupported(value)} value`);
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SchemaInferenceError(path, "Invalid date");
    }
    return valueType(value);
  }
  if (Array.isArray(value)) return "list";
  if (isPlainRecord(value)) return "map";
  throw new SchemaInferenceError(path, `Unsupported ${describeUnsupported(value)} value`);
}

/**
 * Infer a schema from one or more example values.
 * An empty list yields an empty schema.
 */
export function inferSchema(
  values: readonly unknown[],
  options: InferSchemaOptions = {}
): Schema {
  const maxSamples = options.maxSamples ?? 5;
  const accumulators = new Map<string, FieldAccumulator>();

  const accumulatorFor = (path: string): FieldAccumulator => {
    let acc = accumulators.get(path);
    if (!acc) {
      acc = {
        types: [],
        itemTypes: [],
        nullable: false,
        presentIn: new Set(),
        samples: new Map(),
      };
      accumulators.set(path, acc);
    }
    return acc;
  };

  const walk = (
    value: unknown,
    path: string,
    example: number,
    ancestors: Set<object>
  ): ExampleValue => {
    const type = classify(value, path);
    const isRoot = path === ROOT_PATH;

    if (type === "map" || type === "list") {
      if (typeof value !== "object" || value === null) {
        throw new SchemaInferenceError(path, "Container expected");
      }
      if (ancestors.has(value)) {
        throw new SchemaInferenceError(path, "Circular reference");
      }
      ancestors.add(value);
    }

    let walked: ExampleValue;
    if (type === "list" && Array.isArray(value)) {
      const itemPath = elementPath(path);
      const items = value.map((item) => walk(item, itemPath, example, ancestors));
      const acc = accumulatorFor(path);
      for (const item of items) {
        if (item !== null) acc.itemTypes.push(valueType(item));
      }
      walked = items;
    } else if (type === "map" && isPlainRecord(value)) {
      const record: { [key: string]: ExampleValue } = {};
      for (const [key, child] of Object.entries(value)) {
        record[key] = walk(child, childPath(path, key), example, ancestors);
      }
      walked = record;
    } else if (type === "null") {
      walked = null;
    } else if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean" ||
      typeof value === "bigint" ||
      value instanceof Date
    ) {
      walked = value;
    } else {
      throw new SchemaInferenceError(path, "Unsupported value");
    }

    if (typeof value === "object" && value !== null) ancestors.delete(value);

    // An object at the root is the example itself, not a field.
    if (isRoot && type === "map") return walked;

    const acc = accumulatorFor(path);
    acc.presentIn.add(example);
    if (type === "null") {
      acc.nullable = true;
    } else if (!acc.types.includes(type)) {
      acc.types.push(type);
    }
    if (type !== "map" && acc.samples.size < maxSamples) {
      const key = stableKey(walked);
      if (!acc.samples.has(key)) acc.samples.set(key, walked);
    }
    return walked;
  };

  values.forEach((value, i) => {
    walk(value, ROOT_PATH, i, new Set());
  });

  const fields = new Map<string, SchemaField>();
  let maxDepth = 0;
  for (const [path, acc] of accumulators) {
    if (acc.presentIn.size === 0) continue;
    const type = acc.types.length === 0 && acc.nullable ? "null" : joinTypes(acc.types);
    const depth = pathDepth(path);
    maxDepth = Math.max(maxDepth, depth);
    const itemType = type === "list" ? joinItemTypes(acc.itemTypes) : undefined;
    fields.set(path, {
      path,
      name: pathName(path),
      type,
      observedTypes: [...acc.types],
      nullable: acc.nullable,
      required: acc.presentIn.size === values.length,
      depth,
      isArray: type === "list",
      ...(itemType ? { itemType } : {}),
      samples: [...acc.samples.values()],
    });
  }

  return { fields, exampleCount: values.length, maxDepth };
}

function joinItemTypes(types: readonly FieldType[]): FieldType {
  const distinct = [...new Set(types)];
  return joinTypes(distinct);
}

export interface DiffSchemasOptions {
  /**
   * Minimum Jaccard similarity between the sample sets of a removed and an
   * added field of the same type for them to be reported as a rename.
   */
  renameSimilarity?: number;
}

function jaccard(a: readonly ExampleValue[], b: readonly ExampleValue[]): number {
  const left = new Set(a.map(stableKey));
  const right = new Set(b.map(stableKey));
  if (left.size === 0 && right.size === 0) return 0;
  let shared = 0;
  for (const key of left) if (right.has(key)) shared++;
  return shared / (left.size + right.size - shared);
}

/**
 * Ordered differences from `before` to `after`: additions, removals, type
 * changes, then heuristic renames. A renamed pair is also listed as an
 * addition and a removal.
 */
export function diffSchemas(
  before: Schema,
  after: Schema,
  options: DiffSchemasOptions = {}
): SchemaDifference[] {
  const threshold = options.renameSimilarity ?? 0.5;
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new RangeError(`renameSimilarity must be within [0, 1], got ${threshold}`);
  }

  const added: SchemaField[] = [];
  const removed: SchemaField[] = [];
  const differences: SchemaDifference[] = [];

  for (const field of after.fields.values()) {
    if (!before.fields.has(field.path)) added.push(field);
  }
  for (const field of before.fields.values()) {
    if (!after.fields.has(field.path)) removed.push(field);
  }

  for (const field of added) {
    differences.push({
      kind: "field-added",
      path: field.path,
      toType: field.type,
      description: `Field '${field.path}' added (${field.type})`,
    });
  }
  for (const field of removed) {
    differences.push({
      kind: "field-removed",
      path: field.path,
      fromType: field.type,
      description: `Field '${field.path}' removed (${field.type})`,
    });
  }
  for (const field of before.fields.values()) {
    const other = after.fields.get(field.path);
    if (other && other.type !== field.type) {
      differences.push({
        kind: "type-changed",
        path: field.path,
        fromType: field.type,
        toType: other.type,
        description: `Field '${field.path}' changed from ${field.type} to ${other.type}`,
      });
    }
  }

  const claimed = new Set<string>();
  for (const gone of removed) {
    let best: { field: SchemaField; similarity: number } | null = null;
    for (const candidate of added) {
      if (claimed.has(candidate.path) || candidate.type !== gone.type) continue;
      const similarity = jaccard(gone.samples, candidate.samples);
      if (similarity > 0 && similarity >= threshold && (!best || similarity > best.similarity)) {
        best = { field: candidate, similarity };
      }
    }
    if (best) {
      claimed.add(best.field.path);
      differences.push({
        kind: "field-renamed",
        path: gone.path,
        toPath: best.field.path,
        fromType: gone.type,
        toType: best.field.type,
        similarity: best.similarity,
        description: `Field '${gone.path}' likely renamed to '${best.field.path}'`,
      });
    }
  }

  return differences;
}

/** Fields directly under the root */
export function topLevelFields(schema: Schema): SchemaField[] {
  return [...schema.fields.values()].filter((f) => f.depth === 0 && !isElementPath(f.path));
}

/** Fields below a map, outside arrays */
export function nestedFields(schema: Schema): SchemaField[] {
  return [...schema.fields.values()].filter((f) => f.depth > 0 && !isElementPath(f.path));
}

export function arrayFields(schema: Schema): SchemaField[] {
  return [...schema.fields.values()].filter((f) => f.isArray);
}
