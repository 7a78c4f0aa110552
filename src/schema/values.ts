/**
 * Value helpers shared by inference, detection and evaluation
 */

import type { ExampleValue, FieldType } from "./types.js";

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isUtcMidnight(date: Date): boolean {
  return (
    date.getUTCHours() === 0 &&
    date.getUTCMinutes() === 0 &&
    date.getUTCSeconds() === 0 &&
    date.getUTCMilliseconds() === 0
  );
}

/**
 * Type of a single, already validated value.
 */
export function valueType(value: ExampleValue): FieldType {
  if (value === null) return "null";
  if (typeof value === "string") return "string";
  if (typeof value === "boolean") return "boolean";
  if (typeof value === "bigint") return "decimal";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "float";
  }
  if (value instanceof Date) return isUtcMidnight(value) ? "date" : "datetime";
  if (Array.isArray(value)) return "list";
  return "map";
}

const NUMERIC: ReadonlySet<FieldType> = new Set(["integer", "float", "decimal"]);
const TEMPORAL: ReadonlySet<FieldType> = new Set(["date", "datetime"]);

export function isNumericType(type: FieldType): boolean {
  return NUMERIC.has(type);
}

function joinPair(a: FieldType, b: FieldType): FieldType {
  if (a === b) return a;
  if (NUMERIC.has(a) && NUMERIC.has(b)) {
    return a === "decimal" || b === "decimal" ? "decimal" : "float";
  }
  if (TEMPORAL.has(a) && TEMPORAL.has(b)) return "datetime";
  return "unknown";
}

/**
 * Least common type of a set of observations (null excluded by the caller).
 */
export function joinTypes(types: readonly FieldType[]): FieldType {
  if (types.length === 0) return "unknown";
  return types.reduce(joinPair);
}

/**
 * Canonical text form of a value: object keys sorted, dates as ISO strings.
 * Two values with the same key are deep-equal.
 */
export function stableKey(value: ExampleValue): string {
  if (value === null) return "null";
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) return `@${value.toISOString()}`;
  if (Array.isArray(value)) return `[${value.map(stableKey).join(",")}]`;
  if (typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${stableKey(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

/**
 * Deep equality. `tolerance` applies to numbers only.
 */
export function deepEqual(a: unknown, b: unknown, tolerance = 0): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") {
    return tolerance > 0 && Math.abs(a - b) <= tolerance;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((v, i) => deepEqual(v, b[i], tolerance));
  }
  if (isPlainRecord(a) && isPlainRecord(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((k) => k in b && deepEqual(a[k], b[k], tolerance));
  }
  return false;
}

/**
 * Narrow an unknown value to ExampleValue without walking further than needed.
 * Returns undefined for anything outside the value model.
 */
export function asExampleValue(value: unknown): ExampleValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
    case "bigint":
      return value;
    case "number":
      return Number.isFinite(value) ? value : undefined;
    case "object":
      break;
    default:
      return undefined;
  }
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value;
  if (Array.isArray(value)) {
    const items: ExampleValue[] = [];
    for (const item of value) {
      const narrowed = asExampleValue(item);
      if (narrowed === undefined) return undefined;
      items.push(narrowed);
    }
    return items;
  }
  if (isPlainRecord(value)) {
    const record: { [key: string]: ExampleValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const narrowed = asExampleValue(item);
      if (narrowed === undefined) return undefined;
      record[key] = narrowed;
    }
    return record;
  }
  return undefined;
}

export function isRecordValue(
  value: ExampleValue | undefined
): value is { [key: string]: ExampleValue } {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/** Short human-readable rendering used in descriptions and prompts */
export function formatValue(value: ExampleValue | undefined, max = 40): string {
  if (value === undefined) return "(absent)";
  const text = stableKey(value);
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * TypeScript source literal for a value.
 */
export function toCodeLiteral(value: ExampleValue): string {
  if (value === null) return "null";
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) return `new Date(${JSON.stringify(value.toISOString())})`;
  if (Array.isArray(value)) return `[${value.map(toCodeLiteral).join(", ")}]`;
  if (typeof value === "object") {
    const entries = Object.entries(value).map(
      ([k, v]) => `${JSON.stringify(k)}: ${toCodeLiteral(v)}`
    );
    return `{ ${entries.join(", ")} }`;
  }
  return JSON.stringify(value);
}
