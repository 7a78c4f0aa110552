/**
 * Pattern recognizers
 *
 * Each recognizer is a pure function from one output field and the example
 * pairs to zero or more scored candidates. The detector runs them in the order
 * of RECOGNIZERS; the order breaks confidence ties.
 */

import type { ExampleValue, Schema, SchemaField } from "../schema/types.js";
import {
  ROOT_PATH,
  childPath,
  elementPath,
  formatPath,
  getValueAtPath,
  isElementPath,
  parsePath,
  pathDepth,
} from "../schema/paths.js";
import {
  deepEqual,
  formatValue,
  isNumericType,
  stableKey,
  toCodeLiteral,
  valueType,
} from "../schema/values.js";
import { conversionsBetween, parseNumericText } from "./conversions.js";
import { synthesizeStringTransform } from "./string-transforms.js";
import type { ExamplePair, PatternExample, PatternKind } from "./types.js";

export interface RecognizerContext {
  readonly target: string;
  readonly targetField: SchemaField;
  readonly pairs: readonly ExamplePair[];
  /** Output value at the target, per pair */
  readonly outputs: readonly (ExampleValue | undefined)[];
  /** Concrete input locations, per pair */
  readonly inputs: readonly ReadonlyMap<string, ExampleValue>[];
  /** Indices of pairs whose output holds the target */
  readonly present: readonly number[];
  /** Concrete input paths in first-seen order */
  readonly inputPaths: readonly string[];
  readonly inputSchema: Schema;
  readonly outputSchema: Schema;
}

export interface PatternCandidate {
  kind: PatternKind;
  sourcePath: string | null;
  extraSources?: string[];
  consistency: number;
  /** 1 for exact structural rules, lower for heuristics */
  specificity: number;
  description: string;
  snippet?: string;
  params?: Record<string, ExampleValue>;
}

export interface Recognizer {
  readonly kind: PatternKind;
  recognize(ctx: RecognizerContext): PatternCandidate[];
}

const NUMERIC_TOLERANCE = 1e-6;

function inputAt(ctx: RecognizerContext, i: number, path: string): ExampleValue | undefined {
  return ctx.inputs[i].get(path);
}

/** Fraction of present examples satisfying `holds` */
function consistencyOf(ctx: RecognizerContext, holds: (i: number) => boolean): number {
  if (ctx.present.length === 0) return 0;
  let matched = 0;
  for (const i of ctx.present) {
    if (holds(i)) matched++;
  }
  return matched / ctx.present.length;
}

function closeEnough(a: number, b: number): boolean {
  return Math.abs(a - b) <= NUMERIC_TOLERANCE * Math.max(1, Math.abs(b));
}

function asNumber(value: ExampleValue | undefined): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/** Most consistent first */
function best<T extends { consistency: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.consistency - a.consistency);
}

function isLeaf(value: ExampleValue | undefined): boolean {
  return value !== undefined && !Array.isArray(value) && valueType(value) !== "map";
}

function roundParam(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/** Index segments of a concrete path */
function indices(path: string): number[] {
  return parsePath(path).filter((s): s is number => typeof s === "number");
}

/**
 * Input paths holding a value equal to the output, with match counts.
 */
function sameValueSources(ctx: RecognizerContext): Array<{ path: string; consistency: number }> {
  const results: Array<{ path: string; consistency: number }> = [];
  for (const path of ctx.inputPaths) {
    const consistency = consistencyOf(ctx, (i) => {
      const value = inputAt(ctx, i, path);
      return value !== undefined && deepEqual(value, ctx.outputs[i]);
    });
    if (consistency > 0) results.push({ path, consistency });
  }
  return results;
}

const directCopy: Recognizer = {
  kind: "direct-copy",
  recognize(ctx) {
    if (!ctx.inputPaths.includes(ctx.target)) return [];
    const consistency = consistencyOf(ctx, (i) => deepEqual(inputAt(ctx, i, ctx.target), ctx.outputs[i]));
    if (consistency === 0) return [];
    return [
      {
        kind: "direct-copy",
        sourcePath: ctx.target,
        consistency,
        specificity: 1,
        description: `Copy '${ctx.target}' unchanged`,
        snippet: "(v: unknown) => v",
      },
    ];
  },
};

function relocation(
  kind: PatternKind,
  accept: (path: string) => boolean,
  describe: (path: string, target: string) => string
): Recognizer {
  return {
    kind,
    recognize(ctx) {
      const sources = sameValueSources(ctx).filter((s) => s.path !== ctx.target && accept(s.path));
      return best(sources).map((s) => ({
        kind,
        sourcePath: s.path,
        consistency: s.consistency,
        specificity: 1,
        description: describe(s.path, ctx.target),
        snippet: "(v: unknown) => v",
      }));
    },
  };
}

const fieldRename = relocation(
  "field-rename",
  (path) => pathDepth(path) === 0 && !isElementPath(path),
  (path, target) => `Rename '${path}' to '${target}'`
);

const nestedExtraction = relocation(
  "nested-extraction",
  (path) => pathDepth(path) > 0 && !isElementPath(path),
  (path, target) => `Extract nested '${path}' into '${target}'`
);

const arrayFirst = relocation(
  "array-first",
  (path) => indices(path).length > 0 && indices(path).every((i) => i === 0),
  (path, target) => `Take the first element via '${path}' into '${target}'`
);

const arrayElement: Recognizer = {
  kind: "array-element",
  recognize(ctx) {
    const candidates: PatternCandidate[] = [];

    const fixed = sameValueSources(ctx).filter((s) => indices(s.path).some((i) => i > 0));
    for (const s of fixed) {
      candidates.push({
        kind: "array-element",
        sourcePath: s.path,
        consistency: s.consistency,
        specificity: 1,
        description: `Take element '${s.path}' into '${ctx.target}'`,
        snippet: "(v: unknown) => v",
      });
    }

    // Last element, for lists outside other lists
    for (const field of ctx.inputSchema.fields.values()) {
      if (!field.isArray || isElementPath(field.path)) continue;
      const base = parsePath(field.path);
      const lastPaths = [
        elementPath(field.path, -1),
        ...elementKeyPaths(ctx.inputSchema, field.path).map(({ keys }) => formatPath([...base, -1, ...keys])),
      ];
      const multiElement = ctx.present.some((i) => {
        const list = inputAt(ctx, i, field.path);
        return Array.isArray(list) && list.length > 1;
      });
      if (!multiElement) continue;
      for (const path of lastPaths) {
        const consistency = consistencyOf(ctx, (i) => {
          const value = resolveLast(ctx, i, path);
          return value !== undefined && deepEqual(value, ctx.outputs[i]);
        });
        if (consistency > 0) {
          candidates.push({
            kind: "array-element",
            sourcePath: path,
            consistency,
            specificity: 1,
            description: `Take the last element via '${path}' into '${ctx.target}'`,
            snippet: "(v: unknown) => v",
          });
        }
      }
    }
    return best(candidates);
  },
};

/** Key paths below the elements of list `path`: ["name"] for items[].name */
function elementKeyPaths(schema: Schema, path: string): Array<{ keys: string[]; field: SchemaField }> {
  const depth = parsePath(path).length;
  const elements = elementPath(path);
  const found: Array<{ keys: string[]; field: SchemaField }> = [];
  for (const child of schema.fields.values()) {
    const segments = parsePath(child.path);
    if (segments.length <= depth + 1 || formatPath(segments.slice(0, depth + 1)) !== elements) continue;
    const keys = segments.slice(depth + 1);
    if (keys.every((s): s is string => typeof s === "string")) found.push({ keys, field: child });
  }
  return found;
}

const typeConversion: Recognizer = {
  kind: "type-conversion",
  recognize(ctx) {
    if (ctx.present.length === 0) return [];
    const first = ctx.present[0];
    const output = ctx.outputs[first];
    if (output === undefined) return [];

    const sources = ctx.inputPaths.includes(ctx.target)
      ? [ctx.target, ...ctx.inputPaths.filter((p) => p !== ctx.target)]
      : [...ctx.inputPaths];
    const candidates: PatternCandidate[] = [];

    for (const path of sources) {
      const sample = inputAt(ctx, first, path);
      if (!isLeaf(sample) || sample === undefined) continue;
      const samePath = path === ctx.target;

      let chosen: PatternCandidate | null = null;
      for (const conversion of conversionsBetween(sample, output)) {
        const consistency = consistencyOf(ctx, (i) => {
          const value = inputAt(ctx, i, path);
          if (value === undefined) return false;
          const converted = conversion.apply(value);
          return converted !== undefined && deepEqual(converted, ctx.outputs[i], 1e-9);
        });
        if (consistency === 0 || (!samePath && consistency < 0.5)) continue;
        if (!chosen || consistency > chosen.consistency) {
          chosen = {
            kind: "type-conversion",
            sourcePath: path,
            consistency,
            specificity: samePath ? 1 : 0.8,
            description: `Convert '${path}' (${valueType(sample)}) to ${valueType(output)} via ${conversion.name}`,
            snippet: conversion.code,
            params: { conversion: conversion.name },
          };
        }
      }
      if (chosen) candidates.push(chosen);
    }
    return best(candidates);
  },
};

const stringConcatenation: Recognizer = {
  kind: "string-concatenation",
  recognize(ctx) {
    if (ctx.present.length === 0) return [];
    const first = ctx.present[0];
    const output = ctx.outputs[first];
    if (typeof output !== "string") return [];

    const parts = ctx.inputPaths.filter((path) => {
      const value = inputAt(ctx, first, path);
      if (typeof value !== "string" && typeof value !== "number") return false;
      const text = String(value);
      return text.length > 0 && text !== output && output.includes(text);
    });
    if (parts.length < 2 || parts.length > 30) return [];

    const separators = [" ", ", ", "-", "_", "/", " - ", ": ", ""];
    const candidates: PatternCandidate[] = [];
    for (const a of parts) {
      for (const b of parts) {
        if (a === b) continue;
        for (const sep of separators) {
          const consistency = consistencyOf(ctx, (i) => {
            const left = inputAt(ctx, i, a);
            const right = inputAt(ctx, i, b);
            if (left === undefined || right === undefined) return false;
            return `${String(left)}${sep}${String(right)}` === ctx.outputs[i];
          });
          if (consistency < 0.5) continue;
          candidates.push({
            kind: "string-concatenation",
            sourcePath: a,
            extraSources: [b],
            consistency,
            specificity: 0.5,
            description: `Join '${a}' and '${b}' with ${JSON.stringify(sep)}`,
            snippet: `(a: unknown, b: unknown) => \`\${String(a)}${sep.replace(/[`\\$]/g, "\\$&")}\${String(b)}\``,
            params: { separator: sep },
          });
        }
      }
    }
    return best(candidates);
  },
};

const stringManipulation: Recognizer = {
  kind: "string-manipulation",
  recognize(ctx) {
    if (ctx.present.length === 0) return [];
    const first = ctx.present[0];
    const output = ctx.outputs[first];
    if (output === undefined || output === null) return [];

    const sources = ctx.inputPaths
      .filter((path) => typeof inputAt(ctx, first, path) === "string")
      .sort((a, b) => Number(b === ctx.target) - Number(a === ctx.target))
      .slice(0, 15);

    const candidates: PatternCandidate[] = [];
    for (const path of sources) {
      const examples: Array<{ input: string; output: ExampleValue }> = [];
      for (const i of ctx.present) {
        const value = inputAt(ctx, i, path);
        const out = ctx.outputs[i];
        if (typeof value !== "string" || out === undefined) break;
        examples.push({ input: value, output: out });
      }
      if (examples.length !== ctx.present.length) continue;
      // Clean numeric text is a type conversion, not a string rule
      if (
        typeof output === "number" &&
        examples.every((e) => parseNumericText(e.input) !== undefined)
      ) {
        continue;
      }
      const transform = synthesizeStringTransform(examples);
      if (!transform) continue;
      candidates.push({
        kind: "string-manipulation",
        sourcePath: path,
        consistency: 1,
        specificity: 0.5,
        description: `${transform.description} of '${path}'`,
        snippet: transform.code,
        params: { transform: transform.name, input: "string" },
      });
    }
    return best(candidates);
  },
};

const constant: Recognizer = {
  kind: "constant",
  recognize(ctx) {
    if (ctx.present.length === 0 || ctx.present.length !== ctx.pairs.length) return [];
    const value = ctx.outputs[ctx.present[0]];
    if (value === undefined) return [];
    if (!ctx.present.every((i) => deepEqual(ctx.outputs[i], value))) return [];
    return [
      {
        kind: "constant",
        sourcePath: null,
        consistency: 1,
        specificity: ctx.present.length >= 2 ? 1 : 0,
        description: `Constant ${formatValue(value)}`,
        snippet: `() => ${toCodeLiteral(value)}`,
        params: { value },
      },
    ];
  },
};

function numericSources(ctx: RecognizerContext): string[] {
  return ctx.inputPaths
    .filter((p) => !isElementPath(p))
    .filter((p) => ctx.present.every((i) => asNumber(inputAt(ctx, i, p)) !== undefined))
    .slice(0, 12);
}

const BINARY_OPERATORS: Array<{ symbol: string; apply: (x: number, y: number) => number }> = [
  { symbol: "+", apply: (x, y) => x + y },
  { symbol: "-", apply: (x, y) => x - y },
  { symbol: "*", apply: (x, y) => x * y },
  { symbol: "/", apply: (x, y) => x / y },
];

const calculation: Recognizer = {
  kind: "calculation",
  recognize(ctx) {
    if (ctx.present.length < 2) return [];
    if (!ctx.present.every((i) => typeof ctx.outputs[i] === "number")) return [];
    const out = (i: number): number => asNumber(ctx.outputs[i]) ?? Number.NaN;
    const sources = numericSources(ctx);
    const candidates: PatternCandidate[] = [];

    // y = a * x + b, needs a third point to be evidence rather than a fit
    if (ctx.present.length >= 3) {
      for (const path of sources) {
        const x = (i: number): number => asNumber(inputAt(ctx, i, path)) ?? Number.NaN;
        const [p, ...rest] = ctx.present;
        const q = rest.find((i) => x(i) !== x(p));
        if (q === undefined) continue;
        const a = roundParam((out(q) - out(p)) / (x(q) - x(p)));
        const b = roundParam(out(p) - a * x(p));
        if (a === 0 || (a === 1 && b === 0)) continue;
        const consistency = consistencyOf(ctx, (i) => closeEnough(a * x(i) + b, out(i)));
        if (consistency < 0.5) continue;
        candidates.push({
          kind: "calculation",
          sourcePath: path,
          consistency,
          specificity: 1,
          description: `Compute ${a} * '${path}' + ${b}`,
          snippet: `(x: unknown) => Number(x) * ${a} + ${b}`,
          params: { operator: "linear", scale: a, offset: b },
        });
      }
    }

    for (const left of sources) {
      for (const right of sources) {
        if (left === right) continue;
        for (const op of BINARY_OPERATORS) {
          if ((op.symbol === "+" || op.symbol === "*") && left > right) continue;
          const consistency = consistencyOf(ctx, (i) => {
            const x = asNumber(inputAt(ctx, i, left));
            const y = asNumber(inputAt(ctx, i, right));
            if (x === undefined || y === undefined) return false;
            const result = op.apply(x, y);
            return Number.isFinite(result) && closeEnough(result, out(i));
          });
          if (consistency < 0.5) continue;
          candidates.push({
            kind: "calculation",
            sourcePath: left,
            extraSources: [right],
            consistency,
            specificity: ctx.present.length >= 3 ? 1 : 0.5,
            description: `Compute '${left}' ${op.symbol} '${right}'`,
            snippet: `(x: unknown, y: unknown) => Number(x) ${op.symbol} Number(y)`,
            params: { operator: op.symbol },
          });
        }
      }
    }
    return best(candidates);
  },
};

interface Aggregator {
  name: string;
  apply: (values: number[]) => number | undefined;
  code: (read: string) => string;
}

const AGGREGATORS: Aggregator[] = [
  {
    name: "sum",
    apply: (v) => v.reduce((t, x) => t + x, 0),
    code: (read) => `(items: unknown) => (Array.isArray(items) ? items.reduce((t: number, x) => t + Number(${read}), 0) : 0)`,
  },
  {
    name: "min",
    apply: (v) => (v.length > 0 ? Math.min(...v) : undefined),
    code: (read) => `(items: unknown) => (Array.isArray(items) ? Math.min(...items.map((x) => Number(${read}))) : null)`,
  },
  {
    name: "max",
    apply: (v) => (v.length > 0 ? Math.max(...v) : undefined),
    code: (read) => `(items: unknown) => (Array.isArray(items) ? Math.max(...items.map((x) => Number(${read}))) : null)`,
  },
  {
    name: "avg",
    apply: (v) => (v.length > 0 ? v.reduce((t, x) => t + x, 0) / v.length : undefined),
    code: (read) =>
      `(items: unknown) => (Array.isArray(items) && items.length > 0 ? items.reduce((t: number, x) => t + Number(${read}), 0) / items.length : null)`,
  },
];

const aggregation: Recognizer = {
  kind: "aggregation",
  recognize(ctx) {
    if (ctx.present.length === 0) return [];
    if (!ctx.present.every((i) => typeof ctx.outputs[i] === "number")) return [];
    const out = (i: number): number => asNumber(ctx.outputs[i]) ?? Number.NaN;
    const candidates: PatternCandidate[] = [];

    for (const field of ctx.inputSchema.fields.values()) {
      if (!field.isArray || isElementPath(field.path)) continue;
      const list = (i: number): ExampleValue[] | undefined => {
        const value = inputAt(ctx, i, field.path);
        return Array.isArray(value) ? value : undefined;
      };

      const count = consistencyOf(ctx, (i) => list(i)?.length === out(i));
      if (count > 0) {
        candidates.push({
          kind: "aggregation",
          sourcePath: field.path,
          consistency: count,
          specificity: 1,
          description: `Count of '${field.path}'`,
          snippet: "(items: unknown) => (Array.isArray(items) ? items.length : 0)",
          params: { aggregate: "count" },
        });
      }

      // Numeric elements directly, or one numeric key of object elements
      const selectors: Array<{ key: string | null }> = [];
      if (field.itemType && isNumericType(field.itemType)) selectors.push({ key: null });
      for (const { keys, field: child } of elementKeyPaths(ctx.inputSchema, field.path)) {
        if (keys.length === 1 && isNumericType(child.type)) selectors.push({ key: keys[0] });
      }

      for (const { key } of selectors) {
        const numbers = (i: number): number[] | undefined => {
          const items = list(i);
          if (!items) return undefined;
          const values: number[] = [];
          for (const item of items) {
            const value = key === null ? item : getValueAtPath(item, childPath(ROOT_PATH, key));
            if (typeof value !== "number") return undefined;
            values.push(value);
          }
          return values;
        };
        for (const aggregator of AGGREGATORS) {
          const consistency = consistencyOf(ctx, (i) => {
            const values = numbers(i);
            const result = values ? aggregator.apply(values) : undefined;
            return result !== undefined && closeEnough(result, out(i));
          });
          if (consistency === 0) continue;
          const label = key === null ? field.path : childPath(elementPath(field.path), key);
          candidates.push({
            kind: "aggregation",
            sourcePath: field.path,
            consistency,
            specificity: 1,
            description: `${aggregator.name} of '${label}'`,
            snippet: aggregator.code(key === null ? "x" : `x?.[${JSON.stringify(key)}]`),
            params: { aggregate: aggregator.name, key },
          });
        }
      }
    }
    return best(candidates);
  },
};

const conditional: Recognizer = {
  kind: "conditional",
  recognize(ctx) {
    if (ctx.present.length < 2) return [];
    const outputs = ctx.present.map((i) => ctx.outputs[i]);
    const first = outputs[0];
    if (first === undefined || outputs.every((o) => deepEqual(o, first))) return [];
    if (!outputs.every((o) => isLeaf(o))) return [];
    const candidates: PatternCandidate[] = [];

    for (const path of ctx.inputPaths) {
      if (path === ROOT_PATH || isElementPath(path)) continue;
      const values = ctx.present.map((i) => inputAt(ctx, i, path));
      if (!values.every((v) => isLeaf(v))) continue;

      // Lookup table keyed by the input value
      const groups = new Map<string, Map<string, { value: ExampleValue; count: number }>>();
      ctx.present.forEach((i, n) => {
        const input = values[n];
        const output = ctx.outputs[i];
        if (input === undefined || output === undefined) return;
        const key = stableKey(input);
        const bucket = groups.get(key) ?? new Map<string, { value: ExampleValue; count: number }>();
        const entry = bucket.get(stableKey(output)) ?? { value: output, count: 0 };
        entry.count++;
        bucket.set(stableKey(output), entry);
        groups.set(key, bucket);
      });
      const repeated = [...groups.values()].some(
        (bucket) => [...bucket.values()].reduce((t, e) => t + e.count, 0) > 1
      );
      const identity = ctx.present.every((i, n) => deepEqual(values[n], ctx.outputs[i]));
      if (repeated && !identity) {
        let agreeing = 0;
        const table: Record<string, ExampleValue> = {};
        for (const [key, bucket] of groups) {
          const winner = [...bucket.values()].sort((a, b) => b.count - a.count)[0];
          agreeing += winner.count;
          table[key] = winner.value;
        }
        const consistency = agreeing / ctx.present.length;
        if (consistency >= 0.75) {
          const entries = Object.entries(table)
            .map(([k, v]) => `[${JSON.stringify(k)}, ${toCodeLiteral(v)}]`)
            .join(", ");
          candidates.push({
            kind: "conditional",
            sourcePath: path,
            consistency,
            specificity: 0.5,
            description: `Map values of '${path}' through a lookup table`,
            snippet: `(v: unknown) => new Map<string, unknown>([${entries}]).get(JSON.stringify(v)) ?? null`,
            params: { table },
          });
        }
      }

      // Boolean threshold over a numeric input
      if (outputs.every((o) => typeof o === "boolean") && values.every((v) => typeof v === "number")) {
        const trues = ctx.present.filter((i) => ctx.outputs[i] === true).map((i) => asNumber(inputAt(ctx, i, path)) ?? 0);
        const falses = ctx.present.filter((i) => ctx.outputs[i] === false).map((i) => asNumber(inputAt(ctx, i, path)) ?? 0);
        if (trues.length > 0 && falses.length > 0) {
          const above = Math.min(...trues) > Math.max(...falses);
          const below = Math.max(...trues) < Math.min(...falses);
          if (above || below) {
            const threshold = above ? Math.max(...falses) : Math.min(...falses);
            const op = above ? ">" : "<";
            candidates.push({
              kind: "conditional",
              sourcePath: path,
              consistency: 1,
              specificity: 0.5,
              description: `True when '${path}' ${op} ${threshold}`,
              snippet: `(v: unknown) => Number(v) ${op} ${threshold}`,
              params: { operator: op, threshold },
            });
          }
        }
      }
    }
    return best(candidates);
  },
};

const defaultValue: Recognizer = {
  kind: "default-value",
  recognize(ctx) {
    if (ctx.present.length < 2) return [];
    const sources = ctx.inputPaths.includes(ctx.target)
      ? [ctx.target, ...ctx.inputPaths.filter((p) => p !== ctx.target)]
      : [...ctx.inputPaths];
    // Paths missing from some inputs never show up in the first one
    for (const field of ctx.inputSchema.fields.values()) {
      if (!isElementPath(field.path) && !sources.includes(field.path)) sources.push(field.path);
    }

    const candidates: PatternCandidate[] = [];
    for (const path of sources) {
      if (isElementPath(path)) continue;
      const missing = ctx.present.filter((i) => {
        const v = inputAt(ctx, i, path);
        return v === undefined || v === null;
      });
      const supplied = ctx.present.filter((i) => !missing.includes(i));
      if (missing.length === 0 || supplied.length === 0) continue;

      const fallback = ctx.outputs[missing[0]];
      if (fallback === undefined || fallback === null) continue;
      let agreeing = 0;
      for (const i of supplied) if (deepEqual(inputAt(ctx, i, path), ctx.outputs[i])) agreeing++;
      if (agreeing === 0) continue;
      for (const i of missing) if (deepEqual(ctx.outputs[i], fallback)) agreeing++;
      const consistency = agreeing / ctx.present.length;
      if (consistency < 0.5) continue;
      candidates.push({
        kind: "default-value",
        sourcePath: path,
        consistency,
        specificity: 1,
        description: `Use '${path}', defaulting to ${formatValue(fallback)}`,
        snippet: `(v: unknown) => v ?? ${toCodeLiteral(fallback)}`,
        params: { default: fallback },
      });
    }
    return best(candidates);
  },
};

/**
 * Fixed recognizer order. `complex` is not listed: the detector adds it as a
 * fallback.
 */
export const RECOGNIZERS: readonly Recognizer[] = [
  directCopy,
  fieldRename,
  nestedExtraction,
  arrayFirst,
  arrayElement,
  typeConversion,
  defaultValue,
  constant,
  aggregation,
  calculation,
  stringConcatenation,
  stringManipulation,
  conditional,
];

function tokens(value: ExampleValue | undefined): Set<string> {
  if (value === undefined || value === null) return new Set();
  const text = typeof value === "string" ? value : stableKey(value);
  return new Set(
    (text.toLowerCase().match(/[a-z]{3,}|\d+/g) ?? []).filter((t) => t.length >= 3 || /^\d+$/.test(t))
  );
}

/**
 * Low-confidence fallback when the output visibly draws on the input but no
 * rule reproduces it. Returns null when there is no shared evidence.
 */
export function recognizeComplex(ctx: RecognizerContext): PatternCandidate | null {
  const consistency = consistencyOf(ctx, (i) => {
    const wanted = tokens(ctx.outputs[i]);
    if (wanted.size === 0) return false;
    for (const value of ctx.inputs[i].values()) {
      if (!isLeaf(value)) continue;
      for (const token of tokens(value)) if (wanted.has(token)) return true;
    }
    return false;
  });
  if (consistency === 0) return null;
  return {
    kind: "complex",
    sourcePath: null,
    consistency,
    specificity: 0,
    description: `No simple rule reproduces '${ctx.target}'; derive it from the input text`,
  };
}

export function candidateExamples(ctx: RecognizerContext, candidate: PatternCandidate): PatternExample[] {
  return ctx.present.map((i) => ({
    input: candidate.sourcePath === null ? undefined : inputAt(ctx, i, candidate.sourcePath) ?? resolveLast(ctx, i, candidate.sourcePath),
    output: ctx.outputs[i],
  }));
}

function resolveLast(ctx: RecognizerContext, i: number, path: string): ExampleValue | undefined {
  if (!parsePath(path).includes(-1)) return undefined;
  return getValueAtPath(ctx.pairs[i].input, path);
}
