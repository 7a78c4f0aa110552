/**
 * String transforms
 *
 * A table of named single-string rules (text -> value) plus search strategies
 * for prefix/suffix stripping, delimiter fields and embedded numbers. Each rule
 * carries the expression the synthesizer emits into generated code.
 */

import type { ExampleValue } from "../schema/types.js";
import { deepEqual } from "../schema/values.js";

export interface StringTransform {
  name: string;
  description: string;
  /** Expression of type `(s: string) => unknown` */
  code: string;
  apply: (s: string) => ExampleValue;
}

export interface StringTransformTemplate extends StringTransform {
  inputPattern: RegExp;
  outputType: "number" | "string" | "array";
}

export interface StringExample {
  input: string;
  output: ExampleValue;
}

export const STRING_TRANSFORMS: StringTransformTemplate[] = [
  // Key: Value -> Value
  {
    name: "key_value_value",
    description: "Value from a 'key: value' pair",
    inputPattern: /^[^:]+:\s*.+$/,
    outputType: "string",
    code: "(s: string) => s.replace(/^[^:]+:\\s*/, \"\").trim()",
    apply: (s) => s.replace(/^[^:]+:\s*/, "").trim(),
  },

  // Key: Value -> Key
  {
    name: "key_value_key",
    description: "Key from a 'key: value' pair",
    inputPattern: /^[^:]+:\s*.+$/,
    outputType: "string",
    code: "(s: string) => s.slice(0, s.indexOf(\":\")).trim()",
    apply: (s) => s.slice(0, s.indexOf(":")).trim(),
  },

  // key=value -> value
  {
    name: "key_equals_value",
    description: "Value from a 'key=value' pair",
    inputPattern: /^[^=]+=.+$/,
    outputType: "string",
    code: "(s: string) => s.slice(s.indexOf(\"=\") + 1)",
    apply: (s) => s.slice(s.indexOf("=") + 1),
  },

  {
    name: "split_comma",
    description: "Split on commas",
    inputPattern: /^[^,]+,[^,]+(,[^,]+)*$/,
    outputType: "array",
    code: "(s: string) => s.split(\",\").map((x) => x.trim())",
    apply: (s) => s.split(",").map((x) => x.trim()),
  },

  {
    name: "split_pipe",
    description: "Split on pipes",
    inputPattern: /^[^|]+\|[^|]+(\|[^|]+)*$/,
    outputType: "array",
    code: "(s: string) => s.split(\"|\").map((x) => x.trim())",
    apply: (s) => s.split("|").map((x) => x.trim()),
  },

  {
    name: "bracket_content",
    description: "Content of [brackets] or (parentheses)",
    inputPattern: /^(\[.*\]|\(.*\))$/,
    outputType: "string",
    code: "(s: string) => s.slice(1, -1)",
    apply: (s) => s.slice(1, -1),
  },

  {
    name: "trim",
    description: "Trim surrounding whitespace",
    inputPattern: /^\s|\s$/,
    outputType: "string",
    code: "(s: string) => s.trim()",
    apply: (s) => s.trim(),
  },

  {
    name: "upper_case",
    description: "Upper-case",
    inputPattern: /[a-z]/,
    outputType: "string",
    code: "(s: string) => s.trim().toUpperCase()",
    apply: (s) => s.trim().toUpperCase(),
  },

  {
    name: "lower_case",
    description: "Lower-case",
    inputPattern: /[A-Z]/,
    outputType: "string",
    code: "(s: string) => s.trim().toLowerCase()",
    apply: (s) => s.trim().toLowerCase(),
  },

  {
    name: "title_case",
    description: "Capitalize each word",
    inputPattern: /[a-zA-Z]/,
    outputType: "string",
    code: "(s: string) => s.trim().toLowerCase().replace(/\\b\\w/g, (c) => c.toUpperCase())",
    apply: (s) => s.trim().toLowerCase().replace(/\b\w/g, (c) => c.toUpperCase()),
  },

  {
    name: "embedded_currency",
    description: "Currency amount embedded in text",
    inputPattern: /[$€£]\s?[\d,]+(\.\d+)?/,
    outputType: "number",
    code: "(s: string) => { const m = s.match(/[$€£]\\s?([\\d,]+(\\.\\d+)?)/); return m ? parseFloat(m[1].replace(/,/g, \"\")) : null; }",
    apply: (s) => {
      const m = s.match(/[$€£]\s?([\d,]+(\.\d+)?)/);
      return m ? parseFloat(m[1].replace(/,/g, "")) : null;
    },
  },

  {
    name: "embedded_number",
    description: "First number embedded in text",
    inputPattern: /\d/,
    outputType: "number",
    code: "(s: string) => { const m = s.match(/-?\\d[\\d,]*(\\.\\d+)?/); return m ? parseFloat(m[0].replace(/,/g, \"\")) : null; }",
    apply: (s) => {
      const m = s.match(/-?\d[\d,]*(\.\d+)?/);
      return m ? parseFloat(m[0].replace(/,/g, "")) : null;
    },
  },
];

/**
 * Same input mapped to two different outputs
 */
function hasConflicts(examples: readonly StringExample[]): boolean {
  const seen = new Map<string, ExampleValue>();
  for (const ex of examples) {
    const previous = seen.get(ex.input);
    if (previous !== undefined && !deepEqual(previous, ex.output)) return true;
    seen.set(ex.input, ex.output);
  }
  return false;
}

function findCommonPrefix(strings: readonly string[]): string {
  if (strings.length === 0) return "";
  let prefix = strings[0];
  for (const s of strings.slice(1)) {
    while (!s.startsWith(prefix)) {
      prefix = prefix.slice(0, -1);
      if (prefix === "") return "";
    }
  }
  return prefix;
}

function findCommonSuffix(strings: readonly string[]): string {
  if (strings.length === 0) return "";
  let suffix = strings[0];
  for (const s of strings.slice(1)) {
    while (!s.endsWith(suffix)) {
      suffix = suffix.slice(1);
      if (suffix === "") return "";
    }
  }
  return suffix;
}

function reproduces(transform: (s: string) => ExampleValue, examples: readonly StringExample[]): boolean {
  return examples.every((e) => deepEqual(transform(e.input), e.output, 1e-9));
}

function outputKind(value: ExampleValue): "number" | "string" | "array" | "other" {
  if (typeof value === "number") return "number";
  if (typeof value === "string") return "string";
  if (Array.isArray(value)) return "array";
  return "other";
}

/**
 * Find a single string rule reproducing every example, or null.
 * Identity is never returned.
 */
export function synthesizeStringTransform(
  examples: readonly StringExample[]
): StringTransform | null {
  if (examples.length === 0 || hasConflicts(examples)) return null;
  if (examples.every((e) => e.input === e.output)) return null;

  const kind = outputKind(examples[0].output);
  if (kind === "other" || !examples.every((e) => outputKind(e.output) === kind)) {
    return null;
  }

  for (const template of STRING_TRANSFORMS) {
    if (template.outputType !== kind) continue;
    if (!examples.every((e) => template.inputPattern.test(e.input))) continue;
    if (reproduces(template.apply, examples)) {
      const { name, description, code, apply } = template;
      return { name, description, code, apply };
    }
  }

  if (kind !== "string") return null;

  return tryPrefixSuffix(examples) ?? tryDelimiterField(examples);
}

function tryPrefixSuffix(examples: readonly StringExample[]): StringTransform | null {
  // Common affixes need at least two inputs to mean anything
  if (examples.length < 2) return null;
  const inputs = examples.map((e) => e.input);
  const prefix = findCommonPrefix(inputs);
  const suffix = findCommonSuffix(inputs);
  if (prefix.length === 0 && suffix.length === 0) return null;

  const start = prefix.length;
  const end = suffix.length;
  const apply = (s: string): string => (end > 0 ? s.slice(start, -end) : s.slice(start));
  if (!reproduces(apply, examples)) return null;

  return {
    name: "prefix_suffix_strip",
    description: `Remove prefix ${JSON.stringify(prefix)} and suffix ${JSON.stringify(suffix)}`,
    code: end > 0 ? `(s: string) => s.slice(${start}, ${-end})` : `(s: string) => s.slice(${start})`,
    apply,
  };
}

function tryDelimiterField(examples: readonly StringExample[]): StringTransform | null {
  const delimiters = [",", "|", "\t", ";", " - ", " ", "/"];

  for (const delim of delimiters) {
    if (!examples.every((e) => e.input.includes(delim))) continue;

    for (let index = 0; index < 10; index++) {
      const apply = (s: string): string | null => s.split(delim).map((x) => x.trim())[index] ?? null;
      if (!reproduces(apply, examples)) continue;
      return {
        name: `delimiter_field_${index}`,
        description: `Field ${index} of ${JSON.stringify(delim)}-separated text`,
        code: `(s: string) => s.split(${JSON.stringify(delim)}).map((x) => x.trim())[${index}] ?? null`,
        apply,
      };
    }
  }
  return null;
}
