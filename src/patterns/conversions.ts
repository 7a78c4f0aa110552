/**
 * Type conversions recognized between an input value and an output value of a
 * different type.
 */

import type { ExampleValue, FieldType } from "../schema/types.js";
import { valueType } from "../schema/values.js";

export interface Conversion {
  name: string;
  from: readonly FieldType[];
  to: readonly FieldType[];
  /** Expression of type `(v: unknown) => unknown` */
  code: string;
  apply: (value: ExampleValue) => ExampleValue | undefined;
}

const NUMERIC_TEXT = /^\(?-?[$€£¥]?\s*-?[\d,]*\.?\d+\)?$/;

/**
 * "1,000,000" -> 1000000, "$1,234.50" -> 1234.5, "(200)" -> -200.
 */
export function parseNumericText(text: string): number | undefined {
  const trimmed = text.trim().replace(/\s+/g, "");
  if (!NUMERIC_TEXT.test(trimmed)) return undefined;
  const negative = trimmed.startsWith("(") && trimmed.endsWith(")");
  const digits = trimmed.replace(/[()$€£¥,]/g, "");
  const parsed = Number(digits);
  if (!Number.isFinite(parsed)) return undefined;
  return negative ? -parsed : parsed;
}

const TRUE_WORDS = new Set(["true", "yes", "y", "1", "on"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0", "off"]);
const ISO_DATE = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function text(value: ExampleValue): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export const CONVERSIONS: Conversion[] = [
  {
    name: "parse-number",
    from: ["string"],
    to: ["integer", "float"],
    code: "(v: unknown) => Number(String(v).replace(/[\\s$€£¥,]/g, \"\").replace(/^\\((.*)\\)$/, \"-$1\"))",
    apply: (value) => {
      const s = text(value);
      return s === undefined ? undefined : parseNumericText(s);
    },
  },
  {
    name: "parse-percent",
    from: ["string"],
    to: ["integer", "float"],
    code: "(v: unknown) => parseFloat(String(v).replace(\"%\", \"\")) / 100",
    apply: (value) => {
      const s = text(value);
      if (s === undefined || !/^\s*-?\d+(\.\d+)?\s*%\s*$/.test(s)) return undefined;
      return parseFloat(s.replace("%", "")) / 100;
    },
  },
  {
    name: "parse-boolean",
    from: ["string"],
    to: ["boolean"],
    code: "(v: unknown) => [\"true\", \"yes\", \"y\", \"1\", \"on\"].includes(String(v).trim().toLowerCase())",
    apply: (value) => {
      const s = text(value)?.trim().toLowerCase();
      if (s === undefined) return undefined;
      if (TRUE_WORDS.has(s)) return true;
      if (FALSE_WORDS.has(s)) return false;
      return undefined;
    },
  },
  {
    name: "parse-date",
    from: ["string"],
    to: ["date", "datetime"],
    code: "(v: unknown) => new Date(String(v))",
    apply: (value) => {
      const s = text(value)?.trim();
      if (s === undefined || !ISO_DATE.test(s)) return undefined;
      const date = new Date(s);
      return Number.isNaN(date.getTime()) ? undefined : date;
    },
  },
  {
    name: "format-date",
    from: ["date"],
    to: ["string"],
    code: "(v: unknown) => (v instanceof Date ? v.toISOString().slice(0, 10) : String(v))",
    apply: (value) => (value instanceof Date ? value.toISOString().slice(0, 10) : undefined),
  },
  {
    name: "format-datetime",
    from: ["date", "datetime"],
    to: ["string"],
    code: "(v: unknown) => (v instanceof Date ? v.toISOString() : String(v))",
    apply: (value) => (value instanceof Date ? value.toISOString() : undefined),
  },
  {
    name: "to-string",
    from: ["integer", "float", "decimal", "boolean"],
    to: ["string"],
    code: "(v: unknown) => String(v)",
    apply: (value) =>
      typeof value === "number" || typeof value === "boolean" || typeof value === "bigint"
        ? String(value)
        : undefined,
  },
  {
    name: "number-to-boolean",
    from: ["integer"],
    to: ["boolean"],
    code: "(v: unknown) => Number(v) !== 0",
    apply: (value) => (typeof value === "number" ? value !== 0 : undefined),
  },
  {
    name: "boolean-to-number",
    from: ["boolean"],
    to: ["integer"],
    code: "(v: unknown) => (v ? 1 : 0)",
    apply: (value) => (typeof value === "boolean" ? (value ? 1 : 0) : undefined),
  },
  {
    name: "round-number",
    from: ["float"],
    to: ["integer"],
    code: "(v: unknown) => Math.round(Number(v))",
    apply: (value) => (typeof value === "number" ? Math.round(value) : undefined),
  },
];

/**
 * Conversions applicable between two observed values.
 */
export function conversionsBetween(input: ExampleValue, output: ExampleValue): Conversion[] {
  const from = valueType(input);
  const to = valueType(output);
  if (from === to) return [];
  return CONVERSIONS.filter((c) => c.from.includes(from) && c.to.includes(to));
}
