/**
 * Template context
 *
 * Turns an ArtifactAnalysis into the plain values the templates render:
 * data model interfaces, deterministic resolvers, prompt sections and
 * test cases. Templates do no computation of their own.
 */

import { confidenceLevel, type Pattern } from "../patterns/types.js";
import type { ExampleValue, FieldType, Schema, SchemaField } from "../schema/types.js";
import { ANY_ELEMENT, ROOT_PATH, parentPath, parsePath, pathName } from "../schema/paths.js";
import { isRecordValue, toCodeLiteral, valueType } from "../schema/values.js";
import type { TemplateContext, TemplateValue } from "./template.js";
import { toKebabCase, toPascalCase } from "./template.js";
import type { ArtifactAnalysis, ArtifactPart } from "./types.js";

export interface ContextOptions {
  /** Worked examples taken from the request into the prompt */
  maxPromptExamples?: number;
  maxTestCases?: number;
  /** Characters of a text input shown in a prompt example */
  maxExampleText?: number;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Characters read from the start of a located section */
export const SECTION_LENGTH = 20000;

/** Conversions worth re-applying to a completion that returned text */
const NORMALIZING_CONVERSIONS = new Set(["parse-number", "parse-percent", "parse-boolean"]);

export function fileNamesFor(name: string): Record<ArtifactPart, string> {
  const kebab = toKebabCase(name);
  return {
    dataModel: `${kebab}.model.ts`,
    prompt: `${kebab}.prompt.md`,
    extractor: `${kebab}.extractor.ts`,
    tests: `${kebab}.extractor.test.ts`,
    manifest: "manifest.json",
  };
}

/**
 * JSON-compatible rendering of an example value. Dates become ISO text,
 * day precision when the time is midnight UTC.
 */
export function toJsonValue(value: ExampleValue): TemplateValue {
  if (value instanceof Date) {
    return valueType(value) === "date" ? value.toISOString().slice(0, 10) : value.toISOString();
  }
  if (typeof value === "bigint") return Number(value);
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (isRecordValue(value)) {
    const out: { [key: string]: TemplateValue } = {};
    for (const [key, item] of Object.entries(value)) out[key] = toJsonValue(item);
    return out;
  }
  return value;
}

function propertyKey(key: string): string {
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

function scalarTsType(type: FieldType): string {
  switch (type) {
    case "integer":
    case "float":
    case "decimal":
      return "number";
    case "string":
    case "date":
    case "datetime":
      return "string";
    case "boolean":
      return "boolean";
    case "null":
      return "null";
    default:
      return "unknown";
  }
}

function jsonType(type: FieldType): string {
  switch (type) {
    case "integer":
    case "float":
    case "decimal":
      return "number";
    case "string":
    case "date":
    case "datetime":
      return "string";
    case "list":
      return "array";
    case "map":
      return "object";
    default:
      return type;
  }
}

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const URL_TEXT = /^https?:\/\/\S+$/;
const MAX_ENUM = 4;

function constraintsOf(field: SchemaField, exampleCount: number): string[] {
  const constraints: string[] = [];
  if (field.type === "integer") constraints.push("integer");
  if (field.type === "decimal") constraints.push("decimal");
  if (field.type === "date") constraints.push("format: YYYY-MM-DD");
  if (field.type === "datetime") constraints.push("format: ISO 8601");
  const numbers = field.samples.filter((s): s is number => typeof s === "number");
  if (numbers.length > 0 && numbers.length === field.samples.length && numbers.every((n) => n >= 0)) {
    constraints.push("non-negative");
  }
  const strings = field.samples.filter((s): s is string => typeof s === "string");
  if (field.type === "string" && strings.length > 0 && strings.length === field.samples.length) {
    if (strings.every((s) => EMAIL.test(s))) constraints.push("format: email");
    else if (strings.every((s) => URL_TEXT.test(s))) constraints.push("format: url");
    else if (exampleCount >= 3 && strings.length <= MAX_ENUM && strings.length < exampleCount) {
      constraints.push(`one of ${strings.map((s) => JSON.stringify(s)).join(", ")}`);
    }
  }
  return constraints;
}

function describeType(field: SchemaField): string {
  switch (field.type) {
    case "integer":
      return "an integer";
    case "float":
    case "decimal":
      return "a number";
    case "date":
      return "a date (YYYY-MM-DD)";
    case "datetime":
      return "a timestamp (ISO 8601)";
    case "boolean":
      return "a boolean";
    case "list":
      return "a list";
    case "map":
      return "an object";
    case "string":
      return "a string";
    default:
      return "any JSON value";
  }
}

/** One line of the prompt's output requirements */
export function describeRequirement(field: SchemaField): string {
  const presence = field.required ? "required" : "optional";
  return `\`${field.path}\` is ${describeType(field)} (${presence}${field.nullable ? ", may be null" : ""})`;
}

interface ModelField {
  [key: string]: TemplateValue;
  name: string;
  key: string;
  path: string;
  tsType: string;
  optionalMark: string;
  required: boolean;
  nullable: boolean;
  description: string;
  constraintText: string;
}

interface Model {
  [key: string]: TemplateValue;
  name: string;
  description: string;
  fields: ModelField[];
}

/** Direct children of `prefix` ("" for the root) in schema order */
function childrenOf(schema: Schema, prefix: string): SchemaField[] {
  const parent = prefix === "" ? ROOT_PATH : prefix;
  return [...schema.fields.values()].filter((field) => {
    if (field.path === ROOT_PATH) return false;
    const segments = parsePath(field.path);
    return typeof segments[segments.length - 1] === "string" && parentPath(field.path) === parent;
  });
}

/**
 * Interfaces for the output schema: the root record first, then one per
 * nested object in the order they are reached.
 */
export function buildModels(schema: Schema, modelName: string, description: string): Model[] {
  const models: Model[] = [];

  const visit = (prefix: string, name: string, summary: string): void => {
    const model: Model = { name, description: summary, fields: [] };
    models.push(model);
    const pending: Array<[string, string, string]> = [];

    for (const field of childrenOf(schema, prefix)) {
      let base = scalarTsType(field.type);
      if (field.type === "map") {
        const nested = `${name}${toPascalCase(field.name)}`;
        pending.push([field.path, nested, `Contents of '${field.path}'`]);
        base = nested;
      } else if (field.type === "list") {
        const item = field.itemType ?? "unknown";
        if (item === "map") {
          const nested = `${name}${toPascalCase(field.name)}Item`;
          pending.push([`${field.path}[]`, nested, `One element of '${field.path}'`]);
          base = `${nested}[]`;
        } else {
          base = `${scalarTsType(item)}[]`;
        }
      }
      const constraints = constraintsOf(field, schema.exampleCount);
      model.fields.push({
        name: field.name,
        key: propertyKey(field.name),
        path: field.path,
        tsType: field.nullable && base !== "null" && base !== "unknown" ? `${base} | null` : base,
        optionalMark: field.required ? "" : "?",
        required: field.required,
        nullable: field.nullable,
        description: toPascalCase(field.name).replace(/([a-z0-9])([A-Z])/g, "$1 $2"),
        constraintText: constraints.join(", "),
      });
    }
    for (const [path, nested, text] of pending) visit(path, nested, text);
  };

  visit("", modelName, description || `Record extracted by ${modelName.replace(/Record$/, "")}`);
  return models;
}

/** JSON Schema of the output, embedded in the prompt */
export function buildJsonSchema(schema: Schema, prefix = ""): TemplateValue {
  const properties: { [key: string]: TemplateValue } = {};
  const required: string[] = [];
  for (const field of childrenOf(schema, prefix)) {
    properties[field.name] = fieldJsonSchema(schema, field);
    if (field.required) required.push(field.name);
  }
  return { type: "object", properties, required };
}

function fieldJsonSchema(schema: Schema, field: SchemaField): TemplateValue {
  const type = jsonType(field.type);
  let node: { [key: string]: TemplateValue };
  if (field.type === "map") {
    const nested = buildJsonSchema(schema, field.path);
    node = isTemplateObject(nested) ? nested : {};
  } else if (field.type === "list") {
    node = {
      type: "array",
      items:
        field.itemType === "map"
          ? buildJsonSchema(schema, `${field.path}[]`)
          : { type: jsonType(field.itemType ?? "unknown") },
    };
  } else if (type === "unknown") {
    node = {};
  } else {
    node = { type: field.type === "integer" ? "integer" : type };
    if (field.type === "date") node.format = "date";
    if (field.type === "datetime") node.format = "date-time";
  }
  if (field.nullable && typeof node.type === "string") node.type = [node.type, "null"];
  return node;
}

function isTemplateObject(value: TemplateValue): value is { [key: string]: TemplateValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Runtime shape checks for the root record */
export function buildFieldSpecs(schema: Schema): TemplateValue[] {
  return childrenOf(schema, "").map((field) => ({
    key: field.name,
    type: jsonType(field.type),
    required: field.required,
    nullable: field.nullable,
    integer: field.type === "integer",
  }));
}

/** Path as a code literal of keys and indices, read by the generated pick() */
function segmentsLiteral(path: string): string {
  const segments = parsePath(path).map((s) => (s === ANY_ELEMENT ? 0 : s));
  return JSON.stringify(segments);
}

function resolverArgs(pattern: Pattern): string {
  if (pattern.sourcePath === null) return "";
  const sources = [pattern.sourcePath, ...pattern.extraSources];
  return sources
    .map((path) =>
      pattern.kind === "string-manipulation"
        ? `String(pick(input, ${segmentsLiteral(path)}) ?? "")`
        : `pick(input, ${segmentsLiteral(path)})`
    )
    .join(", ");
}

/**
 * Best pattern per target at or above the threshold, skipping complex ones.
 */
export function selectResolvers(analysis: ArtifactAnalysis): Pattern[] {
  const chosen: Pattern[] = [];
  for (const target of analysis.parsed.targets) {
    const pattern = analysis.parsed.patterns.find(
      (p) =>
        p.targetPath === target &&
        p.kind !== "complex" &&
        p.snippet !== undefined &&
        p.confidence >= analysis.threshold
    );
    if (pattern) chosen.push(pattern);
  }
  return chosen;
}

/**
 * Whether the rendered extractor passes `input` on to the completion. A
 * section opened by a marker must carry every required keyword and no
 * rejected one in its first 300 characters; text without a marker is read
 * whole.
 */
export function acceptsInput(analysis: ArtifactAnalysis, input: ExampleValue): boolean {
  if (typeof input !== "string") return true;
  const { requiredKeywords, rejectedKeywords } = analysis.contentRules;
  for (const source of analysis.sectionMarkers) {
    const match = new RegExp(source, "im").exec(input);
    if (!match) continue;
    const section = input.slice(match.index, match.index + SECTION_LENGTH).toLowerCase();
    const heading = section.slice(0, 300);
    if (rejectedKeywords.some((k) => heading.includes(k.toLowerCase()))) return false;
    return requiredKeywords.every((k) => section.includes(k.toLowerCase()));
  }
  return true;
}

function promptInput(value: ExampleValue, maxText: number): string {
  if (typeof value === "string") {
    return value.length > maxText ? `${value.slice(0, maxText)}...` : value;
  }
  return JSON.stringify(toJsonValue(value), null, 2);
}

/**
 * Assemble the full template context for one artifact.
 */
export function buildTemplateContext(
  analysis: ArtifactAnalysis,
  options: ContextOptions = {}
): TemplateContext {
  const { maxTestCases = 5, maxExampleText = 1500 } = options;
  const { parsed } = analysis;
  const schema = parsed.outputSchema;
  const fileNames = fileNamesFor(analysis.name);

  const selected = selectResolvers(analysis);
  const resolvers = selected.map((pattern) => ({
    target: pattern.targetPath,
    keys: segmentsLiteral(pattern.targetPath),
    kind: pattern.kind,
    confidence: pattern.confidence.toFixed(2),
    description: pattern.description.replace(/\s+/g, " "),
    expression: `(${pattern.snippet ?? "() => undefined"})(${resolverArgs(pattern)})`,
  }));

  const normalizers: TemplateValue[] = [];
  for (const target of parsed.targets.filter((t) => parsePath(t).length === 1)) {
    const conversion = parsed.patterns.find(
      (p) =>
        p.targetPath === target &&
        p.kind === "type-conversion" &&
        p.confidence >= analysis.threshold &&
        typeof p.params.conversion === "string" &&
        NORMALIZING_CONVERSIONS.has(p.params.conversion)
    );
    if (conversion?.snippet) normalizers.push({ target, key: pathName(target), code: conversion.snippet });
  }

  const patternSummary = parsed.patterns.map((p) => ({
    target: p.targetPath,
    kind: p.kind,
    source: p.sourcePath,
    confidence: p.confidence,
    level: confidenceLevel(p.confidence),
  }));

  const examples = parsed.examples;
  const promptExamples = analysis.promptExamples.map((example, index) => ({
    number: index + 1,
    input: promptInput(example.input, maxExampleText),
    output: JSON.stringify(toJsonValue(example.output), null, 2),
  }));

  const testCases = examples.slice(0, maxTestCases).map((example, index) => {
    const accepted = acceptsInput(analysis, example.input);
    return {
      title: accepted ? `reproduces example ${index + 1}` : `skips example ${index + 1} by its section keywords`,
      accepted,
      input: toCodeLiteral(example.input),
      expected: JSON.stringify(toJsonValue(example.output)),
    };
  });

  return {
    name: analysis.name,
    kebabName: toKebabCase(analysis.name),
    symbolName: analysis.symbolName,
    modelName: analysis.modelName,
    domain: analysis.domain,
    description: analysis.description || `Extracts ${analysis.domain} records`,
    version: analysis.version,
    confidence: analysis.confidence.toFixed(2),
    confidenceValue: analysis.confidence,
    exampleCount: analysis.exampleCount,
    models: buildModels(schema, analysis.modelName, analysis.description),
    fieldSpecs: buildFieldSpecs(schema),
    fieldKeys: childrenOf(schema, "").map((f) => f.name),
    jsonSchema: JSON.stringify(buildJsonSchema(schema), null, 2),
    resolvers,
    fullyResolved: selected.length > 0 && selected.length === parsed.targets.length,
    normalizers,
    patternSummary,
    sectionMarkers: [...analysis.sectionMarkers],
    sectionLength: SECTION_LENGTH,
    requiredKeywords: [...analysis.contentRules.requiredKeywords],
    rejectedKeywords: [...analysis.contentRules.rejectedKeywords],
    systemPrompt: analysis.systemPrompt,
    parsingRules: analysis.parsingRules.map((text, index) => ({ number: index + 1, text })),
    fieldRules: analysis.fieldRules.map((r) => ({ field: r.field, rule: r.rule })),
    outputRequirements: [...analysis.outputRequirements],
    promptExamples,
    testCases,
    guardExceptions: analysis.flags.guardExceptions,
    strictValidation: analysis.flags.strictValidation,
    appliedRefinements: [...analysis.appliedRefinements],
    fileNames: { ...fileNames },
    modelModule: `./${fileNames.dataModel.replace(/\.ts$/, ".js")}`,
    extractorModule: `./${fileNames.extractor.replace(/\.ts$/, ".js")}`,
  };
}
