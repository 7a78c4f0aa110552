/**
 * Template renderer
 *
 *   {{ name }}                 variable, dotted lookup through enclosing scopes
 *   {{ fields | json }}        filters: json, pretty, upper, lower, pascal, camel, kebab
 *   {{#each fields}}...{{/each}}   with this, @index, @first, @last
 *   {{#if flag}}...{{else}}...{{/if}}
 *
 * A missing variable is a SynthesisError, never an empty string. Block tags
 * alone on a line consume that line.
 */

import { SynthesisError } from "../errors.js";

export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export type TemplateContext = { [key: string]: TemplateValue };

type Node =
  | { type: "text"; text: string }
  | { type: "var"; path: string; filters: string[] }
  | { type: "each"; path: string; body: Node[] }
  | { type: "if"; path: string; then: Node[]; otherwise: Node[] };

type Token =
  | { type: "text"; text: string }
  | { type: "tag"; kind: "#each" | "#if" | "/each" | "/if" | "else" | "var"; body: string };

const TAG = /\{\{\s*([^}]*?)\s*\}\}/g;

function tokenize(source: string, name: string): Token[] {
  const tokens: Token[] = [];
  let last = 0;
  for (const match of source.matchAll(TAG)) {
    const index = match.index ?? 0;
    if (index > last) tokens.push({ type: "text", text: source.slice(last, index) });
    const body = match[1];
    if (body.startsWith("#each ")) tokens.push({ type: "tag", kind: "#each", body: body.slice(6).trim() });
    else if (body.startsWith("#if ")) tokens.push({ type: "tag", kind: "#if", body: body.slice(4).trim() });
    else if (body === "/each") tokens.push({ type: "tag", kind: "/each", body: "" });
    else if (body === "/if") tokens.push({ type: "tag", kind: "/if", body: "" });
    else if (body === "else") tokens.push({ type: "tag", kind: "else", body: "" });
    else if (body.startsWith("#") || body.startsWith("/")) {
      throw new SynthesisError(`Unknown block tag '{{${body}}}'`, { template: name });
    } else tokens.push({ type: "tag", kind: "var", body });
    last = index + match[0].length;
  }
  if (last < source.length) tokens.push({ type: "text", text: source.slice(last) });
  return stripStandalone(tokens);
}

/**
 * Block tags that sit alone on a line take the line with them.
 */
function stripStandalone(tokens: Token[]): Token[] {
  const out = tokens.map((t) => ({ ...t }));
  out.forEach((token, i) => {
    if (token.type !== "tag" || token.kind === "var") return;
    const before = out[i - 1];
    const after = out[i + 1];
    const beforeOk =
      before === undefined || (before.type === "text" && /(^|\n)[ \t]*$/.test(before.text));
    const afterOk = after === undefined || (after.type === "text" && /^[ \t]*(\r?\n|$)/.test(after.text));
    if (!beforeOk || !afterOk) return;
    if (before && before.type === "text") before.text = before.text.replace(/[ \t]*$/, "");
    if (after && after.type === "text") after.text = after.text.replace(/^[ \t]*(\r?\n)?/, "");
  });
  return out;
}

function parse(tokens: Token[], name: string): Node[] {
  let pos = 0;

  const block = (closers: string[]): { nodes: Node[]; closer: string | null } => {
    const nodes: Node[] = [];
    while (pos < tokens.length) {
      const token = tokens[pos++];
      if (token.type === "text") {
        if (token.text) nodes.push({ type: "text", text: token.text });
        continue;
      }
      switch (token.kind) {
        case "var": {
          const [path, ...filters] = token.body.split("|").map((s) => s.trim());
          nodes.push({ type: "var", path, filters });
          break;
        }
        case "#each": {
          const inner = block(["/each"]);
          if (inner.closer !== "/each") {
            throw new SynthesisError(`Unclosed {{#each ${token.body}}}`, { template: name });
          }
          nodes.push({ type: "each", path: token.body, body: inner.nodes });
          break;
        }
        case "#if": {
          const then = block(["else", "/if"]);
          let otherwise: Node[] = [];
          if (then.closer === "else") {
            const rest = block(["/if"]);
            if (rest.closer !== "/if") {
              throw new SynthesisError(`Unclosed {{#if ${token.body}}}`, { template: name });
            }
            otherwise = rest.nodes;
          } else if (then.closer !== "/if") {
            throw new SynthesisError(`Unclosed {{#if ${token.body}}}`, { template: name });
          }
          nodes.push({ type: "if", path: token.body, then: then.nodes, otherwise });
          break;
        }
        default:
          if (closers.includes(token.kind)) return { nodes, closer: token.kind };
          throw new SynthesisError(`Unexpected {{${token.kind}}}`, { template: name });
      }
    }
    return { nodes, closer: null };
  };

  const result = block([]);
  return result.nodes;
}

interface Scope {
  value: TemplateValue;
  meta?: { index: number; first: boolean; last: boolean };
}

function isObject(value: TemplateValue | undefined): value is { [key: string]: TemplateValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function words(text: string): string[] {
  return text
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean);
}

export function toPascalCase(text: string): string {
  return words(text)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join("");
}

export function toCamelCase(text: string): string {
  const pascal = toPascalCase(text);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

export function toKebabCase(text: string): string {
  return words(text)
    .map((w) => w.toLowerCase())
    .join("-");
}

const FILTERS: Record<string, (value: TemplateValue) => TemplateValue> = {
  json: (v) => JSON.stringify(v),
  pretty: (v) => JSON.stringify(v, null, 2),
  upper: (v) => String(v).toUpperCase(),
  lower: (v) => String(v).toLowerCase(),
  pascal: (v) => toPascalCase(String(v)),
  camel: (v) => toCamelCase(String(v)),
  kebab: (v) => toKebabCase(String(v)),
};

export class Template {
  readonly name: string;
  private nodes: Node[];

  constructor(name: string, source: string) {
    this.name = name;
    this.nodes = parse(tokenize(source, name), name);
  }

  render(context: TemplateContext): string {
    return this.renderNodes(this.nodes, [{ value: context }]);
  }

  private renderNodes(nodes: Node[], scopes: Scope[]): string {
    let out = "";
    for (const node of nodes) {
      switch (node.type) {
        case "text":
          out += node.text;
          break;
        case "var":
          out += this.renderVariable(node.path, node.filters, scopes);
          break;
        case "each": {
          const list = this.lookup(node.path, scopes);
          if (!Array.isArray(list)) {
            throw new SynthesisError(`Template variable '${node.path}' is not a list`, {
              template: this.name,
              variable: node.path,
            });
          }
          list.forEach((item, index) => {
            out += this.renderNodes(node.body, [
              ...scopes,
              { value: item, meta: { index, first: index === 0, last: index === list.length - 1 } },
            ]);
          });
          break;
        }
        case "if": {
          const value = this.lookup(node.path, scopes);
          const truthy = Array.isArray(value) ? value.length > 0 : Boolean(value);
          out += this.renderNodes(truthy ? node.then : node.otherwise, scopes);
          break;
        }
      }
    }
    return out;
  }

  private renderVariable(path: string, filters: string[], scopes: Scope[]): string {
    let value = this.lookup(path, scopes);
    for (const filter of filters) {
      const apply = FILTERS[filter];
      if (!apply) {
        throw new SynthesisError(`Unknown filter '${filter}'`, { template: this.name, variable: path });
      }
      value = apply(value);
    }
    if (typeof value === "object" && value !== null) {
      throw new SynthesisError(`Template variable '${path}' is not text; use a json filter`, {
        template: this.name,
        variable: path,
      });
    }
    return String(value);
  }

  private lookup(path: string, scopes: Scope[]): TemplateValue {
    const [head, ...rest] = path.split(".");
    let value: TemplateValue | undefined;

    const innermost = scopes[scopes.length - 1];
    if (head === "this") {
      value = innermost.value;
    } else if (head.startsWith("@")) {
      const meta = [...scopes].reverse().find((s) => s.meta)?.meta;
      if (meta && head === "@index") value = meta.index;
      else if (meta && head === "@first") value = meta.first;
      else if (meta && head === "@last") value = meta.last;
    } else {
      for (let i = scopes.length - 1; i >= 0; i--) {
        const scope = scopes[i].value;
        if (isObject(scope) && Object.prototype.hasOwnProperty.call(scope, head)) {
          value = scope[head];
          break;
        }
      }
    }

    for (const key of rest) {
      if (!isObject(value) || !Object.prototype.hasOwnProperty.call(value, key)) {
        value = undefined;
        break;
      }
      value = value[key];
    }

    if (value === undefined) {
      throw new SynthesisError(`Missing template variable '${path}'`, {
        template: this.name,
        variable: path,
      });
    }
    return value;
  }
}

export function renderTemplate(name: string, source: string, context: TemplateContext): string {
  return new Template(name, source).render(context);
}
