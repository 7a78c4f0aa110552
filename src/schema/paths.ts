/**
 * Path notation
 *
 *   $              the example itself
 *   main.temp      nested key
 *   ["a.b"]        key that is not plain (holds . [ ] " \ or starts with $)
 *   items[]        any element of `items` (schema paths)
 *   items[0].name  concrete element (pattern sources)
 *   items[-1]      last element
 */

import { SchemaInferenceError } from "../errors.js";
import type { ExampleValue } from "./types.js";
import { isRecordValue } from "./values.js";

export const ROOT_PATH = "$";

/** Wildcard segment of a schema path: any element of a list */
export const ANY_ELEMENT: unique symbol = Symbol("[]");

export type PathSegment = string | number | typeof ANY_ELEMENT;

const PLAIN_KEY = /^[^.[\]"\\$][^.[\]"\\]*$/;

export function childPath(parent: string, key: string): string {
  if (!PLAIN_KEY.test(key)) {
    return `${parent === ROOT_PATH ? "" : parent}[${JSON.stringify(key)}]`;
  }
  return parent === ROOT_PATH ? key : `${parent}.${key}`;
}

export function elementPath(parent: string, index?: number): string {
  return `${parent}[${index === undefined ? "" : index}]`;
}

/** Inverse of parsePath */
export function formatPath(segments: readonly PathSegment[]): string {
  let path = ROOT_PATH;
  for (const segment of segments) {
    if (segment === ANY_ELEMENT) path = elementPath(path);
    else if (typeof segment === "number") path = elementPath(path, segment);
    else path = childPath(path, segment);
  }
  return path;
}

/**
 * Split a path into keys, indices and ANY_ELEMENT wildcards.
 */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  // Plain keys never start with "$", so a leading "$" is always the root
  let rest = path.startsWith(ROOT_PATH) ? path.slice(ROOT_PATH.length) : path;
  const token = /^\.?([^.[\]"\\]+)|^\[(-?\d*)\]|^\[("(?:[^"\\]|\\.)*")\]/;

  while (rest.length > 0) {
    const match = token.exec(rest);
    if (!match) {
      throw new SchemaInferenceError(path, "Malformed path");
    }
    if (match[1] !== undefined) {
      segments.push(match[1]);
    } else if (match[3] !== undefined) {
      segments.push(String(JSON.parse(match[3])));
    } else if (match[2] === "") {
      segments.push(ANY_ELEMENT);
    } else {
      segments.push(Number(match[2]));
    }
    rest = rest.slice(match[0].length);
  }
  return segments;
}

export function pathDepth(path: string): number {
  return Math.max(0, parsePath(path).length - 1);
}

/** Last key of a path, ignoring trailing element markers */
export function pathName(path: string): string {
  const keys = parsePath(path).filter((s): s is string => typeof s === "string");
  return keys.length > 0 ? keys[keys.length - 1] : "value";
}

/** Path of the enclosing value; the root for top-level keys */
export function parentPath(path: string): string {
  return formatPath(parsePath(path).slice(0, -1));
}

export function isElementPath(path: string): boolean {
  return parsePath(path).some((s) => typeof s !== "string");
}

/**
 * Read the value at a concrete path. Wildcards and missing keys yield undefined.
 */
export function getValueAtPath(
  value: ExampleValue,
  path: string
): ExampleValue | undefined {
  let current: ExampleValue | undefined = value;
  for (const segment of parsePath(path)) {
    if (current === undefined || segment === ANY_ELEMENT) return undefined;
    if (typeof segment === "number") {
      if (!Array.isArray(current)) return undefined;
      const index: number = segment < 0 ? current.length + segment : segment;
      current = index >= 0 && index < current.length ? current[index] : undefined;
    } else {
      if (!isRecordValue(current)) return undefined;
      current = Object.prototype.hasOwnProperty.call(current, segment)
        ? current[segment]
        : undefined;
    }
  }
  return current;
}

export interface Location {
  readonly path: string;
  readonly value: ExampleValue;
}

/**
 * Every concrete location below the root, parents before children.
 * Arrays contribute at most `maxElements` indexed elements.
 */
export function enumerateLocations(value: ExampleValue, maxElements = 20): Location[] {
  const locations: Location[] = [];

  const visit = (current: ExampleValue, path: string): void => {
    if (path !== ROOT_PATH) locations.push({ path, value: current });
    if (Array.isArray(current)) {
      current.slice(0, maxElements).forEach((item, i) => visit(item, elementPath(path, i)));
    } else if (isRecordValue(current)) {
      for (const [key, child] of Object.entries(current)) {
        visit(child, childPath(path, key));
      }
    }
  };

  visit(value, ROOT_PATH);
  return locations;
}
