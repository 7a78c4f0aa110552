/**
 * Symbol table
 *
 * Loadable artifacts are looked up by dotted symbol path in an explicit
 * table of handles, filled at startup by scanning a namespace. Nothing is
 * imported by name at lookup time.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { LoadError, errorMessage } from "../errors.js";

export type ModuleExports = Readonly<Record<string, unknown>>;

const SEGMENT = /^[A-Za-z_$][\w$-]*$/;
const MODULE_FILE = /\.(ts|js|mjs)$/;

export function isSymbolPath(path: string): boolean {
  const segments = path.split(".");
  return segments.length >= 2 && segments.every((s) => SEGMENT.test(s));
}

/** Module name for a file: "invoice.extractor.ts" -> "invoice" */
export function moduleNameOf(fileName: string): string {
  return fileName.split(".")[0];
}

export class SymbolTable {
  private readonly symbols = new Map<string, unknown>();

  define(symbolPath: string, value: unknown): void {
    if (!isSymbolPath(symbolPath)) {
      throw new LoadError("unresolved", `Invalid symbol path '${symbolPath}'`);
    }
    this.symbols.set(symbolPath, value);
  }

  resolve(symbolPath: string): unknown {
    return this.symbols.get(symbolPath);
  }

  has(symbolPath: string): boolean {
    return this.symbols.has(symbolPath);
  }

  get size(): number {
    return this.symbols.size;
  }

  paths(): string[] {
    return [...this.symbols.keys()].sort();
  }

  /**
   * Define every function export of every module under `namespace`.
   * Modules and exports are visited in sorted order; returns the paths defined.
   */
  scanNamespace(namespace: string, modules: Readonly<Record<string, ModuleExports>>): string[] {
    const prefix = namespace.endsWith(".") ? namespace : `${namespace}.`;
    const defined: string[] = [];
    for (const moduleName of Object.keys(modules).sort()) {
      const exports = modules[moduleName];
      for (const exportName of Object.keys(exports).sort()) {
        const value = exports[exportName];
        if (typeof value !== "function") continue;
        const path = `${prefix}${moduleName}.${exportName}`;
        this.define(path, value);
        defined.push(path);
      }
    }
    return defined;
  }

  /**
   * Import every module file in `dir` and scan it into `namespace`.
   * Test files and declaration files are skipped.
   */
  async scanDirectory(namespace: string, dir: string): Promise<string[]> {
    const files = (await readdir(dir))
      .filter((f) => MODULE_FILE.test(f) && !f.endsWith(".d.ts") && !/\.(test|spec)\./.test(f))
      .sort();

    const modules: Record<string, ModuleExports> = {};
    for (const file of files) {
      let loaded: unknown;
      try {
        loaded = await import(pathToFileURL(join(dir, file)).href);
      } catch (error) {
        throw new LoadError("unresolved", `Cannot import ${file}: ${errorMessage(error)}`, { cause: error });
      }
      if (typeof loaded !== "object" || loaded === null) continue;
      const name = moduleNameOf(file);
      modules[name] = { ...modules[name], ...Object.fromEntries(Object.entries(loaded)) };
    }
    return this.scanNamespace(namespace, modules);
  }
}
