/**
 * Artifact Registry
 *
 * Owns one catalog file. The catalog is read once when the registry opens
 * and held in memory; every mutation builds the next catalog, writes it
 * atomically, and only then replaces the in-memory copy. A failed write
 * leaves both the file and the registry as they were.
 *
 * Mutations run one at a time, in call order; each sees the catalog the
 * previous one left.
 *
 * Symbol paths must sit under a configured namespace prefix. The check runs
 * at registration and again on every load, before the symbol table is
 * consulted.
 */

import {
  LoadError,
  NotFoundError,
  RegistrationError,
  SecurityError,
} from "../errors.js";
import { readCatalog, writeCatalog } from "./catalog-store.js";
import { SymbolTable, isSymbolPath } from "./symbol-table.js";
import {
  createMetadata,
  isExtractorClass,
  type ArtifactMetadata,
  type ExtractorClass,
  type ListFilter,
  type MetadataUpdate,
  type RegisterInput,
} from "./types.js";

export const DEFAULT_NAMESPACES: readonly string[] = ["exemplar.artifacts."];

export interface RegistryOptions {
  /** Catalog file */
  path: string;
  /** Allowed symbol path prefixes; each ends in "." */
  namespaces?: readonly string[];
  symbols?: SymbolTable;
  /** Clock for timestamps */
  now?: () => Date;
  verbose?: boolean;
}

export class ArtifactRegistry {
  readonly path: string;
  readonly namespaces: readonly string[];
  readonly symbols: SymbolTable;
  private entries: ReadonlyMap<string, ArtifactMetadata>;
  private pending: Promise<void> = Promise.resolve();
  private readonly now: () => Date;
  private readonly verbose: boolean;

  private constructor(options: RegistryOptions, entries: Map<string, ArtifactMetadata>) {
    this.path = options.path;
    this.namespaces = [...(options.namespaces ?? DEFAULT_NAMESPACES)];
    this.symbols = options.symbols ?? new SymbolTable();
    this.entries = entries;
    this.now = options.now ?? (() => new Date());
    this.verbose = options.verbose ?? false;
  }

  /**
   * Open the registry over `options.path`, loading the whole catalog.
   * A missing file is an empty catalog; an unreadable one is a CatalogError.
   */
  static async open(options: RegistryOptions): Promise<ArtifactRegistry> {
    for (const ns of options.namespaces ?? DEFAULT_NAMESPACES) {
      if (!ns.endsWith(".") || !isSymbolPath(`${ns}module.symbol`)) {
        throw new RangeError(`Invalid namespace prefix '${ns}'`);
      }
    }
    const entries = await readCatalog(options.path);
    const registry = new ArtifactRegistry(options, entries);
    if (registry.verbose) {
      console.log(`[Registry] Loaded ${entries.size} artifacts from ${options.path}`);
    }
    return registry;
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Whether `symbolPath` lies under an allowed namespace */
  inNamespace(symbolPath: string): boolean {
    return this.namespaces.some(
      (ns) => symbolPath.startsWith(ns) && isSymbolPath(symbolPath) && symbolPath.slice(ns.length).includes(".")
    );
  }

  register(input: RegisterInput): Promise<ArtifactMetadata> {
    return this.serialize(() => this.registerNow(input));
  }

  private async registerNow(input: RegisterInput): Promise<ArtifactMetadata> {
    if (this.entries.has(input.name)) {
      throw new RegistrationError(
        "duplicate",
        `Artifact '${input.name}' is already registered; use update() to change it`
      );
    }
    if (!this.inNamespace(input.symbolPath)) {
      throw new RegistrationError(
        "namespace",
        `Symbol path '${input.symbolPath}' is outside the allowed namespaces: ${this.namespaces.join(", ")}`
      );
    }
    this.loadSymbol(input.symbolPath, (reason, message) => new RegistrationError("invalid", `${message} (${reason})`));

    const timestamp = this.now().toISOString();
    const metadata = createMetadata({
      name: input.name,
      symbolPath: input.symbolPath,
      version: input.version,
      description: input.description ?? "",
      domain: input.domain ?? "generic",
      confidence: input.confidence ?? 0,
      exampleCount: input.exampleCount ?? 0,
      tags: input.tags ?? [],
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    const next = new Map(this.entries);
    next.set(metadata.name, metadata);
    await this.commit(next);

    if (this.verbose) {
      console.log(`[Registry] Registered '${metadata.name}' v${metadata.version} -> ${metadata.symbolPath}`);
    }
    return metadata;
  }

  /**
   * Load the artifact's class. The namespace is checked again before the
   * symbol table is touched.
   */
  get(name: string): ExtractorClass {
    const metadata = this.getMetadata(name);
    if (!this.inNamespace(metadata.symbolPath)) {
      throw new SecurityError(metadata.symbolPath, this.namespaces);
    }
    return this.loadSymbol(metadata.symbolPath, (reason, message) => new LoadError(reason, message));
  }

  getMetadata(name: string): ArtifactMetadata {
    const metadata = this.entries.get(name);
    if (!metadata) throw new NotFoundError(name);
    return metadata;
  }

  /** In-memory filter; no I/O */
  list(filter: ListFilter = {}): ArtifactMetadata[] {
    const { domain, tags, minConfidence = 0 } = filter;
    return [...this.entries.values()].filter(
      (m) =>
        (domain === undefined || m.domain === domain) &&
        (tags === undefined || tags.length === 0 || tags.some((t) => m.tags.includes(t))) &&
        m.confidence >= minConfidence
    );
  }

  update(name: string, changes: MetadataUpdate): Promise<ArtifactMetadata> {
    return this.serialize(() => this.updateNow(name, changes));
  }

  private async updateNow(name: string, changes: MetadataUpdate): Promise<ArtifactMetadata> {
    const current = this.getMetadata(name);
    if (changes.symbolPath !== undefined && !this.inNamespace(changes.symbolPath)) {
      throw new RegistrationError(
        "namespace",
        `Symbol path '${changes.symbolPath}' is outside the allowed namespaces: ${this.namespaces.join(", ")}`
      );
    }
    const metadata = createMetadata({
      ...current,
      symbolPath: changes.symbolPath ?? current.symbolPath,
      version: changes.version ?? current.version,
      description: changes.description ?? current.description,
      domain: changes.domain ?? current.domain,
      confidence: changes.confidence ?? current.confidence,
      exampleCount: changes.exampleCount ?? current.exampleCount,
      tags: changes.tags ?? current.tags,
      updatedAt: this.now().toISOString(),
    });

    const next = new Map(this.entries);
    next.set(name, metadata);
    await this.commit(next);

    if (this.verbose) {
      console.log(`[Registry] Updated '${name}' (${Object.keys(changes).join(", ")})`);
    }
    return metadata;
  }

  /** Remove an artifact; unknown names raise NotFoundError */
  unregister(name: string): Promise<ArtifactMetadata> {
    return this.serialize(() => this.unregisterNow(name));
  }

  private async unregisterNow(name: string): Promise<ArtifactMetadata> {
    const metadata = this.getMetadata(name);
    const next = new Map(this.entries);
    next.delete(name);
    await this.commit(next);

    if (this.verbose) {
      console.log(`[Registry] Unregistered '${name}'`);
    }
    return metadata;
  }

  /** Run `mutation` once every earlier mutation has settled */
  private serialize<T>(mutation: () => Promise<T>): Promise<T> {
    const result = this.pending.then(mutation);
    // The caller gets the failure through `result`; the chain only waits on it
    this.pending = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async commit(next: Map<string, ArtifactMetadata>): Promise<void> {
    await writeCatalog(this.path, next.values());
    this.entries = next;
  }

  private loadSymbol(
    symbolPath: string,
    fail: (reason: "unresolved" | "interface", message: string) => Error
  ): ExtractorClass {
    const value = this.symbols.resolve(symbolPath);
    if (value === undefined) {
      throw fail("unresolved", `Symbol '${symbolPath}' is not defined`);
    }
    if (!isExtractorClass(value)) {
      throw fail("interface", `Symbol '${symbolPath}' does not implement extract()`);
    }
    return value;
  }
}
