import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from "../../src/config.js";

describe("Configuration", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "exemplar-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should return the defaults when the file is absent", async () => {
    const config = await loadConfig(join(dir, "missing.json"));
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.registry.namespaces).toEqual(["exemplar.artifacts."]);
    expect(config.history.path).toBe(":memory:");
  });

  it("should merge each section over the defaults", async () => {
    const path = join(dir, "exemplar.config.json");
    await writeFile(
      path,
      JSON.stringify({
        registry: { path: "./catalog.json" },
        refinement: { targetAccuracy: 0.95, maxIterations: 3 },
      })
    );
    const config = await loadConfig(path);

    expect(config.registry).toEqual({ path: "./catalog.json", namespaces: ["exemplar.artifacts."] });
    expect(config.refinement).toEqual({
      targetAccuracy: 0.95,
      maxIterations: 3,
      minImprovement: 0.01,
      minPatternFrequency: 0.2,
      minFieldFailures: 2,
    });
    expect(config.detection).toEqual(DEFAULT_CONFIG.detection);
  });

  it("should propagate a parse error", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ registry: ");
    await expect(loadConfig(path)).rejects.toThrow(SyntaxError);
  });

  it("should reject values of the wrong type", () => {
    expect(() => resolveConfig({ detection: { renameSimilarity: "high" } })).toThrow(
      "Config 'detection.renameSimilarity' must be a number"
    );
    expect(() => resolveConfig({ registry: { namespaces: "exemplar." } })).toThrow(
      "Config 'registry.namespaces' must be a list of strings"
    );
    expect(() => resolveConfig({ history: [] })).toThrow("Config section 'history' must be an object");
    expect(() => resolveConfig([])).toThrow(TypeError);
  });

  it("should leave candidates uncapped unless a cap is set", () => {
    expect(resolveConfig({}).detection.maxCandidatesPerField).toBeNull();
    expect(resolveConfig({ detection: { maxCandidatesPerField: null } }).detection.maxCandidatesPerField).toBeNull();
    expect(resolveConfig({ detection: { maxCandidatesPerField: 4 } }).detection.maxCandidatesPerField).toBe(4);
    expect(() => resolveConfig({ detection: { maxCandidatesPerField: "4" } })).toThrow(
      "Config 'detection.maxCandidatesPerField' must be a number or null"
    );
  });

  it("should not share the default namespace list", () => {
    const config = resolveConfig({});
    config.registry.namespaces.push("other.");
    expect(DEFAULT_CONFIG.registry.namespaces).toEqual(["exemplar.artifacts."]);
  });
});
