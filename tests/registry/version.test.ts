/**
 * Tests for version helpers
 */

import { describe, it, expect } from "vitest";
import { bumpVersion, compareVersions, isVersion } from "../../src/registry/version.js";

describe("version", () => {
  it("should bump the minor part by default", () => {
    expect(bumpVersion("1.2.3")).toBe("1.3.0");
    expect(bumpVersion("1.2.3", "patch")).toBe("1.2.4");
    expect(bumpVersion("1.2.3", "major")).toBe("2.0.0");
  });

  it("should reject malformed versions", () => {
    expect(isVersion("1.0")).toBe(false);
    expect(isVersion("01.0.0")).toBe(false);
    expect(() => bumpVersion("v1.0.0")).toThrow(RangeError);
  });

  it("should compare numerically", () => {
    expect(compareVersions("1.10.0", "1.9.0")).toBeGreaterThan(0);
    expect(compareVersions("2.0.0", "2.0.0")).toBe(0);
  });
});
