/**
 * MAJOR.MINOR.PATCH versions
 */

export type VersionPart = "major" | "minor" | "patch";

const VERSION = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

export function isVersion(version: string): boolean {
  return VERSION.test(version);
}

function parts(version: string): [number, number, number] {
  const match = VERSION.exec(version);
  if (!match) throw new RangeError(`Invalid version '${version}'; expected MAJOR.MINOR.PATCH`);
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/** "1.2.3" -> "1.3.0" for the default minor bump */
export function bumpVersion(version: string, part: VersionPart = "minor"): string {
  const [major, minor, patch] = parts(version);
  switch (part) {
    case "major":
      return `${major + 1}.0.0`;
    case "minor":
      return `${major}.${minor + 1}.0`;
    case "patch":
      return `${major}.${minor}.${patch + 1}`;
  }
}

export function compareVersions(a: string, b: string): number {
  const left = parts(a);
  const right = parts(b);
  for (let i = 0; i < 3; i++) {
    if (left[i] !== right[i]) return left[i] - right[i];
  }
  return 0;
}
