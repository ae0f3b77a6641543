import semver from "semver";
import type { SemVer } from "semver";

/**
 * Module versions always carry a leading "v". The MAJOR and MAJOR.MINOR
 * shorthands are accepted only without pre-release or build parts.
 */
const SHORTHAND = /^v(0|[1-9]\d*)(?:\.(0|[1-9]\d*))?$/;

const TOOLCHAIN = /^(\d+(?:\.\d+){0,2})(?:(alpha|beta|rc)(\d+))?$/;

function parseVersion(version: string): SemVer | null {
  if (!version.startsWith("v")) {
    return null;
  }

  const short = SHORTHAND.exec(version);
  if (short) {
    return semver.parse(`${short[1]}.${short[2] ?? "0"}.0`);
  }

  const rest = version.slice(1);
  // Numeric parts above Number.MAX_SAFE_INTEGER are rejected by semver, so
  // such versions count as invalid and sort lowest.
  // semver itself tolerates a second "v" and surrounding whitespace
  if (!/^\d/.test(rest) || /\s/.test(rest)) {
    return null;
  }
  return semver.parse(rest);
}

export function isValidVersion(version: string): boolean {
  return parseVersion(version) !== null;
}

/**
 * Compare two module versions by precedence, ignoring build metadata.
 * An invalid version sorts below every valid one and ties with any
 * other invalid version.
 */
export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a);
  const pb = parseVersion(b);

  if (!pa && !pb) return 0;
  if (!pa) return -1;
  if (!pb) return 1;

  return semver.compare(pa, pb);
}

/**
 * Canonical form vMAJOR.MINOR.PATCH[-pre]. Build metadata is dropped
 * unless it is exactly "+incompatible". Returns "" for invalid input.
 */
export function canonicalVersion(version: string): string {
  const parsed = parseVersion(version);
  if (!parsed) {
    return "";
  }

  let canonical = `v${parsed.major}.${parsed.minor}.${parsed.patch}`;
  if (parsed.prerelease.length > 0) {
    canonical += `-${parsed.prerelease.join(".")}`;
  }
  if (parsed.build.join(".") === "incompatible") {
    canonical += "+incompatible";
  }
  return canonical;
}

/**
 * The pre-release part of a version including its leading dash
 */
export function prerelease(version: string): string {
  const parsed = parseVersion(version);
  if (!parsed || parsed.prerelease.length === 0) {
    return "";
  }
  return `-${parsed.prerelease.join(".")}`;
}

/**
 * Map a toolchain version such as "go1.21.0" or "go1.22rc1" onto the
 * module version scheme. Strings without the "go" prefix pass through.
 *
 * go1.21.0 -> v1.21.0
 * go1.20   -> v1.20.0
 * go1.22rc1 -> v1.22.0-rc.1
 */
export function toolchainToSemver(version: string): string {
  if (!version.startsWith("go")) {
    return version;
  }

  const rest = version.slice(2);
  const match = TOOLCHAIN.exec(rest);
  if (!match) {
    return `v${rest}`;
  }

  const parts = match[1].split(".");
  while (parts.length < 3) {
    parts.push("0");
  }

  const pre = match[2] ? `-${match[2]}.${match[3]}` : "";
  return `v${parts.join(".")}${pre}`;
}

/**
 * Compare versions that may use either the "go" or the "v" prefix
 */
export function compareToolchainVersions(a: string, b: string): number {
  return compareVersions(toolchainToSemver(a), toolchainToSemver(b));
}
