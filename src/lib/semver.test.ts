import { describe, it, expect } from "vitest";
import {
  canonicalVersion,
  compareToolchainVersions,
  compareVersions,
  isValidVersion,
  prerelease,
  toolchainToSemver,
} from "./semver.js";

describe("isValidVersion", () => {
  it("accepts full and shorthand versions", () => {
    expect(isValidVersion("v1.2.3")).toBe(true);
    expect(isValidVersion("v1.2.3-rc.1+build.5")).toBe(true);
    expect(isValidVersion("v1")).toBe(true);
    expect(isValidVersion("v1.2")).toBe(true);
  });

  it("rejects versions without the v prefix", () => {
    expect(isValidVersion("1.2.3")).toBe(false);
  });

  it("rejects shorthands with a pre-release", () => {
    expect(isValidVersion("v1-pre")).toBe(false);
    expect(isValidVersion("v1.2-pre")).toBe(false);
  });

  it("rejects numeric parts beyond the safe integer range", () => {
    expect(isValidVersion("v99999999999999999.0.0")).toBe(false);
    expect(compareVersions("v99999999999999999.0.0", "v1.0.0")).toBe(-1);
  });

  it("rejects what semver alone would tolerate", () => {
    expect(isValidVersion("vv1.2.3")).toBe(false);
    expect(isValidVersion("v 1.2.3")).toBe(false);
    expect(isValidVersion("v01.2.3")).toBe(false);
  });
});

describe("compareVersions", () => {
  it("orders numerically", () => {
    expect(compareVersions("v1.2.3", "v1.10.0")).toBe(-1);
    expect(compareVersions("v2.0.0", "v1.10.0")).toBe(1);
  });

  it("places pre-releases below their release", () => {
    expect(compareVersions("v1.0.0-rc.1", "v1.0.0")).toBe(-1);
  });

  it("ignores build metadata", () => {
    expect(compareVersions("v1.2.3+a", "v1.2.3+b")).toBe(0);
  });

  it("treats shorthands as their full form", () => {
    expect(compareVersions("v1", "v1.0.0")).toBe(0);
  });

  it("sorts invalid versions lowest", () => {
    expect(compareVersions("bad", "v0.0.1")).toBe(-1);
    expect(compareVersions("v0.0.1", "bad")).toBe(1);
    expect(compareVersions("bad", "junk")).toBe(0);
  });
});

describe("canonicalVersion", () => {
  it("expands shorthands", () => {
    expect(canonicalVersion("v1.2")).toBe("v1.2.0");
  });

  it("drops build metadata except +incompatible", () => {
    expect(canonicalVersion("v1.2.3-pre+meta")).toBe("v1.2.3-pre");
    expect(canonicalVersion("v2.0.0+incompatible")).toBe("v2.0.0+incompatible");
  });

  it("returns an empty string for invalid versions", () => {
    expect(canonicalVersion("1.2.3")).toBe("");
  });
});

describe("prerelease", () => {
  it("returns the pre-release with its dash", () => {
    expect(prerelease("v1.2.3-rc.1+meta")).toBe("-rc.1");
  });

  it("returns an empty string for releases", () => {
    expect(prerelease("v1.2.3")).toBe("");
  });
});

describe("toolchainToSemver", () => {
  it("maps toolchain spellings", () => {
    expect(toolchainToSemver("go1.21.0")).toBe("v1.21.0");
    expect(toolchainToSemver("go1.20")).toBe("v1.20.0");
    expect(toolchainToSemver("go1")).toBe("v1.0.0");
    expect(toolchainToSemver("go1.21rc2")).toBe("v1.21.0-rc.2");
    expect(toolchainToSemver("go1.22beta1")).toBe("v1.22.0-beta.1");
  });

  it("leaves module versions alone", () => {
    expect(toolchainToSemver("v1.2.3")).toBe("v1.2.3");
  });
});

describe("compareToolchainVersions", () => {
  it("orders release candidates below the release", () => {
    expect(compareToolchainVersions("go1.21rc2", "go1.21.0")).toBe(-1);
  });

  it("compares across prefixes", () => {
    expect(compareToolchainVersions("go1.21.1", "v1.21.0")).toBe(1);
  });
});
