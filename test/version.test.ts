import { describe, expect, it } from "vitest";
import {
  INITIAL_VERSION,
  bumpVersion,
  formatVersion,
  latestVersion,
  nextVersion,
  parseVersion,
} from "../src/core/version.js";

const TAGS = ["1.0.0", "1.1.0", "2.0.0"];

describe("nextVersion", () => {
  it("bumps the highest tag by the requested kind", () => {
    expect(formatVersion(nextVersion(TAGS, "patch"))).toBe("2.0.1");
    expect(formatVersion(nextVersion(TAGS, "minor"))).toBe("2.1.0");
    expect(formatVersion(nextVersion(TAGS, "major"))).toBe("3.0.0");
  });

  it("starts at 1.0.0 whatever the kind when there is no tag", () => {
    expect(nextVersion([], "patch")).toEqual({ major: 1, minor: 0, patch: 0 });
    expect(nextVersion([], "major")).toEqual({ major: 1, minor: 0, patch: 0 });
  });

  it("ignores tags that are not versions", () => {
    expect(formatVersion(nextVersion(["latest", "", "1.4.2", "release-9"], "patch"))).toBe("1.4.3");
    expect(nextVersion(["latest", "stable"], "minor")).toEqual(INITIAL_VERSION);
  });

  it("does not treat prefixed or padded tags as releases", () => {
    expect(formatVersion(nextVersion(["1.0.0", "v3.0.0", " 4.0.0"], "patch"))).toBe("1.0.1");
  });

  it("does not depend on tag order", () => {
    expect(formatVersion(nextVersion(["2.0.0", "10.0.0", "9.9.9"], "minor"))).toBe("10.1.0");
  });
});

describe("latestVersion", () => {
  it("returns null without a valid tag", () => {
    expect(latestVersion(["nightly"])).toBeNull();
  });

  it("orders pre-releases by semver precedence but returns a plain triple", () => {
    expect(latestVersion(["2.0.0", "3.0.0-rc.1"])).toEqual({ major: 3, minor: 0, patch: 0 });
    expect(latestVersion(["3.0.0", "3.0.0-rc.1"])).toEqual({ major: 3, minor: 0, patch: 0 });
  });

  it("accepts build metadata", () => {
    expect(latestVersion(["1.2.3+build.5"])).toEqual({ major: 1, minor: 2, patch: 3 });
  });
});

describe("version helpers", () => {
  it("parses strict triples only", () => {
    expect(parseVersion("1.2.3")).toEqual({ major: 1, minor: 2, patch: 3 });
    expect(parseVersion("1.2")).toBeNull();
    expect(parseVersion("v1.2.3")).toBeNull();
  });

  it("resets lower fields when bumping", () => {
    expect(bumpVersion({ major: 1, minor: 4, patch: 7 }, "minor")).toEqual({ major: 1, minor: 5, patch: 0 });
    expect(bumpVersion({ major: 1, minor: 4, patch: 7 }, "major")).toEqual({ major: 2, minor: 0, patch: 0 });
  });
});
