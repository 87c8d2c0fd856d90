import semver, { type SemVer } from "semver";
import type { IncrementKind, Version } from "../types/release.js";

/** Version of the very first release, when no valid tag exists yet. */
export const INITIAL_VERSION: Version = Object.freeze({ major: 1, minor: 0, patch: 0 });

/**
 * Parse a tag as a strict semantic version. Prefixed forms such as "v1.2.3"
 * are not release tags and yield null.
 */
function parseTag(tag: string): SemVer | null {
  if (!/^\d/.test(tag) || tag.trim() !== tag) return null;
  return semver.parse(tag);
}

function toVersion(v: SemVer): Version {
  return Object.freeze({ major: v.major, minor: v.minor, patch: v.patch });
}

export function parseVersion(tag: string): Version | null {
  const parsed = parseTag(tag);
  return parsed ? toVersion(parsed) : null;
}

export function formatVersion(v: Version): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

/** Highest valid release tag by semver precedence; unparsable tags are ignored. */
export function latestVersion(tags: Iterable<string>): Version | null {
  let best: SemVer | null = null;
  for (const tag of tags) {
    const parsed = parseTag(tag);
    if (parsed && (best === null || semver.compare(parsed, best) > 0)) {
      best = parsed;
    }
  }
  return best ? toVersion(best) : null;
}

/** Derive the bumped version; lower fields reset to zero. */
export function bumpVersion(v: Version, kind: IncrementKind): Version {
  switch (kind) {
    case "major":
      return Object.freeze({ major: v.major + 1, minor: 0, patch: 0 });
    case "minor":
      return Object.freeze({ major: v.major, minor: v.minor + 1, patch: 0 });
    case "patch":
      return Object.freeze({ major: v.major, minor: v.minor, patch: v.patch + 1 });
  }
}

/**
 * Next release version for the given tags.
 * Without any valid tag the result is 1.0.0 itself, whatever the kind.
 */
export function nextVersion(tags: Iterable<string>, kind: IncrementKind): Version {
  const latest = latestVersion(tags);
  return latest ? bumpVersion(latest, kind) : INITIAL_VERSION;
}
