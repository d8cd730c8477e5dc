/**
 * Release tag parsing and ordering
 */

import type { VersionKey } from './types';

const RELEASE_CANDIDATE_MARKER = 'rc';

/** Dotted numeric tag with an optional `v`; safe as a path segment and a git ref */
export const RELEASE_TAG_PATTERN = /^v?\d+(\.\d+)*$/;

export function isReleaseTag(tag: string): boolean {
  return RELEASE_TAG_PATTERN.test(tag);
}

/**
 * Decompose a release tag into an ordering key.
 *
 * Numeric components are read left to right after an optional `v`; missing
 * components are 0. A two-component tag follows the upstream `MAJOR.POINT`
 * scheme, so `v29.1` is point release 1 of line 29 and maps to `(29, 0, 1)`.
 * Three components map positionally: `v0.10.6` is `(0, 10, 6)`.
 */
export function parseReleaseTag(tag: string): VersionKey {
  const match = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?/i.exec(tag.trim());
  if (!match) {
    return { major: 0, minor: 0, patch: 0 };
  }

  const [, first, second, third] = match;
  const major = Number(first);

  if (third !== undefined) {
    return { major, minor: Number(second), patch: Number(third) };
  }
  return { major, minor: 0, patch: second !== undefined ? Number(second) : 0 };
}

export function compareVersionKeys(a: VersionKey, b: VersionKey): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function isReleaseCandidate(tag: string): boolean {
  return tag.toLowerCase().includes(RELEASE_CANDIDATE_MARKER);
}

/**
 * Major version of a tag, as used for build-system selection
 */
export function getMajorVersion(tag: string): number {
  return parseReleaseTag(tag).major;
}

/**
 * Keep the newest patch per `(major, minor)` line, newest line first.
 *
 * Release candidates are dropped, then only the first `scanLimit` tags
 * are considered. Within a line the first-seen tag wins a tie.
 */
export function resolveLatestPatches(
  tags: readonly string[],
  maxGroups: number,
  scanLimit: number = Number.POSITIVE_INFINITY
): string[] {
  const groups = new Map<string, { key: VersionKey; tag: string }>();

  for (const tag of tags.filter(t => !isReleaseCandidate(t)).slice(0, scanLimit)) {
    const key = parseReleaseTag(tag);
    const groupKey = `${key.major}.${key.minor}`;
    const current = groups.get(groupKey);

    if (!current || compareVersionKeys(key, current.key) > 0) {
      groups.set(groupKey, { key, tag });
    }
  }

  return Array.from(groups.values())
    .sort((a, b) => b.key.major - a.key.major || b.key.minor - a.key.minor)
    .slice(0, Math.max(0, maxGroups))
    .map(entry => entry.tag);
}

/**
 * First `count` non-candidate tags in upstream order
 */
export function takeLatestReleases(tags: readonly string[], count: number): string[] {
  return tags.filter(tag => !isReleaseCandidate(tag)).slice(0, Math.max(0, count));
}
