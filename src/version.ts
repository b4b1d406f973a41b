// src/version.ts — Version tuple parsing and comparison
// Used for Qt prefix selection, local-vs-upstream checks, and release listings.

import type { VersionTuple } from "./types.js";

const DOTTED_TRIPLE = /(\d+)\.(\d+)\.(\d+)/;
const LISTING_ENTRY = /href="((?:\d+\.)+\d+)\/"/g;

/**
 * Extract every run of decimal digits, in order.
 * "6.10.1" → [6, 10, 1], "msvc2022_64" → [2022, 64], "latest" → [].
 */
export function parseVersionTuple(text: string): VersionTuple {
  return (text.match(/\d+/g) ?? []).map((run) => parseInt(run, 10));
}

/**
 * Scan path segments from last to first and return the first dotted X.Y.Z.
 * Stricter than parseVersionTuple on purpose: "msvc2022_64" or "x64" must not
 * be mistaken for a version when walking an SDK tree.
 */
export function parseVersionFromPathSegments(path: string): VersionTuple {
  const segments = path.split(/[\\/]/);
  for (let i = segments.length - 1; i >= 0; i--) {
    const match = DOTTED_TRIPLE.exec(segments[i]);
    if (match) {
      return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
    }
  }
  return [];
}

/** Lexicographic tuple ordering; a strict prefix sorts first. */
export function compareVersionTuples(a: VersionTuple, b: VersionTuple): -1 | 0 | 1 {
  const common = Math.min(a.length, b.length);
  for (let i = 0; i < common; i++) {
    if (a[i] < b[i]) return -1;
    if (a[i] > b[i]) return 1;
  }
  if (a.length < b.length) return -1;
  if (a.length > b.length) return 1;
  return 0;
}

/**
 * Compare two version strings. Undefined when either side is missing or has no digits.
 */
export function compareVersions(
  lhs: string | null | undefined,
  rhs: string | null | undefined,
): -1 | 0 | 1 | undefined {
  if (!lhs || !rhs) return undefined;
  const left = parseVersionTuple(lhs);
  const right = parseVersionTuple(rhs);
  if (left.length === 0 || right.length === 0) return undefined;
  return compareVersionTuples(left, right);
}

/** Highest version by numeric tuple (first seen wins ties). */
export function selectLatest(versions: Iterable<string>): string | undefined {
  let best: string | undefined;
  let bestTuple: VersionTuple = [];
  for (const raw of versions) {
    const tuple = parseVersionTuple(raw);
    if (tuple.length === 0) continue;
    if (best === undefined || compareVersionTuples(tuple, bestTuple) > 0) {
      best = raw.replace(/\/+$/, "");
      bestTuple = tuple;
    }
  }
  return best;
}

export function formatVersionTuple(tuple: VersionTuple): string | undefined {
  return tuple.length > 0 ? tuple.join(".") : undefined;
}

/**
 * Collect version directories (`href="6.8/"`) from an HTTP index page.
 * With `segments`, keep only entries with exactly that many numeric groups.
 */
export function extractVersionsFromListing(html: string, segments?: number): string[] {
  const versions: string[] = [];
  for (const match of html.matchAll(LISTING_ENTRY)) {
    const version = match[1];
    if (segments !== undefined && parseVersionTuple(version).length !== segments) continue;
    versions.push(version);
  }
  return versions;
}
