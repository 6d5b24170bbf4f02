import { InvalidVersionError } from "./errors.js";

/**
 * A release version as an ordered tuple of non-negative integers,
 * e.g. `7.3.10` or `6.0.7.1`. `raw` keeps the catalog spelling.
 */
export type Version = {
  readonly raw: string;
  readonly parts: readonly number[];
};

const VERSION_RE = /^v?(\d+(?:\.\d+)*)$/;

/** Parse a version string. A leading `v` (as in git tags) is accepted. */
export function parseVersion(raw: string): Version {
  const trimmed = raw.trim();
  const m = VERSION_RE.exec(trimmed);
  if (!m) throw new InvalidVersionError(raw);
  return { raw: trimmed, parts: m[1].split(".").map((p) => Number.parseInt(p, 10)) };
}

/** Like parseVersion, but returns null instead of throwing. */
export function tryParseVersion(raw: string): Version | null {
  return VERSION_RE.test(raw.trim()) ? parseVersion(raw) : null;
}

/**
 * Lexicographic comparison. The shorter tuple is padded with zeros,
 * so `6.1` equals `6.1.0` and `6.0.7.1` sorts after `6.0.7`.
 */
export function compareVersions(a: Version, b: Version): number {
  const len = Math.max(a.parts.length, b.parts.length);
  for (let i = 0; i < len; i++) {
    const diff = (a.parts[i] ?? 0) - (b.parts[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function isAtOrBelow(version: Version, limit: Version): boolean {
  return compareVersions(version, limit) <= 0;
}

export function formatVersion(version: Version): string {
  return version.parts.join(".");
}
