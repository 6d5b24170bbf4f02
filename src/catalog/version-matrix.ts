import { minimatch } from "minimatch";
import { InvalidSelectorError, UnknownVersionError } from "../core/errors.js";
import { compareVersions, formatVersion, tryParseVersion, type Version } from "../core/version.js";
import type { Release, ReleaseCatalog } from "./releases.js";

export type VersionSelector =
  | { kind: "last"; count: number }
  | { kind: "explicit"; versions: string[] };

export type MatrixEntry = {
  version: Version;
  artifactUrl: string;
};

/** Catalog window used when resolving explicit versions. */
export const DEFAULT_EXPLICIT_LOOKBACK = 30;

export type VersionMatrixOptions = {
  explicitLookback?: number;
};

const GLOB_CHARS = /[*?[\]{}]/;

/**
 * Turns a version selector into an ordered list of installable releases.
 *
 * Explicit versions are looked up in a wider catalog window than the
 * default `last` selector, since they may be older than the newest release.
 */
export class VersionMatrix {
  private readonly explicitLookback: number;

  constructor(
    private readonly catalog: ReleaseCatalog,
    opts: VersionMatrixOptions = {}
  ) {
    this.explicitLookback = opts.explicitLookback ?? DEFAULT_EXPLICIT_LOOKBACK;
  }

  async resolve(selector: VersionSelector): Promise<MatrixEntry[]> {
    if (selector.kind === "last") {
      if (!Number.isInteger(selector.count) || selector.count < 1) {
        throw new InvalidSelectorError(`--last-n must be a positive integer, got ${selector.count}`);
      }
      const releases = await this.catalog.latest(selector.count);
      return releases.map(toEntry);
    }

    if (selector.versions.length === 0) {
      throw new InvalidSelectorError("No versions given");
    }
    const releases = await this.catalog.latest(this.explicitLookback);
    return selectExplicit(releases, selector.versions);
  }
}

/**
 * Pick releases for each requested entry, in request order. An entry is an
 * exact version (compared numerically, so `7.3` matches `7.3.0`) or a glob.
 */
export function selectExplicit(releases: Release[], requested: string[]): MatrixEntry[] {
  const picked: MatrixEntry[] = [];
  const seen = new Set<string>();
  const missing: string[] = [];

  for (const want of requested) {
    const matches = matchRelease(releases, want);
    if (matches.length === 0) {
      missing.push(want);
      continue;
    }
    for (const release of matches) {
      const key = formatVersion(release.version);
      if (seen.has(key)) continue;
      seen.add(key);
      picked.push(toEntry(release));
    }
  }

  if (missing.length > 0) throw new UnknownVersionError(missing);
  return picked;
}

function matchRelease(releases: Release[], want: string): Release[] {
  if (GLOB_CHARS.test(want)) {
    return releases.filter((r) => minimatch(formatVersion(r.version), want));
  }
  const version = tryParseVersion(want);
  if (!version) return [];
  const exact = releases.find((r) => compareVersions(r.version, version) === 0);
  return exact ? [exact] : [];
}

function toEntry(release: Release): MatrixEntry {
  return { version: release.version, artifactUrl: release.artifactUrl };
}
