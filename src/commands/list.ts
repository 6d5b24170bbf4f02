import { loadConfig } from "../config/loader.js";
import { errorCode, errorMessage } from "../core/errors.js";
import { formatVersion } from "../core/version.js";
import { catalogFromConfig, type ReleaseCatalog } from "../catalog/releases.js";
import { EXIT, exitCodeFor } from "./exit-codes.js";
import type { HarnessConfig } from "../types/config.js";

export type ListedRelease = {
  version: string;
  artifact_url: string;
  published_at: string | null;
};

export type ListResult =
  | { ok: true; releases: ListedRelease[] }
  | { ok: false; exitCode: number; error: { code: string; message: string } };

export type ListOptions = {
  configDir?: string;
  env?: string;
  count?: number;
  loadConfig?: (envName?: string, configDir?: string) => HarnessConfig;
  createCatalog?: (config: HarnessConfig) => ReleaseCatalog;
};

/**
 * Newest installable releases, newest first.
 */
export async function listReleases(opts: ListOptions = {}): Promise<ListResult> {
  try {
    const config = (opts.loadConfig ?? loadConfig)(opts.env, opts.configDir);
    const count = opts.count ?? config.catalog.list_default;
    if (!Number.isInteger(count) || count < 1) {
      return {
        ok: false,
        exitCode: EXIT.INVALID_ARGS,
        error: { code: "INVALID_ARGS", message: `-n must be a positive integer, got ${count}` }
      };
    }

    const releases = await (opts.createCatalog ?? catalogFromConfig)(config).latest(count);
    return {
      ok: true,
      releases: releases.map((r) => ({
        version: formatVersion(r.version),
        artifact_url: r.artifactUrl,
        published_at: r.publishedAt
      }))
    };
  } catch (e) {
    return { ok: false, exitCode: exitCodeFor(e), error: { code: errorCode(e), message: errorMessage(e) } };
  }
}
