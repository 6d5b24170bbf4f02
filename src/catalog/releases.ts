import { createChecker } from "../schema/ajv.js";
import { CatalogError, errorMessage } from "../core/errors.js";
import { tryParseVersion, type Version } from "../core/version.js";
import type { FetchFn } from "../query/client.js";
import type { HarnessConfig } from "../types/config.js";

export type Release = {
  version: Version;
  artifactUrl: string;
  publishedAt: string | null;
};

/** Source of installable releases, newest first. */
export interface ReleaseCatalog {
  latest(count: number): Promise<Release[]>;
}

type GithubAsset = { name: string; browser_download_url: string };

type GithubRelease = {
  tag_name: string;
  draft?: boolean;
  prerelease?: boolean;
  published_at?: string | null;
  assets: GithubAsset[];
};

const RELEASES_SCHEMA = {
  type: "array",
  items: {
    type: "object",
    required: ["tag_name", "assets"],
    properties: {
      tag_name: { type: "string" },
      draft: { type: "boolean" },
      prerelease: { type: "boolean" },
      published_at: { type: ["string", "null"] },
      assets: {
        type: "array",
        items: {
          type: "object",
          required: ["name", "browser_download_url"],
          properties: {
            name: { type: "string" },
            browser_download_url: { type: "string", format: "uri" }
          }
        }
      }
    }
  }
};

const checkReleases = createChecker<GithubRelease[]>(RELEASES_SCHEMA);

/** GitHub caps `per_page` at 100. */
export const MAX_PAGE_SIZE = 100;

export type GithubReleaseCatalogOptions = {
  apiUrl: string;
  repo: string;
  assetSuffix: string;
  token?: string;
  fetch?: FetchFn;
};

/**
 * Lists releases of a GitHub repository and picks the downloadable server
 * tarball from each. Drafts, prereleases and releases without a matching
 * asset are skipped.
 */
export class GithubReleaseCatalog implements ReleaseCatalog {
  private readonly fetchFn: FetchFn;

  constructor(private readonly opts: GithubReleaseCatalogOptions) {
    this.fetchFn = opts.fetch ?? fetch;
  }

  async latest(count: number): Promise<Release[]> {
    const releases: Release[] = [];
    const perPage = Math.min(count, MAX_PAGE_SIZE);

    for (let page = 1; releases.length < count; page++) {
      const batch = await this.fetchPage(perPage, page);
      for (const raw of batch) {
        const release = toRelease(raw, this.opts.assetSuffix);
        if (release) releases.push(release);
        if (releases.length === count) break;
      }
      if (batch.length < perPage) break;
    }

    return releases;
  }

  private async fetchPage(perPage: number, page: number): Promise<GithubRelease[]> {
    const base = this.opts.apiUrl.replace(/\/+$/, "");
    const url = `${base}/repos/${this.opts.repo}/releases?${new URLSearchParams({ per_page: String(perPage), page: String(page) }).toString()}`;
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "User-Agent": "ilpcompat"
    };
    if (this.opts.token) headers.Authorization = `Bearer ${this.opts.token}`;

    let res: Response;
    try {
      res = await this.fetchFn(url, { headers, signal: AbortSignal.timeout(30_000) });
    } catch (e) {
      throw new CatalogError(`Failed to list releases from ${url}: ${errorMessage(e)}`, { cause: e });
    }
    if (res.status !== 200) {
      throw new CatalogError(`Release listing ${url} returned status ${res.status}`);
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (e) {
      throw new CatalogError(`Release listing ${url} is not valid JSON: ${errorMessage(e)}`, { cause: e });
    }

    const checked = checkReleases(data);
    if (!checked.ok) throw new CatalogError(`Unexpected release listing from ${url}: ${checked.errors}`);
    return checked.value;
  }
}

function toRelease(raw: GithubRelease, assetSuffix: string): Release | null {
  if (raw.draft || raw.prerelease) return null;
  const version = tryParseVersion(raw.tag_name);
  if (!version) return null;
  const asset = raw.assets.find((a) => a.name.endsWith(assetSuffix));
  if (!asset) return null;
  return { version, artifactUrl: asset.browser_download_url, publishedAt: raw.published_at ?? null };
}

export function catalogFromConfig(config: HarnessConfig): ReleaseCatalog {
  return new GithubReleaseCatalog({
    apiUrl: config.catalog.api_url,
    repo: config.catalog.repo,
    assetSuffix: config.catalog.asset_suffix,
    token: config.catalog.token
  });
}
