import { describe, expect, it, vi } from "vitest";
import { CatalogError } from "../src/core/errors.js";
import { GithubReleaseCatalog } from "../src/catalog/releases.js";
import type { FetchFn } from "../src/query/client.js";

const SUFFIX = "-no-jre-bin.tar.gz";

function rel(tag: string, extra: { draft?: boolean; prerelease?: boolean; assets?: string[] } = {}) {
  const assets = extra.assets ?? [`questdb-${tag}${SUFFIX}`, `questdb-${tag}-rt-linux-x86-64.tar.gz`];
  return {
    tag_name: tag,
    draft: extra.draft ?? false,
    prerelease: extra.prerelease ?? false,
    published_at: "2024-01-01T00:00:00Z",
    assets: assets.map((name) => ({ name, browser_download_url: `https://downloads.example.test/${tag}/${name}` }))
  };
}

/** Serves `pages[page - 1]` for `?page=N`. */
function pagedFetch(pages: unknown[][]) {
  return vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async (input) => {
    const page = Number(new URL(input).searchParams.get("page"));
    return new Response(JSON.stringify(pages[page - 1] ?? []), { status: 200 });
  });
}

function catalog(fetch: FetchFn, token?: string) {
  return new GithubReleaseCatalog({ apiUrl: "https://api.example.test/", repo: "questdb/questdb", assetSuffix: SUFFIX, token, fetch });
}

describe("GithubReleaseCatalog.latest", () => {
  it("returns the newest releases with their server tarball", async () => {
    const fetch = pagedFetch([[rel("7.3.10"), rel("7.3.9"), rel("7.3.8")]]);

    const releases = await catalog(fetch).latest(2);

    expect(releases.map((r) => r.version.raw)).toEqual(["7.3.10", "7.3.9"]);
    expect(releases[0].artifactUrl).toBe(`https://downloads.example.test/7.3.10/questdb-7.3.10${SUFFIX}`);
    expect(releases[0].publishedAt).toBe("2024-01-01T00:00:00Z");
    expect(vi.mocked(fetch).mock.calls[0][0]).toBe("https://api.example.test/repos/questdb/questdb/releases?per_page=2&page=1");
  });

  it("skips drafts, prereleases, odd tags and releases without the asset", async () => {
    const fetch = pagedFetch([
      [
        rel("8.0.0", { draft: true }),
        rel("7.4.0", { prerelease: true }),
        rel("nightly"),
        rel("7.3.11", { assets: ["source.zip"] }),
        rel("7.3.10")
      ]
    ]);
    const releases = await catalog(fetch).latest(5);
    expect(releases.map((r) => r.version.raw)).toEqual(["7.3.10"]);
  });

  it("pages until it has enough releases", async () => {
    const fetch = pagedFetch([
      [rel("7.3.10"), rel("7.3.9", { prerelease: true })],
      [rel("7.3.8"), rel("7.3.7")]
    ]);
    const releases = await catalog(fetch).latest(2);
    expect(releases.map((r) => r.version.raw)).toEqual(["7.3.10", "7.3.8"]);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("stops at a short page", async () => {
    const fetch = pagedFetch([[rel("7.3.10")]]);
    const releases = await catalog(fetch).latest(3);
    expect(releases).toHaveLength(1);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("sends the token as a bearer header", async () => {
    const fetch = pagedFetch([[rel("7.3.10")]]);
    await catalog(fetch, "test-secret").latest(1);
    expect(vi.mocked(fetch).mock.calls[0][1]?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
  });

  it("raises CatalogError on a bad status or payload", async () => {
    const limited: FetchFn = async () => new Response("rate limited", { status: 403 });
    await expect(catalog(limited).latest(1)).rejects.toBeInstanceOf(CatalogError);

    const odd: FetchFn = async () => new Response(JSON.stringify({ message: "Not Found" }), { status: 200 });
    await expect(catalog(odd).latest(1)).rejects.toThrow(/Unexpected release listing/);

    const down: FetchFn = async () => {
      throw new Error("getaddrinfo ENOTFOUND");
    };
    await expect(catalog(down).latest(1)).rejects.toThrow(/Failed to list releases from .*: getaddrinfo ENOTFOUND/);
  });
});
