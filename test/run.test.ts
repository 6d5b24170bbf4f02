import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { splitVersionArgs, run, describeScenarios, describeSelector, type RunDeps } from "../src/commands/run.js";
import { listReleases } from "../src/commands/list.js";
import { CatalogError, ConfigError } from "../src/core/errors.js";
import { loadConfig } from "../src/config/loader.js";
import { parseVersion } from "../src/core/version.js";
import { createReporter } from "../src/report/reporter.js";
import { SCENARIOS } from "../src/suite/scenarios.js";
import type { Release, ReleaseCatalog } from "../src/catalog/releases.js";
import type { HarnessConfig } from "../src/types/config.js";
import { FakeFixture, type Fault } from "./support/fake-fixture.js";
import { FakeQuestDb } from "./support/fake-questdb.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

const RELEASES: Release[] = ["7.3.10", "7.3.9", "7.2.1"].map((v) => ({
  version: parseVersion(v),
  artifactUrl: `https://downloads.example.test/questdb-${v}-no-jre-bin.tar.gz`,
  publishedAt: "2024-01-01T00:00:00Z"
}));

const catalog: ReleaseCatalog = { latest: async (count) => RELEASES.slice(0, count) };

const pick = (...names: string[]) => SCENARIOS.filter((s) => names.includes(s.name));

describe("run command", () => {
  let tmp: string;
  let config: HarnessConfig;
  let lines: string[];
  let db: FakeQuestDb;

  function deps(faults: Record<string, Fault[]> = {}): Partial<RunDeps> {
    return {
      loadConfig: () => config,
      createCatalog: () => catalog,
      createFixtureFactory: () => (entry) => new FakeFixture(entry, [], faults[entry.version.raw] ?? []),
      createQueryClient: () => db,
      openSender: db.senders,
      scenarios: pick("single_symbol", "two_columns"),
      now: () => new Date("2024-05-01T10:00:00.000Z")
    };
  }

  function codes(): string[] {
    return lines.map((l) => JSON.parse(l).code);
  }

  const reporter = () => createReporter("jsonl", { write: (chunk: string) => lines.push(chunk.trimEnd()) });

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "ilpcompat-run-"));
    config = { ...loadConfig(undefined, CONFIG_DIR, {}), reports_dir: path.join(tmp, "runs"), install_dir: path.join(tmp, "install") };
    lines = [];
    db = new FakeQuestDb();
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("tests the newest version by default and writes the report", async () => {
    const res = await run({ deps: deps(), reporter: reporter() });
    if (!res.ok) throw new Error(`run() failed: ${JSON.stringify(res.error)}`);

    expect(res.exitCode).toBe(0);
    expect(res.report.success).toBe(true);
    expect(res.report.selector).toBe("last:1");
    expect(res.report.started_at).toBe("2024-05-01T10:00:00.000Z");
    expect(res.report.versions.map((v) => [v.version, v.status])).toEqual([["7.3.10", "passed"]]);
    expect(res.report.versions[0].suite?.scenarios.map((s) => s.name)).toEqual(["single_symbol", "two_columns"]);
    expect(res.reportPath).toBe(path.join(tmp, "runs", res.runId, "report.json"));
    expect(JSON.parse(fs.readFileSync(res.reportPath, "utf8"))).toEqual(res.report);
    expect(fs.existsSync(res.junitPath)).toBe(true);
    expect(codes()).toEqual([
      "MATRIX_RESOLVED",
      "VERSION_START",
      "FIXTURE_READY",
      "SCENARIO_PASSED",
      "SCENARIO_PASSED",
      "VERSION_PASSED",
      "RUN_PASSED"
    ]);
  });

  it("resolves explicit versions and globs", async () => {
    const res = await run({ deps: deps(), versions: ["7.2.1", "7.3.*"] });
    if (!res.ok) throw new Error(`run() failed: ${JSON.stringify(res.error)}`);
    expect(res.report.selector).toBe("versions:7.2.1,7.3.*");
    expect(res.report.versions.map((v) => v.version)).toEqual(["7.2.1", "7.3.10", "7.3.9"]);
  });

  it("accepts comma-separated versions within one --versions argument", async () => {
    const res = await run({ deps: deps(), versions: ["7.2.1,7.3.*"] });
    if (!res.ok) throw new Error(`run() failed: ${JSON.stringify(res.error)}`);
    expect(res.report.selector).toBe("versions:7.2.1,7.3.*");
    expect(res.report.versions.map((v) => v.version)).toEqual(["7.2.1", "7.3.10", "7.3.9"]);
  });

  it("aborts the matrix after a failing version unless told to continue", async () => {
    const faults = { "7.3.10": ["start" as const] };

    const aborted = await run({ deps: deps(faults), lastN: 2 });
    if (!aborted.ok) throw new Error(`run() failed: ${JSON.stringify(aborted.error)}`);
    expect(aborted.exitCode).toBe(1);
    expect(aborted.report.versions.map((v) => v.status)).toEqual(["error", "not_run"]);

    const continued = await run({ deps: deps(faults), lastN: 2, continueOnFailure: true });
    if (!continued.ok) throw new Error(`run() failed: ${JSON.stringify(continued.error)}`);
    expect(continued.exitCode).toBe(1);
    expect(continued.report.versions.map((v) => v.status)).toEqual(["error", "passed"]);
  });

  it("passes the scenario filter and fail-fast through to the suite", async () => {
    const res = await run({ deps: deps(), filter: ["two_*"], failFast: true });
    if (!res.ok) throw new Error(`run() failed: ${JSON.stringify(res.error)}`);
    expect(res.report.versions[0].suite?.scenarios.map((s) => s.name)).toEqual(["two_columns"]);
  });

  it("rejects --last-n together with --versions", async () => {
    const res = await run({ deps: deps(), lastN: 1, versions: ["7.3.10"] });
    expect(res).toEqual({
      ok: false,
      exitCode: 3,
      error: { code: "INVALID_ARGS", message: "--last-n and --versions are mutually exclusive" }
    });
  });

  it("exits 3 for unknown versions and invalid config", async () => {
    const unknown = await run({ deps: deps(), versions: ["1.0.0"] });
    expect(unknown).toMatchObject({ ok: false, exitCode: 3, error: { code: "UNKNOWN_VERSION" } });

    const badConfig = await run({
      deps: {
        ...deps(),
        loadConfig: () => {
          throw new ConfigError("Invalid config in /etc/ilpcompat: data/poll/interval_ms must be >= 1");
        }
      }
    });
    expect(badConfig).toMatchObject({ ok: false, exitCode: 3, error: { code: "CONFIG_INVALID" } });
  });

  it("exits 4 when the catalog is unavailable", async () => {
    const down: ReleaseCatalog = {
      latest: async () => {
        throw new CatalogError("Release listing returned status 503");
      }
    };
    const res = await run({ deps: { ...deps(), createCatalog: () => down } });
    expect(res).toMatchObject({ ok: false, exitCode: 4, error: { code: "CATALOG_ERROR" } });
  });
});

describe("list command", () => {
  const config = loadConfig(undefined, CONFIG_DIR, {});

  it("lists the newest releases", async () => {
    const res = await listReleases({ count: 2, loadConfig: () => config, createCatalog: () => catalog });
    expect(res).toEqual({
      ok: true,
      releases: [
        { version: "7.3.10", artifact_url: "https://downloads.example.test/questdb-7.3.10-no-jre-bin.tar.gz", published_at: "2024-01-01T00:00:00Z" },
        { version: "7.3.9", artifact_url: "https://downloads.example.test/questdb-7.3.9-no-jre-bin.tar.gz", published_at: "2024-01-01T00:00:00Z" }
      ]
    });
  });

  it("defaults to catalog.list_default", async () => {
    let asked = 0;
    const counting: ReleaseCatalog = {
      latest: async (count) => {
        asked = count;
        return [];
      }
    };
    await listReleases({ loadConfig: () => config, createCatalog: () => counting });
    expect(asked).toBe(30);
  });

  it("rejects a non-positive count", async () => {
    const res = await listReleases({ count: 0, loadConfig: () => config, createCatalog: () => catalog });
    expect(res).toMatchObject({ ok: false, exitCode: 3 });
  });
});

describe("scenario listing", () => {
  it("describes every scenario with its gate", () => {
    const info = describeScenarios();
    expect(info).toHaveLength(SCENARIOS.length);
    expect(info.find((s) => s.name === "single_symbol")).toMatchObject({ skip_at_or_below: null, reason: null });
    expect(info.find((s) => s.name === "multibyte_names")).toMatchObject({ skip_at_or_below: "6.0.7.1", reason: "No unicode support." });
  });

  it("describes selectors", () => {
    expect(describeSelector({ kind: "last", count: 3 })).toBe("last:3");
    expect(describeSelector({ kind: "explicit", versions: ["7.3.*"] })).toBe("versions:7.3.*");
  });

  it("splits version arguments on commas and drops empty entries", () => {
    expect(splitVersionArgs(["7.3.10,8.*", "6.2", " 7.2.1 ,"])).toEqual(["7.3.10", "8.*", "6.2", "7.2.1"]);
  });
});
