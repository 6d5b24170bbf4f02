import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { errorCode, errorMessage } from "../core/errors.js";
import { TestOrchestrator, type FixtureFactory, type SuiteRunner } from "../core/orchestrator.js";
import { formatVersion } from "../core/version.js";
import { catalogFromConfig, type ReleaseCatalog } from "../catalog/releases.js";
import { VersionMatrix, type MatrixEntry, type VersionSelector } from "../catalog/version-matrix.js";
import { DatabaseFixture } from "../fixture/fixture.js";
import { TarballInstaller } from "../fixture/installer.js";
import { QueryClient, type SqlQueryable } from "../query/client.js";
import { ConsistencyCheck } from "../query/consistency.js";
import { ReportWriter, makeRunId } from "../report/writer.js";
import { silentReporter, type Reporter } from "../report/reporter.js";
import { randomTableName, runSuite, type Scenario } from "../suite/scenario.js";
import { SCENARIOS } from "../suite/scenarios.js";
import { openIlpSender, type SenderFactory } from "../suite/sender.js";
import { EXIT, exitCodeFor } from "./exit-codes.js";
import type { FixtureHandle } from "../fixture/fixture.js";
import type { HarnessConfig } from "../types/config.js";
import type { RunReport } from "../types/report.js";

/** Collaborators the run command wires together; tests swap them for fakes. */
export type RunDeps = {
  loadConfig: (envName?: string, configDir?: string) => HarnessConfig;
  createCatalog: (config: HarnessConfig) => ReleaseCatalog;
  createFixtureFactory: (config: HarnessConfig, installRoot: string) => FixtureFactory;
  createQueryClient: (fixture: FixtureHandle, config: HarnessConfig) => SqlQueryable;
  openSender: SenderFactory;
  scenarios: Scenario[];
  now: () => Date;
};

export const defaultRunDeps: RunDeps = {
  loadConfig,
  createCatalog: catalogFromConfig,
  createFixtureFactory: (config, installRoot) => {
    const installer = new TarballInstaller(installRoot);
    return (entry) =>
      new DatabaseFixture({
        version: entry.version.raw,
        artifactUrl: entry.artifactUrl,
        installer,
        host: config.host,
        java: config.java,
        startTimeoutMs: config.timeouts.start_sec * 1000,
        stopTimeoutMs: config.timeouts.stop_sec * 1000,
        pollIntervalMs: config.poll.interval_ms
      });
  },
  createQueryClient: (fixture, config) => new QueryClient(fixture.httpUrl, { requestTimeoutMs: config.timeouts.query_ms }),
  openSender: openIlpSender,
  scenarios: SCENARIOS,
  now: () => new Date()
};

export type RunOptions = {
  configDir?: string;
  env?: string;
  cwd?: string;
  lastN?: number;
  versions?: string[];
  filter?: string[];
  failFast?: boolean;
  continueOnFailure?: boolean;
  reporter?: Reporter;
  deps?: Partial<RunDeps>;
};

export type RunResult =
  | {
      ok: true;
      exitCode: number;
      runId: string;
      reportPath: string;
      junitPath: string;
      report: RunReport;
    }
  | { ok: false; exitCode: number; error: { code: string; message: string } };

export type ScenarioInfo = {
  name: string;
  description: string;
  skip_at_or_below: string | null;
  reason: string | null;
};

export function describeScenarios(scenarios: Scenario[] = SCENARIOS): ScenarioInfo[] {
  return scenarios.map((s) => ({
    name: s.name,
    description: s.description,
    skip_at_or_below: s.gate ? formatVersion(s.gate.skipAtOrBelow) : null,
    reason: s.gate?.reason ?? null
  }));
}

export function describeSelector(selector: VersionSelector): string {
  return selector.kind === "last" ? `last:${selector.count}` : `versions:${selector.versions.join(",")}`;
}

/** `--versions 7.3.10,8.* 6.2` and `--versions 7.3.10 8.* 6.2` name the same versions. */
export function splitVersionArgs(args: string[]): string[] {
  return args.flatMap((arg) => arg.split(",")).map((v) => v.trim()).filter((v) => v.length > 0);
}

function pickSelector(opts: RunOptions, config: HarnessConfig): VersionSelector {
  const versions = splitVersionArgs(opts.versions ?? []);
  if (versions.length > 0) return { kind: "explicit", versions };
  return { kind: "last", count: opts.lastN ?? config.catalog.default_last_n };
}

/**
 * Resolve the version matrix, run the behaviour suite against each
 * version and write the run report.
 *
 * `ok: true` means the run completed and a report exists; `exitCode`
 * still tells whether every version passed.
 */
export async function run(opts: RunOptions = {}): Promise<RunResult> {
  const deps: RunDeps = { ...defaultRunDeps, ...opts.deps };
  const reporter = opts.reporter ?? silentReporter;
  const cwd = opts.cwd ?? process.cwd();

  if (opts.lastN !== undefined && opts.versions && opts.versions.length > 0) {
    return {
      ok: false,
      exitCode: EXIT.INVALID_ARGS,
      error: { code: "INVALID_ARGS", message: "--last-n and --versions are mutually exclusive" }
    };
  }

  let config: HarnessConfig;
  let selector: VersionSelector;
  try {
    config = deps.loadConfig(opts.env, opts.configDir);
    selector = pickSelector(opts, config);
  } catch (e) {
    return { ok: false, exitCode: exitCodeFor(e), error: { code: errorCode(e), message: errorMessage(e) } };
  }

  const startedAt = deps.now();
  const runId = makeRunId();

  let entries: MatrixEntry[];
  try {
    const matrix = new VersionMatrix(deps.createCatalog(config), { explicitLookback: config.catalog.explicit_lookback });
    entries = await matrix.resolve(selector);
  } catch (e) {
    return { ok: false, exitCode: exitCodeFor(e), error: { code: errorCode(e), message: errorMessage(e) } };
  }

  reporter.event("info", "MATRIX_RESOLVED", `Versions: ${entries.map((e) => formatVersion(e.version)).join(", ") || "(none)"}`, {
    run_id: runId,
    versions: entries.map((e) => formatVersion(e.version))
  });

  const suiteRunner: SuiteRunner = (fixture) => {
    const label = formatVersion(fixture.version);
    const check = new ConsistencyCheck(deps.createQueryClient(fixture, config), {
      timeoutMs: config.timeouts.table_sec * 1000,
      intervalMs: config.poll.interval_ms,
      strict: config.consistency.strict_query_errors
    });
    return runSuite(
      deps.scenarios,
      {
        fixture,
        openSender: () => deps.openSender(fixture),
        check,
        uniqueTableName: randomTableName
      },
      {
        filter: opts.filter,
        failFast: opts.failFast,
        onOutcome: (outcome) => {
          const detail = outcome.error?.message ?? outcome.reason;
          reporter.event(
            outcome.status === "failed" ? "error" : "info",
            `SCENARIO_${outcome.status.toUpperCase()}`,
            `${label} ${outcome.name}: ${outcome.status}${detail ? ` (${detail})` : ""}`,
            { version: label, scenario: outcome.name, duration_ms: outcome.duration_ms }
          );
        }
      }
    );
  };

  const orchestrator = new TestOrchestrator({
    createFixture: deps.createFixtureFactory(config, path.resolve(cwd, config.install_dir)),
    runSuite: suiteRunner,
    abortOnFailure: opts.continueOnFailure ? false : config.matrix.abort_on_failure,
    reporter
  });
  const outcome = await orchestrator.run(entries);

  const report: RunReport = {
    run_id: runId,
    started_at: startedAt.toISOString(),
    finished_at: deps.now().toISOString(),
    success: outcome.success,
    selector: describeSelector(selector),
    versions: outcome.versions
  };
  const written = new ReportWriter(path.resolve(cwd, config.reports_dir), runId).write(report);

  reporter.event(
    outcome.success ? "info" : "error",
    outcome.success ? "RUN_PASSED" : "RUN_FAILED",
    `Run ${runId}: ${outcome.success ? "all versions passed" : "compatibility failures"}; report at ${written.reportPath}`,
    { run_id: runId, report_path: written.reportPath, junit_path: written.junitPath }
  );

  return { ok: true, exitCode: outcome.exitCode, runId, report, ...written };
}
