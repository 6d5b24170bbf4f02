import { performance } from "node:perf_hooks";
import { errorCode, errorMessage } from "./errors.js";
import { formatVersion } from "./version.js";
import { EXIT } from "../commands/exit-codes.js";
import type { MatrixEntry } from "../catalog/version-matrix.js";
import type { FixtureHandle, TestFixture } from "../fixture/fixture.js";
import { silentReporter, type Reporter } from "../report/reporter.js";
import type { SuiteResult, VersionResult } from "../types/report.js";

export type FixtureFactory = (entry: MatrixEntry) => TestFixture;

export type SuiteRunner = (fixture: FixtureHandle) => Promise<SuiteResult>;

export type OrchestratorOptions = {
  createFixture: FixtureFactory;
  runSuite: SuiteRunner;
  /** Stop testing further versions after the first one that does not pass. */
  abortOnFailure?: boolean;
  reporter?: Reporter;
};

export type OrchestratorResult = {
  success: boolean;
  exitCode: number;
  versions: VersionResult[];
};

/**
 * Runs the behaviour suite once per version.
 *
 * Main loop: install → start → suite → stop. Exactly one fixture is live at
 * a time and it is stopped on every path out of the loop body.
 */
export class TestOrchestrator {
  private readonly createFixture: FixtureFactory;
  private readonly runSuite: SuiteRunner;
  private readonly abortOnFailure: boolean;
  private readonly reporter: Reporter;

  constructor(opts: OrchestratorOptions) {
    this.createFixture = opts.createFixture;
    this.runSuite = opts.runSuite;
    this.abortOnFailure = opts.abortOnFailure ?? true;
    this.reporter = opts.reporter ?? silentReporter;
  }

  async run(matrix: MatrixEntry[]): Promise<OrchestratorResult> {
    const versions: VersionResult[] = [];
    let aborted = false;

    for (const entry of matrix) {
      const label = formatVersion(entry.version);
      if (aborted) {
        versions.push({ version: label, artifact_url: entry.artifactUrl, status: "not_run", duration_ms: 0 });
        continue;
      }

      const result = await this.runVersion(entry, label);
      versions.push(result);

      if (result.status !== "passed" && this.abortOnFailure) {
        aborted = true;
      }
    }

    const success = versions.length > 0 && versions.every((v) => v.status === "passed");
    return { success, exitCode: success ? EXIT.SUCCESS : EXIT.COMPATIBILITY_FAILED, versions };
  }

  private async runVersion(entry: MatrixEntry, label: string): Promise<VersionResult> {
    const start = performance.now();
    const result: VersionResult = { version: label, artifact_url: entry.artifactUrl, status: "error", duration_ms: 0 };
    this.reporter.event("info", "VERSION_START", `Testing ${label}`, { version: label });

    const fixture = this.createFixture(entry);
    try {
      await fixture.install();
      await fixture.start();
      this.reporter.event("info", "FIXTURE_READY", `Server ${formatVersion(fixture.version)} ready at ${fixture.httpUrl}`, {
        version: label,
        http_url: fixture.httpUrl,
        ilp_port: fixture.ilpPort
      });

      const suite = await this.runSuite(fixture);
      result.suite = suite;
      result.status = suite.pass ? "passed" : "failed";
    } catch (e) {
      result.status = "error";
      result.error = { code: errorCode(e), message: errorMessage(e) };
    } finally {
      try {
        await fixture.stop();
      } catch (e) {
        const teardown = { code: errorCode(e), message: errorMessage(e) };
        if (result.status === "passed") result.status = "error";
        if (result.error) result.teardown_error = teardown;
        else result.error = teardown;
      }
    }

    result.duration_ms = Math.round(performance.now() - start);
    if (result.status === "passed") {
      this.reporter.event("info", "VERSION_PASSED", `${label}: passed`, { version: label, duration_ms: result.duration_ms });
    } else {
      const why = result.error?.message ?? `${result.suite?.failed ?? 0} scenario(s) failed`;
      this.reporter.event("error", "VERSION_FAILED", `${label}: ${result.status}: ${why}`, {
        version: label,
        status: result.status,
        error: result.error
      });
    }
    return result;
  }
}
