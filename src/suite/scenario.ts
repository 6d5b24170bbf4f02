import { performance } from "node:perf_hooks";
import { randomBytes } from "node:crypto";
import { minimatch } from "minimatch";
import { errorCode, errorMessage } from "../core/errors.js";
import { isAtOrBelow, type Version } from "../core/version.js";
import type { FixtureHandle } from "../fixture/fixture.js";
import type { ConsistencyCheck } from "../query/consistency.js";
import type { LineSender } from "./sender.js";
import type { ScenarioOutcome, SuiteResult } from "../types/report.js";

/** Scenario does not apply to servers at or below this version. */
export type ScenarioGate = {
  skipAtOrBelow: Version;
  reason: string;
};

/** Everything a scenario may touch; there is no ambient fixture state. */
export type ScenarioContext = {
  fixture: FixtureHandle;
  openSender(): Promise<LineSender>;
  check: ConsistencyCheck;
  uniqueTableName(prefix?: string, suffix?: string): string;
};

export type Scenario = {
  name: string;
  description: string;
  gate?: ScenarioGate;
  run(ctx: ScenarioContext): Promise<void>;
};

export type SuiteOptions = {
  /** Scenario name globs or substrings; empty means all. */
  filter?: string[];
  /** Stop after the first failed scenario. */
  failFast?: boolean;
  onOutcome?: (outcome: ScenarioOutcome) => void;
};

export function randomTableName(prefix = "", suffix = ""): string {
  return `${prefix}${randomBytes(16).toString("hex")}${suffix}`;
}

export function gateSkips(gate: ScenarioGate | undefined, version: Version): boolean {
  return gate !== undefined && isAtOrBelow(version, gate.skipAtOrBelow);
}

export function matchesFilter(name: string, patterns: string[] | undefined): boolean {
  if (!patterns || patterns.length === 0) return true;
  return patterns.some((p) => minimatch(name, p) || name.includes(p));
}

/**
 * Run scenarios in order against one fixture. Gates are checked before a
 * scenario is invoked; a gated-out scenario is skipped, never failed.
 */
export async function runSuite(scenarios: Scenario[], ctx: ScenarioContext, opts: SuiteOptions = {}): Promise<SuiteResult> {
  const suiteStart = performance.now();
  const outcomes: ScenarioOutcome[] = [];
  let halted = false;

  for (const scenario of scenarios) {
    if (!matchesFilter(scenario.name, opts.filter)) continue;

    let outcome: ScenarioOutcome;
    if (halted) {
      outcome = { name: scenario.name, status: "skipped", duration_ms: 0, reason: "fail-fast: an earlier scenario failed" };
    } else if (gateSkips(scenario.gate, ctx.fixture.version)) {
      outcome = { name: scenario.name, status: "skipped", duration_ms: 0, reason: scenario.gate?.reason };
    } else {
      const start = performance.now();
      try {
        await scenario.run(ctx);
        outcome = { name: scenario.name, status: "passed", duration_ms: Math.round(performance.now() - start) };
      } catch (e) {
        outcome = {
          name: scenario.name,
          status: "failed",
          duration_ms: Math.round(performance.now() - start),
          error: { code: errorCode(e), message: errorMessage(e) }
        };
        if (opts.failFast) halted = true;
      }
    }

    outcomes.push(outcome);
    opts.onOutcome?.(outcome);
  }

  const count = (status: ScenarioOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
  const failed = count("failed");
  return {
    pass: failed === 0,
    total: outcomes.length,
    passed: count("passed"),
    failed,
    skipped: count("skipped"),
    duration_ms: Math.round(performance.now() - suiteStart),
    scenarios: outcomes
  };
}
