import { XMLBuilder } from "fast-xml-parser";
import type { RunReport, ScenarioOutcome, VersionResult } from "../types/report.js";

type XmlNode = Record<string, unknown>;

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function testcase(version: string, outcome: ScenarioOutcome): XmlNode {
  const node: XmlNode = {
    "@_name": outcome.name,
    "@_classname": version,
    "@_time": seconds(outcome.duration_ms)
  };
  if (outcome.status === "failed") {
    node.failure = {
      "@_message": outcome.error?.message ?? "failed",
      "@_type": outcome.error?.code ?? "FAILED"
    };
  } else if (outcome.status === "skipped") {
    node.skipped = { "@_message": outcome.reason ?? "skipped" };
  }
  return node;
}

/**
 * One <testsuite> per version. A version that never reached the suite
 * (install/start failure) gets a single `fixture` testcase with an <error>.
 */
function testsuite(result: VersionResult): XmlNode {
  const cases = (result.suite?.scenarios ?? []).map((o) => testcase(result.version, o));
  let errors = 0;

  const error = result.error ?? result.teardown_error;
  if (error) {
    errors = 1;
    cases.push({
      "@_name": "fixture",
      "@_classname": result.version,
      "@_time": "0.000",
      error: { "@_message": error.message, "@_type": error.code }
    });
  }

  return {
    "@_name": `questdb-${result.version}`,
    "@_tests": cases.length,
    "@_failures": result.suite?.failed ?? 0,
    "@_errors": errors,
    "@_skipped": result.suite?.skipped ?? 0,
    "@_time": seconds(result.duration_ms),
    testcase: cases
  };
}

/** Render a run report as JUnit XML for CI dashboards. */
export function buildJunitXml(report: RunReport): string {
  const suites = report.versions.filter((v) => v.status !== "not_run").map(testsuite);
  const sum = (key: string) => suites.reduce((acc, s) => acc + Number(s[key] ?? 0), 0);

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true
  });

  return builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    testsuites: {
      "@_name": report.run_id,
      "@_tests": sum("@_tests"),
      "@_failures": sum("@_failures"),
      "@_errors": sum("@_errors"),
      "@_skipped": sum("@_skipped"),
      testsuite: suites
    }
  });
}
