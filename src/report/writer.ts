import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { createChecker } from "../schema/ajv.js";
import { buildJunitXml } from "./junit-xml.js";
import type { RunReport } from "../types/report.js";

const REPORT_FILE = "report.json";
const JUNIT_FILE = "junit.xml";

const REPORT_SCHEMA = {
  type: "object",
  required: ["run_id", "started_at", "finished_at", "success", "selector", "versions"],
  properties: {
    run_id: { type: "string", minLength: 1 },
    started_at: { type: "string", format: "date-time" },
    finished_at: { type: "string", format: "date-time" },
    success: { type: "boolean" },
    selector: { type: "string" },
    versions: {
      type: "array",
      items: {
        type: "object",
        required: ["version", "artifact_url", "status", "duration_ms"],
        properties: {
          version: { type: "string" },
          artifact_url: { type: "string" },
          status: { type: "string", enum: ["passed", "failed", "error", "not_run"] },
          duration_ms: { type: "number" }
        }
      }
    }
  }
};

const checkReport = createChecker<RunReport>(REPORT_SCHEMA);

export function makeRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(6).toString("hex")}`;
}

/**
 * Owns `{reportsDir}/{runId}/` and writes the run's
 * JSON report plus a JUnit rendering of it.
 */
export class ReportWriter {
  private readonly runDir: string;

  constructor(
    private readonly reportsDir: string,
    private readonly runId: string
  ) {
    this.runDir = path.join(reportsDir, runId);
  }

  write(report: RunReport): { reportPath: string; junitPath: string } {
    fs.mkdirSync(this.runDir, { recursive: true });

    const reportPath = path.join(this.runDir, REPORT_FILE);
    fs.writeFileSync(reportPath, JSON.stringify(report, null, 2) + "\n", "utf8");

    const junitPath = path.join(this.runDir, JUNIT_FILE);
    fs.writeFileSync(junitPath, buildJunitXml(report), "utf8");

    return { reportPath, junitPath };
  }

  getRunDir(): string {
    return this.runDir;
  }
}

/** Read and validate a stored report. Returns null if the run is unknown. */
export function readReport(reportsDir: string, runId: string): RunReport | null {
  const reportPath = path.join(reportsDir, runId, REPORT_FILE);
  if (!fs.existsSync(reportPath)) return null;

  const checked = checkReport(JSON.parse(fs.readFileSync(reportPath, "utf8")));
  if (!checked.ok) throw new Error(`Invalid report ${reportPath}: ${checked.errors}`);
  return checked.value;
}
