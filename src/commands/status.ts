import fs from "node:fs";
import { readReport } from "../report/writer.js";
import { errorMessage } from "../core/errors.js";
import type { RunReport } from "../types/report.js";

export type StatusResult =
  | { ok: true; report: RunReport }
  | { ok: false; error: string };

export type RunSummary = {
  id: string;
  status: "passed" | "failed" | "corrupted";
  finished_at: string;
  versions: string[];
};

/**
 * Read the stored report for a given run ID.
 */
export function status(opts: { reportsDir: string; runId: string }): StatusResult {
  try {
    const report = readReport(opts.reportsDir, opts.runId);
    if (!report) return { ok: false, error: `No run found: ${opts.runId}` };
    return { ok: true, report };
  } catch (e) {
    return { ok: false, error: `Failed to read report: ${errorMessage(e)}` };
  }
}

/**
 * List all runs with their outcome, newest first.
 */
export function listRuns(reportsDir: string): RunSummary[] {
  if (!fs.existsSync(reportsDir)) return [];

  const results: RunSummary[] = [];
  for (const entry of fs.readdirSync(reportsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;

    let report: RunReport | null;
    try {
      report = readReport(reportsDir, entry.name);
    } catch {
      results.push({ id: entry.name, status: "corrupted", finished_at: "", versions: [] });
      continue;
    }
    if (!report) continue;

    results.push({
      id: report.run_id,
      status: report.success ? "passed" : "failed",
      finished_at: report.finished_at,
      versions: report.versions.map((v) => v.version)
    });
  }

  return results.sort((a, b) => b.finished_at.localeCompare(a.finished_at));
}
