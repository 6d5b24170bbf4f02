/** What a run records per version and per scenario. */
export type OutcomeError = {
  code: string;
  message: string;
};

export type ScenarioStatus = "passed" | "failed" | "skipped";

export type ScenarioOutcome = {
  name: string;
  status: ScenarioStatus;
  duration_ms: number;
  /** Why a skipped scenario did not run. */
  reason?: string;
  error?: OutcomeError;
};

export type SuiteResult = {
  pass: boolean;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  duration_ms: number;
  scenarios: ScenarioOutcome[];
};

export type VersionStatus = "passed" | "failed" | "error" | "not_run";

export type VersionResult = {
  version: string;
  artifact_url: string;
  status: VersionStatus;
  duration_ms: number;
  suite?: SuiteResult;
  error?: OutcomeError;
  /** Set when teardown failed after the suite had already finished. */
  teardown_error?: OutcomeError;
};

export type RunReport = {
  run_id: string;
  started_at: string;
  finished_at: string;
  success: boolean;
  selector: string;
  versions: VersionResult[];
};
