import { createChecker } from "../schema/ajv.js";
import type { HarnessConfig } from "../types/config.js";

const positiveInt = { type: "integer", minimum: 1 };

/** Config schema; env overrides arrive as strings and are coerced in place. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "install_dir", "reports_dir", "host", "catalog", "timeouts", "poll", "matrix", "consistency"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    install_dir: { type: "string", minLength: 1 },
    reports_dir: { type: "string", minLength: 1 },
    host: { type: "string", minLength: 1 },
    java: { type: "string", minLength: 1 },
    catalog: {
      type: "object",
      required: ["api_url", "repo", "asset_suffix", "explicit_lookback", "default_last_n", "list_default"],
      properties: {
        api_url: { type: "string", format: "uri" },
        repo: { type: "string", pattern: "^[\\w.-]+/[\\w.-]+$" },
        asset_suffix: { type: "string", minLength: 1 },
        explicit_lookback: positiveInt,
        default_last_n: positiveInt,
        list_default: positiveInt,
        token: { type: "string" }
      }
    },
    timeouts: {
      type: "object",
      required: ["start_sec", "stop_sec", "table_sec", "query_ms"],
      properties: {
        start_sec: { type: "number", exclusiveMinimum: 0 },
        stop_sec: { type: "number", exclusiveMinimum: 0 },
        table_sec: { type: "number", exclusiveMinimum: 0 },
        query_ms: positiveInt
      }
    },
    poll: {
      type: "object",
      required: ["interval_ms"],
      properties: {
        interval_ms: { type: "integer", minimum: 1, maximum: 1000 }
      }
    },
    matrix: {
      type: "object",
      required: ["abort_on_failure"],
      properties: { abort_on_failure: { type: "boolean" } }
    },
    consistency: {
      type: "object",
      required: ["strict_query_errors"],
      properties: { strict_query_errors: { type: "boolean" } }
    }
  }
};

const checkConfig = createChecker<HarnessConfig>(CONFIG_SCHEMA, { coerceTypes: true });

export type ConfigValidationResult =
  | { valid: true; config: HarnessConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a merged config object against the config schema. */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const checked = checkConfig(raw);
  return checked.ok ? { valid: true, config: checked.value, errors: null } : { valid: false, errors: checked.errors };
}
