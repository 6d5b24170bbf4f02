import { UsageError } from "../core/errors.js";

export type OutputFormat = "human" | "jsonl";

export type Level = "info" | "warn" | "error";

export type Writable = { write(chunk: string): unknown };

/**
 * Progress output. `jsonl` emits one `{ level, code, message, ... }` object
 * per line on stdout; `human` prints the message, warnings and errors on stderr.
 */
export interface Reporter {
  readonly format: OutputFormat;
  event(level: Level, code: string, message: string, fields?: Record<string, unknown>): void;
}

export function createReporter(
  format: OutputFormat,
  out: Writable = process.stdout,
  err: Writable = process.stderr
): Reporter {
  return {
    format,
    event(level, code, message, fields) {
      if (format === "jsonl") {
        out.write(JSON.stringify({ level, code, message, ...fields }) + "\n");
        return;
      }
      (level === "info" ? out : err).write(message + "\n");
    }
  };
}

export const silentReporter: Reporter = {
  format: "human",
  event() {}
};

export function parseFormat(raw: string): OutputFormat {
  if (raw === "human" || raw === "jsonl") return raw;
  throw new UsageError(`Unknown output format: ${raw} (expected human|jsonl)`);
}
