/**
 * Error taxonomy for the harness. Every error carries a stable `code`
 * that ends up in jsonl output and run reports.
 */
export class HarnessError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** HTTP call failed to connect, was aborted, or returned a non-200 status. */
export class TransportError extends HarnessError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("TRANSPORT_ERROR", message, options);
    this.status = status;
  }
}

/** Payload could not be parsed or did not have the expected shape. */
export class MalformedResponseError extends HarnessError {
  readonly payload: string;

  constructor(reason: string, payload: string, options?: { cause?: unknown }) {
    super("MALFORMED_RESPONSE", `Could not parse response: ${JSON.stringify(payload)}: ${reason}`, options);
    this.payload = payload;
  }
}

/** The server accepted the request but reported a query error. */
export class QueryError extends HarnessError {
  readonly query: string;
  readonly position: number | null;

  constructor(message: string, query: string, position: number | null = null) {
    super("QUERY_ERROR", message);
    this.query = query;
    this.position = position;
  }
}

export class PollTimeoutError extends HarnessError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super("TIMEOUT", `${message} (after ${timeoutMs}ms)`);
    this.timeoutMs = timeoutMs;
  }
}

/** Database process died or could not be launched. */
export class StartupError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STARTUP_FAILED", message, options);
  }
}

export class StartupTimeoutError extends HarnessError {
  constructor(message: string) {
    super("STARTUP_TIMEOUT", message);
  }
}

/** Database process could not be shut down. */
export class TeardownError extends HarnessError {
  constructor(message: string) {
    super("TEARDOWN_FAILED", message);
  }
}

export class UnknownVersionError extends HarnessError {
  readonly versions: string[];

  constructor(versions: string[]) {
    super("UNKNOWN_VERSION", `Unknown version(s): ${versions.join(", ")}`);
    this.versions = versions;
  }
}

export class InvalidVersionError extends HarnessError {
  constructor(raw: string) {
    super("INVALID_VERSION", `Invalid version: ${JSON.stringify(raw)}`);
  }
}

export class InvalidSelectorError extends HarnessError {
  constructor(message: string) {
    super("INVALID_SELECTOR", message);
  }
}

export class UsageError extends HarnessError {
  constructor(message: string) {
    super("INVALID_ARGS", message);
  }
}

export class FixtureStateError extends HarnessError {
  constructor(message: string) {
    super("FIXTURE_STATE", message);
  }
}

export class InstallError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INSTALL_FAILED", message, options);
  }
}

export class CatalogError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CATALOG_ERROR", message, options);
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** Render any thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Stable code for any thrown value. */
export function errorCode(err: unknown): string {
  if (err instanceof HarnessError) return err.code;
  if (err instanceof Error && err.name === "AssertionError") return "ASSERTION_FAILED";
  return "UNEXPECTED_ERROR";
}
