import {
  CatalogError,
  ConfigError,
  InvalidSelectorError,
  InvalidVersionError,
  UnknownVersionError,
  UsageError
} from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  COMPATIBILITY_FAILED: 1,
  INVALID_ARGS: 3,
  CATALOG_UNAVAILABLE: 4
} as const;

/** Map an error that aborted a command to its exit code. */
export function exitCodeFor(err: unknown): number {
  if (
    err instanceof UnknownVersionError ||
    err instanceof InvalidSelectorError ||
    err instanceof InvalidVersionError ||
    err instanceof ConfigError ||
    err instanceof UsageError
  ) {
    return EXIT.INVALID_ARGS;
  }
  if (err instanceof CatalogError) return EXIT.CATALOG_UNAVAILABLE;
  return EXIT.COMPATIBILITY_FAILED;
}
