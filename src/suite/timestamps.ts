/** The server stores designated timestamps with microsecond resolution. */
export function nanosToMicros(ns: bigint): bigint {
  return ns / 1000n;
}

/**
 * Render epoch microseconds the way the query endpoint does:
 * ISO-8601 UTC with six fraction digits, e.g. `2022-03-15T15:21:28.714369Z`.
 */
export function formatMicrosIso(us: bigint): string {
  const seconds = new Date(Number(us / 1000n)).toISOString().slice(0, 19);
  const fraction = (us % 1_000_000n).toString().padStart(6, "0");
  return `${seconds}.${fraction}Z`;
}
