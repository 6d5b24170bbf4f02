import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";
import { PollTimeoutError } from "./errors.js";

/** Outcome of one probe attempt. */
export type ProbeResult<T> =
  | { kind: "not-yet" }
  | { kind: "success"; value: T }
  | { kind: "failure"; error: unknown };

export type Probe<T> = () => Promise<ProbeResult<T>>;

/** Time source for the poller; tests substitute a virtual one. */
export type Clock = {
  now(): number;
  sleep(ms: number): Promise<void>;
};

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms) => {
    await sleep(ms);
  }
};

export const DEFAULT_POLL_INTERVAL_MS = 50;

export type PollOptions = {
  timeoutMs: number;
  intervalMs?: number;
  message?: string;
  clock?: Clock;
};

export const NOT_YET: ProbeResult<never> = { kind: "not-yet" };

export function success<T>(value: T): ProbeResult<T> {
  return { kind: "success", value };
}

export function failure(error: unknown): ProbeResult<never> {
  return { kind: "failure", error };
}

/**
 * Repeat `probe` at a fixed interval until it succeeds or the deadline passes.
 *
 * A `failure` result ends the poll immediately and rethrows its error.
 * The last sleep is clipped to the remaining time, so a probe that never
 * succeeds times out within one interval of `timeoutMs`.
 */
export async function poll<T>(probe: Probe<T>, opts: PollOptions): Promise<T> {
  const clock = opts.clock ?? systemClock;
  const intervalMs = opts.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const deadline = clock.now() + opts.timeoutMs;

  for (;;) {
    const res = await probe();
    if (res.kind === "success") return res.value;
    if (res.kind === "failure") throw res.error;

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      throw new PollTimeoutError(opts.message ?? "Timed out retrying", opts.timeoutMs);
    }
    await clock.sleep(Math.min(intervalMs, remaining));
  }
}
