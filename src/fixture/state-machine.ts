import { FixtureStateError } from "../core/errors.js";

/**
 * Fixture lifecycle states in order.
 */
export const FIXTURE_STATES = ["uninstalled", "installed", "starting", "running", "stopped"] as const;

export type FixtureState = (typeof FIXTURE_STATES)[number];

/**
 * Events that drive state transitions.
 */
export type FixtureEvent = "install" | "start" | "ready" | "stop";

const TRANSITIONS: Record<FixtureState, Partial<Record<FixtureEvent, FixtureState>>> = {
  uninstalled: { install: "installed", stop: "stopped" },
  installed: { start: "starting", stop: "stopped" },
  starting: { ready: "running", stop: "stopped" },
  running: { stop: "stopped" },
  // A stopped fixture is never restarted; stop stays idempotent.
  stopped: { stop: "stopped" }
};

/**
 * Pure function: given current state + event, return next state.
 */
export function nextFixtureState(current: FixtureState, event: FixtureEvent): FixtureState {
  const next = TRANSITIONS[current][event];
  if (!next) {
    throw new FixtureStateError(`Cannot ${event} a fixture that is ${current}`);
  }
  return next;
}

export function canTransition(current: FixtureState, event: FixtureEvent): boolean {
  return TRANSITIONS[current][event] !== undefined;
}
