import type { RunnerState } from "../types.js";

/**
 * Runner lifecycle:
 *
 *   idle → authenticated → cycling ⇄ sleeping
 *
 * Any state may move to stopped (shutdown, fatal auth error). A
 * re-authentication moves from cycling back to authenticated.
 */
const TRANSITIONS: Record<RunnerState, readonly RunnerState[]> = {
  idle: ["authenticated", "stopped"],
  authenticated: ["cycling", "stopped"],
  cycling: ["sleeping", "authenticated", "stopped"],
  sleeping: ["cycling", "authenticated", "stopped"],
  stopped: [],
};

export class InvalidTransitionError extends Error {
  constructor(public readonly from: RunnerState, public readonly to: RunnerState) {
    super(`Invalid runner transition ${from} → ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function canTransition(from: RunnerState, to: RunnerState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(from: RunnerState, to: RunnerState): RunnerState {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
  return to;
}
