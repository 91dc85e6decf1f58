import type { LocalAlertState, Transition } from "./types.js";

export function initialState(now: number): LocalAlertState {
  return {
    active: false,
    level: "none",
    reason: "",
    triggeredBy: [],
    timestamp: now,
  };
}

/**
 * Sole owner of the committed local alert state.
 *
 * `update()` is synchronous, so compare and commit cannot interleave with
 * another update; callers that do async work before it (override lookups)
 * must serialize that work themselves.
 */
export class StateTransitionTracker {
  private committed: LocalAlertState;

  constructor(initial: LocalAlertState) {
    this.committed = initial;
  }

  get current(): LocalAlertState {
    return this.committed;
  }

  /**
   * Commit the candidate. Returns a transition only when `active` or
   * `level` changed; the committed state is replaced either way.
   */
  update(candidate: LocalAlertState): Transition | null {
    const previous = this.committed;
    this.committed = candidate;

    if (previous.active === candidate.active && previous.level === candidate.level) {
      return null;
    }
    return { previous, current: candidate };
  }

  /** Adopt a persisted state without emitting a transition (warm start). */
  restore(state: LocalAlertState): void {
    this.committed = state;
  }
}
