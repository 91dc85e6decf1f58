import { describe, expect, it } from "@jest/globals";
import { initialState, StateTransitionTracker } from "../tracker.js";
import type { LocalAlertState } from "../types.js";

function state(level: LocalAlertState["level"], reason: string, timestamp: number): LocalAlertState {
  return { active: level !== "none", level, reason, triggeredBy: reason ? [reason] : [], timestamp };
}

describe("StateTransitionTracker", () => {
  it("starts quiet", () => {
    const tracker = new StateTransitionTracker(initialState(7));
    expect(tracker.current).toEqual({ active: false, level: "none", reason: "", triggeredBy: [], timestamp: 7 });
  });

  it("returns a transition when the level changes", () => {
    const tracker = new StateTransitionTracker(initialState(0));
    const previous = tracker.current;
    const next = state("watch", "Weather: Flood Watch", 10);

    expect(tracker.update(next)).toEqual({ previous, current: next });
    expect(tracker.current).toBe(next);
  });

  it("refreshes the committed state without a transition when the level holds", () => {
    const tracker = new StateTransitionTracker(initialState(0));
    tracker.update(state("watch", "Weather: Flood Watch", 10));

    const refreshed = state("watch", "LDMG: LEAN FORWARD", 20);
    expect(tracker.update(refreshed)).toBeNull();
    expect(tracker.current).toEqual(refreshed);
  });

  it("reports a clear", () => {
    const tracker = new StateTransitionTracker(initialState(0));
    tracker.update(state("warning", "Weather: Heatwave Warning", 10));

    const transition = tracker.update(state("none", "No active alerts", 20));
    expect(transition?.previous.level).toBe("warning");
    expect(transition?.current.active).toBe(false);
  });

  it("restores without reporting", () => {
    const tracker = new StateTransitionTracker(initialState(0));
    const restored = state("emergency", "LDMG: STAND UP", 5);
    tracker.restore(restored);

    expect(tracker.current).toBe(restored);
    expect(tracker.update(state("emergency", "LDMG: STAND UP", 6))).toBeNull();
  });
});
