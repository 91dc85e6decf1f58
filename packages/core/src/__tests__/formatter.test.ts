import { describe, expect, it } from "@jest/globals";
import {
  ALL_CLEAR_SPEECH,
  formatActivatedNotification,
  formatCallMessage,
  formatClearedNotification,
  formatStatusSpeech,
  formatTransitionLine,
} from "../formatter.js";
import type { LocalAlertState } from "../types.js";

const T0 = Date.UTC(2026, 2, 1, 12, 30, 0);

const watch: LocalAlertState = {
  active: true,
  level: "watch",
  reason: "Weather: Flood Watch",
  triggeredBy: ["Weather: Flood Watch"],
  timestamp: T0,
};
const quiet: LocalAlertState = { active: false, level: "none", reason: "No active alerts", triggeredBy: [], timestamp: T0 };

describe("formatter", () => {
  it("formats notifications", () => {
    expect(formatActivatedNotification(watch, "Local Alert")).toEqual({
      message: "Local alert activated: Weather: Flood Watch",
      title: "Local Alert - WATCH Alert",
    });
    expect(formatClearedNotification("Home")).toEqual({ message: "All alerts have been cleared", title: "Home - All Clear" });
  });

  it("formats call messages per level", () => {
    expect(formatCallMessage("advisory", "Weather: Frost")).toBe("Advisory alert: Weather: Frost");
    expect(formatCallMessage("emergency", "LDMG: STAND UP")).toBe("Emergency alert! LDMG: STAND UP. Take immediate action!");
  });

  it("speaks the current status", () => {
    expect(formatStatusSpeech(watch)).toBe(
      "Current alert level is WATCH. Weather: Flood Watch. This is a watch alert. Monitor conditions closely.",
    );
    expect(formatStatusSpeech(quiet)).toBe(ALL_CLEAR_SPEECH);
  });

  it("formats a transition line", () => {
    expect(formatTransitionLine({ type: "transition", ts: T0, previous: quiet, current: watch })).toBe(
      "2026-03-01T12:30:00.000Z NONE -> WATCH: Weather: Flood Watch",
    );
  });
});
