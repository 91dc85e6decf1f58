import { describe, expect, it } from "@jest/globals";
import { buildCandidateState, classify, NO_ALERTS_REASON, shortEventName } from "../classifier.js";
import { DEFAULT_LEVEL_TABLE, parseLevelTable } from "../level-table.js";
import { EMPTY_EOC, EMPTY_WEATHER, eoc, site, weather, weatherAlert } from "./fixtures.js";

describe("shortEventName", () => {
  it("cuts at ' for ' and then at ' - '", () => {
    expect(shortEventName("Flood Warning for Coastal Plains - Upper Reaches")).toBe("Flood Warning");
    expect(shortEventName("Flood Watch - Lower River")).toBe("Flood Watch");
    expect(shortEventName("Heatwave Warning")).toBe("Heatwave Warning");
  });
});

describe("classify with the default table", () => {
  it("raises warning for a severe thunderstorm", () => {
    const result = classify(
      weather(weatherAlert("Severe Thunderstorm Warning for Coastal Plains", "severe")),
      EMPTY_EOC,
      DEFAULT_LEVEL_TABLE,
    );
    expect(result).toEqual({ level: "warning", reasons: ["Weather: Severe Thunderstorm Warning"] });
  });

  it("raises emergency when an EOC stands up", () => {
    const result = classify(EMPTY_WEATHER, eoc(site("stand_up")), DEFAULT_LEVEL_TABLE);
    expect(result).toEqual({ level: "emergency", reasons: ["LDMG: STAND UP"] });
  });

  it("picks the highest level and explains it with contributing alerts only", () => {
    const result = classify(
      weather(
        weatherAlert("Strong Wind Warning", "minor"),
        weatherAlert("Bushfire Emergency Warning - Northern Ranges", "extreme"),
      ),
      EMPTY_EOC,
      DEFAULT_LEVEL_TABLE,
    );
    expect(result).toEqual({ level: "emergency", reasons: ["Weather: Bushfire Emergency Warning"] });
  });

  it("matches a named event at any severity", () => {
    const result = classify(
      weather(weatherAlert("Tropical Cyclone Warning for Coastal Plains", "unknown")),
      EMPTY_EOC,
      DEFAULT_LEVEL_TABLE,
    );
    expect(result.level).toBe("emergency");
  });

  it("lists weather reasons before EOC reasons, de-duplicated", () => {
    const result = classify(
      weather(
        weatherAlert("Fire Weather Warning for Coastal Plains", "extreme"),
        weatherAlert("Fire Weather Warning for Northern Ranges", "extreme"),
      ),
      eoc(site("stand_up"), site("stand_up"), site("alert")),
      DEFAULT_LEVEL_TABLE,
    );
    expect(result).toEqual({
      level: "emergency",
      reasons: ["Weather: Fire Weather Warning", "LDMG: STAND UP", "LDMG: ALERT"],
    });
  });

  it("ignores sites that are not activated", () => {
    expect(classify(EMPTY_WEATHER, eoc(site("stand_up", false)), DEFAULT_LEVEL_TABLE)).toEqual({
      level: "none",
      reasons: [],
    });
  });

  it("returns none on empty snapshots", () => {
    expect(classify(EMPTY_WEATHER, EMPTY_EOC, DEFAULT_LEVEL_TABLE)).toEqual({ level: "none", reasons: [] });
  });

  it("is pure", () => {
    const w = weather(weatherAlert("Flood Watch", "moderate"));
    const e = eoc(site("lean_forward"));
    const first = classify(w, e, DEFAULT_LEVEL_TABLE);
    const second = classify(w, e, DEFAULT_LEVEL_TABLE);
    expect(second).toEqual(first);
    expect(first).toEqual({ level: "watch", reasons: ["Weather: Flood Watch", "LDMG: LEAN FORWARD"] });
    expect(w.size).toBe(1);
    expect(e.size).toBe(1);
  });
});

describe("classify with custom tables", () => {
  it("never triggers an and-level whose EOC side is empty", () => {
    const { table } = parseLevelTable({
      warning: {
        weather_conditions: { operator: "or", rules: [{ type: "any", severity: "severe" }] },
        eoc_conditions: { operator: "or", rules: [] },
        condition_logic: "and",
      },
    });
    expect(classify(weather(weatherAlert("Heatwave Warning", "severe")), EMPTY_EOC, table).level).toBe("none");
  });

  it("requires both sides under and", () => {
    const { table } = parseLevelTable({
      watch: {
        weather_conditions: { rules: [{ type: "flood", severity: "any" }] },
        eoc_conditions: { rules: [{ state: "lean forward" }] },
        condition_logic: "and",
      },
    });
    const flood = weather(weatherAlert("Flood Watch", "minor"));
    expect(classify(flood, EMPTY_EOC, table).level).toBe("none");
    expect(classify(flood, eoc(site("lean_forward")), table)).toEqual({
      level: "watch",
      reasons: ["Weather: Flood Watch", "LDMG: LEAN FORWARD"],
    });
  });
});

describe("buildCandidateState", () => {
  it("joins reasons", () => {
    expect(buildCandidateState({ level: "watch", reasons: ["Weather: Flood Watch", "LDMG: ALERT"] }, 1000)).toEqual({
      active: true,
      level: "watch",
      reason: "Weather: Flood Watch, LDMG: ALERT",
      triggeredBy: ["Weather: Flood Watch", "LDMG: ALERT"],
      timestamp: 1000,
    });
  });

  it("describes the quiet state", () => {
    expect(buildCandidateState({ level: "none", reasons: [] }, 5)).toEqual({
      active: false,
      level: "none",
      reason: NO_ALERTS_REASON,
      triggeredBy: [],
      timestamp: 5,
    });
  });
});
