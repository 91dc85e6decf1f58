import { evaluateConditionSet, matchingWeatherAlerts } from "./conditions.js";
import { eocStateLabel, LEVELS_DESCENDING } from "./levels.js";
import type {
  AlertLevelRule,
  Classification,
  EocSnapshot,
  LevelTable,
  LocalAlertState,
  WeatherSnapshot,
} from "./types.js";

export const NO_ALERTS_REASON = "No active alerts";

/**
 * Strip the area list from an event name:
 * "Severe Heatwave Warning for the Peninsula" → "Severe Heatwave Warning".
 */
export function shortEventName(event: string): string {
  const beforeFor = event.split(" for ")[0] ?? event;
  return beforeFor.split(" - ")[0] ?? beforeFor;
}

/** Combined weather/EOC result for one level. */
export function evaluateLevel(
  rule: AlertLevelRule,
  weather: WeatherSnapshot,
  eoc: EocSnapshot,
): { triggered: boolean; weatherMatch: boolean; eocMatch: boolean } {
  const weatherMatch = evaluateConditionSet(rule.weather, weather, eoc);
  const eocMatch = evaluateConditionSet(rule.eoc, weather, eoc);
  const triggered = rule.combine === "and" ? weatherMatch && eocMatch : weatherMatch || eocMatch;
  return { triggered, weatherMatch, eocMatch };
}

/**
 * Pick the highest triggered level and explain it.
 * Lower levels are never evaluated once a higher one has triggered.
 */
export function classify(
  weather: WeatherSnapshot,
  eoc: EocSnapshot,
  table: LevelTable,
): Classification {
  for (const level of LEVELS_DESCENDING) {
    const rule = table[level];
    const { triggered, weatherMatch, eocMatch } = evaluateLevel(rule, weather, eoc);
    if (!triggered) continue;

    const reasons: string[] = [];
    const add = (reason: string) => {
      if (!reasons.includes(reason)) reasons.push(reason);
    };

    if (weatherMatch) {
      for (const alert of matchingWeatherAlerts(rule.weather, weather)) {
        add(`Weather: ${shortEventName(alert.event)}`);
      }
    }

    if (eocMatch) {
      for (const site of eoc.values()) {
        if (site.activated) add(`LDMG: ${eocStateLabel(site.state)}`);
      }
    }

    return { level, reasons };
  }

  return { level: "none", reasons: [] };
}

export function buildCandidateState(result: Classification, now: number): LocalAlertState {
  return {
    active: result.level !== "none",
    level: result.level,
    reason: result.reasons.length > 0 ? result.reasons.join(", ") : NO_ALERTS_REASON,
    triggeredBy: result.reasons,
    timestamp: now,
  };
}
