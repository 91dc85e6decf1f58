import type {
  ConditionSet,
  EocRule,
  EocSnapshot,
  WeatherAlert,
  WeatherRule,
  WeatherSnapshot,
} from "./types.js";

/** Whether a single alert satisfies a weather rule. */
export function alertMatchesRule(alert: WeatherAlert, rule: WeatherRule): boolean {
  const wantedType = rule.eventType.toLowerCase();
  const wantedSeverity = rule.severity.toLowerCase();

  const typeMatch = wantedType === "any" || alert.event.toLowerCase().includes(wantedType);
  const severityMatch = wantedSeverity === "any" || wantedSeverity === alert.severity.toLowerCase();

  return typeMatch && severityMatch;
}

export function matchWeatherRule(rule: WeatherRule, weather: WeatherSnapshot): boolean {
  for (const alert of weather.values()) {
    if (alertMatchesRule(alert, rule)) return true;
  }
  return false;
}

export function matchEocRule(rule: EocRule, eoc: EocSnapshot): boolean {
  for (const site of eoc.values()) {
    if (site.activated && site.state === rule.state) return true;
  }
  return false;
}

/**
 * Evaluate a rule set against the current snapshots.
 * An empty rule list never matches, whatever the operator.
 */
export function evaluateConditionSet(
  set: ConditionSet,
  weather: WeatherSnapshot,
  eoc: EocSnapshot,
): boolean {
  if (set.rules.length === 0) return false;

  const results = set.rules.map((rule) =>
    rule.kind === "weather" ? matchWeatherRule(rule, weather) : matchEocRule(rule, eoc),
  );

  return set.operator === "and" ? results.every(Boolean) : results.some(Boolean);
}

/** Alerts that satisfy at least one weather rule of the set, in snapshot order. */
export function matchingWeatherAlerts(set: ConditionSet, weather: WeatherSnapshot): WeatherAlert[] {
  const weatherRules = set.rules.filter((r): r is WeatherRule => r.kind === "weather");
  if (weatherRules.length === 0) return [];

  return [...weather.values()].filter((alert) =>
    weatherRules.some((rule) => alertMatchesRule(alert, rule)),
  );
}
