import type {
  ActiveAlertLevel,
  AlertLevel,
  EocSnapshot,
  EocState,
  RoutineKey,
  SourceRoutineKey,
  WeatherSeverity,
} from "./types.js";

export const ALERT_LEVEL_PRIORITY: Readonly<Record<AlertLevel, number>> = {
  none: 0,
  advisory: 1,
  watch: 2,
  warning: 3,
  emergency: 4,
};

/** Active levels, highest priority first. */
export const LEVELS_DESCENDING: readonly ActiveAlertLevel[] = ["emergency", "warning", "watch", "advisory"];

export const WEATHER_SEVERITIES: readonly WeatherSeverity[] = ["minor", "moderate", "severe", "extreme", "unknown"];

export const EOC_STATES: readonly EocState[] = ["inactive", "alert", "lean_forward", "stand_up", "stand_down"];

export function isAlertLevel(value: unknown): value is AlertLevel {
  return typeof value === "string" && Object.hasOwn(ALERT_LEVEL_PRIORITY, value);
}

export function isActiveLevel(value: unknown): value is ActiveAlertLevel {
  return isAlertLevel(value) && value !== "none";
}

/** "Stand Up", "stand-up" and "STAND_UP" all become "stand_up". */
export function normalizeEocState(raw: string): EocState | null {
  const key = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return EOC_STATES.find((s) => s === key) ?? null;
}

export function normalizeSeverity(raw: string): WeatherSeverity {
  const key = raw.trim().toLowerCase();
  return WEATHER_SEVERITIES.find((s) => s === key) ?? "unknown";
}

/** Display form used in reasons: "stand_up" → "STAND UP". */
export function eocStateLabel(state: EocState): string {
  return state.replace(/_/g, " ").toUpperCase();
}

export function routineKeyFor(level: ActiveAlertLevel): RoutineKey {
  return `${level}_alert`;
}

/** Routine for a newly issued weather alert, by its event name. */
export function weatherRoutineKey(event: string): SourceRoutineKey | null {
  const lower = event.toLowerCase();
  if (lower.includes("tornado")) return "tornado_warning";
  if (["severe", "thunderstorm", "flood"].some((word) => lower.includes(word))) return "severe_weather";
  return null;
}

export function eocRoutineKey(state: Exclude<EocState, "inactive">): SourceRoutineKey {
  return `eoc_${state}`;
}

// Most urgent first; stand down outranks only inactive.
const EOC_URGENCY: readonly EocState[] = ["stand_up", "lean_forward", "alert", "stand_down"];

/** Most urgent state across all sites, "inactive" when none is set. */
export function mostUrgentEocState(snapshot: EocSnapshot): EocState {
  const states = new Set([...snapshot.values()].map((s) => s.state));
  return EOC_URGENCY.find((state) => states.has(state)) ?? "inactive";
}
