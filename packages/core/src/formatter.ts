import { eocStateLabel, mostUrgentEocState } from "./levels.js";
import type {
  ActiveAlertLevel,
  EocSiteState,
  EocSnapshot,
  LocalAlertState,
  StoredTransition,
  WeatherAlert,
  WeatherSnapshot,
} from "./types.js";

const PREVIEW_LENGTH = 200;

// ─── Notifications (sent through the home-automation platform) ───────────────

export function formatActivatedNotification(
  state: LocalAlertState,
  title: string,
): { message: string; title: string } {
  return {
    message: `Local alert activated: ${state.reason}`,
    title: `${title} - ${state.level.toUpperCase()} Alert`,
  };
}

export function formatClearedNotification(title: string): { message: string; title: string } {
  return {
    message: "All alerts have been cleared",
    title: `${title} - All Clear`,
  };
}

export function formatWeatherAlertNotification(alert: WeatherAlert): { message: string; title: string } {
  return {
    message: `${alert.event}\n${alert.headline}\nAreas: ${alert.areas}`,
    title: `Weather Alert: ${alert.event}`,
  };
}

export function formatWeatherClearedNotification(alert: WeatherAlert): { message: string; title: string } {
  return {
    message: `Alert cleared: ${alert.event}`,
    title: "Weather Alert Cleared",
  };
}

export function formatEocChangeNotification(
  siteId: string,
  previous: EocSiteState,
  current: EocSiteState,
): { message: string; title: string } {
  const from = eocStateLabel(previous.state);
  const to = eocStateLabel(current.state);
  return {
    message: `EOC state changed: ${from} → ${to}\n${siteId}\n\nPreview: ${current.description.slice(0, PREVIEW_LENGTH)}...`,
    title: `EOC: ${to}`,
  };
}

// ─── Sensor ──────────────────────────────────────────────────────────────────

export function sensorAttributes(state: LocalAlertState, friendlyName: string): Record<string, unknown> {
  return {
    friendly_name: friendlyName,
    alert_level: state.level,
    reason: state.reason,
    triggered_by: state.triggeredBy.join(", "),
    timestamp: new Date(state.timestamp).toISOString(),
  };
}

export function weatherSensorAttributes(snapshot: WeatherSnapshot, now: number): Record<string, unknown> {
  return {
    friendly_name: "Weather Alerts",
    alert_count: snapshot.size,
    alerts: [...snapshot].map(([id, alert]) => ({
      id,
      event: alert.event,
      severity: alert.severity,
      headline: alert.headline,
      areas: alert.areas,
    })),
    last_check: new Date(now).toISOString(),
  };
}

export function eocSensorAttributes(snapshot: EocSnapshot, now: number): Record<string, unknown> {
  const sites: Record<string, unknown> = {};
  for (const [id, site] of snapshot) {
    sites[id] = { state: site.state, activated: site.activated };
  }
  return {
    friendly_name: "EOC Status",
    monitored_sites: snapshot.size,
    activated_sites: [...snapshot.values()].filter((s) => s.activated).length,
    current_state: mostUrgentEocState(snapshot),
    sites,
    last_check: new Date(now).toISOString(),
  };
}

// ─── Voice ───────────────────────────────────────────────────────────────────

const CALL_MESSAGES: Record<ActiveAlertLevel, (reason: string) => string> = {
  advisory: (r) => `Advisory alert: ${r}`,
  watch: (r) => `Watch alert: ${r}. Monitor conditions.`,
  warning: (r) => `Warning! ${r}. Take precautions.`,
  emergency: (r) => `Emergency alert! ${r}. Take immediate action!`,
};

/** Spoken message for an outbound alert call. */
export function formatCallMessage(level: ActiveAlertLevel, reason: string): string {
  return CALL_MESSAGES[level](reason);
}

const STATUS_ADVICE: Record<ActiveAlertLevel, string> = {
  emergency: "This is an emergency. Take immediate action.",
  warning: "This is a warning. Take appropriate precautions.",
  watch: "This is a watch alert. Monitor conditions closely.",
  advisory: "This is an advisory. Be aware of conditions.",
};

export const ALL_CLEAR_SPEECH = "There are currently no active alerts. All systems normal.";

/** Spoken answer for an inbound status call. */
export function formatStatusSpeech(state: LocalAlertState): string {
  if (!state.active || state.level === "none") return ALL_CLEAR_SPEECH;
  return `Current alert level is ${state.level.toUpperCase()}. ${state.reason}. ${STATUS_ADVICE[state.level]}`;
}

// ─── Transition History ──────────────────────────────────────────────────────

export function formatTransitionLine(entry: StoredTransition): string {
  const when = new Date(entry.ts).toISOString();
  const from = entry.previous.level.toUpperCase();
  const to = entry.current.level.toUpperCase();
  return `${when} ${from} -> ${to}: ${entry.current.reason}`;
}
