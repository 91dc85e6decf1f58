import type {
  AlertLogger,
  EocSiteState,
  EocSnapshot,
  EocState,
  WeatherAlert,
  WeatherSeverity,
  WeatherSnapshot,
} from "../types.js";

export function weatherAlert(event: string, severity: WeatherSeverity, extra?: Partial<WeatherAlert>): WeatherAlert {
  return {
    event,
    severity,
    headline: event,
    areas: "Coastal Plains",
    onset: null,
    expires: null,
    source: "test-feed",
    ...extra,
  };
}

/** Snapshot keyed w1, w2, … in argument order. */
export function weather(...alerts: WeatherAlert[]): WeatherSnapshot {
  return new Map(alerts.map((a, i) => [`w${i + 1}`, a]));
}

export function site(state: EocState, activated = state !== "inactive"): EocSiteState {
  return { state, activated, lastCheck: 0, description: "" };
}

/** Snapshot keyed https://eoc.example/1, /2, … in argument order. */
export function eoc(...sites: EocSiteState[]): EocSnapshot {
  return new Map(sites.map((s, i) => [`https://eoc.example/${i + 1}`, s]));
}

export const EMPTY_WEATHER: WeatherSnapshot = new Map();
export const EMPTY_EOC: EocSnapshot = new Map();

export type RecordingLogger = Required<AlertLogger> & { lines: Array<[keyof AlertLogger, string]> };

export function recordingLogger(): RecordingLogger {
  const lines: Array<[keyof AlertLogger, string]> = [];
  return {
    lines,
    info: (msg) => { lines.push(["info", msg]); },
    warn: (msg) => { lines.push(["warn", msg]); },
    error: (msg) => { lines.push(["error", msg]); },
    debug: (msg) => { lines.push(["debug", msg]); },
  };
}
