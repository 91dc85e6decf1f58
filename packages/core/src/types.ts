// ─── Alert Levels ────────────────────────────────────────────────────────────

export type AlertLevel = "none" | "advisory" | "watch" | "warning" | "emergency";

export type ActiveAlertLevel = Exclude<AlertLevel, "none">;

// ─── Weather Input ───────────────────────────────────────────────────────────

export type WeatherSeverity = "minor" | "moderate" | "severe" | "extreme" | "unknown";

export type WeatherAlert = {
  readonly event: string;
  readonly severity: WeatherSeverity;
  readonly headline: string;
  readonly areas: string;
  readonly onset: number | null;
  readonly expires: number | null;
  readonly source: string;
};

/** All active weather alerts, keyed by the feed's own identifier. */
export type WeatherSnapshot = ReadonlyMap<string, WeatherAlert>;

// ─── EOC Input ───────────────────────────────────────────────────────────────

export type EocState = "inactive" | "alert" | "lean_forward" | "stand_up" | "stand_down";

export type EocSiteState = {
  readonly state: EocState;
  readonly activated: boolean;
  readonly lastCheck: number;
  readonly description: string;
};

/** Status of every monitored EOC site, keyed by site id (usually its URL). */
export type EocSnapshot = ReadonlyMap<string, EocSiteState>;

export type SnapshotKind = "weather" | "eoc";

/** One snapshot replacing the previous one of the same kind. */
export type SnapshotChange =
  | { readonly kind: "weather"; readonly previous: WeatherSnapshot; readonly current: WeatherSnapshot }
  | { readonly kind: "eoc"; readonly previous: EocSnapshot; readonly current: EocSnapshot };

// ─── Rules ───────────────────────────────────────────────────────────────────

export type ConditionOperator = "and" | "or";

export type WeatherRule = {
  readonly kind: "weather";
  /** Substring of the alert's event, or "any". */
  readonly eventType: string;
  readonly severity: WeatherSeverity | "any";
};

export type EocRule = {
  readonly kind: "eoc";
  readonly state: EocState;
};

export type ConditionRule = WeatherRule | EocRule;

export type ConditionSet = {
  readonly operator: ConditionOperator;
  readonly rules: readonly ConditionRule[];
};

export type AlertLevelRule = {
  readonly weather: ConditionSet;
  readonly eoc: ConditionSet;
  /** How the weather and EOC results combine. */
  readonly combine: ConditionOperator;
};

export type LevelTable = Readonly<Record<ActiveAlertLevel, AlertLevelRule>>;

export type LevelTableIssue = {
  /** Dotted path into the raw table, e.g. "warning.eoc_conditions". */
  path: string;
  message: string;
};

// ─── Engine State ────────────────────────────────────────────────────────────

export type LocalAlertState = {
  readonly active: boolean;
  readonly level: AlertLevel;
  readonly reason: string;
  readonly triggeredBy: readonly string[];
  readonly timestamp: number;
};

export type Transition = {
  readonly previous: LocalAlertState;
  readonly current: LocalAlertState;
};

export type Classification = {
  level: AlertLevel;
  reasons: string[];
};

export type OverrideResult = {
  level: ActiveAlertLevel;
  reason: string;
};

// ─── Collaborator Ports ──────────────────────────────────────────────────────

/** One poll of an external feed. Rejects when the feed could not be read. */
export interface SnapshotSource<T> {
  readonly name: string;
  poll(signal: AbortSignal): Promise<T>;
}

/** Manual override switches, keyed by level. */
export interface OverrideSource {
  getOverrideState(level: ActiveAlertLevel): Promise<boolean> | boolean;
}

/** State and service API of the home-automation platform. */
export interface HomeAutomationPort {
  sendNotification(message: string, title: string): Promise<void>;
  triggerRoutine(identifier: string): Promise<void>;
  setSensorState(entityId: string, state: string, attributes: Record<string, unknown>): Promise<void>;
}

export interface VoiceCallPort {
  readonly name: string;
  /** Resolves true when the call was handed to the transport. */
  placeAlertCall(destination: string, level: ActiveAlertLevel, reason: string): Promise<boolean>;
  /** Resolves once the transport is registered; absent for transports that are always ready. */
  waitUntilReady?(): Promise<boolean>;
}

export type AlertLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
};

// ─── Effects Config ──────────────────────────────────────────────────────────

export type RoutineKey =
  | "advisory_alert"
  | "watch_alert"
  | "warning_alert"
  | "emergency_alert"
  | "alert_cleared";

/** Routines tied to a single source rather than to the local alert level. */
export type SourceRoutineKey =
  | "tornado_warning"
  | "severe_weather"
  | "eoc_activated"
  | `eoc_${Exclude<EocState, "inactive">}`;

/** Scene/script entity ids to run, per routine key. */
export type RoutineConfig = Partial<Record<RoutineKey | SourceRoutineKey, readonly string[]>>;

/** Destinations (extensions or numbers) to call, per level. */
export type VoiceCallConfig = Partial<Record<ActiveAlertLevel, readonly string[]>>;

export type EffectConfig = {
  routines?: RoutineConfig;
  voiceCalls?: VoiceCallConfig;
  /** Entity that mirrors the local alert state. */
  sensorEntityId?: string;
  /** Prefix for notification titles. */
  notificationTitle?: string;
};

export type SourceEffectConfig = {
  routines?: RoutineConfig;
  /** Mirrors the weather snapshot: on while any alert is active. */
  weatherSensorEntityId?: string;
  /** Mirrors the EOC snapshot: on while any site is activated. */
  eocSensorEntityId?: string;
};

// ─── Stored Transitions (persisted to JSONL) ─────────────────────────────────

export type StoredTransition = {
  type: "transition";
  ts: number;
  previous: LocalAlertState;
  current: LocalAlertState;
};

// ─── Init Options (for LocalAlertEngine) ─────────────────────────────────────

export type PollerSchedule<T> = {
  source: SnapshotSource<T>;
  intervalMs: number;
  timeoutMs?: number;
  retryDelayMs?: number;
};

export type LocalAlertEngineOptions = {
  /** Raw level table (the `alert_rules` shape). Required. */
  levelTable: unknown;
  overrides?: OverrideSource;
  automation?: HomeAutomationPort;
  voice?: VoiceCallPort;
  effects?: EffectConfig;
  /** Where to keep the transition log. Omit to keep nothing on disk. */
  stateDir?: string;
  weatherPoller?: PollerSchedule<WeatherSnapshot>;
  eocPoller?: PollerSchedule<EocSnapshot>;
  logger?: AlertLogger;
  logPrefix?: string;
  /** Clock, for tests. */
  now?: () => number;
};

// ─── Constants ───────────────────────────────────────────────────────────────

export const STORE_DIR_NAME = "local-alert";
export const LOG_FILENAME = "transitions.jsonl";

export const DEFAULTS = {
  pollTimeoutMs: 30_000,
  pollRetryDelayMs: 60_000,
  voiceReadyTimeoutMs: 10_000,
  sensorEntityId: "binary_sensor.local_alert",
  weatherSensorEntityId: "binary_sensor.local_alert_weather_alert",
  eocSensorEntityId: "binary_sensor.local_alert_eoc_active",
  notificationTitle: "Local Alert",
  maxLogSizeKb: 512,
  maxLogAgeDays: 30,
  pruneIntervalMs: 6 * 60 * 60 * 1000, // 6 hours
} as const;
