// @local-alert/core: local alert level engine

// Types
export type {
  ActiveAlertLevel,
  AlertLevel,
  AlertLevelRule,
  AlertLogger,
  Classification,
  ConditionOperator,
  ConditionRule,
  ConditionSet,
  EffectConfig,
  EocRule,
  EocSiteState,
  EocSnapshot,
  EocState,
  HomeAutomationPort,
  LevelTable,
  LevelTableIssue,
  LocalAlertEngineOptions,
  LocalAlertState,
  OverrideResult,
  OverrideSource,
  PollerSchedule,
  RoutineConfig,
  RoutineKey,
  SnapshotChange,
  SnapshotKind,
  SnapshotSource,
  SourceEffectConfig,
  SourceRoutineKey,
  StoredTransition,
  Transition,
  VoiceCallConfig,
  VoiceCallPort,
  WeatherAlert,
  WeatherRule,
  WeatherSeverity,
  WeatherSnapshot,
} from "./types.js";

// Constants
export { DEFAULTS, LOG_FILENAME, STORE_DIR_NAME } from "./types.js";

// Engine
export { LocalAlertEngine } from "./engine.js";

// Levels
export {
  ALERT_LEVEL_PRIORITY,
  EOC_STATES,
  eocRoutineKey,
  eocStateLabel,
  isActiveLevel,
  isAlertLevel,
  LEVELS_DESCENDING,
  mostUrgentEocState,
  normalizeEocState,
  normalizeSeverity,
  routineKeyFor,
  WEATHER_SEVERITIES,
  weatherRoutineKey,
} from "./levels.js";

// Level Table
export {
  DEFAULT_LEVEL_TABLE,
  DEFAULT_LEVEL_TABLE_CONFIG,
  EMPTY_CONDITION_SET,
  parseLevelTable,
  serializeLevelTable,
} from "./level-table.js";

// Classification
export {
  alertMatchesRule,
  evaluateConditionSet,
  matchEocRule,
  matchingWeatherAlerts,
  matchWeatherRule,
} from "./conditions.js";
export {
  buildCandidateState,
  classify,
  evaluateLevel,
  NO_ALERTS_REASON,
  shortEventName,
} from "./classifier.js";

// Overrides
export { overrideReason, overrideState, resolveOverride } from "./overrides.js";

// State
export { initialState, StateTransitionTracker } from "./tracker.js";
export {
  EventBus,
  SnapshotBus,
  TransitionBus,
  type Listener,
  type SnapshotListener,
  type TransitionListener,
} from "./event-bus.js";
export { SerialQueue } from "./serial-queue.js";

// Effects
export { EffectDispatcher, isRoutineIdentifier, triggerRoutines } from "./effect-dispatcher.js";
export { SourceEffects } from "./source-effects.js";

// Polling
export { Poller, type PollerStats } from "./poller.js";

// Store
export {
  appendTransition,
  pruneLog,
  readLastTransition,
  readRecentTransitions,
} from "./store.js";

// Formatter
export {
  ALL_CLEAR_SPEECH,
  eocSensorAttributes,
  formatActivatedNotification,
  formatCallMessage,
  formatClearedNotification,
  formatEocChangeNotification,
  formatStatusSpeech,
  formatTransitionLine,
  formatWeatherAlertNotification,
  formatWeatherClearedNotification,
  sensorAttributes,
  weatherSensorAttributes,
} from "./formatter.js";

// Errors
export { ConfigurationError, TimeoutError, withTimeout } from "./errors.js";
