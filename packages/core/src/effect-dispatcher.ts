import { withTimeout } from "./errors.js";
import { formatActivatedNotification, formatClearedNotification, sensorAttributes } from "./formatter.js";
import { routineKeyFor } from "./levels.js";
import {
  DEFAULTS,
  type ActiveAlertLevel,
  type AlertLogger,
  type EffectConfig,
  type HomeAutomationPort,
  type LocalAlertState,
  type RoutineConfig,
  type RoutineKey,
  type SourceRoutineKey,
  type Transition,
  type VoiceCallPort,
} from "./types.js";

const ROUTINE_PREFIXES = ["scene.", "script."];

export function isRoutineIdentifier(identifier: string): boolean {
  return ROUTINE_PREFIXES.some((prefix) => identifier.startsWith(prefix));
}

/** Run every configured scene or script for `key`; unknown identifiers and failures are logged. */
export async function triggerRoutines(
  automation: HomeAutomationPort,
  routines: RoutineConfig | undefined,
  key: RoutineKey | SourceRoutineKey,
  logger: AlertLogger,
  logPrefix: string,
): Promise<void> {
  const identifiers = routines?.[key] ?? [];
  const runs = identifiers.map(async (identifier) => {
    if (!isRoutineIdentifier(identifier)) {
      logger.warn(`${logPrefix}: unknown routine type "${identifier}" in ${key}, skipped`);
      return;
    }
    try {
      await automation.triggerRoutine(identifier);
    } catch (err) {
      logger.error(`${logPrefix}: routine "${identifier}" failed: ${String(err)}`);
    }
  });

  await Promise.allSettled(runs);
}

/**
 * Fans a transition out to the sensor, routines, notification and voice calls.
 * Fire-and-forget: each effect fails on its own and is only logged.
 */
export class EffectDispatcher {
  private automation?: HomeAutomationPort;
  private voice?: VoiceCallPort;
  private config: EffectConfig;
  private logger: AlertLogger;
  private logPrefix: string;
  private voiceReadyTimeoutMs: number;

  constructor(opts: {
    automation?: HomeAutomationPort;
    voice?: VoiceCallPort;
    config?: EffectConfig;
    logger?: AlertLogger;
    logPrefix?: string;
    voiceReadyTimeoutMs?: number;
  }) {
    this.automation = opts.automation;
    this.voice = opts.voice;
    this.config = opts.config ?? {};
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "local-alert";
    this.voiceReadyTimeoutMs = opts.voiceReadyTimeoutMs ?? DEFAULTS.voiceReadyTimeoutMs;
  }

  /** Replace the given effect settings; settings left out keep their value. */
  configure(config: EffectConfig): void {
    this.config = { ...this.config, ...config };
  }

  async dispatch(transition: Transition): Promise<void> {
    const state = transition.current;
    const effects: Array<Promise<void>> = [this.updateSensor(state)];

    if (state.active && state.level !== "none") {
      effects.push(this.runRoutines(routineKeyFor(state.level)));
      effects.push(this.notify(formatActivatedNotification(state, this.title)));
      effects.push(this.placeCalls(state.level, state.reason));
    } else {
      effects.push(this.runRoutines("alert_cleared"));
      effects.push(this.notify(formatClearedNotification(this.title)));
    }

    await Promise.allSettled(effects);
  }

  // ─── Effects ───────────────────────────────────────────────────────────────

  private get title(): string {
    return this.config.notificationTitle ?? DEFAULTS.notificationTitle;
  }

  private async updateSensor(state: LocalAlertState): Promise<void> {
    if (!this.automation) return;
    const entityId = this.config.sensorEntityId ?? DEFAULTS.sensorEntityId;
    try {
      await this.automation.setSensorState(
        entityId,
        state.active ? "on" : "off",
        sensorAttributes(state, this.title),
      );
    } catch (err) {
      this.logger.error(`${this.logPrefix}: sensor update for ${entityId} failed: ${String(err)}`);
    }
  }

  private async runRoutines(key: RoutineKey): Promise<void> {
    if (!this.automation) return;
    await triggerRoutines(this.automation, this.config.routines, key, this.logger, this.logPrefix);
  }

  private async notify(notification: { message: string; title: string }): Promise<void> {
    if (!this.automation) return;
    try {
      await this.automation.sendNotification(notification.message, notification.title);
    } catch (err) {
      this.logger.error(`${this.logPrefix}: notification failed: ${String(err)}`);
    }
  }

  private async placeCalls(level: ActiveAlertLevel, reason: string): Promise<void> {
    const voice = this.voice;
    if (!voice) return;

    const destinations = this.config.voiceCalls?.[level] ?? [];
    if (destinations.length === 0) {
      this.logger.debug?.(`${this.logPrefix}: no voice calls configured for ${level}`);
      return;
    }

    if (voice.waitUntilReady) {
      let ready = false;
      try {
        ready = await withTimeout(voice.waitUntilReady(), this.voiceReadyTimeoutMs, `${voice.name} readiness`);
      } catch (err) {
        this.logger.error(`${this.logPrefix}: voice transport "${voice.name}" unavailable: ${String(err)}`);
        return;
      }
      if (!ready) {
        this.logger.error(`${this.logPrefix}: voice transport "${voice.name}" not ready, ${destinations.length} call(s) skipped`);
        return;
      }
    }

    this.logger.info(`${this.logPrefix}: placing ${destinations.length} call(s) for ${level}`);

    const calls = destinations.map(async (destination) => {
      try {
        const placed = await voice.placeAlertCall(destination, level, reason);
        if (placed) {
          this.logger.info(`${this.logPrefix}: call initiated to ${destination}`);
        } else {
          this.logger.error(`${this.logPrefix}: call to ${destination} was not initiated`);
        }
      } catch (err) {
        this.logger.error(`${this.logPrefix}: call to ${destination} failed: ${String(err)}`);
      }
    });

    await Promise.allSettled(calls);
  }
}
