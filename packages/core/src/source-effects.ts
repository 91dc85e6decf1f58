import { triggerRoutines } from "./effect-dispatcher.js";
import type { SnapshotListener } from "./event-bus.js";
import {
  eocSensorAttributes,
  formatEocChangeNotification,
  formatWeatherAlertNotification,
  formatWeatherClearedNotification,
  weatherSensorAttributes,
} from "./formatter.js";
import { eocRoutineKey, weatherRoutineKey } from "./levels.js";
import {
  DEFAULTS,
  type AlertLogger,
  type EocSnapshot,
  type HomeAutomationPort,
  type SnapshotChange,
  type SnapshotKind,
  type SourceEffectConfig,
  type SourceRoutineKey,
  type WeatherSnapshot,
} from "./types.js";

/**
 * Effects of a single source, apart from the local alert level: one
 * notification per new or cleared weather alert and per EOC state change,
 * the routines tied to those, and one sensor per source.
 *
 * The first snapshot of each kind after construction is a baseline. Its
 * sensor is written; nothing is announced, so a restart does not repeat
 * notifications for alerts that were already known.
 */
export class SourceEffects {
  private automation?: HomeAutomationPort;
  private config: SourceEffectConfig;
  private readonly seen = new Set<SnapshotKind>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: AlertLogger;
  private readonly logPrefix: string;
  private readonly now: () => number;

  constructor(opts: {
    automation?: HomeAutomationPort;
    config?: SourceEffectConfig;
    logger?: AlertLogger;
    logPrefix?: string;
    now?: () => number;
  }) {
    this.automation = opts.automation;
    this.config = opts.config ?? {};
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "local-alert";
    this.now = opts.now ?? Date.now;
  }

  /** Replace the given settings; settings left out keep their value. */
  configure(config: SourceEffectConfig): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Follow a snapshot stream (usually `engine.onSnapshot`). Effects run in
   * the background; `flush()` waits for them. Returns the unsubscribe function.
   */
  attach(subscribe: (listener: SnapshotListener) => () => void): () => void {
    return subscribe((change) => {
      const effects = this.handle(change).catch((err: unknown) => {
        this.logger.error(`${this.logPrefix}: ${change.kind} source effects failed: ${String(err)}`);
      });
      this.inFlight.add(effects);
      void effects.finally(() => this.inFlight.delete(effects));
    });
  }

  async handle(change: SnapshotChange): Promise<void> {
    const baseline = !this.seen.has(change.kind);
    this.seen.add(change.kind);

    const effects =
      change.kind === "weather"
        ? this.weatherEffects(change.previous, change.current, baseline)
        : this.eocEffects(change.previous, change.current, baseline);
    await Promise.allSettled(effects);
  }

  /** Resolves once every effect started so far has settled. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  // ─── Weather ───────────────────────────────────────────────────────────────

  private weatherEffects(previous: WeatherSnapshot, current: WeatherSnapshot, baseline: boolean): Array<Promise<void>> {
    const entityId = this.config.weatherSensorEntityId ?? DEFAULTS.weatherSensorEntityId;
    const effects = [
      this.updateSensor(entityId, current.size > 0, weatherSensorAttributes(current, this.now())),
    ];
    if (baseline) return effects;

    for (const [id, alert] of current) {
      if (previous.has(id)) continue;
      this.logger.info(`${this.logPrefix}: new weather alert ${id}: ${alert.event}`);
      effects.push(this.notify(formatWeatherAlertNotification(alert)));
      const key = weatherRoutineKey(alert.event);
      if (key) effects.push(this.runRoutines(key));
    }

    for (const [id, alert] of previous) {
      if (current.has(id)) continue;
      this.logger.info(`${this.logPrefix}: weather alert ${id} cleared: ${alert.event}`);
      effects.push(this.notify(formatWeatherClearedNotification(alert)));
    }

    return effects;
  }

  // ─── EOC ───────────────────────────────────────────────────────────────────

  private eocEffects(previous: EocSnapshot, current: EocSnapshot, baseline: boolean): Array<Promise<void>> {
    const entityId = this.config.eocSensorEntityId ?? DEFAULTS.eocSensorEntityId;
    const activated = [...current.values()].some((s) => s.activated);
    const effects = [this.updateSensor(entityId, activated, eocSensorAttributes(current, this.now()))];
    if (baseline) return effects;

    for (const [id, site] of current) {
      const before = previous.get(id);
      // A site seen for the first time has nothing to compare against
      if (!before || before.state === site.state) continue;

      this.logger.info(`${this.logPrefix}: EOC ${id} changed: ${before.state} → ${site.state}`);
      effects.push(this.notify(formatEocChangeNotification(id, before, site)));

      const state = site.state;
      if (state !== "inactive") {
        const key = eocRoutineKey(state);
        effects.push(this.runRoutines(this.hasRoutines(key) ? key : "eoc_activated"));
      }
    }

    return effects;
  }

  // ─── Effects ───────────────────────────────────────────────────────────────

  private hasRoutines(key: SourceRoutineKey): boolean {
    return (this.config.routines?.[key]?.length ?? 0) > 0;
  }

  private async runRoutines(key: SourceRoutineKey): Promise<void> {
    if (!this.automation) return;
    await triggerRoutines(this.automation, this.config.routines, key, this.logger, this.logPrefix);
  }

  private async updateSensor(entityId: string, on: boolean, attributes: Record<string, unknown>): Promise<void> {
    if (!this.automation) return;
    try {
      await this.automation.setSensorState(entityId, on ? "on" : "off", attributes);
    } catch (err) {
      this.logger.error(`${this.logPrefix}: sensor update for ${entityId} failed: ${String(err)}`);
    }
  }

  private async notify(notification: { message: string; title: string }): Promise<void> {
    if (!this.automation) return;
    try {
      await this.automation.sendNotification(notification.message, notification.title);
    } catch (err) {
      this.logger.error(`${this.logPrefix}: notification failed: ${String(err)}`);
    }
  }
}
