import { buildCandidateState, classify } from "./classifier.js";
import { EffectDispatcher } from "./effect-dispatcher.js";
import { ConfigurationError } from "./errors.js";
import { SnapshotBus, TransitionBus, type SnapshotListener, type TransitionListener } from "./event-bus.js";
import { parseLevelTable } from "./level-table.js";
import { overrideState, resolveOverride } from "./overrides.js";
import { Poller, type PollerStats } from "./poller.js";
import { SerialQueue } from "./serial-queue.js";
import { appendTransition, pruneLog, readLastTransition, readRecentTransitions } from "./store.js";
import { initialState, StateTransitionTracker } from "./tracker.js";
import {
  DEFAULTS,
  type AlertLogger,
  type EffectConfig,
  type EocSnapshot,
  type LevelTable,
  type LevelTableIssue,
  type LocalAlertEngineOptions,
  type LocalAlertState,
  type OverrideSource,
  type SnapshotKind,
  type StoredTransition,
  type Transition,
  type WeatherSnapshot,
} from "./types.js";

/**
 * LocalAlertEngine owns the latest weather and EOC snapshots and the
 * committed local alert state.
 *
 * Every submission runs one evaluation cycle (override lookup, classify,
 * commit) strictly after the previous one. Effects of a transition are
 * dispatched outside that queue and never block the next cycle.
 */
export class LocalAlertEngine {
  readonly bus: TransitionBus;
  readonly snapshots: SnapshotBus;

  private table: LevelTable;
  private weather: WeatherSnapshot = new Map();
  private eoc: EocSnapshot = new Map();

  private readonly tracker: StateTransitionTracker;
  private readonly queue = new SerialQueue();
  private readonly dispatcher: EffectDispatcher;
  private readonly overrides?: OverrideSource;
  private readonly stateDir?: string;
  private readonly pollers: Array<Poller<WeatherSnapshot> | Poller<EocSnapshot>> = [];
  private readonly polledKinds: SnapshotKind[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: AlertLogger;
  private readonly logPrefix: string;
  private readonly now: () => number;

  private pruneTimer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  /** Snapshot kinds still owed after a warm start; classification waits for them. */
  private awaiting = new Set<SnapshotKind>();

  constructor(options: LocalAlertEngineOptions) {
    this.logger = options.logger ?? console;
    this.logPrefix = options.logPrefix ?? "local-alert";
    this.now = options.now ?? Date.now;
    this.overrides = options.overrides;
    this.stateDir = options.stateDir;

    const { table, issues } = parseLevelTable(options.levelTable);
    this.table = table;
    this.reportIssues(issues);

    this.tracker = new StateTransitionTracker(initialState(this.now()));
    this.bus = new TransitionBus(this.logger);
    this.snapshots = new SnapshotBus(this.logger);
    this.dispatcher = new EffectDispatcher({
      automation: options.automation,
      voice: options.voice,
      config: options.effects,
      logger: this.logger,
      logPrefix: this.logPrefix,
    });

    if (options.weatherPoller) {
      this.polledKinds.push("weather");
      this.pollers.push(
        new Poller<WeatherSnapshot>({
          ...options.weatherPoller,
          onSnapshot: (snapshot) => this.submitWeatherSnapshot(snapshot),
          logger: this.logger,
          logPrefix: this.logPrefix,
          now: this.now,
        }),
      );
    }
    if (options.eocPoller) {
      this.polledKinds.push("eoc");
      this.pollers.push(
        new Poller<EocSnapshot>({
          ...options.eocPoller,
          onSnapshot: (snapshot) => this.submitEocSnapshot(snapshot),
          logger: this.logger,
          logPrefix: this.logPrefix,
          now: this.now,
        }),
      );
    }
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Start the engine: warm from the transition log, start pollers and timers.
   * A restored state holds until every polled snapshot kind has arrived, so a
   * restart does not compare the old state against empty inputs.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    if (this.stateDir) {
      const stateDir = this.stateDir;
      try {
        const last = readLastTransition(stateDir);
        if (last) {
          this.tracker.restore(last.current);
          this.awaiting = new Set(this.requiredSnapshots());
          this.logger.info(`${this.logPrefix}: restored ${last.current.level} state from transition log`);
        }
      } catch (err) {
        this.logger.warn(`${this.logPrefix}: warm-start failed: ${String(err)}`);
      }

      // Prune timer (cleans old log entries every 6h)
      this.pruneTimer = setInterval(() => {
        try {
          pruneLog(stateDir);
        } catch (err) {
          this.logger.warn(`${this.logPrefix}: prune failed: ${String(err)}`);
        }
      }, DEFAULTS.pruneIntervalMs);
    }

    for (const poller of this.pollers) {
      poller.start();
    }

    this.logger.info(`${this.logPrefix}: started, ${this.pollers.length} poller(s)`);
  }

  /** Stop pollers and timers, then wait for queued cycles and issued effects. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    for (const poller of this.pollers) {
      poller.stop();
    }
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }

    await this.queue.idle();
    await this.flushEffects();
    this.bus.clear();
    this.snapshots.clear();

    this.logger.info(`${this.logPrefix}: stopped`);
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ─── Inputs ────────────────────────────────────────────────────────────────

  /** Replace the weather snapshot and evaluate. */
  submitWeatherSnapshot(snapshot: WeatherSnapshot): Promise<Transition | null> {
    const copy = new Map(snapshot);
    return this.queue.run(() => {
      const previous = this.weather;
      this.weather = copy;
      this.awaiting.delete("weather");
      this.snapshots.emit({ kind: "weather", previous, current: copy });
      return this.runCycle();
    });
  }

  /** Replace the EOC snapshot and evaluate. */
  submitEocSnapshot(snapshot: EocSnapshot): Promise<Transition | null> {
    const copy = new Map(snapshot);
    return this.queue.run(() => {
      const previous = this.eoc;
      this.eoc = copy;
      this.awaiting.delete("eoc");
      this.snapshots.emit({ kind: "eoc", previous, current: copy });
      return this.runCycle();
    });
  }

  /** Evaluate against the current snapshots (e.g. after an override switch changed). */
  reevaluate(): Promise<Transition | null> {
    return this.queue.run(() => this.runCycle());
  }

  /**
   * Swap the level table. Returns the validation issues; a value that is not
   * a table at all keeps the current one. Call `reevaluate()` to apply it.
   */
  reloadLevelTable(raw: unknown): LevelTableIssue[] {
    let parsed: { table: LevelTable; issues: LevelTableIssue[] };
    try {
      parsed = parseLevelTable(raw);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      const issues = [{ path: "", message: `${err.message}, keeping current table` }];
      this.reportIssues(issues);
      return issues;
    }

    this.table = parsed.table;
    this.reportIssues(parsed.issues);
    this.logger.info(`${this.logPrefix}: level table reloaded`);
    return parsed.issues;
  }

  /** Replace routine, call or sensor settings for future transitions; omitted settings are kept. */
  configureEffects(config: EffectConfig): void {
    this.dispatcher.configure(config);
  }

  // ─── Outputs ───────────────────────────────────────────────────────────────

  onTransition(listener: TransitionListener): () => void {
    return this.bus.on(listener);
  }

  /** Called each time a submitted snapshot replaces the previous one, before it is classified. */
  onSnapshot(listener: SnapshotListener): () => void {
    return this.snapshots.on(listener);
  }

  /** True while a restored state waits for fresh snapshots before it can change. */
  get isHoldingRestoredState(): boolean {
    return this.awaiting.size > 0;
  }

  getCurrentState(): LocalAlertState {
    return this.tracker.current;
  }

  getWeatherSnapshot(): WeatherSnapshot {
    return this.weather;
  }

  getEocSnapshot(): EocSnapshot {
    return this.eoc;
  }

  getLevelTable(): LevelTable {
    return this.table;
  }

  getPollerStats(): PollerStats[] {
    return this.pollers.map((p) => p.getStats());
  }

  /** Recent persisted transitions, oldest first. Empty without a state directory. */
  getRecentTransitions(limit = 100): StoredTransition[] {
    if (!this.stateDir) return [];
    return readRecentTransitions(this.stateDir, limit);
  }

  /** Resolves once every effect dispatched so far has settled. */
  async flushEffects(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────────────

  private async runCycle(): Promise<Transition | null> {
    const override = await resolveOverride(this.overrides, this.logger);
    if (!override && this.awaiting.size > 0) {
      this.logger.debug?.(
        `${this.logPrefix}: holding restored ${this.tracker.current.level} state until ${[...this.awaiting].join(" and ")} snapshot arrives`,
      );
      return null;
    }

    const now = this.now();
    const candidate = override
      ? overrideState(override, now)
      : buildCandidateState(classify(this.weather, this.eoc, this.table), now);

    const transition = this.tracker.update(candidate);
    if (transition) {
      this.commit(transition);
    }
    return transition;
  }

  private commit(transition: Transition): void {
    const { previous, current } = transition;
    this.logger.info(
      `${this.logPrefix}: ${previous.level} → ${current.level}${current.active ? ` (${current.reason})` : ""}`,
    );

    if (this.stateDir) {
      try {
        appendTransition(this.stateDir, { type: "transition", ts: current.timestamp, previous, current });
      } catch (err) {
        this.logger.warn(`${this.logPrefix}: failed to persist transition: ${String(err)}`);
      }
    }

    this.bus.emit(transition);

    const effects = this.dispatcher.dispatch(transition).catch((err: unknown) => {
      this.logger.error(`${this.logPrefix}: effect dispatch failed: ${String(err)}`);
    });
    this.inFlight.add(effects);
    void effects.finally(() => this.inFlight.delete(effects));
  }

  /**
   * Kinds a warm start waits for: those with a configured poller, or both
   * when snapshots are submitted from outside.
   */
  private requiredSnapshots(): SnapshotKind[] {
    return this.polledKinds.length > 0 ? this.polledKinds : ["weather", "eoc"];
  }

  private reportIssues(issues: LevelTableIssue[]): void {
    for (const issue of issues) {
      this.logger.warn(`${this.logPrefix}: level table ${issue.path || "(root)"}: ${issue.message}`);
    }
  }
}
