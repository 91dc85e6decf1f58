import { withTimeout } from "./errors.js";
import { DEFAULTS, type AlertLogger, type SnapshotSource } from "./types.js";

export type PollerStats = {
  source: string;
  lastSuccessTs: number | null;
  lastFailureTs: number | null;
  lastError: string | null;
  consecutiveFailures: number;
};

/**
 * Polls one source on its own timer and hands every fresh snapshot over.
 * A failed poll is logged and retried later; the consumer keeps whatever
 * snapshot it had.
 */
export class Poller<T> {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private controller: AbortController | null = null;
  private running = false;
  private stats: PollerStats;

  private readonly source: SnapshotSource<T>;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly onSnapshot: (snapshot: T) => Promise<unknown> | unknown;
  private readonly logger: AlertLogger;
  private readonly logPrefix: string;
  private readonly now: () => number;

  constructor(opts: {
    source: SnapshotSource<T>;
    intervalMs: number;
    timeoutMs?: number;
    retryDelayMs?: number;
    onSnapshot: (snapshot: T) => Promise<unknown> | unknown;
    logger?: AlertLogger;
    logPrefix?: string;
    now?: () => number;
  }) {
    this.source = opts.source;
    this.intervalMs = opts.intervalMs;
    this.timeoutMs = opts.timeoutMs ?? DEFAULTS.pollTimeoutMs;
    this.retryDelayMs = opts.retryDelayMs ?? DEFAULTS.pollRetryDelayMs;
    this.onSnapshot = opts.onSnapshot;
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "local-alert";
    this.now = opts.now ?? Date.now;
    this.stats = {
      source: opts.source.name,
      lastSuccessTs: null,
      lastFailureTs: null,
      lastError: null,
      consecutiveFailures: 0,
    };
  }

  /** Poll now, then keep polling until `stop()`. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(0);
  }

  /** Stop polling. A poll still in flight is aborted and its result dropped. */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    this.controller = null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): PollerStats {
    return { ...this.stats };
  }

  /** One poll. Resolves true when a snapshot was delivered. Never rejects. */
  async pollOnce(): Promise<boolean> {
    const controller = new AbortController();
    this.controller = controller;
    let snapshot: T;
    try {
      snapshot = await withTimeout(
        this.source.poll(controller.signal),
        this.timeoutMs,
        `${this.source.name} poll`,
      );
    } catch (err) {
      if (controller.signal.aborted) {
        this.logger.debug?.(`${this.logPrefix}: ${this.source.name} poll cancelled`);
        return false;
      }
      controller.abort();
      this.stats.consecutiveFailures++;
      this.stats.lastFailureTs = this.now();
      this.stats.lastError = String(err);
      this.logger.warn(`${this.logPrefix}: ${this.source.name} poll failed, keeping last snapshot: ${String(err)}`);
      return false;
    } finally {
      if (this.controller === controller) this.controller = null;
    }

    if (controller.signal.aborted) {
      this.logger.debug?.(`${this.logPrefix}: ${this.source.name} poll finished after stop, dropping snapshot`);
      return false;
    }

    this.stats.consecutiveFailures = 0;
    this.stats.lastSuccessTs = this.now();
    this.stats.lastError = null;

    try {
      await this.onSnapshot(snapshot);
    } catch (err) {
      this.logger.error(`${this.logPrefix}: ${this.source.name} snapshot handling failed: ${String(err)}`);
    }
    return true;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    const ok = await this.pollOnce();
    if (this.running) {
      this.schedule(ok ? this.intervalMs : Math.min(this.retryDelayMs, this.intervalMs));
    }
  }
}
