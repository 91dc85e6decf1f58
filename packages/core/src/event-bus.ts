import type { AlertLogger, SnapshotChange, Transition } from "./types.js";

export type Listener<T> = (event: T) => void;
export type TransitionListener = Listener<Transition>;
export type SnapshotListener = Listener<SnapshotChange>;

/**
 * Typed pub/sub. Listeners run after the change they report and cannot
 * affect it; a throwing listener is logged and the rest still run.
 */
export class EventBus<T> {
  private listeners = new Set<Listener<T>>();

  constructor(
    private readonly logger: AlertLogger = console,
    private readonly label = "event",
  ) {}

  /** Subscribe. Returns an unsubscribe function. */
  on(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  emit(event: T): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error(`${this.label} listener error: ${String(err)}`);
      }
    }
  }

  clear(): void {
    this.listeners.clear();
  }

  get size(): number {
    return this.listeners.size;
  }
}

/** Committed transitions. */
export class TransitionBus extends EventBus<Transition> {
  constructor(logger: AlertLogger = console) {
    super(logger, "transition");
  }
}

/** Snapshot replacements, emitted before the cycle they trigger. */
export class SnapshotBus extends EventBus<SnapshotChange> {
  constructor(logger: AlertLogger = console) {
    super(logger, "snapshot");
  }
}
