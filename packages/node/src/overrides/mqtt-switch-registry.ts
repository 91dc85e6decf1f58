import {
  isActiveLevel,
  LEVELS_DESCENDING,
  withTimeout,
  type ActiveAlertLevel,
  type AlertLogger,
  type OverrideSource,
} from "@local-alert/core";
import EventEmitter from "eventemitter3";
import { connect } from "mqtt";

/** The slice of an MQTT client the registry talks to. */
export interface SwitchBrokerClient {
  readonly connected: boolean;
  onConnect(cb: () => void): void;
  onClose(cb: () => void): void;
  onError(cb: (err: Error) => void): void;
  onMessage(cb: (topic: string, payload: string) => void): void;
  subscribe(topic: string): void;
  publish(topic: string, payload: string, opts: { qos: 0 | 1; retain: boolean }): void;
  end(): void;
}

export type BrokerConnectOptions = {
  broker: string;
  port: number;
  username?: string;
  password?: string;
  clientId: string;
};

/** Connects a real MQTT client (mqtt.js) and adapts it. */
export function connectMqttBroker(opts: BrokerConnectOptions): SwitchBrokerClient {
  const client = connect(`mqtt://${opts.broker}:${opts.port}`, {
    clientId: opts.clientId,
    username: opts.username || undefined,
    password: opts.password || undefined,
    protocolVersion: 4,
    keepalive: 60,
    reconnectPeriod: 5_000,
  });

  return {
    get connected() {
      return client.connected;
    },
    onConnect: (cb) => { client.on("connect", () => cb()); },
    onClose: (cb) => { client.on("close", () => cb()); },
    onError: (cb) => { client.on("error", (err) => cb(err)); },
    onMessage: (cb) => { client.on("message", (topic, payload) => cb(topic, payload.toString("utf-8"))); },
    subscribe: (topic) => { client.subscribe(topic); },
    publish: (topic, payload, publishOpts) => { client.publish(topic, payload, publishOpts); },
    end: () => { client.end(); },
  };
}

type RegistryEvents = {
  change: (level: ActiveAlertLevel, on: boolean) => void;
  connected: () => void;
  disconnected: () => void;
};

export type MqttSwitchRegistryOptions = {
  broker: string;
  port?: number;
  username?: string;
  password?: string;
  /** Discovery node id; topics are `homeassistant/switch/<nodeId>/...`. */
  nodeId?: string;
  connectTimeoutMs?: number;
  /** Swap the transport (tests use an in-memory client). */
  clientFactory?: (opts: BrokerConnectOptions) => SwitchBrokerClient;
  logger?: AlertLogger;
  logPrefix?: string;
};

const SWITCH_ICONS: Record<ActiveAlertLevel, string> = {
  advisory: "mdi:information",
  watch: "mdi:eye",
  warning: "mdi:alert",
  emergency: "mdi:alarm-light",
};

/**
 * Manual override switches announced to Home Assistant through MQTT
 * discovery. Commands on `.../set` flip the in-memory state, are echoed on
 * `.../state` and emitted as `change` so the engine can re-evaluate at once.
 *
 * Emits: change, connected, disconnected
 */
export class MqttSwitchRegistry extends EventEmitter<RegistryEvents> implements OverrideSource {
  private client: SwitchBrokerClient | null = null;
  private states = new Map<ActiveAlertLevel, boolean>();
  private readonly opts: Required<Omit<MqttSwitchRegistryOptions, "username" | "password" | "logger">> & {
    username?: string;
    password?: string;
  };
  private readonly logger: AlertLogger;

  constructor(opts: MqttSwitchRegistryOptions) {
    super();
    this.opts = {
      broker: opts.broker,
      port: opts.port ?? 1883,
      username: opts.username,
      password: opts.password,
      nodeId: opts.nodeId ?? "local_alert",
      connectTimeoutMs: opts.connectTimeoutMs ?? 30_000,
      clientFactory: opts.clientFactory ?? connectMqttBroker,
      logPrefix: opts.logPrefix ?? "local-alert",
    };
    this.logger = opts.logger ?? console;
    for (const level of LEVELS_DESCENDING) {
      this.states.set(level, false);
    }
  }

  get isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  /**
   * Connect and announce the switches. Resolves false when the broker is
   * not reachable within `connectTimeoutMs`.
   */
  async connect(): Promise<boolean> {
    if (this.client) {
      this.logger.warn(`${this.opts.logPrefix}: MQTT client already exists, skipping duplicate connection`);
      return this.isConnected;
    }

    const { broker, port, username } = this.opts;
    this.logger.info(`${this.opts.logPrefix}: connecting to MQTT broker ${broker}:${port} (username ${username ? "set" : "none"})`);

    const connected = new Promise<boolean>((resolve) => {
      this.once("connected", () => resolve(true));
    });

    const client = this.opts.clientFactory({
      broker,
      port,
      username,
      password: this.opts.password,
      clientId: `local_alert_${Date.now()}`,
    });
    this.client = client;

    client.onConnect(() => {
      this.announce(client);
      this.emit("connected");
    });
    client.onClose(() => {
      this.emit("disconnected");
    });
    client.onError((err) => {
      this.logger.error(`${this.opts.logPrefix}: MQTT error: ${err.message}`);
    });
    client.onMessage((topic, payload) => {
      this.handleMessage(topic, payload);
    });

    try {
      return await withTimeout(connected, this.opts.connectTimeoutMs, `MQTT connect to ${broker}:${port}`);
    } catch (err) {
      this.logger.error(`${this.opts.logPrefix}: ${String(err)}`);
      return false;
    }
  }

  disconnect(): void {
    if (!this.client) return;
    this.client.end();
    this.client = null;
    this.logger.info(`${this.opts.logPrefix}: disconnected from MQTT broker`);
  }

  getOverrideState(level: ActiveAlertLevel): boolean {
    return this.states.get(level) ?? false;
  }

  /** Set a switch from this side and publish its state. */
  setSwitch(level: ActiveAlertLevel, on: boolean): void {
    this.states.set(level, on);
    this.client?.publish(this.topic(level, "state"), on ? "ON" : "OFF", { qos: 0, retain: true });
  }

  topic(level: ActiveAlertLevel, suffix: "config" | "set" | "state"): string {
    return `homeassistant/switch/${this.opts.nodeId}/manual_${level}/${suffix}`;
  }

  // ─── Internal ──────────────────────────────────────────────────────────────

  private announce(client: SwitchBrokerClient): void {
    for (const level of LEVELS_DESCENDING) {
      const config = {
        name: `Manual ${level.charAt(0).toUpperCase()}${level.slice(1)} Alert`,
        unique_id: `${this.opts.nodeId}_manual_${level}`,
        command_topic: this.topic(level, "set"),
        state_topic: this.topic(level, "state"),
        payload_on: "ON",
        payload_off: "OFF",
        state_on: "ON",
        state_off: "OFF",
        icon: SWITCH_ICONS[level],
        device: {
          identifiers: [this.opts.nodeId],
          name: "Local Alert",
          model: "Weather & EOC Alert System",
          manufacturer: "Local Alert",
        },
      };
      client.publish(this.topic(level, "config"), JSON.stringify(config), { qos: 1, retain: true });
      client.subscribe(this.topic(level, "set"));
      client.publish(this.topic(level, "state"), this.getOverrideState(level) ? "ON" : "OFF", { qos: 0, retain: true });
    }
    this.logger.info(`${this.opts.logPrefix}: announced ${LEVELS_DESCENDING.length} override switches over MQTT`);
  }

  private handleMessage(topic: string, payload: string): void {
    // homeassistant/switch/<nodeId>/manual_<level>/set
    const parts = topic.split("/");
    if (parts.length !== 5 || parts[2] !== this.opts.nodeId || parts[4] !== "set") return;

    const switchId = parts[3] ?? "";
    const level = switchId.startsWith("manual_") ? switchId.slice("manual_".length) : "";
    if (!isActiveLevel(level)) {
      this.logger.warn(`${this.opts.logPrefix}: command for unknown switch "${switchId}" ignored`);
      return;
    }

    const command = payload.trim().toUpperCase();
    if (command !== "ON" && command !== "OFF") {
      this.logger.warn(`${this.opts.logPrefix}: invalid payload "${payload}" for ${switchId}`);
      return;
    }

    const on = command === "ON";
    this.logger.info(`${this.opts.logPrefix}: override ${level} switched ${command}`);
    this.setSwitch(level, on);
    this.emit("change", level, on);
  }
}
