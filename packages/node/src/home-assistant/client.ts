import type { AlertLogger, HomeAutomationPort } from "@local-alert/core";
import { z } from "zod";

export const SUPERVISOR_API_URL = "http://supervisor/core/api";

const EntityStateSchema = z.object({
  entity_id: z.string(),
  state: z.string(),
  attributes: z.record(z.unknown()).default({}),
  last_changed: z.string().optional(),
});

export type EntityState = z.infer<typeof EntityStateSchema>;

export class HomeAssistantError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = "HomeAssistantError";
  }
}

export type HomeAssistantClientOptions = {
  /** Supervisor or long-lived access token. */
  token: string;
  /** Defaults to the Supervisor proxy. */
  baseUrl?: string;
  /** Persistent notifications replace each other under this id. */
  notificationId?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: AlertLogger;
  logPrefix?: string;
};

/**
 * Home Assistant REST API client.
 *
 * ```ts
 * const ha = new HomeAssistantClient({ token: process.env.SUPERVISOR_TOKEN ?? "" });
 * await ha.sendNotification("Cyclone warning", "Local Alert - WARNING Alert");
 * ```
 */
export class HomeAssistantClient implements HomeAutomationPort {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly notificationId: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: AlertLogger;
  private readonly logPrefix: string;

  constructor(opts: HomeAssistantClientOptions) {
    this.baseUrl = (opts.baseUrl ?? SUPERVISOR_API_URL).replace(/\/+$/, "");
    this.headers = {
      Authorization: `Bearer ${opts.token}`,
      "Content-Type": "application/json",
    };
    this.notificationId = opts.notificationId ?? "local_alert";
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetch ?? fetch;
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "local-alert";
  }

  // ─── Services ──────────────────────────────────────────────────────────────

  async callService(domain: string, service: string, data: Record<string, unknown> = {}): Promise<unknown> {
    const res = await this.request("POST", `/services/${domain}/${service}`, data);
    this.logger.debug?.(`${this.logPrefix}: service call ${domain}.${service} ok`);
    return res.json();
  }

  async sendNotification(message: string, title: string): Promise<void> {
    await this.callService("persistent_notification", "create", {
      message,
      title,
      notification_id: this.notificationId,
    });
  }

  async activateScene(sceneId: string): Promise<void> {
    await this.callService("scene", "turn_on", { entity_id: sceneId });
  }

  async runScript(scriptId: string): Promise<void> {
    await this.callService("script", "turn_on", { entity_id: scriptId });
  }

  /** Run a `scene.*` or `script.*` entity. */
  async triggerRoutine(identifier: string): Promise<void> {
    if (identifier.startsWith("scene.")) {
      await this.activateScene(identifier);
    } else if (identifier.startsWith("script.")) {
      await this.runScript(identifier);
    } else {
      throw new HomeAssistantError(`not a scene or script: ${identifier}`, null);
    }
  }

  // ─── States ────────────────────────────────────────────────────────────────

  /** Entity state, or null when the entity does not exist. */
  async getState(entityId: string): Promise<EntityState | null> {
    let res: Response;
    try {
      res = await this.request("GET", `/states/${entityId}`);
    } catch (err) {
      if (err instanceof HomeAssistantError && err.status === 404) return null;
      throw err;
    }
    return EntityStateSchema.parse(await res.json());
  }

  async setSensorState(entityId: string, state: string, attributes: Record<string, unknown>): Promise<void> {
    await this.request("POST", `/states/${entityId}`, { state, attributes });
    this.logger.debug?.(`${this.logPrefix}: state set for ${entityId}: ${state}`);
  }

  // ─── Internal ──────────────────────────────────────────────────────────────

  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new HomeAssistantError(`Home Assistant ${method} ${path} failed: ${String(err)}`, null);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new HomeAssistantError(`Home Assistant ${method} ${path} ${res.status}${text ? `: ${text}` : ""}`, res.status);
    }
    return res;
  }
}
