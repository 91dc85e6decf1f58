import type { ActiveAlertLevel, OverrideSource } from "@local-alert/core";
import type { EntityState } from "../home-assistant/client.js";

export const DEFAULT_SWITCH_PREFIX = "input_boolean.local_alert_manual_";

export type EntityStateReader = { getState(entityId: string): Promise<EntityState | null> };

/**
 * Override switches kept as Home Assistant helpers
 * (`input_boolean.local_alert_manual_<level>`), read over REST on every lookup.
 * A missing helper reads as off; a failed read rejects.
 */
export class RestSwitchRegistry implements OverrideSource {
  private readonly prefix: string;

  constructor(
    private readonly client: EntityStateReader,
    opts?: { entityPrefix?: string },
  ) {
    this.prefix = opts?.entityPrefix ?? DEFAULT_SWITCH_PREFIX;
  }

  entityIdFor(level: ActiveAlertLevel): string {
    return `${this.prefix}${level}`;
  }

  async getOverrideState(level: ActiveAlertLevel): Promise<boolean> {
    const entity = await this.client.getState(this.entityIdFor(level));
    return entity?.state === "on";
  }
}
