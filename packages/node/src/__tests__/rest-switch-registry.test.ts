import { describe, expect, it } from "@jest/globals";
import type { EntityState } from "../home-assistant/client.js";
import { RestSwitchRegistry } from "../overrides/rest-switch-registry.js";

function states(entities: Record<string, string>) {
  const read: string[] = [];
  return {
    read,
    getState: async (entityId: string): Promise<EntityState | null> => {
      read.push(entityId);
      const state = entities[entityId];
      return state === undefined ? null : { entity_id: entityId, state, attributes: {} };
    },
  };
}

describe("RestSwitchRegistry", () => {
  it("reads the helper for each level", async () => {
    const client = states({ "input_boolean.local_alert_manual_watch": "on" });
    const registry = new RestSwitchRegistry(client);

    await expect(registry.getOverrideState("watch")).resolves.toBe(true);
    await expect(registry.getOverrideState("warning")).resolves.toBe(false);
    expect(client.read).toEqual(["input_boolean.local_alert_manual_watch", "input_boolean.local_alert_manual_warning"]);
  });

  it("treats anything but on as off", async () => {
    const registry = new RestSwitchRegistry(states({ "input_boolean.local_alert_manual_advisory": "unavailable" }));
    await expect(registry.getOverrideState("advisory")).resolves.toBe(false);
  });

  it("uses a custom prefix", () => {
    const registry = new RestSwitchRegistry(states({}), { entityPrefix: "input_boolean.storm_" });
    expect(registry.entityIdFor("emergency")).toBe("input_boolean.storm_emergency");
  });

  it("lets a failed read reject", async () => {
    const registry = new RestSwitchRegistry({
      getState: async () => {
        throw new Error("401 unauthorized");
      },
    });
    await expect(registry.getOverrideState("watch")).rejects.toThrow("401 unauthorized");
  });
});
