import { LEVELS_DESCENDING } from "./levels.js";
import type { AlertLogger, LocalAlertState, OverrideResult, OverrideSource } from "./types.js";

export function overrideReason(level: string): string {
  return `Manual override: ${level.toUpperCase()}`;
}

/**
 * Probe override switches from the highest level down.
 * A switch that cannot be read counts as off.
 */
export async function resolveOverride(
  source: OverrideSource | undefined,
  logger?: AlertLogger,
): Promise<OverrideResult | null> {
  if (!source) return null;

  for (const level of LEVELS_DESCENDING) {
    let on = false;
    try {
      on = await source.getOverrideState(level);
    } catch (err) {
      logger?.debug?.(`could not read ${level} override: ${String(err)}`);
      continue;
    }
    if (on) {
      return { level, reason: overrideReason(level) };
    }
  }

  return null;
}

export function overrideState(result: OverrideResult, now: number): LocalAlertState {
  return {
    active: true,
    level: result.level,
    reason: result.reason,
    triggeredBy: [result.reason],
    timestamp: now,
  };
}
