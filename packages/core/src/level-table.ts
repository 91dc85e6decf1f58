import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { LEVELS_DESCENDING, normalizeEocState, WEATHER_SEVERITIES } from "./levels.js";
import type {
  ActiveAlertLevel,
  AlertLevelRule,
  ConditionOperator,
  ConditionRule,
  ConditionSet,
  LevelTable,
  LevelTableIssue,
} from "./types.js";

// ─── Raw Shape ───────────────────────────────────────────────────────────────
//
// The configuration keeps the add-on's historical format:
//
//   { "warning": {
//       "weather_conditions": { "operator": "or", "rules": [{ "type": "any", "severity": "severe" }] },
//       "eoc_conditions": { "operator": "or", "rules": [{ "state": "stand up" }] },
//       "condition_logic": "or" } }
//
// Weather rules carry `severity`, EOC rules carry `state`. That key sniffing
// happens here only; everything past this module sees tagged rules.

const OperatorSchema = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(["and", "or"]));

const WeatherRuleSchema = z
  .object({
    type: z.string().optional(),
    severity: z.string(),
  })
  .transform((r, ctx): ConditionRule => {
    const eventType = r.type === undefined || r.type.trim().toLowerCase() === "any" ? "any" : r.type;
    const wanted = r.severity.trim().toLowerCase();
    if (wanted === "any") return { kind: "weather", eventType, severity: "any" };

    const severity = WEATHER_SEVERITIES.find((s) => s === wanted);
    if (!severity) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown severity "${r.severity}"` });
      return z.NEVER;
    }
    return { kind: "weather", eventType, severity };
  });

const EocRuleSchema = z
  .object({ state: z.string() })
  .transform((r, ctx): ConditionRule => {
    const state = normalizeEocState(r.state);
    if (!state) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown EOC state "${r.state}"` });
      return z.NEVER;
    }
    return { kind: "eoc", state };
  });

const RawRuleSchema = z.unknown().transform((raw, ctx): ConditionRule => {
  const schema: z.ZodType<ConditionRule, z.ZodTypeDef, unknown> | null = isRecord(raw) && "severity" in raw
    ? WeatherRuleSchema
    : isRecord(raw) && "state" in raw
      ? EocRuleSchema
      : null;
  if (!schema) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "rule has neither `severity` nor `state`" });
    return z.NEVER;
  }
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: formatZodIssues(parsed.error) });
  return z.NEVER;
});

const ConditionSetSchema = z.object({
  operator: OperatorSchema.default("or"),
  rules: z.array(RawRuleSchema).default([]),
});

// ─── Fallbacks ───────────────────────────────────────────────────────────────

export const EMPTY_CONDITION_SET: ConditionSet = { operator: "or", rules: [] };

const NEVER_TRIGGERS: AlertLevelRule = { weather: EMPTY_CONDITION_SET, eoc: EMPTY_CONDITION_SET, combine: "or" };

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

function parseConditionSet(raw: unknown, path: string, issues: LevelTableIssue[]): ConditionSet {
  if (raw === undefined) return EMPTY_CONDITION_SET;
  const parsed = ConditionSetSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  issues.push({ path, message: formatZodIssues(parsed.error) });
  return EMPTY_CONDITION_SET;
}

function parseOperator(raw: unknown, path: string, issues: LevelTableIssue[]): ConditionOperator {
  if (raw === undefined) return "or";
  const parsed = OperatorSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  issues.push({ path, message: `invalid operator ${JSON.stringify(raw)}, using "or"` });
  return "or";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Build a level table from configuration. Never throws for an object:
 * a malformed level, condition set or operator falls back to `or` over an
 * empty rule list (never matches) and is reported in `issues`.
 */
export function parseLevelTable(raw: unknown): { table: LevelTable; issues: LevelTableIssue[] } {
  if (!isRecord(raw)) {
    throw new ConfigurationError("level table is missing or not an object");
  }

  const issues: LevelTableIssue[] = [];
  const table: LevelTable = {
    emergency: parseLevelRule(raw, "emergency", issues),
    warning: parseLevelRule(raw, "warning", issues),
    watch: parseLevelRule(raw, "watch", issues),
    advisory: parseLevelRule(raw, "advisory", issues),
  };
  return { table, issues };
}

function parseLevelRule(
  raw: Record<string, unknown>,
  level: ActiveAlertLevel,
  issues: LevelTableIssue[],
): AlertLevelRule {
  const entry = raw[level];
  if (!isRecord(entry)) {
    issues.push({
      path: level,
      message: entry === undefined ? "level missing, it will never trigger" : "level is not an object, it will never trigger",
    });
    return NEVER_TRIGGERS;
  }
  return {
    weather: parseConditionSet(entry.weather_conditions, `${level}.weather_conditions`, issues),
    eoc: parseConditionSet(entry.eoc_conditions, `${level}.eoc_conditions`, issues),
    combine: parseOperator(entry.condition_logic, `${level}.condition_logic`, issues),
  };
}

/** Back to the raw configuration format (for the config endpoint). */
export function serializeLevelTable(table: LevelTable): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const level of LEVELS_DESCENDING) {
    const rule = table[level];
    out[level] = {
      weather_conditions: serializeConditionSet(rule.weather),
      eoc_conditions: serializeConditionSet(rule.eoc),
      condition_logic: rule.combine,
    };
  }
  return out;
}

function serializeConditionSet(set: ConditionSet): Record<string, unknown> {
  return {
    operator: set.operator,
    rules: set.rules.map((rule) =>
      rule.kind === "weather"
        ? { type: rule.eventType, severity: rule.severity }
        : { state: rule.state.replace(/_/g, " ") },
    ),
  };
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_LEVEL_TABLE_CONFIG = {
  advisory: {
    weather_conditions: { operator: "or", rules: [{ type: "any", severity: "minor" }] },
    eoc_conditions: { operator: "or", rules: [{ state: "alert" }, { state: "stand down" }] },
    condition_logic: "or",
  },
  watch: {
    weather_conditions: { operator: "or", rules: [{ type: "any", severity: "moderate" }] },
    eoc_conditions: { operator: "or", rules: [{ state: "lean forward" }] },
    condition_logic: "or",
  },
  warning: {
    weather_conditions: { operator: "or", rules: [{ type: "any", severity: "severe" }] },
    eoc_conditions: { operator: "or", rules: [] },
    condition_logic: "or",
  },
  emergency: {
    weather_conditions: {
      operator: "or",
      rules: [
        { type: "any", severity: "extreme" },
        { type: "Tropical Cyclone Warning", severity: "any" },
      ],
    },
    eoc_conditions: { operator: "or", rules: [{ state: "stand up" }] },
    condition_logic: "or",
  },
} as const;

export const DEFAULT_LEVEL_TABLE: LevelTable = parseLevelTable(DEFAULT_LEVEL_TABLE_CONFIG).table;
