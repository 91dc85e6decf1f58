import fs from "node:fs";
import path from "node:path";
import { ConfigurationError, DEFAULT_LEVEL_TABLE_CONFIG, DEFAULTS } from "@local-alert/core";
import { DEFAULT_SWITCH_PREFIX, SUPERVISOR_API_URL } from "@local-alert/node";
import dotenv from "dotenv";
import { z } from "zod";

export const DEFAULT_OPTIONS_PATH = "/data/options.json";
export const LOCAL_OPTIONS_PATH = "./options.json";

const IdList = z.array(z.string()).default([]);

/** Scenes and scripts per routine key: one per level, the clear, and the per-source ones. */
export const RoutinesSchema = z.object({
	advisory_alert: IdList,
	watch_alert: IdList,
	warning_alert: IdList,
	emergency_alert: IdList,
	alert_cleared: IdList,
	tornado_warning: IdList,
	severe_weather: IdList,
	eoc_activated: IdList,
	eoc_alert: IdList,
	eoc_lean_forward: IdList,
	eoc_stand_up: IdList,
	eoc_stand_down: IdList,
});

// ─── Schema ──────────────────────────────────────────────────────────────────
//
// Keys follow the add-on options file (snake_case). `alert_rules` stays raw:
// the engine validates it and reports per-level issues instead of failing.

export const AppConfigSchema = z.object({
	supervisor_token: z.string().default(""),
	ha_url: z.string().url().default(SUPERVISOR_API_URL),
	/** Weather poll interval, seconds. */
	check_interval: z.coerce.number().int().positive().default(300),
	/** EOC poll interval, seconds. Falls back to `check_interval`. */
	eoc_check_interval: z.coerce.number().int().positive().optional(),
	port: z.coerce.number().int().min(0).max(65535).default(5000),
	log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
	state_dir: z.string().min(1).default("/data"),
	weather_feed: z
		.object({
			url: z.string().default(""),
			area_keywords: z.array(z.string()).default([]),
			source_name: z.string().default("cap-feed"),
		})
		.default({}),
	/** A URL, or a URL with a display id and named CSS selectors for its status block. */
	eoc_urls: z
		.array(
			z.union([
				z.string().url(),
				z.object({
					url: z.string().url(),
					id: z.string().optional(),
					selectors: z.record(z.string()).optional(),
				}),
			]),
		)
		.default([]),
	routines: RoutinesSchema.default({}),
	voip: z
		.object({
			enabled: z.boolean().default(false),
			ha_notify_service: z.string().default("notify.voip_phone"),
			alert_calls: z
				.object({
					advisory: IdList,
					watch: IdList,
					warning: IdList,
					emergency: IdList,
				})
				.default({}),
		})
		.default({}),
	mqtt: z
		.object({
			enabled: z.boolean().default(true),
			broker: z.string().default("core-mosquitto"),
			port: z.coerce.number().int().min(1).max(65535).default(1883),
			username: z.string().default(""),
			password: z.string().default(""),
		})
		.default({}),
	notification_title: z.string().default(DEFAULTS.notificationTitle),
	sensor_entity_id: z.string().default(DEFAULTS.sensorEntityId),
	override_entity_prefix: z.string().default(DEFAULT_SWITCH_PREFIX),
	alert_rules: z.unknown().default(DEFAULT_LEVEL_TABLE_CONFIG),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = AppConfig["log_level"];

// ─── Environment ─────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string): string | undefined {
	const value = env[name];
	return value === undefined || value === "" ? undefined : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Environment variables win over the options file. */
export function applyEnvOverrides(options: Record<string, unknown>, env: Env): Record<string, unknown> {
	const merged: Record<string, unknown> = { ...options };
	const set = (key: string, envName: string) => {
		const value = getEnvVar(env, envName);
		if (value !== undefined) merged[key] = value;
	};

	set("supervisor_token", "SUPERVISOR_TOKEN");
	set("ha_url", "HA_URL");
	set("check_interval", "CHECK_INTERVAL");
	set("eoc_check_interval", "EOC_CHECK_INTERVAL");
	set("port", "PORT");
	set("log_level", "LOG_LEVEL");
	set("state_dir", "STATE_DIR");

	const mqtt: Record<string, unknown> = isRecord(options.mqtt) ? { ...options.mqtt } : {};
	const mqttEnv: Array<[string, string]> = [
		["broker", "MQTT_BROKER"],
		["port", "MQTT_PORT"],
		["username", "MQTT_USERNAME"],
		["password", "MQTT_PASSWORD"],
	];
	let mqttTouched = false;
	for (const [key, envName] of mqttEnv) {
		const value = getEnvVar(env, envName);
		if (value !== undefined) {
			mqtt[key] = value;
			mqttTouched = true;
		}
	}
	if (mqttTouched || isRecord(options.mqtt)) merged.mqtt = mqtt;

	return merged;
}

// ─── Options File ────────────────────────────────────────────────────────────

/** First options file that exists: `OPTIONS_PATH` (or /data/options.json), then ./options.json. */
export function resolveOptionsPath(env: Env): string | null {
	const candidates = [getEnvVar(env, "OPTIONS_PATH") ?? DEFAULT_OPTIONS_PATH, path.resolve(LOCAL_OPTIONS_PATH)];
	return candidates.find((p) => fs.existsSync(p)) ?? null;
}

export function readOptionsFile(filePath: string): Record<string, unknown> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (err) {
		throw new ConfigurationError(`cannot read options file ${filePath}: ${String(err)}`);
	}
	if (!isRecord(parsed)) {
		throw new ConfigurationError(`options file ${filePath} must contain a JSON object`);
	}
	return parsed;
}

export function parseAppConfig(raw: unknown): AppConfig {
	const result = AppConfigSchema.safeParse(raw);
	if (!result.success) {
		const details = result.error.issues
			.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
			.join("; ");
		throw new ConfigurationError(`invalid configuration: ${details}`);
	}
	return result.data;
}

/**
 * Load configuration: `.env`, then the options file, then environment
 * overrides, validated as a whole.
 */
export function loadConfig(opts?: { env?: Env; optionsPath?: string | null }): AppConfig & { optionsPath: string | null } {
	if (!opts?.env) dotenv.config();
	const env = opts?.env ?? process.env;

	const optionsPath = opts?.optionsPath === undefined ? resolveOptionsPath(env) : opts.optionsPath;
	const options = optionsPath ? readOptionsFile(optionsPath) : {};

	return { ...parseAppConfig(applyEnvOverrides(options, env)), optionsPath };
}
