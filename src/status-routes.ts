import type { IncomingMessage, ServerResponse } from "node:http";
import {
	formatStatusSpeech,
	formatTransitionLine,
	serializeLevelTable,
	type AlertLogger,
	type EocSnapshot,
	type LevelTableIssue,
	type LocalAlertEngine,
	type LocalAlertState,
	type RoutineConfig,
	type VoiceCallPort,
	type WeatherSnapshot,
} from "@local-alert/core";
import { z, ZodError } from "zod";
import { RoutinesSchema } from "./config.js";
import { GOODBYE_TWIML, statusAgi, statusTwiml } from "./voip-responses.js";

export type HttpHandler = (req: IncomingMessage, res: ServerResponse) => Promise<boolean> | boolean;

export class HttpError extends Error {
	constructor(
		readonly status: number,
		message: string,
	) {
		super(message);
		this.name = "HttpError";
	}
}

const MAX_BODY_BYTES = 1_000_000;

const ConfigUpdateSchema = z
	.object({
		alert_rules: z.record(z.unknown()).optional(),
		routines: RoutinesSchema.partial().optional(),
	})
	.refine((u) => u.alert_rules !== undefined || u.routines !== undefined, {
		message: "expected alert_rules or routines",
	});

const TestCallSchema = z.object({
	destination: z.string().min(1),
	level: z.enum(["advisory", "watch", "warning", "emergency"]).default("advisory"),
	reason: z.string().default("This is a test call"),
});

// ─── Serialization ───────────────────────────────────────────────────────────

function iso(ts: number | null): string | null {
	return ts === null ? null : new Date(ts).toISOString();
}

export function serializeState(state: LocalAlertState): Record<string, unknown> {
	return {
		active: state.active,
		level: state.level,
		reason: state.reason,
		triggered_by: [...state.triggeredBy],
		timestamp: iso(state.timestamp),
	};
}

export function serializeWeather(snapshot: WeatherSnapshot): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [id, alert] of snapshot) {
		out[id] = {
			event: alert.event,
			severity: alert.severity,
			headline: alert.headline,
			areas: alert.areas,
			onset: iso(alert.onset),
			expires: iso(alert.expires),
			source: alert.source,
		};
	}
	return out;
}

export function serializeEoc(snapshot: EocSnapshot): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [site, status] of snapshot) {
		out[site] = {
			state: status.state,
			activated: status.activated,
			last_check: iso(status.lastCheck),
			description: status.description,
		};
	}
	return out;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function sendJson(res: ServerResponse, status: number, body: unknown): void {
	res.writeHead(status, { "Content-Type": "application/json", "Cache-Control": "no-cache" });
	res.end(JSON.stringify(body));
}

function sendText(res: ServerResponse, status: number, contentType: string, body: string): void {
	res.writeHead(status, { "Content-Type": contentType, "Cache-Control": "no-cache" });
	res.end(body);
}

async function readBody(req: IncomingMessage): Promise<string> {
	const chunks: Buffer[] = [];
	let size = 0;
	for await (const chunk of req) {
		const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buf.length;
		if (size > MAX_BODY_BYTES) throw new HttpError(413, "request body too large");
		chunks.push(buf);
	}
	return Buffer.concat(chunks).toString("utf-8");
}

async function readJson(req: IncomingMessage): Promise<unknown> {
	const text = await readBody(req);
	if (text.trim() === "") throw new HttpError(400, "No data provided");
	try {
		return JSON.parse(text);
	} catch {
		throw new HttpError(400, "request body is not valid JSON");
	}
}

export function sendError(res: ServerResponse, err: unknown): void {
	if (err instanceof ZodError) {
		sendJson(res, 400, { error: "validation_error", details: err.errors });
		return;
	}
	if (err instanceof HttpError) {
		sendJson(res, err.status, { error: err.message });
		return;
	}
	sendJson(res, 500, { error: err instanceof Error ? err.message : "Internal server error" });
}

// ─── Handler ─────────────────────────────────────────────────────────────────

export type StatusRouteDeps = {
	engine: LocalAlertEngine;
	voice?: VoiceCallPort;
	routines?: RoutineConfig;
	/** Called with the merged routines after `POST /api/config` changed them. */
	onRoutinesChange?: (routines: RoutineConfig) => void;
	logger?: AlertLogger;
	now?: () => number;
};

/**
 * JSON status API and inbound voice endpoints. Resolves false for paths it
 * does not own so the caller can answer 404.
 */
export function createStatusHandler(deps: StatusRouteDeps): HttpHandler {
	const { engine } = deps;
	const logger = deps.logger ?? console;
	const now = deps.now ?? Date.now;
	let routines: RoutineConfig = deps.routines ?? {};

	return async (req, res) => {
		const url = new URL(req.url ?? "/", "http://localhost");
		const method = req.method ?? "GET";
		const route = `${method} ${url.pathname.replace(/\/+$/, "") || "/"}`;

		try {
			switch (route) {
				case "GET /health":
					sendJson(res, 200, { status: "healthy", timestamp: iso(now()) });
					return true;

				case "GET /api/status":
					sendJson(res, 200, {
						weather_alerts: serializeWeather(engine.getWeatherSnapshot()),
						eoc_states: serializeEoc(engine.getEocSnapshot()),
						local_alert_state: serializeState(engine.getCurrentState()),
						pollers: engine.getPollerStats(),
						last_update: iso(engine.getCurrentState().timestamp),
					});
					return true;

				case "GET /api/weather": {
					const weather = engine.getWeatherSnapshot();
					sendJson(res, 200, { alerts: serializeWeather(weather), count: weather.size });
					return true;
				}

				case "GET /api/eoc": {
					const eoc = engine.getEocSnapshot();
					const activated = [...eoc.values()].filter((s) => s.activated).length;
					sendJson(res, 200, { states: serializeEoc(eoc), activated_count: activated });
					return true;
				}

				case "GET /api/local_alert":
					sendJson(res, 200, serializeState(engine.getCurrentState()));
					return true;

				case "GET /api/transitions": {
					const limit = z.coerce.number().int().min(1).max(1000).default(50).parse(url.searchParams.get("limit") ?? undefined);
					const transitions = engine.getRecentTransitions(limit);
					sendJson(res, 200, {
						transitions: transitions.map((t) => ({
							ts: iso(t.ts),
							previous: serializeState(t.previous),
							current: serializeState(t.current),
						})),
						lines: transitions.map(formatTransitionLine),
					});
					return true;
				}

				case "GET /api/config":
					sendJson(res, 200, {
						alert_rules: serializeLevelTable(engine.getLevelTable()),
						routines,
					});
					return true;

				case "POST /api/config": {
					const update = ConfigUpdateSchema.parse(await readJson(req));
					if (update.routines) {
						routines = { ...routines, ...update.routines };
						engine.configureEffects({ routines });
						deps.onRoutinesChange?.(routines);
						logger.info("local-alert: routines updated over HTTP");
					}
					let issues: LevelTableIssue[] = [];
					if (update.alert_rules) {
						issues = engine.reloadLevelTable(update.alert_rules);
						await engine.reevaluate();
						logger.info(`local-alert: level table reloaded over HTTP (${issues.length} issue(s))`);
					}
					sendJson(res, 200, { success: true, message: "Configuration reloaded", issues });
					return true;
				}

				case "GET /voip/status":
				case "POST /voip/status": {
					const state = engine.getCurrentState();
					sendJson(res, 200, {
						active: state.active,
						level: state.level,
						reason: state.reason,
						message: formatStatusSpeech(state),
					});
					return true;
				}

				case "GET /voip/twiml":
				case "POST /voip/twiml":
					sendText(res, 200, "text/xml", statusTwiml(engine.getCurrentState()));
					return true;

				case "POST /voip/menu": {
					const digit = new URLSearchParams(await readBody(req)).get("Digits") ?? "";
					sendText(res, 200, "text/xml", digit === "1" ? statusTwiml(engine.getCurrentState()) : GOODBYE_TWIML);
					return true;
				}

				case "GET /voip/agi":
					sendText(res, 200, "text/plain", statusAgi(engine.getCurrentState()));
					return true;

				case "POST /api/voip/test-call": {
					const voice = deps.voice;
					if (!voice) throw new HttpError(503, "voice calls are not enabled");
					const call = TestCallSchema.parse(await readJson(req));
					const placed = await voice.placeAlertCall(call.destination, call.level, call.reason);
					sendJson(res, placed ? 200 : 502, { success: placed });
					return true;
				}

				default:
					return false;
			}
		} catch (err) {
			if (!(err instanceof ZodError) && !(err instanceof HttpError)) {
				logger.error(`local-alert: ${route} failed: ${String(err)}`);
			}
			sendError(res, err);
			return true;
		}
	};
}
