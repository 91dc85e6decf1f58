import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import {
	ALL_CLEAR_SPEECH,
	DEFAULT_LEVEL_TABLE,
	DEFAULT_LEVEL_TABLE_CONFIG,
	LocalAlertEngine,
	serializeLevelTable,
	type ActiveAlertLevel,
	type RoutineConfig,
	type VoiceCallPort,
	type WeatherAlert,
} from "@local-alert/core";
import { createStatusHandler } from "../status-routes.js";
import { GOODBYE_TWIML } from "../voip-responses.js";
import { recordingLogger, serve } from "./helpers.js";

const T0 = Date.UTC(2026, 0, 15, 3, 0, 0);
const T0_ISO = "2026-01-15T03:00:00.000Z";

const storm: WeatherAlert = {
	event: "Severe Thunderstorm Warning",
	severity: "severe",
	headline: "Severe thunderstorms for Coastal Plains",
	areas: "Coastal Plains",
	onset: T0,
	expires: null,
	source: "test-feed",
};

function fakeVoice(): VoiceCallPort & { placed: Array<[string, ActiveAlertLevel, string]> } {
	const placed: Array<[string, ActiveAlertLevel, string]> = [];
	return {
		name: "test-voice",
		placed,
		placeAlertCall: async (destination, level, reason) => {
			placed.push([destination, level, reason]);
			return true;
		},
	};
}

let engine: LocalAlertEngine;
let voice: ReturnType<typeof fakeVoice>;
let logger: ReturnType<typeof recordingLogger>;
let base: string;
let close: () => Promise<void>;

beforeEach(async () => {
	logger = recordingLogger();
	engine = new LocalAlertEngine({ levelTable: DEFAULT_LEVEL_TABLE_CONFIG, logger, now: () => T0 });
	voice = fakeVoice();
	const server = await serve(
		createStatusHandler({ engine, voice, routines: { alert_cleared: ["scene.all_clear"] }, logger, now: () => T0 }),
	);
	base = server.base;
	close = server.close;
});

afterEach(async () => {
	await close();
	await engine.stop();
});

async function get(path: string): Promise<{ status: number; body: unknown }> {
	const res = await fetch(`${base}${path}`);
	return { status: res.status, body: await res.json() };
}

async function post(path: string, body: string): Promise<{ status: number; body: unknown }> {
	const res = await fetch(`${base}${path}`, { method: "POST", headers: { "Content-Type": "application/json" }, body });
	return { status: res.status, body: await res.json() };
}

describe("status API", () => {
	it("reports health", async () => {
		await expect(get("/health")).resolves.toEqual({ status: 200, body: { status: "healthy", timestamp: T0_ISO } });
	});

	it("reports the local alert state", async () => {
		await engine.submitWeatherSnapshot(new Map([["urn:test:1", storm]]));

		await expect(get("/api/local_alert")).resolves.toEqual({
			status: 200,
			body: {
				active: true,
				level: "warning",
				reason: "Weather: Severe Thunderstorm Warning",
				triggered_by: ["Weather: Severe Thunderstorm Warning"],
				timestamp: T0_ISO,
			},
		});
	});

	it("lists weather alerts and EOC states", async () => {
		await engine.submitWeatherSnapshot(new Map([["urn:test:1", storm]]));
		await engine.submitEocSnapshot(
			new Map([
				["https://eoc.example/status", { state: "lean_forward", activated: true, lastCheck: T0, description: "Lean Forward" }],
				["https://regional.example/eoc", { state: "inactive", activated: false, lastCheck: T0, description: "" }],
			]),
		);

		await expect(get("/api/weather")).resolves.toEqual({
			status: 200,
			body: {
				alerts: {
					"urn:test:1": {
						event: "Severe Thunderstorm Warning",
						severity: "severe",
						headline: "Severe thunderstorms for Coastal Plains",
						areas: "Coastal Plains",
						onset: T0_ISO,
						expires: null,
						source: "test-feed",
					},
				},
				count: 1,
			},
		});

		const eoc = await get("/api/eoc");
		expect(eoc.body).toMatchObject({
			activated_count: 1,
			states: {
				"https://eoc.example/status": { state: "lean_forward", activated: true, last_check: T0_ISO, description: "Lean Forward" },
			},
		});

		const status = await get("/api/status");
		expect(status.body).toMatchObject({ local_alert_state: { level: "warning" }, pollers: [], last_update: T0_ISO });
	});

	it("returns an empty history without a state directory", async () => {
		await expect(get("/api/transitions")).resolves.toEqual({ status: 200, body: { transitions: [], lines: [] } });
	});

	it("rejects an out-of-range history limit", async () => {
		const res = await get("/api/transitions?limit=0");
		expect(res.status).toBe(400);
		expect(res.body).toMatchObject({ error: "validation_error" });
	});

	it("answers 404 for unknown paths", async () => {
		await expect(get("/api/nothing")).resolves.toEqual({ status: 404, body: { error: "not_found" } });
	});
});

describe("config API", () => {
	it("returns the active level table and routines", async () => {
		await expect(get("/api/config")).resolves.toEqual({
			status: 200,
			body: { alert_rules: serializeLevelTable(DEFAULT_LEVEL_TABLE), routines: { alert_cleared: ["scene.all_clear"] } },
		});
	});

	it("reloads the level table and re-evaluates", async () => {
		await engine.submitWeatherSnapshot(new Map([["urn:test:1", storm]]));

		const res = await post(
			"/api/config",
			JSON.stringify({
				alert_rules: {
					...DEFAULT_LEVEL_TABLE_CONFIG,
					warning: { weather_conditions: { operator: "or", rules: [{ type: "flood", severity: "any" }] } },
				},
			}),
		);

		expect(res).toEqual({ status: 200, body: { success: true, message: "Configuration reloaded", issues: [] } });
		expect(engine.getCurrentState().level).toBe("none");
		expect(logger.lines).toContainEqual(["info", "local-alert: level table reloaded over HTTP (0 issue(s))"]);
	});

	it("rejects an empty or malformed body", async () => {
		await expect(post("/api/config", "")).resolves.toEqual({ status: 400, body: { error: "No data provided" } });
		await expect(post("/api/config", "{")).resolves.toEqual({ status: 400, body: { error: "request body is not valid JSON" } });

		const invalid = await post("/api/config", JSON.stringify({ alert_rules: [] }));
		expect(invalid.status).toBe(400);
		expect(invalid.body).toMatchObject({ error: "validation_error" });
	});

	it("rejects an update that names neither rules nor routines", async () => {
		const res = await post("/api/config", JSON.stringify({ port: 8080 }));
		expect(res.status).toBe(400);
		expect(res.body).toMatchObject({ error: "validation_error", details: [{ message: "expected alert_rules or routines" }] });
	});

	it("applies new routines to the next transition", async () => {
		const routinesRun: string[] = [];
		const changes: RoutineConfig[] = [];
		const wired = new LocalAlertEngine({
			levelTable: DEFAULT_LEVEL_TABLE_CONFIG,
			automation: {
				sendNotification: async () => undefined,
				triggerRoutine: async (identifier) => { routinesRun.push(identifier); },
				setSensorState: async () => undefined,
			},
			effects: { routines: { alert_cleared: ["scene.all_clear"] } },
			logger,
			now: () => T0,
		});
		const server = await serve(
			createStatusHandler({
				engine: wired,
				routines: { alert_cleared: ["scene.all_clear"] },
				onRoutinesChange: (r) => changes.push(r),
				logger,
			}),
		);
		try {
			const res = await fetch(`${server.base}/api/config`, {
				method: "POST",
				body: JSON.stringify({ routines: { warning_alert: ["scene.storm_mode"] } }),
			});
			await expect(res.json()).resolves.toEqual({ success: true, message: "Configuration reloaded", issues: [] });

			const merged = { alert_cleared: ["scene.all_clear"], warning_alert: ["scene.storm_mode"] };
			expect(changes).toEqual([merged]);
			const config = await fetch(`${server.base}/api/config`).then((r) => r.json());
			expect(config).toMatchObject({ routines: merged });

			await wired.submitWeatherSnapshot(new Map([["urn:test:1", storm]]));
			await wired.flushEffects();
			expect(routinesRun).toEqual(["scene.storm_mode"]);
			expect(logger.lines).toContainEqual(["info", "local-alert: routines updated over HTTP"]);
		} finally {
			await server.close();
			await wired.stop();
		}
	});
});

describe("voice endpoints", () => {
	it("reports the status for inbound calls", async () => {
		await expect(get("/voip/status")).resolves.toEqual({
			status: 200,
			body: { active: false, level: "none", reason: "", message: ALL_CLEAR_SPEECH },
		});
	});

	it("serves TwiML and AGI as text", async () => {
		const twiml = await fetch(`${base}/voip/twiml`);
		expect(twiml.headers.get("content-type")).toBe("text/xml");
		expect((await twiml.text()).split("\n")[2]).toBe(`    <Say voice="alice">${ALL_CLEAR_SPEECH}</Say>`);

		const agi = await fetch(`${base}/voip/agi`);
		expect((await agi.text()).split("\n")[3]).toBe(`EXEC SayText("${ALL_CLEAR_SPEECH}")`);
	});

	it("repeats on 1 and says goodbye otherwise", async () => {
		const form = (digits: string) =>
			fetch(`${base}/voip/menu`, {
				method: "POST",
				headers: { "Content-Type": "application/x-www-form-urlencoded" },
				body: `Digits=${digits}`,
			}).then((r) => r.text());

		expect((await form("1")).split("\n")[2]).toBe(`    <Say voice="alice">${ALL_CLEAR_SPEECH}</Say>`);
		expect(await form("2")).toBe(GOODBYE_TWIML);
	});

	it("places a test call with defaults", async () => {
		await expect(post("/api/voip/test-call", JSON.stringify({ destination: "101" }))).resolves.toEqual({
			status: 200,
			body: { success: true },
		});
		expect(voice.placed).toEqual([["101", "advisory", "This is a test call"]]);
	});

	it("rejects a test call for an unknown level", async () => {
		const res = await post("/api/voip/test-call", JSON.stringify({ destination: "101", level: "none" }));
		expect(res.status).toBe(400);
		expect(res.body).toMatchObject({ error: "validation_error", details: [{ path: ["level"] }] });
		expect(voice.placed).toEqual([]);
	});
});

describe("voice endpoints without a transport", () => {
	it("answers 503 for a test call", async () => {
		const bare = await serve(createStatusHandler({ engine, logger }));
		try {
			const res = await fetch(`${bare.base}/api/voip/test-call`, { method: "POST", body: JSON.stringify({ destination: "101" }) });
			expect(res.status).toBe(503);
			await expect(res.json()).resolves.toEqual({ error: "voice calls are not enabled" });
		} finally {
			await bare.close();
		}
	});
});
