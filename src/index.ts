import http from "node:http";
import path from "node:path";
import {
	LocalAlertEngine,
	SourceEffects,
	type AlertLogger,
	type EocSnapshot,
	type OverrideSource,
	type PollerSchedule,
	type VoiceCallPort,
	type WeatherSnapshot,
} from "@local-alert/core";
import {
	CapFeedWeatherSource,
	EocStatusPageSource,
	HomeAssistantClient,
	MqttSwitchRegistry,
	NotifyServiceVoiceCaller,
	RestSwitchRegistry,
	type BrokerConnectOptions,
	type EntityStateReader,
	type SwitchBrokerClient,
} from "@local-alert/node";
import type { AppConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { createStatusHandler } from "./status-routes.js";

export { loadConfig, type AppConfig } from "./config.js";
export { createConsoleLogger } from "./logger.js";
export { createStatusHandler } from "./status-routes.js";

const LOG_PREFIX = "local-alert";

// ─── Override Source ─────────────────────────────────────────────────────────

export type OverrideSelection = {
	source: OverrideSource;
	/** Set when the MQTT registry won; the caller re-evaluates on its `change`. */
	registry: MqttSwitchRegistry | null;
};

/**
 * Pick the override source once at startup: MQTT discovery switches when a
 * broker is configured and reachable, Home Assistant helpers otherwise.
 */
export async function createOverrideSource(
	config: AppConfig,
	ha: EntityStateReader,
	logger: AlertLogger,
	clientFactory?: (opts: BrokerConnectOptions) => SwitchBrokerClient,
): Promise<OverrideSelection> {
	if (config.mqtt.enabled && config.mqtt.broker) {
		const registry = new MqttSwitchRegistry({
			broker: config.mqtt.broker,
			port: config.mqtt.port,
			username: config.mqtt.username,
			password: config.mqtt.password,
			clientFactory,
			logger,
			logPrefix: LOG_PREFIX,
		});
		if (await registry.connect()) {
			logger.info(`${LOG_PREFIX}: manual overrides via MQTT switches`);
			return { source: registry, registry };
		}
		registry.disconnect();
		logger.warn(`${LOG_PREFIX}: MQTT unavailable, falling back to Home Assistant helpers for overrides`);
	}

	return {
		source: new RestSwitchRegistry(ha, { entityPrefix: config.override_entity_prefix }),
		registry: null,
	};
}

// ─── Service ─────────────────────────────────────────────────────────────────

export type LocalAlertService = {
	engine: LocalAlertEngine;
	sourceEffects: SourceEffects;
	server: http.Server;
	stop: () => Promise<void>;
};

export type ServiceDeps = {
	logger?: AlertLogger;
	fetch?: typeof fetch;
	mqttClientFactory?: (opts: BrokerConnectOptions) => SwitchBrokerClient;
};

/** Wire collaborators, start the engine and the HTTP status surface. */
export async function startService(config: AppConfig, deps: ServiceDeps = {}): Promise<LocalAlertService> {
	const logger = deps.logger ?? createConsoleLogger(config.log_level);

	const ha = new HomeAssistantClient({
		token: config.supervisor_token,
		baseUrl: config.ha_url,
		fetch: deps.fetch,
		logger,
		logPrefix: LOG_PREFIX,
	});

	const overrides = await createOverrideSource(config, ha, logger, deps.mqttClientFactory);

	let voice: VoiceCallPort | undefined;
	if (config.voip.enabled) {
		const caller = new NotifyServiceVoiceCaller(ha, config.voip.ha_notify_service);
		logger.info(`${LOG_PREFIX}: voice calls via ${caller.serviceName}`);
		voice = caller;
	}

	let weatherPoller: PollerSchedule<WeatherSnapshot> | undefined;
	if (config.weather_feed.url) {
		weatherPoller = {
			source: new CapFeedWeatherSource({
				url: config.weather_feed.url,
				areaKeywords: config.weather_feed.area_keywords,
				sourceName: config.weather_feed.source_name,
				fetch: deps.fetch,
				logger,
				logPrefix: LOG_PREFIX,
			}),
			intervalMs: config.check_interval * 1000,
		};
	} else {
		logger.warn(`${LOG_PREFIX}: no weather feed configured, weather monitoring disabled`);
	}

	let eocPoller: PollerSchedule<EocSnapshot> | undefined;
	if (config.eoc_urls.length > 0) {
		eocPoller = {
			source: new EocStatusPageSource({ sites: config.eoc_urls, fetch: deps.fetch, logger, logPrefix: LOG_PREFIX }),
			intervalMs: (config.eoc_check_interval ?? config.check_interval) * 1000,
		};
	} else {
		logger.warn(`${LOG_PREFIX}: no EOC URLs configured, LDMG monitoring disabled`);
	}

	const engine = new LocalAlertEngine({
		levelTable: config.alert_rules,
		overrides: overrides.source,
		automation: ha,
		voice,
		effects: {
			routines: config.routines,
			voiceCalls: config.voip.alert_calls,
			sensorEntityId: config.sensor_entity_id,
			notificationTitle: config.notification_title,
		},
		stateDir: path.resolve(config.state_dir),
		weatherPoller,
		eocPoller,
		logger,
		logPrefix: LOG_PREFIX,
	});

	const sourceEffects = new SourceEffects({
		automation: ha,
		config: { routines: config.routines },
		logger,
		logPrefix: LOG_PREFIX,
	});
	sourceEffects.attach((listener) => engine.onSnapshot(listener));

	overrides.registry?.on("change", () => {
		engine.reevaluate().catch((err: unknown) => {
			logger.error(`${LOG_PREFIX}: re-evaluation after override change failed: ${String(err)}`);
		});
	});

	engine.start();

	const handler = createStatusHandler({
		engine,
		voice,
		routines: config.routines,
		onRoutinesChange: (routines) => sourceEffects.configure({ routines }),
		logger,
	});
	const server = http.createServer((req, res) => {
		Promise.resolve(handler(req, res))
			.then((handled) => {
				if (!handled) {
					res.writeHead(404, { "Content-Type": "application/json" });
					res.end(JSON.stringify({ error: "not_found" }));
				}
			})
			.catch((err: unknown) => {
				logger.error(`${LOG_PREFIX}: request failed: ${String(err)}`);
				if (!res.headersSent) res.writeHead(500);
				res.end();
			});
	});

	await new Promise<void>((resolve, reject) => {
		server.once("error", reject);
		server.listen(config.port, () => {
			server.off("error", reject);
			resolve();
		});
	});
	logger.info(`${LOG_PREFIX}: status server listening on port ${config.port}`);

	return {
		engine,
		sourceEffects,
		server,
		stop: async () => {
			await new Promise<void>((resolve) => server.close(() => resolve()));
			overrides.registry?.disconnect();
			await engine.stop();
			await sourceEffects.flush();
		},
	};
}
