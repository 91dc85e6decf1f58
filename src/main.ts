#!/usr/bin/env node
import { loadConfig, startService } from "./index.js";
import { createConsoleLogger } from "./logger.js";

async function main(): Promise<void> {
	const config = loadConfig();
	const logger = createConsoleLogger(config.log_level);
	logger.info(`local-alert: starting (options ${config.optionsPath ?? "not found, using defaults"})`);

	const service = await startService(config, { logger });

	let stopping = false;
	const shutdown = (signal: string) => {
		if (stopping) return;
		stopping = true;
		logger.info(`local-alert: ${signal} received, shutting down`);
		service
			.stop()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error(`local-alert: shutdown failed: ${String(err)}`);
				process.exit(1);
			});
	};

	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
	console.error(`local-alert: fatal: ${err instanceof Error ? err.message : String(err)}`);
	process.exit(1);
});
