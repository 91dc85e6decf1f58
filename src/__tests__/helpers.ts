import http from "node:http";
import type { AlertLogger } from "@local-alert/core";
import type { HttpHandler } from "../status-routes.js";

export type RecordingLogger = Required<AlertLogger> & { lines: Array<[keyof AlertLogger, string]> };

export function recordingLogger(): RecordingLogger {
	const lines: Array<[keyof AlertLogger, string]> = [];
	return {
		lines,
		info: (msg) => { lines.push(["info", msg]); },
		warn: (msg) => { lines.push(["warn", msg]); },
		error: (msg) => { lines.push(["error", msg]); },
		debug: (msg) => { lines.push(["debug", msg]); },
	};
}

export function baseUrl(server: http.Server): string {
	const address = server.address();
	if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
	return `http://127.0.0.1:${address.port}`;
}

/** Serve a handler on a loopback port, answering 404 for paths it leaves. */
export async function serve(handler: HttpHandler): Promise<{ base: string; close: () => Promise<void> }> {
	const server = http.createServer((req, res) => {
		Promise.resolve(handler(req, res))
			.then((handled) => {
				if (!handled) {
					res.writeHead(404, { "Content-Type": "application/json" });
					res.end(JSON.stringify({ error: "not_found" }));
				}
			})
			.catch(() => {
				res.writeHead(500);
				res.end();
			});
	});
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	return {
		base: baseUrl(server),
		close: () =>
			new Promise<void>((resolve) => {
				server.closeAllConnections();
				server.close(() => resolve());
			}),
	};
}
