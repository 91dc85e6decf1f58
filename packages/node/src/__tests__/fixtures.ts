import type { AlertLogger } from "@local-alert/core";

export type FetchCall = { url: string; method: string; headers: Record<string, string>; body: unknown };

/** A fetch that records requests and answers from `handler`. */
export function stubFetch(handler: (url: string) => Response | Promise<Response>): { impl: typeof fetch; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const impl: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({
      url,
      method: init?.method ?? "GET",
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return handler(url);
  };
  return { impl, calls };
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

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
