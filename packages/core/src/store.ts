import fs from "node:fs";
import path from "node:path";
import { DEFAULTS, LOG_FILENAME, STORE_DIR_NAME, type StoredTransition } from "./types.js";

function resolveDir(stateDir: string): string {
  return path.join(stateDir, STORE_DIR_NAME);
}

function resolveLogPath(stateDir: string): string {
  return path.join(resolveDir(stateDir), LOG_FILENAME);
}

function ensureDir(stateDir: string): void {
  const dir = resolveDir(stateDir);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function hasLevel(value: unknown): boolean {
  return typeof value === "object" && value !== null && "level" in value && typeof value.level === "string";
}

function isStoredTransition(value: unknown): value is StoredTransition {
  return typeof value === "object" && value !== null
    && "type" in value && value.type === "transition"
    && "ts" in value && typeof value.ts === "number"
    && "current" in value && hasLevel(value.current)
    && "previous" in value && hasLevel(value.previous);
}

/** Append a transition to the JSONL log. */
export function appendTransition(stateDir: string, entry: StoredTransition): void {
  ensureDir(stateDir);
  fs.appendFileSync(resolveLogPath(stateDir), JSON.stringify(entry) + "\n", "utf-8");
}

/** Read the most recent N transitions, oldest first. Skips malformed lines. */
export function readRecentTransitions(stateDir: string, limit: number): StoredTransition[] {
  const logPath = resolveLogPath(stateDir);
  if (!fs.existsSync(logPath)) return [];

  const lines = fs.readFileSync(logPath, "utf-8").trim().split("\n").filter(Boolean);
  const entries: StoredTransition[] = [];

  for (const line of lines.slice(-limit)) {
    try {
      const parsed: unknown = JSON.parse(line);
      if (isStoredTransition(parsed)) entries.push(parsed);
    } catch {
      // torn write from a crash; the rest of the log is still usable
    }
  }

  return entries;
}

/** Last persisted transition, if any (for warm start). */
export function readLastTransition(stateDir: string): StoredTransition | null {
  const recent = readRecentTransitions(stateDir, 1);
  return recent[recent.length - 1] ?? null;
}

/** Prune the log by age, then by size. Atomic rewrite via .tmp + rename. */
export function pruneLog(
  stateDir: string,
  opts?: { maxAgeMs?: number; maxSizeKb?: number; now?: number },
): void {
  const logPath = resolveLogPath(stateDir);
  if (!fs.existsSync(logPath)) return;

  const maxAgeMs = opts?.maxAgeMs ?? DEFAULTS.maxLogAgeDays * 24 * 60 * 60 * 1000;
  const maxSizeBytes = (opts?.maxSizeKb ?? DEFAULTS.maxLogSizeKb) * 1024;
  const cutoff = (opts?.now ?? Date.now()) - maxAgeMs;

  const content = fs.readFileSync(logPath, "utf-8");
  const original = content.trim().split("\n").filter(Boolean);

  let lines = original.filter((line) => {
    try {
      const parsed: unknown = JSON.parse(line);
      return isStoredTransition(parsed) && parsed.ts >= cutoff;
    } catch {
      return false; // malformed lines are dropped during prune
    }
  });

  // Newest entries win when the log is still too large
  while (lines.length > 0 && Buffer.byteLength(lines.join("\n") + "\n", "utf-8") > maxSizeBytes) {
    lines = lines.slice(Math.max(1, Math.floor(lines.length * 0.25)));
  }

  if (lines.length === original.length) return;
  writeAtomic(logPath, lines.length > 0 ? lines.join("\n") + "\n" : "");
}

function writeAtomic(filePath: string, content: string): void {
  const tmpPath = filePath + ".tmp";
  fs.writeFileSync(tmpPath, content, "utf-8");
  fs.renameSync(tmpPath, filePath);
}
