/**
 * Logging for the engine, the CLI and the MCP server.
 *
 * Output goes to stderr at the level set by --verbose/--debug or
 * CONSILIUM_LOG_LEVEL. Once initFileLogging() has run, it also goes to
 * data/<user>/logs/:
 *     - info.log           : info level and above, all sessions
 *     - sessions/<id>.log  : one file per deliberation, every level
 *
 * Retention is applied at startup, per channel (consilium.config.json):
 *  - info.log   : "date" (max days) or "size" (newest max bytes)
 *  - sessions/  : "count" (N newest), "date" (max days), or "size" (newest up to max total bytes)
 *
 * Non-string arguments pass through redactForLog() before they are written,
 * so structured session data never reaches a log channel with free text intact.
 *
 * CRITICAL: MCP server uses stdio (stdout for JSON-RPC). All log output
 * MUST go to stderr via console.error() to avoid corrupting the protocol.
 */

import {
  appendFileSync, readFileSync, writeFileSync,
  mkdirSync, statSync, readdirSync, unlinkSync,
} from "node:fs";
import { join } from "node:path";
import { redactForLog, maskSensitive } from "./redaction.js";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };
const LEVEL_TAGS: Record<LogLevel, string> = { error: "ERR", warn: "WRN", info: "INF", debug: "DBG" };
const LEVEL_NAMES: readonly LogLevel[] = ["error", "warn", "info", "debug"];

// ── stderr level (interactive) ──────────────────────────────────────────

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVEL_NAMES.some((l) => l === value);
}

const envLevel = process.env.CONSILIUM_LOG_LEVEL;
let stderrLevel: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.warn;

export function setLogLevel(l: LogLevel): void {
  stderrLevel = LEVELS[l];
}

export function getLogLevel(): LogLevel {
  const found = LEVEL_NAMES.find((k) => LEVELS[k] === stderrLevel);
  return found ?? "warn";
}

// ── File logging config ─────────────────────────────────────────────────

export interface FileLoggingConfig {
  info?: {
    purge?: "date" | "size";
    maxDays?: number;
    maxBytes?: number;
  };
  sessions?: {
    purge?: "count" | "date" | "size";
    maxFiles?: number;
    maxDays?: number;
    maxBytes?: number;
  };
}

interface ResolvedConfig {
  logsDir: string;
  sessionsDir: string;
  infoLogPath: string;
  info: { purge: "date" | "size"; maxDays: number; maxBytes: number };
  sessions: { purge: "count" | "date" | "size"; maxFiles: number; maxDays: number; maxBytes: number };
}

let cfg: ResolvedConfig | null = null;

/**
 * Initialize file logging. Call once at startup.
 * @param userDataDir  Base data directory for the user (e.g. "data/default")
 * @param config       Logging config from consilium.config.json
 */
export function initFileLogging(userDataDir: string, config?: FileLoggingConfig): void {
  const logsDir = join(userDataDir, "logs");
  const sessionsDir = join(logsDir, "sessions");

  cfg = {
    logsDir,
    sessionsDir,
    infoLogPath: join(logsDir, "info.log"),
    info: {
      purge: config?.info?.purge ?? "date",
      maxDays: config?.info?.maxDays ?? 30,
      maxBytes: config?.info?.maxBytes ?? 50 * 1024 * 1024,
    },
    sessions: {
      purge: config?.sessions?.purge ?? "count",
      maxFiles: config?.sessions?.maxFiles ?? 50,
      maxDays: config?.sessions?.maxDays ?? 14,
      maxBytes: config?.sessions?.maxBytes ?? 100 * 1024 * 1024,
    },
  };

  mkdirSync(logsDir, { recursive: true });
  mkdirSync(sessionsDir, { recursive: true });

  pruneInfoLog();
  pruneSessionLogs();
}

/** Stop writing log files (stderr output is unaffected). */
export function disableFileLogging(): void {
  cfg = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

function fullTs(): string {
  return new Date().toISOString();
}

/** Truncate a string for display. */
export function truncate(s: string, maxLen = 500): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + `... (${s.length} chars total)`;
}

export function formatArgs(args: unknown[]): string {
  return args
    .map((a) => (typeof a === "string" ? a : JSON.stringify(redactForLog(a)) ?? String(a)))
    .join(" ");
}

// ── Core log function (stderr + info.log) ───────────────────────────────

const STDERR_MAX_LINE = 800;

function log(level: LogLevel, tag: string, args: unknown[]): void {
  const lvl = LEVELS[level];
  const levelTag = LEVEL_TAGS[level];
  const message = formatArgs(args);

  // stderr, truncated
  if (stderrLevel >= lvl) {
    const short = message.length > STDERR_MAX_LINE
      ? message.slice(0, STDERR_MAX_LINE) + `... (${message.length} chars, full in session log)`
      : message;
    console.error(ts(), levelTag, tag, short);
  }

  // info.log: info level and above
  if (cfg && lvl <= LEVELS.info) {
    const line = `${fullTs()} ${levelTag} ${tag} ${message}\n`;
    try { appendFileSync(cfg.infoLogPath, line); } catch { /* best effort */ }
  }
}

// ── Per-session log ─────────────────────────────────────────────────────

export interface SessionLog {
  /** Write a line to the session log file (with timestamp). Strings are pattern-masked. */
  write: (level: LogLevel, message: string) => void;
  /** Write a labelled, redacted JSON payload. */
  event: (level: LogLevel, label: string, payload: unknown) => void;
  /** Absolute path to this session's log file. */
  readonly path: string;
}

/** Session ids name log files, so they are restricted to a path-safe alphabet. */
const SAFE_SESSION_ID = /^[a-zA-Z0-9_-]+$/;

export function isValidSessionId(sessionId: string): boolean {
  return SAFE_SESSION_ID.test(sessionId) && sessionId.length <= 128;
}

/**
 * Create a per-session log file: data/<user>/logs/sessions/<sessionId>.log
 * Returns null when file logging is off or the id is not path-safe.
 */
export function createSessionLog(sessionId: string): SessionLog | null {
  if (!cfg) return null;
  if (!isValidSessionId(sessionId)) {
    log("warn", "[logger]", [`Invalid sessionId for log file (rejected): ${sessionId}`]);
    return null;
  }

  const path = join(cfg.sessionsDir, `${sessionId}.log`);

  const append = (level: LogLevel, message: string): void => {
    const line = `${fullTs()} ${LEVEL_TAGS[level]} ${message}\n`;
    try { appendFileSync(path, line); } catch { /* best effort */ }
  };

  return {
    write(level: LogLevel, message: string): void {
      append(level, maskSensitive(message));
    },
    event(level: LogLevel, label: string, payload: unknown): void {
      append(level, `${label} ${JSON.stringify(redactForLog(payload))}`);
    },
    path,
  };
}

// ── Retention ───────────────────────────────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000;

/** Drop info.log lines older than maxDays, or keep only its newest maxBytes. */
function pruneInfoLog(): void {
  if (!cfg) return;
  const { infoLogPath, info } = cfg;
  let content: string;
  try {
    content = readFileSync(infoLogPath, "utf-8");
  } catch {
    return; // nothing logged yet
  }

  let kept: string;
  if (info.purge === "date") {
    const cutoff = new Date(Date.now() - info.maxDays * DAY_MS).toISOString();
    kept = content.split("\n").filter((line) => !line.trim() || line.slice(0, 24) >= cutoff).join("\n");
  } else {
    if (Buffer.byteLength(content) <= info.maxBytes) return;
    const tail = content.slice(-info.maxBytes);
    // Resume at a line boundary
    kept = tail.slice(tail.indexOf("\n") + 1);
  }
  if (kept !== content) writeFileSync(infoLogPath, kept);
}

interface SessionLogFile {
  path: string;
  size: number;
  mtimeMs: number;
}

/** Session log files, newest first. */
function sessionLogFiles(dir: string): SessionLogFile[] {
  try {
    return readdirSync(dir)
      .filter((name) => name.endsWith(".log"))
      .map((name) => {
        const path = join(dir, name);
        const { size, mtimeMs } = statSync(path);
        return { path, size, mtimeMs };
      })
      .sort((a, b) => b.mtimeMs - a.mtimeMs);
  } catch {
    return [];
  }
}

/** Delete the session logs that fall outside the configured retention. */
function pruneSessionLogs(): void {
  if (!cfg) return;
  const { sessions } = cfg;
  const cutoff = Date.now() - sessions.maxDays * DAY_MS;
  let runningBytes = 0;

  sessionLogFiles(cfg.sessionsDir).forEach((file, rank) => {
    runningBytes += file.size;
    const expired =
      sessions.purge === "count" ? rank >= sessions.maxFiles :
      sessions.purge === "date" ? file.mtimeMs < cutoff :
      runningBytes > sessions.maxBytes;
    if (!expired) return;
    try {
      unlinkSync(file.path);
    } catch (err) {
      log("warn", "[logger]", ["could not remove", file.path, err instanceof Error ? err.message : String(err)]);
    }
  });
}

// ── Logger factory ──────────────────────────────────────────────────────

export function createLogger(namespace: string) {
  const tag = `[${namespace}]`;
  return {
    error: (...args: unknown[]) => log("error", tag, args),
    warn:  (...args: unknown[]) => log("warn", tag, args),
    info:  (...args: unknown[]) => log("info", tag, args),
    debug: (...args: unknown[]) => log("debug", tag, args),
  };
}
