import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, readFileSync, readdirSync, rmSync, existsSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  setLogLevel,
  getLogLevel,
  isLogLevel,
  truncate,
  formatArgs,
  initFileLogging,
  disableFileLogging,
  createSessionLog,
  isValidSessionId,
} from "../logger.js";
import { setSensitivePatterns } from "../redaction.js";

describe("setLogLevel / getLogLevel", () => {
  afterEach(() => setLogLevel("warn")); // reset

  it("defaults to warn", () => {
    setLogLevel("warn");
    expect(getLogLevel()).toBe("warn");
  });

  it("can set to debug", () => {
    setLogLevel("debug");
    expect(getLogLevel()).toBe("debug");
  });

  it("can set to error", () => {
    setLogLevel("error");
    expect(getLogLevel()).toBe("error");
  });
});

describe("isLogLevel", () => {
  it("accepts the four level names only", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe("truncate", () => {
  it("returns short strings unchanged", () => {
    expect(truncate("hello", 500)).toBe("hello");
  });

  it("truncates long strings with char count", () => {
    const long = "a".repeat(600);
    const result = truncate(long, 500);
    expect(result.length).toBeLessThan(600);
    expect(result).toContain("600 chars total");
  });

  it("respects custom maxLen", () => {
    const result = truncate("abcdef", 3);
    expect(result).toBe("abc... (6 chars total)");
  });
});

describe("formatArgs", () => {
  it("redacts free-text keys from objects", () => {
    const line = formatArgs(["round", 1, { hypotheses: ["flu"], justification: "patient says..." }]);
    expect(line).toBe('round 1 {"hypotheses":["flu"]}');
  });
});

describe("isValidSessionId", () => {
  it("accepts path-safe ids up to 128 chars", () => {
    expect(isValidSessionId("case-42_a")).toBe(true);
    expect(isValidSessionId("a".repeat(128))).toBe(true);
    expect(isValidSessionId("a".repeat(129))).toBe(false);
    expect(isValidSessionId("../etc")).toBe(false);
    expect(isValidSessionId("")).toBe(false);
  });
});

describe("session logs", () => {
  let dir = "";

  afterEach(() => {
    disableFileLogging();
    setSensitivePatterns([]);
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it("returns null while file logging is off", () => {
    disableFileLogging();
    expect(createSessionLog("s1")).toBeNull();
  });

  it("writes redacted events and masked lines", () => {
    dir = mkdtempSync(join(tmpdir(), "consilium-log-"));
    initFileLogging(dir);
    setSensitivePatterns(["\\b\\d{3}-\\d{4}\\b"]);

    const slog = createSessionLog("s1");
    expect(slog).not.toBeNull();
    slog?.event("info", "round 1 decision", { rationale: "private", consensusHypotheses: ["flu"] });
    slog?.write("warn", "call 555-1234 back");

    const path = join(dir, "logs", "sessions", "s1.log");
    expect(slog?.path).toBe(path);
    expect(existsSync(path)).toBe(true);
    const lines = readFileSync(path, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]?.slice(25)).toBe('INF round 1 decision {"consensusHypotheses":["flu"]}');
    expect(lines[1]?.slice(25)).toBe("WRN call [redacted] back");
  });

  it("keeps only the newest session logs under the count strategy", () => {
    dir = mkdtempSync(join(tmpdir(), "consilium-log-"));
    const sessions = join(dir, "logs", "sessions");
    mkdirSync(sessions, { recursive: true });
    const now = Date.now() / 1000;
    ["old", "mid", "new"].forEach((name, i) => {
      const path = join(sessions, `${name}.log`);
      writeFileSync(path, "x\n");
      utimesSync(path, now - 300 + i * 100, now - 300 + i * 100);
    });

    initFileLogging(dir, { sessions: { purge: "count", maxFiles: 2 } });

    expect(readdirSync(sessions).sort()).toEqual(["mid.log", "new.log"]);
  });

  it("drops info.log lines older than the date cutoff", () => {
    dir = mkdtempSync(join(tmpdir(), "consilium-log-"));
    const logs = join(dir, "logs");
    mkdirSync(logs, { recursive: true });
    const recent = new Date().toISOString();
    writeFileSync(join(logs, "info.log"), `2000-01-01T00:00:00.000Z INF [old] gone\n${recent} INF [new] kept\n`);

    initFileLogging(dir, { info: { purge: "date", maxDays: 30 } });

    expect(readFileSync(join(logs, "info.log"), "utf-8")).toBe(`${recent} INF [new] kept\n`);
  });
});
