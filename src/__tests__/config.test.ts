import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir, homedir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigSchema, applyEnvOverrides, getUserDataDir, loadConfig, resetLoadedConfigDir } from "../config.js";

describe("ConfigSchema.parse", () => {
  it("parses an empty object with all defaults", () => {
    const config = ConfigSchema.parse({});
    expect(config.user).toBe("default");
    expect(config.deliberation).toEqual({ maxRounds: 7, stopOnConsensus: false, parallel: true });
    expect(config.panel.size).toBe(3);
    expect(config.panel.experts.map((e) => e.id)).toEqual(["expert_1", "expert_2", "expert_3"]);
    expect(config.backend.type).toBe("openai-compat");
    expect(config.backend.expert).toEqual({ maxTokens: 700, temperature: 0.7 });
    expect(config.backend.coordinator).toEqual({ maxTokens: 600, temperature: 0.3 });
  });

  it("rejects a round budget outside 1..13", () => {
    expect(() => ConfigSchema.parse({ deliberation: { maxRounds: 0 } })).toThrow();
    expect(() => ConfigSchema.parse({ deliberation: { maxRounds: 14 } })).toThrow();
    expect(ConfigSchema.parse({ deliberation: { maxRounds: 13 } }).deliberation.maxRounds).toBe(13);
  });

  it("rejects duplicate expert ids", () => {
    expect(() => ConfigSchema.parse({ panel: { size: 2, experts: [{ id: "a" }, { id: "a" }] } })).toThrow(
      "panel.experts ids must be unique",
    );
  });

  it("rejects a panel size that differs from the expert list", () => {
    expect(() => ConfigSchema.parse({ panel: { size: 2 } })).toThrow(
      "panel.size must equal the number of panel.experts",
    );
    expect(() => ConfigSchema.parse({ panel: { experts: [{ id: "a" }, { id: "b" }] } })).toThrow(
      "panel.size must equal the number of panel.experts",
    );
    expect(ConfigSchema.parse({ panel: { size: 2, experts: [{ id: "a" }, { id: "b" }] } }).panel.size).toBe(2);
  });

  it("rejects expert ids with path characters", () => {
    expect(() => ConfigSchema.parse({ panel: { experts: [{ id: "../a" }] } })).toThrow();
  });
});

describe("applyEnvOverrides", () => {
  it("overrides the backend from the environment", () => {
    const config = applyEnvOverrides(ConfigSchema.parse({}), {
      CONSILIUM_API_BASE: "http://localhost:1234",
      CONSILIUM_API_KEY: "test-secret",
      CONSILIUM_MODEL: "local-model",
    });
    expect(config.backend).toMatchObject({
      endpoint: "http://localhost:1234",
      apiKey: "test-secret",
      model: "local-model",
    });
  });

  it("ignores empty variables", () => {
    const base = ConfigSchema.parse({});
    expect(applyEnvOverrides(base, { CONSILIUM_MODEL: "" })).toBe(base);
  });
});

describe("getUserDataDir", () => {
  it("uses the XDG fallback when no config file was loaded", () => {
    resetLoadedConfigDir();
    const config = ConfigSchema.parse({ user: "testuser" });
    const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
    expect(getUserDataDir(config)).toBe(resolve(xdg, "consilium", "testuser"));
  });
});

describe("loadConfig", () => {
  let dir = "";

  afterEach(() => {
    resetLoadedConfigDir();
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it("reads an explicit file and resolves data beside it", () => {
    dir = mkdtempSync(join(tmpdir(), "consilium-config-"));
    const path = join(dir, "consilium.config.json");
    writeFileSync(path, JSON.stringify({ user: "clinic", deliberation: { maxRounds: 3 } }));

    const config = loadConfig(path);

    expect(config.deliberation.maxRounds).toBe(3);
    expect(getUserDataDir(config)).toBe(resolve(dir, "data", "clinic"));
  });

  it("throws on an invalid file", () => {
    dir = mkdtempSync(join(tmpdir(), "consilium-config-"));
    const path = join(dir, "consilium.config.json");
    writeFileSync(path, JSON.stringify({ deliberation: { maxRounds: 99 } }));
    expect(() => loadConfig(path)).toThrow();
  });
});
