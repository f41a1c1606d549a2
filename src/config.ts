import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { homedir } from "node:os";

// --- Schemas ---

const EXPERT_ID = /^[a-zA-Z0-9_-]{1,64}$/;

export const ExpertConfigSchema = z.object({
  id: z.string().regex(EXPERT_ID, "expert id must be alphanumeric/hyphens/underscores"),
  /** Persona name (built-in or custom) that shapes this expert's system prompt */
  persona: z.string().default("generalist"),
  /** Per-expert model override (same backend endpoint) */
  model: z.string().optional(),
});

export const PersonaConfigSchema = z.object({
  name: z.string(),
  role: z.string(),
  systemPrompt: z.string(),
});

const GenerationProfileSchema = (maxTokens: number, temperature: number) =>
  z.object({
    maxTokens: z.number().int().min(1).default(maxTokens),
    temperature: z.number().min(0).max(2).default(temperature),
  }).default({});

export const BackendConfigSchema = z.object({
  type: z.enum(["openai-compat", "ollama"]).default("openai-compat"),
  endpoint: z.string().default("https://api.openai.com"),
  model: z.string().default("gpt-4o-mini"),
  apiKey: z.string().optional(),
  /** Ceiling for each generation call. A continuation retry gets its own. */
  timeoutMs: z.number().int().min(1000).default(60_000),
  expert: GenerationProfileSchema(700, 0.7),
  coordinator: GenerationProfileSchema(600, 0.3),
});

export const ConfigSchema = z.object({
  /** User identifier. Determines the data directory: data/<user>/. */
  user: z.string().default("default"),

  backend: BackendConfigSchema.default({}),

  panel: z
    .object({
      /** Number of distinct experts every round must be run with. */
      size: z.number().int().min(1).default(3),
      experts: z.array(ExpertConfigSchema).default([
        { id: "expert_1", persona: "generalist" },
        { id: "expert_2", persona: "generalist" },
        { id: "expert_3", persona: "generalist" },
      ]),
    })
    .default({})
    .refine((p) => new Set(p.experts.map((e) => e.id)).size === p.experts.length, {
      message: "panel.experts ids must be unique",
    })
    .refine((p) => p.size === p.experts.length, {
      message: "panel.size must equal the number of panel.experts",
    }),

  deliberation: z
    .object({
      maxRounds: z.number().int().min(1).max(13).default(7),
      /** false = always exhaust the round budget; consensus is still recorded every round. */
      stopOnConsensus: z.boolean().default(false),
      /** Query experts concurrently within a round. */
      parallel: z.boolean().default(true),
    })
    .default({}),

  imaging: z
    .object({
      /** Captioning service endpoint. Without it every case gets a demo caption. */
      endpoint: z.string().optional(),
      timeoutMs: z.number().int().min(1000).default(30_000),
    })
    .default({}),

  /** Custom persona definitions (extend or override built-ins) */
  personas: z.array(PersonaConfigSchema).default([]),

  logging: z
    .object({
      /** Retention for logs/info.log, applied at startup */
      info: z.object({
        purge: z.enum(["date", "size"]).default("date"),
        maxDays: z.number().int().min(1).default(30),
        maxBytes: z.number().int().min(0).default(50 * 1024 * 1024),
      }).default({}),
      /** Retention for logs/sessions/*.log; "size" caps their combined size */
      sessions: z.object({
        purge: z.enum(["count", "date", "size"]).default("count"),
        maxFiles: z.number().int().min(1).default(50),
        maxDays: z.number().int().min(1).default(14),
        maxBytes: z.number().int().min(0).default(100 * 1024 * 1024),
      }).default({}),
    })
    .default({}),

  privacy: z
    .object({
      sensitivePatterns: z
        .array(z.string())
        .default([
          "\\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Z]{2,}\\b",
          "\\b(?:sk|pk|api|token|key|secret)[_-]?[a-zA-Z0-9]{16,}\\b",
          "\\b\\d{3}[-. ]\\d{3,4}[-. ]\\d{4}\\b",
          "\\b\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\b",
        ]),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type ExpertConfig = z.infer<typeof ExpertConfigSchema>;
export type PersonaConfig = z.infer<typeof PersonaConfigSchema>;

/** Directory where the loaded config file was found (null if defaults used). */
let loadedConfigDir: string | null = null;

/** Reset loadedConfigDir to null. Exported for testing only. */
export function resetLoadedConfigDir(): void {
  loadedConfigDir = null;
}

/**
 * Base data directory for a user.
 * - If a config file was loaded: resolves relative to its directory → <configDir>/data/<user>/
 * - Otherwise: uses XDG_DATA_HOME/consilium/<user> (fallback ~/.local/share/consilium/<user>)
 */
export function getUserDataDir(config: Config): string {
  if (loadedConfigDir) {
    return resolve(loadedConfigDir, "data", config.user);
  }
  const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
  return resolve(xdg, "consilium", config.user);
}

/**
 * Environment overrides for the generation backend, applied on top of the file.
 * Empty variables are ignored.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const endpoint = env.CONSILIUM_API_BASE || undefined;
  const apiKey = env.CONSILIUM_API_KEY || undefined;
  const model = env.CONSILIUM_MODEL || undefined;
  if (!endpoint && !apiKey && !model) return config;

  return {
    ...config,
    backend: {
      ...config.backend,
      endpoint: endpoint ?? config.backend.endpoint,
      apiKey: apiKey ?? config.backend.apiKey,
      model: model ?? config.backend.model,
    },
  };
}

// --- Loader ---

export const CONFIG_FILENAMES = ["consilium.config.json", ".consiliumrc.json"];

function readConfigFile(path: string): Config {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return applyEnvOverrides(ConfigSchema.parse(raw));
}

export function loadConfig(explicitPath?: string): Config {
  if (explicitPath) {
    loadedConfigDir = dirname(resolve(explicitPath));
    return readConfigFile(explicitPath);
  }

  for (const filename of CONFIG_FILENAMES) {
    const fullPath = resolve(process.cwd(), filename);
    if (existsSync(fullPath)) {
      loadedConfigDir = dirname(fullPath);
      return readConfigFile(fullPath);
    }
  }

  // No config file: defaults, data under the XDG path
  loadedConfigDir = null;
  return applyEnvOverrides(ConfigSchema.parse({}));
}
