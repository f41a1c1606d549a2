import type { IGenerationBackend } from "./base.js";
import type { BackendConfig } from "../config.js";
import { OllamaBackend } from "./ollama.js";
import { OpenAICompatBackend } from "./openai-compat.js";
import { createLogger } from "../logger.js";

const log = createLogger("backends");

/**
 * Create the backend named by `config.type`.
 * `model` overrides the configured model (per-expert models share the endpoint).
 */
export function createBackend(config: BackendConfig, model?: string): IGenerationBackend {
  const resolved = { ...config, model: model ?? config.model };
  switch (resolved.type) {
    case "openai-compat":
      log.debug("creating OpenAICompatBackend, model=" + resolved.model);
      return new OpenAICompatBackend(resolved);
    case "ollama":
      log.debug("creating OllamaBackend, model=" + resolved.model);
      return new OllamaBackend(resolved);
  }
}

export { OllamaBackend } from "./ollama.js";
export { OpenAICompatBackend } from "./openai-compat.js";
export { calculateTimeout } from "./base.js";
export type { IGenerationBackend, GenerationRequest, GenerationResult, TokenUsage, BackendType } from "./base.js";
