import { z } from "zod";
import type { IGenerationBackend, GenerationRequest, GenerationResult, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { httpRequest, parseJson } from "./http.js";
import type { BackendConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("ollama");

const GenerateResponseSchema = z.object({
  response: z.string().default(""),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const TagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional(),
});

/**
 * Backend for Ollama via its native HTTP API.
 * Calls POST /api/generate on the configured endpoint.
 *
 * Supports system prompts natively via Ollama's "system" field.
 * `done_reason === "length"` marks the result as truncated.
 */
export class OllamaBackend implements IGenerationBackend {
  readonly name: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(config: Pick<BackendConfig, "endpoint" | "model">) {
    this.model = config.model;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.name = `ollama:${this.model}`;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const raw = await httpRequest({ method: "GET", url: `${this.endpoint}/api/tags`, timeoutMs: 5000, label: this.name });
      const data = TagsSchema.safeParse(parseJson(raw, this.name));
      // Check if our specific model is pulled
      const available = data.success && (data.data.models?.some((m) => m.name.startsWith(this.model)) ?? false);
      log.debug(this.name, "isAvailable:", available);
      return available;
    } catch (err) {
      log.debug(this.name, "isAvailable: false", err instanceof Error ? err.message : String(err));
      return false;
    }
  }

  async invoke(request: GenerationRequest): Promise<GenerationResult> {
    const { systemPrompt, userPrompt } = request;
    const timeoutMs = request.timeoutMs ?? calculateTimeout(systemPrompt.length + userPrompt.length);
    const start = Date.now();
    log.debug(this.name, "invoke start, prompt length:", userPrompt.length);

    const options: Record<string, number> = {};
    if (request.maxTokens !== undefined) options.num_predict = request.maxTokens;
    if (request.temperature !== undefined) options.temperature = request.temperature;

    const body = {
      model: this.model,
      prompt: userPrompt,
      system: systemPrompt,
      stream: false,
      options,
    };

    const raw = await httpRequest({
      method: "POST",
      url: `${this.endpoint}/api/generate`,
      body,
      timeoutMs,
      label: this.name,
    });
    const durationMs = Date.now() - start;

    const parsed = GenerateResponseSchema.safeParse(parseJson(raw, this.name));
    if (!parsed.success) {
      throw new Error(`${this.name}: unexpected response shape from /api/generate`);
    }
    const data = parsed.data;

    // Ollama reports token counts directly
    const tokens: TokenUsage | undefined =
      data.prompt_eval_count !== undefined || data.eval_count !== undefined
        ? {
            inputTokens: data.prompt_eval_count ?? 0,
            outputTokens: data.eval_count ?? 0,
          }
        : undefined;

    const truncated = data.done_reason === "length";

    log.info(this.name, "invoke complete:", durationMs + "ms" +
      (tokens ? `, ${tokens.inputTokens + tokens.outputTokens} tokens` : "") +
      (truncated ? ", truncated" : ""));

    return { text: data.response.trim(), truncated, tokens, durationMs };
  }
}
