import { z } from "zod";
import type { IGenerationBackend, GenerationRequest, GenerationResult, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { httpRequest, parseJson } from "./http.js";
import type { BackendConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("openai-compat");

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }).optional(),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })).optional(),
});

/**
 * Backend for any OpenAI-compatible chat completions API.
 *
 * Works with: OpenAI, LM Studio, Ollama (/v1), vLLM, llama.cpp, LocalAI,
 * Groq, Mistral, Together AI.
 *
 * Uses the standard POST /v1/chat/completions endpoint.
 * `finish_reason === "length"` marks the result as truncated.
 */
export class OpenAICompatBackend implements IGenerationBackend {
  readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly model: string;

  constructor(config: Pick<BackendConfig, "endpoint" | "model" | "apiKey">) {
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.name = `openai-compat:${this.model}`;
  }

  private headers(): Record<string, string> {
    return this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
  }

  async isAvailable(): Promise<boolean> {
    try {
      const raw = await httpRequest({
        method: "GET",
        url: `${this.endpoint}/v1/models`,
        timeoutMs: 5000,
        headers: this.headers(),
        label: this.name,
      });
      const data = ModelListSchema.safeParse(parseJson(raw, this.name));
      // If model list is available, check if our model is in it
      if (data.success && data.data.data) {
        const found = data.data.data.some((m) => m.id === this.model || m.id.includes(this.model));
        log.debug(this.name, "isAvailable:", found);
        return found;
      }
      // Some providers don't list models; a response is enough
      log.debug(this.name, "isAvailable: true (endpoint responded, model list not checked)");
      return true;
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

    const body = {
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      stream: false,
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    };

    const url = `${this.endpoint}/v1/chat/completions`;
    const raw = await httpRequest({ method: "POST", url, body, timeoutMs, headers: this.headers(), label: this.name });
    const durationMs = Date.now() - start;

    const parsed = ChatCompletionResponseSchema.safeParse(parseJson(raw, this.name));
    if (!parsed.success) {
      throw new Error(`${this.name}: unexpected response shape from ${url}`);
    }
    const choice = parsed.data.choices[0];
    if (!choice) {
      throw new Error(`${this.name}: empty response from ${url}`);
    }

    const usage = parsed.data.usage;
    const tokens: TokenUsage | undefined = usage
      ? {
          inputTokens: usage.prompt_tokens ?? 0,
          outputTokens: usage.completion_tokens ?? 0,
        }
      : undefined;

    const text = (choice.message?.content ?? "").trim();
    const truncated = choice.finish_reason === "length";

    log.info(this.name, "invoke complete:", durationMs + "ms" +
      (tokens ? `, ${tokens.inputTokens + tokens.outputTokens} tokens` : "") +
      (truncated ? ", truncated" : ""));

    return { text, truncated, tokens, durationMs };
  }
}
