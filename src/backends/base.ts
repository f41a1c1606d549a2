/**
 * Generation backend interface.
 *
 * A backend wraps a text-generation service and gives the experts and the
 * coordinator one uniform call. It may time out, return empty text, or be
 * cut off at the token limit; callers never trust it to be well-formed.
 */

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens?: number;
  temperature?: number;
  /** Socket timeout in milliseconds. The recovery layer adds its own ceiling on top. */
  timeoutMs?: number;
}

export interface GenerationResult {
  /** Generated text, possibly empty */
  text: string;
  /** Generation stopped at the token limit */
  truncated: boolean;
  /** Token usage for this call (if the service reports it) */
  tokens?: TokenUsage;
  /** Wall-clock time in milliseconds */
  durationMs: number;
}

export type BackendType = "openai-compat" | "ollama";

/**
 * Calculate a dynamic timeout based on estimated prompt size.
 * Base 15s + 15ms/token, max 10 min.
 */
export function calculateTimeout(promptLength: number): number {
  const estimatedTokens = Math.ceil(promptLength / 4);
  return Math.min(15_000 + estimatedTokens * 15, 600_000);
}

export interface IGenerationBackend {
  /** Short label used in logs and error messages (e.g. "openai-compat:gpt-4o-mini") */
  readonly name: string;

  /** Check if the service answers and serves the configured model */
  isAvailable(): Promise<boolean>;

  /** Run one generation call */
  invoke(request: GenerationRequest): Promise<GenerationResult>;
}
