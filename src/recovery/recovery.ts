/**
 * Response recovery: generate → parse → (one continuation) → fallback.
 *
 * Every generation call is bounded by a timeout. Backend errors, empty
 * output and unparseable output all end in the contract's fallback value,
 * so nothing thrown by a backend crosses the Opinion/Decision boundary.
 */

import type { Decision, Opinion, ValidationResult } from "../contracts.js";
import { fallbackDecision, recoveryFallbackOpinion } from "../contracts.js";
import type { GenerationRequest, GenerationResult, IGenerationBackend, TokenUsage } from "../backends/base.js";
import {
  GenerationEmptyError,
  GenerationTimeoutError,
  GenerationTruncatedError,
  describeError,
} from "../errors.js";
import { addTokens, emptyTokens } from "../usage.js";
import { parseDecisionText, parseOpinionText } from "./parser.js";
import { createLogger } from "../logger.js";

const log = createLogger("recovery");

/** Appended to the original user prompt when the first answer came back empty and truncated. */
export const CONTINUATION_INSTRUCTION =
  "Your previous answer was cut off before any content was produced. " +
  "Resume and complete the same structured output, using every section heading requested above.";

export function buildContinuationPrompt(userPrompt: string): string {
  return `${userPrompt}\n\n${CONTINUATION_INSTRUCTION}`;
}

export interface RecoveryOptions {
  /** Label for errors and logs, e.g. the expert id or "coordinator" */
  source: string;
  timeoutMs: number;
}

export interface RecoveryOutcome<T> {
  value: T;
  /** True when `value` was parsed from backend text; false when the fallback was substituted */
  recovered: boolean;
  /** Generation calls made: 1, or 2 when a continuation was requested */
  attempts: number;
  /** Why the fallback was used */
  error?: string;
  /** Last text received from the backend ("" if none) */
  raw: string;
  tokens: TokenUsage;
}

/**
 * Race a promise against a timer. The timer is cleared either way; the
 * losing promise is left to settle on its own.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, source: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GenerationTimeoutError(source, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

async function recover<T>(
  backend: IGenerationBackend,
  request: GenerationRequest,
  options: RecoveryOptions,
  parse: (text: string) => ValidationResult<T>,
  fallback: (reason: string) => T,
): Promise<RecoveryOutcome<T>> {
  const { source, timeoutMs } = options;
  let attempts = 0;
  let tokens = emptyTokens();
  let raw = "";

  const fail = (reason: string): RecoveryOutcome<T> => {
    log.warn(source, "falling back after", attempts, "attempt(s):", reason);
    return { value: fallback(reason), recovered: false, attempts, error: reason, raw, tokens };
  };

  const call = async (userPrompt: string): Promise<GenerationResult> => {
    attempts += 1;
    const result = await withTimeout(
      backend.invoke({ ...request, userPrompt, timeoutMs: request.timeoutMs ?? timeoutMs }),
      timeoutMs,
      source,
    );
    if (result.tokens) tokens = addTokens(tokens, result.tokens);
    raw = result.text;
    return result;
  };

  let result: GenerationResult;
  try {
    result = await call(request.userPrompt);
    if (!result.text.trim()) {
      if (!result.truncated) {
        return fail(describeError(new GenerationEmptyError(source)));
      }
      log.info(source, "empty truncated response, requesting one continuation");
      result = await call(buildContinuationPrompt(request.userPrompt));
      if (!result.text.trim()) {
        return fail(describeError(new GenerationTruncatedError(source)));
      }
    }
  } catch (err) {
    return fail(describeError(err));
  }

  const parsed = parse(result.text);
  if (!parsed.ok) {
    return fail(`unparseable response: ${parsed.issues.join("; ")}`);
  }
  log.debug(source, "parsed response after", attempts, "attempt(s)");
  return { value: parsed.value, recovered: true, attempts, raw, tokens };
}

export function recoverOpinion(
  backend: IGenerationBackend,
  request: GenerationRequest,
  options: RecoveryOptions,
): Promise<RecoveryOutcome<Opinion>> {
  return recover(backend, request, options, parseOpinionText, recoveryFallbackOpinion);
}

export function recoverDecision(
  backend: IGenerationBackend,
  request: GenerationRequest,
  options: RecoveryOptions,
): Promise<RecoveryOutcome<Decision>> {
  return recover(backend, request, options, parseDecisionText, fallbackDecision);
}
