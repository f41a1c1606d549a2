/**
 * Token usage bookkeeping, per session.
 *
 * Experts and the coordinator record what each generation call cost;
 * the orchestrator reports the totals with the deliberation result.
 */

import type { TokenUsage } from "./backends/base.js";

export interface UsageReport {
  totalTokens: TokenUsage;
  /** Source (expert id or "coordinator") → tokens */
  perSource: Record<string, TokenUsage>;
  perRound: Array<{ round: number; tokens: TokenUsage }>;
  /** Generation calls made, continuation retries included */
  calls: number;
}

export function emptyTokens(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0 };
}

export function addTokens(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
  };
}

export function totalTokenCount(t: TokenUsage): number {
  return t.inputTokens + t.outputTokens;
}

interface SessionUsage {
  total: TokenUsage;
  perSource: Map<string, TokenUsage>;
  perRound: Map<number, TokenUsage>;
  calls: number;
}

export class UsageMeter {
  private readonly sessions = new Map<string, SessionUsage>();

  record(sessionId: string, source: string, round: number, tokens: TokenUsage | undefined, calls = 1): void {
    let usage = this.sessions.get(sessionId);
    if (!usage) {
      usage = { total: emptyTokens(), perSource: new Map(), perRound: new Map(), calls: 0 };
      this.sessions.set(sessionId, usage);
    }
    usage.calls += calls;
    if (!tokens) return;

    usage.total = addTokens(usage.total, tokens);
    usage.perSource.set(source, addTokens(usage.perSource.get(source) ?? emptyTokens(), tokens));
    usage.perRound.set(round, addTokens(usage.perRound.get(round) ?? emptyTokens(), tokens));
  }

  report(sessionId: string): UsageReport {
    const usage = this.sessions.get(sessionId);
    if (!usage) {
      return { totalTokens: emptyTokens(), perSource: {}, perRound: [], calls: 0 };
    }
    return {
      totalTokens: { ...usage.total },
      perSource: Object.fromEntries(usage.perSource),
      perRound: [...usage.perRound.entries()]
        .sort(([a], [b]) => a - b)
        .map(([round, tokens]) => ({ round, tokens })),
      calls: usage.calls,
    };
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }
}
