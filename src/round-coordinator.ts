/**
 * RoundCoordinator: runs one round of expert opinions.
 *
 * Each expert is asked exactly once. Every call settles into a Result; a
 * failed or shape-invalid answer becomes the explicit fallback opinion.
 * Nothing is recorded until every expert has answered, so a round is
 * committed whole or not at all.
 */

import type { Opinion } from "./contracts.js";
import { expertFallbackOpinion, validateOpinion } from "./contracts.js";
import type { ExpertRequest, IExpert } from "./experts.js";
import type { SessionStore } from "./session-store.js";
import { SessionNotFoundError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("round");

export type Result<T, E = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Run `fn` and capture its outcome instead of letting it throw. */
export async function settle<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

export interface ResolvedOpinion {
  opinion: Opinion;
  /** True when the expert's own answer was replaced */
  fallback: boolean;
  /** Why it was replaced */
  error?: string;
}

/**
 * Turn an expert call's Result into an opinion that passes the contract.
 * Errors and invalid shapes both resolve to the fallback opinion.
 */
export function resolveOpinion(result: Result<unknown>): ResolvedOpinion {
  if (!result.ok) {
    const error = describeError(result.error);
    return { opinion: expertFallbackOpinion(error), fallback: true, error };
  }
  const checked = validateOpinion(result.value);
  if (!checked.ok) {
    const error = `invalid opinion: ${checked.issues.join("; ")}`;
    return { opinion: expertFallbackOpinion(error), fallback: true, error };
  }
  return { opinion: checked.value, fallback: false };
}

export interface RoundCoordinatorOptions {
  /** Query experts concurrently (default true). Aggregation is the same either way. */
  parallel?: boolean;
}

export interface RoundOutcome {
  roundIndex: number;
  opinions: Record<string, Opinion>;
  fallbackExperts: string[];
}

export class RoundCoordinator {
  private readonly parallel: boolean;

  constructor(
    private readonly store: SessionStore,
    options: RoundCoordinatorOptions = {},
  ) {
    this.parallel = options.parallel ?? true;
  }

  /**
   * Collect one opinion per expert for an already opened round and record
   * them. Callers serialize access to the session; this does not lock.
   */
  async runRound(sessionId: string, roundIndex: number, experts: readonly IExpert[]): Promise<RoundOutcome> {
    const session = this.store.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    const prior = session.rounds.find((r) => r.index === roundIndex - 1);
    const request: ExpertRequest = {
      sessionId,
      context: session.context,
      roundIndex,
      maxRounds: session.maxRounds,
      priorOpinions: prior?.opinions ?? {},
      priorRationale: prior?.decision?.rationale ?? "",
    };

    log.info("session", sessionId, "round", roundIndex, "querying", experts.length, "experts" +
      (this.parallel ? " in parallel" : " sequentially"));

    const ask = async (expert: IExpert): Promise<[IExpert, Result<Opinion>]> =>
      [expert, await settle(() => expert.opine(request))];

    let settled: Array<[IExpert, Result<Opinion>]>;
    if (this.parallel) {
      settled = await Promise.all(experts.map(ask));
    } else {
      settled = [];
      for (const expert of experts) {
        settled.push(await ask(expert));
      }
    }

    // Join complete: resolve, then record
    const opinions: Record<string, Opinion> = {};
    const fallbackExperts: string[] = [];
    for (const [expert, result] of settled) {
      const resolved = resolveOpinion(result);
      if (resolved.fallback) {
        fallbackExperts.push(expert.id);
        log.warn("session", sessionId, "round", roundIndex, expert.id, "fell back:", resolved.error);
      }
      opinions[expert.id] = resolved.opinion;
    }

    for (const [expertId, opinion] of Object.entries(opinions)) {
      opinions[expertId] = this.store.recordOpinion(sessionId, expertId, opinion, roundIndex);
    }

    return { roundIndex, opinions, fallbackExperts };
  }
}
