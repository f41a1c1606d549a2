/**
 * DeliberationOrchestrator: drives a session from its first round to termination.
 *
 * Responsibilities:
 * - Open rounds and have the RoundCoordinator collect every expert's opinion
 * - Run the decision step once all opinions are in, falling back when it fails
 * - Record a consensus report every round, whatever the policy
 * - Terminate on round limit, on consensus (when the policy says so), on abort
 *   or on a fatal error
 *
 * State machine per run:
 *   idle → round_open → opinions_collected → decision_recorded → (round_open | terminated)
 */

import type { Decision } from "./contracts.js";
import { fallbackDecision, validateDecision } from "./contracts.js";
import type { IDecisionMaker, IExpert } from "./experts.js";
import type { Round, Session } from "./session-store.js";
import { SessionStore, DEFAULT_MAX_ROUNDS, ROUND_LIMIT_REASON } from "./session-store.js";
import { RoundCoordinator, settle } from "./round-coordinator.js";
import { evaluateConsensus, describeConsensus } from "./consensus/evaluator.js";
import type { DeliberationState } from "./events.js";
import { DeliberationEventBus } from "./events.js";
import type { UsageReport } from "./usage.js";
import { UsageMeter } from "./usage.js";
import {
  PanelSizeMismatchError,
  RoundLimitReachedError,
  SessionAlreadyTerminatedError,
  SessionNotFoundError,
  describeError,
} from "./errors.js";
import { createLogger, createSessionLog } from "./logger.js";

const log = createLogger("orchestrator");

export const CONSENSUS_REASON = "consensus reached";
export const ABORTED_REASON = "aborted";
export const PANEL_MISMATCH_REASON = "panel size mismatch";

export interface DeliberationPolicy {
  /** End the session as soon as a round reaches consensus. Off: always exhaust the round budget. */
  stopOnConsensus: boolean;
  /** Query experts concurrently within a round */
  parallel: boolean;
}

export const DEFAULT_POLICY: DeliberationPolicy = {
  stopOnConsensus: false,
  parallel: true,
};

export interface OrchestratorOptions {
  coordinator: IDecisionMaker;
  store?: SessionStore;
  policy?: Partial<DeliberationPolicy>;
  events?: DeliberationEventBus;
  usage?: UsageMeter;
  /** Panel size for sessions started without an explicit one */
  defaultPanelSize?: number;
}

export interface RunOptions {
  /** Abort between steps. In-flight expert calls still finish; no new round or decision starts. */
  signal?: AbortSignal;
}

export interface DeliberationResult {
  sessionId: string;
  totalRounds: number;
  terminationReason: string;
  /** Always a valid decision; a flagged fallback when no round produced one */
  finalDecision: Decision;
  /** True when any round reached consensus */
  consensusReached: boolean;
  /** Indices of the rounds that reached consensus */
  consensusRounds: number[];
  rounds: Round[];
  usage: UsageReport;
  durationMs: number;
}

export class DeliberationOrchestrator {
  readonly store: SessionStore;
  readonly events: DeliberationEventBus;
  readonly usage: UsageMeter;
  readonly policy: DeliberationPolicy;
  private readonly coordinator: IDecisionMaker;
  private readonly rounds: RoundCoordinator;
  private readonly defaultPanelSize: number | undefined;

  constructor(options: OrchestratorOptions) {
    this.coordinator = options.coordinator;
    this.store = options.store ?? new SessionStore();
    this.events = options.events ?? new DeliberationEventBus();
    this.usage = options.usage ?? new UsageMeter();
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
    this.rounds = new RoundCoordinator(this.store, { parallel: this.policy.parallel });
    this.defaultPanelSize = options.defaultPanelSize;
  }

  startSession(
    sessionId: string,
    caseContext: unknown,
    maxRounds: number = DEFAULT_MAX_ROUNDS,
    panelSize: number | undefined = this.defaultPanelSize,
  ): Session {
    return this.store.start(sessionId, caseContext, maxRounds, panelSize);
  }

  getSession(sessionId: string): Session | undefined {
    return this.store.get(sessionId);
  }

  /** Terminate a session from outside a run. No-op when the id is unknown. */
  endSession(sessionId: string, reason = "ended by caller"): void {
    this.store.end(sessionId, reason);
  }

  /**
   * Forget a session and its token usage. A run in progress on it finishes
   * first. Returns false when the id is unknown.
   */
  discardSession(sessionId: string): Promise<boolean> {
    return this.store.withLock(sessionId, () => {
      this.usage.clear(sessionId);
      return this.store.delete(sessionId);
    });
  }

  /** Decision of the latest round that has one. */
  getFinalDecision(sessionId: string): Decision | undefined {
    const session = this.store.get(sessionId);
    if (!session) return undefined;
    for (let i = session.rounds.length - 1; i >= 0; i--) {
      const decision = session.rounds[i]?.decision;
      if (decision) return decision;
    }
    return undefined;
  }

  /**
   * Run a started session to termination. The session's lock is held for
   * the whole run, so two runs on one session never interleave.
   */
  async runDeliberation(
    sessionId: string,
    experts: readonly IExpert[],
    options: RunOptions = {},
  ): Promise<DeliberationResult> {
    if (!this.store.has(sessionId)) throw new SessionNotFoundError(sessionId);
    return this.store.withLock(sessionId, () => this.run(sessionId, experts, options.signal));
  }

  private async run(sessionId: string, experts: readonly IExpert[], signal?: AbortSignal): Promise<DeliberationResult> {
    const start = Date.now();
    const session = this.store.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (session.terminated) {
      throw new SessionAlreadyTerminatedError(sessionId, session.terminationReason);
    }

    const slog = createSessionLog(sessionId);
    let state: DeliberationState = "idle";
    const transition = (to: DeliberationState, round: number): void => {
      log.debug("session", sessionId, state, "→", to, "round", round);
      this.events.emitStateChanged({ sessionId, from: state, to, round });
      state = to;
    };

    const distinct = new Set(experts.map((e) => e.id)).size;
    if (distinct !== session.panelSize || distinct !== experts.length) {
      this.store.end(sessionId, PANEL_MISMATCH_REASON);
      transition("terminated", session.currentRound);
      slog?.write("error", `panel size mismatch: expected ${session.panelSize}, got ${distinct} of ${experts.length}`);
      throw new PanelSizeMismatchError(sessionId, session.panelSize, distinct, experts.length);
    }

    log.info("deliberation start:", sessionId, experts.length, "experts, maxRounds=" + session.maxRounds,
      "stopOnConsensus=" + this.policy.stopOnConsensus);
    slog?.event("info", "deliberation start", {
      panel: experts.map((e) => e.id),
      maxRounds: session.maxRounds,
      policy: this.policy,
    });

    try {
      for (;;) {
        if (signal?.aborted) {
          this.store.end(sessionId, ABORTED_REASON);
          break;
        }

        let roundIndex: number;
        try {
          roundIndex = this.store.beginRound(sessionId);
        } catch (err) {
          // The store has already terminated the session with "round limit reached"
          if (err instanceof RoundLimitReachedError) break;
          throw err;
        }
        transition("round_open", roundIndex);

        const outcome = await this.rounds.runRound(sessionId, roundIndex, experts);
        transition("opinions_collected", roundIndex);
        slog?.event("info", `round ${roundIndex} opinions`, outcome);

        if (signal?.aborted) {
          log.warn("session", sessionId, "aborted after round", roundIndex, "opinions; decision skipped");
          this.store.end(sessionId, ABORTED_REASON);
          break;
        }

        const { decision, fallback } = await this.decide(sessionId, roundIndex);
        transition("decision_recorded", roundIndex);

        const report = evaluateConsensus({ opinions: outcome.opinions, decision });
        this.store.recordConsensus(sessionId, roundIndex, report);
        log.info("session", sessionId, "round", roundIndex + "/" + session.maxRounds, describeConsensus(report));
        slog?.event("info", `round ${roundIndex} decision`, { decision, fallback, consensus: report });
        this.events.emitRoundCompleted({
          sessionId,
          round: roundIndex,
          consensus: report,
          fallbackExperts: outcome.fallbackExperts,
          decisionFallback: fallback,
        });

        if (this.policy.stopOnConsensus && report.reachedConsensus) {
          this.store.end(sessionId, CONSENSUS_REASON);
          break;
        }
        if (roundIndex >= session.maxRounds) {
          this.store.end(sessionId, ROUND_LIMIT_REASON);
          break;
        }
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.store.end(sessionId, `fatal error: ${message}`);
      transition("terminated", session.currentRound);
      log.error("session", sessionId, "fatal:", describeError(err));
      slog?.write("error", `fatal error: ${message}`);
      this.events.emitSessionEnded({
        sessionId,
        reason: session.terminationReason ?? `fatal error: ${message}`,
        totalRounds: session.currentRound,
      });
      throw err;
    }

    transition("terminated", session.currentRound);
    const result = this.buildResult(sessionId, Date.now() - start);
    log.info("deliberation end:", sessionId, result.totalRounds, "rounds,", result.terminationReason + ",",
      "consensus=" + result.consensusReached + ",", result.durationMs + "ms");
    slog?.event("info", "deliberation end", {
      totalRounds: result.totalRounds,
      terminationReason: result.terminationReason,
      consensusRounds: result.consensusRounds,
      usage: result.usage,
    });
    this.events.emitSessionEnded({
      sessionId,
      reason: result.terminationReason,
      totalRounds: result.totalRounds,
    });
    return result;
  }

  /** Decision step for a round whose opinions are all recorded. Always records a decision. */
  private async decide(sessionId: string, roundIndex: number): Promise<{ decision: Decision; fallback: boolean }> {
    const session = this.store.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    const round = session.rounds.find((r) => r.index === roundIndex);

    const result = await settle(() => this.coordinator.decide({
      sessionId,
      context: session.context,
      roundIndex,
      maxRounds: session.maxRounds,
      opinions: round?.opinions ?? {},
      history: session.rounds.filter((r) => r.index < roundIndex),
    }));

    let candidate: Decision;
    let fallback = false;
    if (!result.ok) {
      candidate = fallbackDecision(describeError(result.error));
      fallback = true;
    } else {
      const checked = validateDecision(result.value);
      if (checked.ok) {
        candidate = checked.value;
      } else {
        candidate = fallbackDecision(`invalid decision: ${checked.issues.join("; ")}`);
        fallback = true;
      }
    }
    if (fallback) {
      log.warn("session", sessionId, "round", roundIndex, "decision fell back:", candidate.rationale);
    }

    return { decision: this.store.recordDecision(sessionId, candidate, roundIndex), fallback };
  }

  private buildResult(sessionId: string, durationMs: number): DeliberationResult {
    const snapshot = this.store.snapshot(sessionId);
    if (!snapshot) throw new SessionNotFoundError(sessionId);

    const terminationReason = snapshot.terminationReason ?? "unknown";
    const consensusRounds = snapshot.rounds
      .filter((r) => r.consensus?.reachedConsensus)
      .map((r) => r.index);

    return {
      sessionId,
      totalRounds: snapshot.currentRound,
      terminationReason,
      finalDecision: this.getFinalDecision(sessionId)
        ?? fallbackDecision(`no round produced a decision (${terminationReason})`),
      consensusReached: consensusRounds.length > 0,
      consensusRounds,
      rounds: [...snapshot.rounds],
      usage: this.usage.report(sessionId),
      durationMs,
    };
  }
}
