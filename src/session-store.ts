/**
 * SessionStore: in-memory registry of deliberation sessions.
 *
 * The store owns every session's round history. Callers get read-only
 * views; all mutation goes through the named operations below, which
 * validate payloads against the contracts before anything is written.
 * Nothing survives the process.
 */

import type { CaseContext, Decision, Opinion } from "./contracts.js";
import { validateCaseContext, validateDecision, validateOpinion, freezeDeep } from "./contracts.js";
import type { ConsensusReport } from "./consensus/base.js";
import {
  InvalidCaseContextError,
  InvalidDecisionError,
  InvalidOpinionError,
  InvalidSessionIdError,
  NoOpenRoundError,
  RoundStillOpenError,
  RoundLimitReachedError,
  SessionAlreadyTerminatedError,
  SessionNotFoundError,
} from "./errors.js";
import { SessionLock } from "./session-lock.js";
import { createLogger, isValidSessionId } from "./logger.js";

const log = createLogger("session-store");

export const DEFAULT_MAX_ROUNDS = 7;
export const MAX_ROUNDS_LIMIT = 13;
export const DEFAULT_PANEL_SIZE = 3;

export const ROUND_LIMIT_REASON = "round limit reached";

export interface Round {
  /** 1-based */
  readonly index: number;
  /** Expert id → opinion. Last write wins. */
  readonly opinions: Readonly<Record<string, Opinion>>;
  readonly decision: Decision | null;
  readonly consensus: ConsensusReport | null;
}

export interface Session {
  readonly id: string;
  readonly context: CaseContext;
  readonly currentRound: number;
  readonly maxRounds: number;
  readonly panelSize: number;
  readonly rounds: readonly Round[];
  readonly terminated: boolean;
  readonly terminationReason: string | null;
  readonly createdAt: string;
}

interface RoundRecord {
  index: number;
  opinions: Record<string, Opinion>;
  decision: Decision | null;
  consensus: ConsensusReport | null;
}

interface SessionRecord {
  id: string;
  context: CaseContext;
  currentRound: number;
  maxRounds: number;
  panelSize: number;
  rounds: RoundRecord[];
  terminated: boolean;
  terminationReason: string | null;
  createdAt: string;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly lock = new SessionLock();

  /**
   * Register a session. Idempotent: an existing id returns the stored
   * session untouched, whatever the other arguments say.
   */
  start(
    sessionId: string,
    context: unknown,
    maxRounds: number = DEFAULT_MAX_ROUNDS,
    panelSize: number = DEFAULT_PANEL_SIZE,
  ): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      log.debug("start: session", sessionId, "already registered, returning it");
      return existing;
    }

    if (!isValidSessionId(sessionId)) {
      throw new InvalidSessionIdError(sessionId);
    }
    if (!Number.isInteger(maxRounds) || maxRounds < 1 || maxRounds > MAX_ROUNDS_LIMIT) {
      throw new RangeError(`maxRounds must be an integer between 1 and ${MAX_ROUNDS_LIMIT}, got ${maxRounds}`);
    }
    if (!Number.isInteger(panelSize) || panelSize < 1) {
      throw new RangeError(`panelSize must be a positive integer, got ${panelSize}`);
    }

    const parsed = validateCaseContext(context);
    if (!parsed.ok) {
      throw new InvalidCaseContextError(parsed.issues);
    }

    const session: SessionRecord = {
      id: sessionId,
      context: freezeDeep(parsed.value),
      currentRound: 0,
      maxRounds,
      panelSize,
      rounds: [],
      terminated: false,
      terminationReason: null,
      createdAt: new Date().toISOString(),
    };
    this.sessions.set(sessionId, session);
    log.info("session", sessionId, "started: maxRounds=" + maxRounds, "panelSize=" + panelSize);
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  /**
   * Terminate a session. No-op when the id is unknown. The first
   * termination reason sticks; later calls do not overwrite it.
   */
  end(sessionId: string, reason: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    if (session.terminated) {
      log.debug("end: session", sessionId, "already terminated (" + session.terminationReason + ")");
      return;
    }
    session.terminated = true;
    session.terminationReason = reason;
    log.info("session", sessionId, "terminated:", reason);
  }

  /** Forget a session entirely. Returns false when it was not registered. */
  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Open the next round and return its 1-based index. The previous round
   * must be closed by a decision first (RoundStillOpenError otherwise).
   * Once the budget is spent the session is terminated with
   * "round limit reached" and RoundLimitReachedError is thrown.
   */
  beginRound(sessionId: string): number {
    const session = this.require(sessionId);
    if (session.terminated) {
      throw new SessionAlreadyTerminatedError(sessionId, session.terminationReason);
    }
    const previous = session.rounds[session.rounds.length - 1];
    if (previous && previous.decision === null) {
      throw new RoundStillOpenError(sessionId, previous.index);
    }
    if (session.currentRound >= session.maxRounds) {
      this.end(sessionId, ROUND_LIMIT_REASON);
      throw new RoundLimitReachedError(sessionId, session.maxRounds);
    }

    session.currentRound += 1;
    session.rounds.push({ index: session.currentRound, opinions: {}, decision: null, consensus: null });
    log.debug("session", sessionId, "round", session.currentRound + "/" + session.maxRounds, "opened");
    return session.currentRound;
  }

  /**
   * Store one expert's opinion in the open round. Passing `roundIndex`
   * pins the write to that round; it fails if another round is open.
   */
  recordOpinion(sessionId: string, expertId: string, opinion: unknown, roundIndex?: number): Opinion {
    const round = this.openRound(sessionId, roundIndex);
    if (!expertId.trim()) {
      throw new InvalidOpinionError(expertId, ["expert id must be non-empty"]);
    }
    const result = validateOpinion(opinion);
    if (!result.ok) {
      throw new InvalidOpinionError(expertId, result.issues);
    }
    const stored = freezeDeep(result.value);
    round.opinions[expertId] = stored;
    return stored;
  }

  /** Store the coordinator's decision. This closes the round. */
  recordDecision(sessionId: string, decision: unknown, roundIndex?: number): Decision {
    const round = this.openRound(sessionId, roundIndex);
    const result = validateDecision(decision);
    if (!result.ok) {
      throw new InvalidDecisionError(result.issues);
    }
    const stored = freezeDeep(result.value);
    round.decision = stored;
    return stored;
  }

  /** Attach the consensus report computed for an existing round. */
  recordConsensus(sessionId: string, roundIndex: number, report: ConsensusReport): ConsensusReport {
    const session = this.require(sessionId);
    const round = session.rounds.find((r) => r.index === roundIndex);
    if (!round) {
      throw new NoOpenRoundError(sessionId, `round ${roundIndex} does not exist`);
    }
    const stored = freezeDeep(report);
    round.consensus = stored;
    return stored;
  }

  /** Serialize work against one session. Different sessions never block each other. */
  withLock<T>(sessionId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.lock.run(sessionId, fn);
  }

  /** Detached, mutable deep copy, suitable for redactForLog or JSON output. */
  snapshot(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  private require(sessionId: string): SessionRecord {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private openRound(sessionId: string, roundIndex?: number): RoundRecord {
    const session = this.require(sessionId);
    if (session.terminated) {
      throw new SessionAlreadyTerminatedError(sessionId, session.terminationReason);
    }
    const round = session.rounds[session.rounds.length - 1];
    if (!round) {
      throw new NoOpenRoundError(sessionId);
    }
    if (roundIndex !== undefined && roundIndex !== round.index) {
      throw new NoOpenRoundError(sessionId, `round ${roundIndex} is not open (current round is ${round.index})`);
    }
    if (round.decision) {
      throw new NoOpenRoundError(sessionId, `round ${round.index} already has a decision`);
    }
    return round;
  }
}
