/**
 * Consensus interfaces.
 *
 * A round's consensus is judged from two independent signals:
 * - Declared: the coordinator's decision carries a termination reason
 * - Overlap: distinct experts share a hypothesis and a test
 *
 * Either is enough. Neither calls a generation backend.
 */

import type { Decision, Opinion } from "../contracts.js";

export type ConsensusSignal = "declared" | "overlap";

export interface ConsensusInput {
  /** Recorded opinions for the round, keyed by expert id */
  opinions: Readonly<Record<string, Opinion>>;
  /** The round's decision, if one was recorded */
  decision: Decision | null;
}

export interface SharedItem {
  /** Normalized (trimmed, lower-cased) text */
  item: string;
  /** Distinct experts that produced it, sorted */
  experts: string[];
}

export interface ConsensusReport {
  reachedConsensus: boolean;
  /** Decision carried a non-empty termination reason */
  declaredByDecision: boolean;
  /** Overlap heuristic held */
  byOverlap: boolean;
  /** Hypotheses produced by two or more distinct experts, most supported first */
  sharedHypotheses: SharedItem[];
  /** Tests produced by two or more distinct experts, most supported first */
  sharedTests: SharedItem[];
  /** Number of opinions the report was computed from */
  expertCount: number;
}

export interface IConsensusCheck {
  readonly signal: ConsensusSignal;

  /** True when this signal alone indicates consensus. */
  holds(input: ConsensusInput): boolean;
}
