/**
 * Deliberation event bus: a typed EventEmitter for orchestrator progress.
 *
 * Lets surfaces (CLI progress lines, MCP status) follow a run without
 * polling the store. Payloads carry ids, indices and reports only; no
 * case text.
 */

import { EventEmitter } from "node:events";
import type { ConsensusReport } from "./consensus/base.js";

export type DeliberationState =
  | "idle"
  | "round_open"
  | "opinions_collected"
  | "decision_recorded"
  | "terminated";

export interface StateChangedEvent {
  sessionId: string;
  from: DeliberationState;
  to: DeliberationState;
  round: number;
}

export interface RoundCompletedEvent {
  sessionId: string;
  round: number;
  consensus: ConsensusReport;
  /** Experts whose opinion was replaced by the fallback this round */
  fallbackExperts: string[];
  decisionFallback: boolean;
}

export interface SessionEndedEvent {
  sessionId: string;
  reason: string;
  totalRounds: number;
}

export class DeliberationEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(0); // pub/sub, any number of subscribers
  }

  emitStateChanged(event: StateChangedEvent): void {
    this.emit("state:changed", event);
  }

  onStateChanged(listener: (event: StateChangedEvent) => void): this {
    return this.on("state:changed", listener);
  }

  emitRoundCompleted(event: RoundCompletedEvent): void {
    this.emit("round:completed", event);
  }

  onRoundCompleted(listener: (event: RoundCompletedEvent) => void): this {
    return this.on("round:completed", listener);
  }

  offRoundCompleted(listener: (event: RoundCompletedEvent) => void): this {
    return this.off("round:completed", listener);
  }

  emitSessionEnded(event: SessionEndedEvent): void {
    this.emit("session:ended", event);
  }

  onSessionEnded(listener: (event: SessionEndedEvent) => void): this {
    return this.on("session:ended", listener);
  }
}
