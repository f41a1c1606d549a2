/**
 * Typed error classes for the deliberation engine.
 *
 * Session-level errors are surfaced to callers. Generation errors are raised
 * inside the recovery pipeline and converted into fallback opinions/decisions
 * before they reach the Opinion/Decision boundary.
 */

export type DeliberationErrorCode =
  | "SESSION_NOT_FOUND"
  | "SESSION_ALREADY_TERMINATED"
  | "ROUND_LIMIT_REACHED"
  | "NO_OPEN_ROUND"
  | "ROUND_STILL_OPEN"
  | "INVALID_OPINION"
  | "INVALID_DECISION"
  | "INVALID_SESSION_ID"
  | "INVALID_CASE_CONTEXT"
  | "PANEL_SIZE_MISMATCH"
  | "GENERATION_TIMEOUT"
  | "GENERATION_EMPTY"
  | "GENERATION_TRUNCATED";

export class DeliberationError extends Error {
  readonly code: DeliberationErrorCode;

  constructor(code: DeliberationErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "DeliberationError";
  }
}

export class SessionNotFoundError extends DeliberationError {
  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export class SessionAlreadyTerminatedError extends DeliberationError {
  constructor(sessionId: string, reason: string | null) {
    super("SESSION_ALREADY_TERMINATED",
      `Session ${sessionId} is already terminated` + (reason ? ` (${reason})` : ""));
    this.name = "SessionAlreadyTerminatedError";
  }
}

/** Raised by beginRound once the budget is spent. The session is terminated before this is thrown. */
export class RoundLimitReachedError extends DeliberationError {
  constructor(sessionId: string, maxRounds: number) {
    super("ROUND_LIMIT_REACHED", `Session ${sessionId} reached its round limit (${maxRounds})`);
    this.name = "RoundLimitReachedError";
  }
}

export class NoOpenRoundError extends DeliberationError {
  constructor(sessionId: string, detail = "call beginRound first") {
    super("NO_OPEN_ROUND", `Session ${sessionId} has no open round: ${detail}`);
    this.name = "NoOpenRoundError";
  }
}

export class RoundStillOpenError extends DeliberationError {
  constructor(sessionId: string, roundIndex: number) {
    super("ROUND_STILL_OPEN", `Session ${sessionId} cannot open a new round: round ${roundIndex} has no decision yet`);
    this.name = "RoundStillOpenError";
  }
}

export class InvalidOpinionError extends DeliberationError {
  readonly issues: string[];

  constructor(expertId: string, issues: string[]) {
    super("INVALID_OPINION", `Invalid opinion from ${expertId}: ${issues.join("; ")}`);
    this.issues = issues;
    this.name = "InvalidOpinionError";
  }
}

export class InvalidDecisionError extends DeliberationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_DECISION", `Invalid decision: ${issues.join("; ")}`);
    this.issues = issues;
    this.name = "InvalidDecisionError";
  }
}

export class InvalidSessionIdError extends DeliberationError {
  constructor(sessionId: string) {
    super("INVALID_SESSION_ID",
      `Invalid session ID: "${sessionId}". Must be alphanumeric/hyphens/underscores, max 128 chars.`);
    this.name = "InvalidSessionIdError";
  }
}

export class InvalidCaseContextError extends DeliberationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CASE_CONTEXT", `Invalid case context: ${issues.join("; ")}`);
    this.issues = issues;
    this.name = "InvalidCaseContextError";
  }
}

export class PanelSizeMismatchError extends DeliberationError {
  constructor(sessionId: string, expected: number, actual: number, supplied = actual) {
    super("PANEL_SIZE_MISMATCH",
      `Session ${sessionId} expects a panel of ${expected} distinct experts, got ${actual}` +
      (supplied !== actual ? ` among ${supplied} supplied` : ""));
    this.name = "PanelSizeMismatchError";
  }
}

export class GenerationTimeoutError extends DeliberationError {
  constructor(source: string, timeoutMs: number) {
    super("GENERATION_TIMEOUT", `${source}: generation timed out after ${timeoutMs}ms`);
    this.name = "GenerationTimeoutError";
  }
}

export class GenerationEmptyError extends DeliberationError {
  constructor(source: string) {
    super("GENERATION_EMPTY", `${source}: backend returned empty content`);
    this.name = "GenerationEmptyError";
  }
}

export class GenerationTruncatedError extends DeliberationError {
  constructor(source: string) {
    super("GENERATION_TRUNCATED", `${source}: backend returned empty content after continuation retry`);
    this.name = "GenerationTruncatedError";
  }
}

/** Render any thrown value as "Name: message" for fallback rationales. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
