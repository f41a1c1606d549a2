/**
 * Public API of the consilium package.
 *
 * Re-exports the engine for programmatic use: run deliberations with your
 * own experts and coordinator, or reuse the contracts and recovery parser.
 */

// --- Contracts ---
export {
  MAX_LIST_ITEMS,
  CaseContextSchema,
  OpinionSchema,
  DecisionSchema,
  validateCaseContext,
  validateOpinion,
  validateDecision,
  expertFallbackOpinion,
  recoveryFallbackOpinion,
  fallbackDecision,
} from "./contracts.js";
export type { CaseContext, CaseContextInput, CaseValue, Opinion, Decision, ValidationResult } from "./contracts.js";
export { buildCaseContext, extractIntakeSignals, renderCaseContext, INTAKE_STAGES } from "./case-context.js";
export type { IntakeAnswers, IntakeStage } from "./case-context.js";

// --- Sessions ---
export { SessionStore, DEFAULT_MAX_ROUNDS, MAX_ROUNDS_LIMIT, DEFAULT_PANEL_SIZE, ROUND_LIMIT_REASON } from "./session-store.js";
export type { Session, Round } from "./session-store.js";
export { SessionLock } from "./session-lock.js";

// --- Deliberation ---
export { RoundCoordinator, settle, resolveOpinion } from "./round-coordinator.js";
export type { Result, RoundOutcome, ResolvedOpinion } from "./round-coordinator.js";
export {
  DeliberationOrchestrator,
  DEFAULT_POLICY,
  CONSENSUS_REASON,
  ABORTED_REASON,
  PANEL_MISMATCH_REASON,
} from "./orchestrator.js";
export type { DeliberationPolicy, DeliberationResult, OrchestratorOptions, RunOptions } from "./orchestrator.js";
export { DeliberationEventBus } from "./events.js";
export type { DeliberationState, StateChangedEvent, RoundCompletedEvent, SessionEndedEvent } from "./events.js";

// --- Consensus ---
export { evaluateConsensus, describeConsensus } from "./consensus/evaluator.js";
export { normalizeItem, sharedItems } from "./consensus/overlap.js";
export type { ConsensusReport, ConsensusInput, SharedItem } from "./consensus/base.js";

// --- Recovery ---
export { recoverOpinion, recoverDecision } from "./recovery/recovery.js";
export type { RecoveryOutcome, RecoveryOptions } from "./recovery/recovery.js";
export { parseOpinionText, parseDecisionText } from "./recovery/parser.js";

// --- Experts & backends ---
export { LlmExpert, LlmCoordinator, createPanel, createCoordinator } from "./experts.js";
export type { IExpert, IDecisionMaker, ExpertRequest, DecisionRequest } from "./experts.js";
export { createBackend, OpenAICompatBackend, OllamaBackend } from "./backends/index.js";
export type { IGenerationBackend, GenerationRequest, GenerationResult, TokenUsage } from "./backends/index.js";
export { UsageMeter } from "./usage.js";
export type { UsageReport } from "./usage.js";

// --- Imaging ---
export { SafeCaptioner, HttpCaptioner, createCaptioner, loadImage, postprocessCaption } from "./imaging.js";
export type { ImageCaptioner, ImageInput } from "./imaging.js";

// --- Config & privacy ---
export { loadConfig, getUserDataDir, ConfigSchema } from "./config.js";
export type { Config, BackendConfig, ExpertConfig, PersonaConfig } from "./config.js";
export { redactForLog, setSensitivePatterns } from "./redaction.js";

// --- Errors ---
export {
  DeliberationError,
  SessionNotFoundError,
  SessionAlreadyTerminatedError,
  RoundLimitReachedError,
  NoOpenRoundError,
  RoundStillOpenError,
  InvalidOpinionError,
  InvalidDecisionError,
  InvalidSessionIdError,
  InvalidCaseContextError,
  PanelSizeMismatchError,
  GenerationTimeoutError,
  GenerationEmptyError,
  GenerationTruncatedError,
} from "./errors.js";
export type { DeliberationErrorCode } from "./errors.js";

// --- MCP ---
export { createMcpServer, createOrchestrator, startServer } from "./server.js";
