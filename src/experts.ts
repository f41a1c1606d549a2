/**
 * Experts and the coordinator.
 *
 * The round coordinator only sees IExpert / IDecisionMaker. The LLM-backed
 * implementations build a prompt, run it through ResponseRecovery and hand
 * back a contract value; they never throw for backend trouble.
 */

import type { CaseContext, Decision, Opinion } from "./contracts.js";
import type { Round } from "./session-store.js";
import type { IGenerationBackend } from "./backends/base.js";
import type { BackendConfig, Config, PersonaConfig } from "./config.js";
import type { UsageMeter } from "./usage.js";
import type { RecoveryOutcome } from "./recovery/recovery.js";
import { recoverDecision, recoverOpinion } from "./recovery/recovery.js";
import { buildDecisionPrompt, buildOpinionPrompt } from "./prompts.js";
import { COORDINATOR_PERSONA, resolvePersona } from "./personas.js";
import { createBackend } from "./backends/index.js";
import { createLogger, createSessionLog } from "./logger.js";

const log = createLogger("experts");

export interface ExpertRequest {
  sessionId: string;
  context: CaseContext;
  roundIndex: number;
  maxRounds: number;
  /**
   * Every expert's opinion from the previous round, keyed by expert id.
   * The receiving expert's own entry is included; empty in round 1.
   */
  priorOpinions: Readonly<Record<string, Opinion>>;
  /** Previous round's decision rationale, "" in round 1 */
  priorRationale: string;
}

export interface IExpert {
  readonly id: string;
  opine(request: ExpertRequest): Promise<Opinion>;
}

export interface DecisionRequest {
  sessionId: string;
  context: CaseContext;
  roundIndex: number;
  maxRounds: number;
  /** This round's opinions, keyed by expert id */
  opinions: Readonly<Record<string, Opinion>>;
  /** Earlier rounds, oldest first */
  history: readonly Round[];
}

export interface IDecisionMaker {
  decide(request: DecisionRequest): Promise<Decision>;
}

export interface GenerationProfile {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

interface LlmParticipantOptions {
  backend: IGenerationBackend;
  profile: GenerationProfile;
  usage?: UsageMeter;
  /** Called with every recovery outcome, e.g. to write the session log */
  onOutcome?: (source: string, request: { sessionId: string; roundIndex: number }, outcome: RecoveryOutcome<unknown>) => void;
}

export interface LlmExpertOptions extends LlmParticipantOptions {
  id: string;
  persona: PersonaConfig;
}

export class LlmExpert implements IExpert {
  readonly id: string;
  readonly persona: PersonaConfig;
  private readonly options: LlmExpertOptions;

  constructor(options: LlmExpertOptions) {
    this.id = options.id;
    this.persona = options.persona;
    this.options = options;
  }

  async opine(request: ExpertRequest): Promise<Opinion> {
    const { backend, profile, usage, onOutcome } = this.options;
    const userPrompt = buildOpinionPrompt(this.id, request);
    log.debug(this.id, "round", request.roundIndex, "prompt:", userPrompt.length, "chars");

    const outcome = await recoverOpinion(
      backend,
      {
        systemPrompt: this.persona.systemPrompt,
        userPrompt,
        maxTokens: profile.maxTokens,
        temperature: profile.temperature,
      },
      { source: this.id, timeoutMs: profile.timeoutMs },
    );

    usage?.record(request.sessionId, this.id, request.roundIndex, outcome.tokens, outcome.attempts);
    onOutcome?.(this.id, request, outcome);
    return outcome.value;
  }
}

export interface LlmCoordinatorOptions extends LlmParticipantOptions {
  persona?: PersonaConfig;
}

export class LlmCoordinator implements IDecisionMaker {
  static readonly SOURCE = "coordinator";
  private readonly options: LlmCoordinatorOptions;

  constructor(options: LlmCoordinatorOptions) {
    this.options = options;
  }

  async decide(request: DecisionRequest): Promise<Decision> {
    const { backend, profile, usage, onOutcome } = this.options;
    const persona = this.options.persona ?? COORDINATOR_PERSONA;
    const userPrompt = buildDecisionPrompt(request);
    log.debug("round", request.roundIndex, "decision prompt:", userPrompt.length, "chars");

    const outcome = await recoverDecision(
      backend,
      {
        systemPrompt: persona.systemPrompt,
        userPrompt,
        maxTokens: profile.maxTokens,
        temperature: profile.temperature,
      },
      { source: LlmCoordinator.SOURCE, timeoutMs: profile.timeoutMs },
    );

    usage?.record(request.sessionId, LlmCoordinator.SOURCE, request.roundIndex, outcome.tokens, outcome.attempts);
    onOutcome?.(LlmCoordinator.SOURCE, request, outcome);
    return outcome.value;
  }
}

// --- Panel assembly from config ---

export interface PanelOptions {
  usage?: UsageMeter;
  /** Defaults to createBackend; tests pass a scripted backend here */
  backendFactory?: (config: BackendConfig, model?: string) => IGenerationBackend;
}

/** Writes recovery metadata (never the raw text) to the session log. */
function logOutcome(
  source: string,
  request: { sessionId: string; roundIndex: number },
  outcome: RecoveryOutcome<unknown>,
): void {
  createSessionLog(request.sessionId)?.event(
    outcome.recovered ? "debug" : "warn",
    `${source} round ${request.roundIndex} recovery`,
    { recovered: outcome.recovered, attempts: outcome.attempts, error: outcome.error, tokens: outcome.tokens },
  );
}

export function createPanel(config: Config, options: PanelOptions = {}): LlmExpert[] {
  const factory = options.backendFactory ?? createBackend;
  const { expert, timeoutMs } = config.backend;
  return config.panel.experts.map((e) => new LlmExpert({
    id: e.id,
    persona: resolvePersona(e.persona, config),
    backend: factory(config.backend, e.model),
    profile: { maxTokens: expert.maxTokens, temperature: expert.temperature, timeoutMs },
    usage: options.usage,
    onOutcome: logOutcome,
  }));
}

export function createCoordinator(config: Config, options: PanelOptions = {}): LlmCoordinator {
  const factory = options.backendFactory ?? createBackend;
  const { coordinator, timeoutMs } = config.backend;
  return new LlmCoordinator({
    backend: factory(config.backend),
    profile: { maxTokens: coordinator.maxTokens, temperature: coordinator.temperature, timeoutMs },
    usage: options.usage,
    onOutcome: logOutcome,
  });
}
