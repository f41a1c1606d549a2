/**
 * MCP tool definitions (Zod schemas) and their handlers.
 *
 * The handlers are transport-free: they take parsed arguments and return
 * MCP text content, so server.ts only has to register them.
 */

import { z } from "zod";
import type { Config } from "./config.js";
import { CaseContextSchema } from "./contracts.js";
import { buildCaseContext } from "./case-context.js";
import type { IExpert } from "./experts.js";
import type { DeliberationOrchestrator } from "./orchestrator.js";
import { MAX_ROUNDS_LIMIT } from "./session-store.js";
import { DeliberationError, SessionNotFoundError, describeError } from "./errors.js";
import { redactForLog } from "./redaction.js";
import { createLogger } from "./logger.js";

const log = createLogger("tools");

// --- Tool input schemas ---

export const IntakeAnswersSchema = z.object({
  demographics: z.string().optional().describe("Age, sex, occupation"),
  history: z.string().optional().describe("Past medical history"),
  symptoms: z.string().optional().describe("Current symptoms"),
  medications: z.string().optional().describe("Current medications"),
  vitals: z.record(z.string(), z.string()).optional().describe("Vital signs, e.g. { \"temp\": \"38.9C\" }"),
  imaging_finding: z.string().optional().describe("Caption of an imaging study, if any"),
  notes: z.string().optional().describe("Anything else the patient reported"),
});

export const StartSessionInputSchema = z.object({
  session_id: z.string().describe("Caller-chosen session id ([A-Za-z0-9_-], up to 128 chars)"),
  case_context: CaseContextSchema
    .optional()
    .describe("Structured case context. Takes precedence over intake."),
  intake: IntakeAnswersSchema
    .optional()
    .describe("Free-text intake answers, turned into a case context"),
  max_rounds: z
    .number()
    .int()
    .min(1)
    .max(MAX_ROUNDS_LIMIT)
    .optional()
    .describe(`Round budget (default: from config, at most ${MAX_ROUNDS_LIMIT})`),
});

export const RunDeliberationInputSchema = z.object({
  session_id: z.string().describe("Session to run to termination"),
});

export const GetFinalDecisionInputSchema = z.object({
  session_id: z.string().describe("Session to read the latest decision from"),
});

export const GetSessionInputSchema = z.object({
  session_id: z.string().describe("Session to describe"),
});

export const EndSessionInputSchema = z.object({
  session_id: z.string().describe("Session to terminate"),
  reason: z.string().optional().describe("Termination reason (default: \"ended by caller\")"),
});

// --- Tool definitions for MCP registration ---

export const TOOL_DEFINITIONS = [
  {
    name: "start_session",
    description:
      "Register a deliberation session for a case. Idempotent: an existing " +
      "session id is returned unchanged.",
    inputSchema: StartSessionInputSchema,
  },
  {
    name: "run_deliberation",
    description:
      "Run the configured expert panel on a session until it terminates " +
      "(round limit, consensus or error). Returns the final decision.",
    inputSchema: RunDeliberationInputSchema,
  },
  {
    name: "get_final_decision",
    description: "Return the decision of the latest round that produced one.",
    inputSchema: GetFinalDecisionInputSchema,
  },
  {
    name: "get_session",
    description:
      "Return a session's status: rounds, consensus reports and termination. " +
      "Free-text fields are redacted.",
    inputSchema: GetSessionInputSchema,
  },
  {
    name: "end_session",
    description: "Terminate a session and discard its state. Later calls with the id report it as not found.",
    inputSchema: EndSessionInputSchema,
  },
] as const;

// --- Handlers ---

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ToolDeps {
  orchestrator: DeliberationOrchestrator;
  /** Experts a run_deliberation call uses. Built per call so usage stays per session. */
  panel: () => readonly IExpert[];
  config: Config;
}

function textResult(payload: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }] };
}

function errorResult(err: unknown): ToolResult {
  const text = err instanceof DeliberationError ? `${err.code}: ${err.message}` : describeError(err);
  return { content: [{ type: "text" as const, text }], isError: true };
}

async function guarded(tool: string, fn: () => Promise<ToolResult> | ToolResult): Promise<ToolResult> {
  try {
    return await fn();
  } catch (err) {
    log.warn(tool, "failed:", describeError(err));
    return errorResult(err);
  }
}

export function createToolHandlers(deps: ToolDeps) {
  const { orchestrator, config } = deps;

  return {
    start_session: (args: z.infer<typeof StartSessionInputSchema>) =>
      guarded("start_session", () => {
        const context = args.case_context ?? buildCaseContext({
          demographics: args.intake?.demographics,
          history: args.intake?.history,
          symptoms: args.intake?.symptoms,
          medications: args.intake?.medications,
          vitals: args.intake?.vitals,
          imagingFinding: args.intake?.imaging_finding,
          notes: args.intake?.notes,
        });
        const session = orchestrator.startSession(
          args.session_id,
          context,
          args.max_rounds ?? config.deliberation.maxRounds,
          config.panel.size,
        );
        return textResult({
          session_id: session.id,
          max_rounds: session.maxRounds,
          panel_size: session.panelSize,
          current_round: session.currentRound,
          terminated: session.terminated,
        });
      }),

    run_deliberation: (args: z.infer<typeof RunDeliberationInputSchema>) =>
      guarded("run_deliberation", async () => {
        const result = await orchestrator.runDeliberation(args.session_id, deps.panel());
        return textResult({
          session_id: result.sessionId,
          total_rounds: result.totalRounds,
          termination_reason: result.terminationReason,
          consensus_reached: result.consensusReached,
          consensus_rounds: result.consensusRounds,
          final_decision: result.finalDecision,
          usage: { total_tokens: result.usage.totalTokens, calls: result.usage.calls },
          duration_ms: result.durationMs,
        });
      }),

    get_final_decision: (args: z.infer<typeof GetFinalDecisionInputSchema>) =>
      guarded("get_final_decision", () => {
        const session = orchestrator.getSession(args.session_id);
        if (!session) {
          throw new SessionNotFoundError(args.session_id);
        }
        const decision = orchestrator.getFinalDecision(args.session_id);
        return textResult({ session_id: session.id, decision: decision ?? null });
      }),

    get_session: (args: z.infer<typeof GetSessionInputSchema>) =>
      guarded("get_session", () => {
        const snapshot = orchestrator.store.snapshot(args.session_id);
        if (!snapshot) {
          throw new SessionNotFoundError(args.session_id);
        }
        return textResult(redactForLog(snapshot));
      }),

    end_session: (args: z.infer<typeof EndSessionInputSchema>) =>
      guarded("end_session", async () => {
        const session = orchestrator.getSession(args.session_id);
        if (!session) {
          throw new SessionNotFoundError(args.session_id);
        }
        orchestrator.endSession(args.session_id, args.reason);
        const ended = {
          session_id: session.id,
          terminated: session.terminated,
          termination_reason: session.terminationReason,
        };
        await orchestrator.discardSession(args.session_id);
        return textResult(ended);
      }),
  };
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;
