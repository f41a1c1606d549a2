import { describe, it, expect, vi } from "vitest";
import { LlmExpert, LlmCoordinator, createPanel, createCoordinator } from "../experts.js";
import type { DecisionRequest, ExpertRequest } from "../experts.js";
import type { BackendConfig } from "../config.js";
import { ConfigSchema } from "../config.js";
import { COORDINATOR_PERSONA, resolvePersona } from "../personas.js";
import { recoveryFallbackOpinion } from "../contracts.js";
import { UsageMeter } from "../usage.js";
import { ScriptedBackend } from "./fakes.js";

const CONTEXT = {
  demographics: {},
  history: {},
  symptoms: {},
  medications: {},
  vitals: {},
  imagingFinding: "",
  freeText: "fever and cough",
};

const OPINION_TEXT = "**Hypotheses**\n1. Pneumonia\n**Tests**\n1. Chest X-ray\n**Justification**\nFocal crackles.";
const DECISION_TEXT = "**Consensus Hypotheses**\n1. Pneumonia\n**Prioritized Tests**\n1. Chest X-ray\n" +
  "**Consensus Rationale**\nShared by all.\n**Consensus Status**\nClear consensus";

const EXPERT_REQUEST: ExpertRequest = {
  sessionId: "s1",
  context: CONTEXT,
  roundIndex: 1,
  maxRounds: 3,
  priorOpinions: {},
  priorRationale: "",
};

const PROFILE = { maxTokens: 700, temperature: 0.7, timeoutMs: 1000 };

describe("LlmExpert", () => {
  it("prompts under its persona and records usage", async () => {
    const backend = new ScriptedBackend([{ text: OPINION_TEXT }]);
    const usage = new UsageMeter();
    const persona = resolvePersona("internist");
    const expert = new LlmExpert({ id: "expert_1", persona, backend, profile: PROFILE, usage });

    const result = await expert.opine(EXPERT_REQUEST);

    expect(result).toEqual({ hypotheses: ["Pneumonia"], tests: ["Chest X-ray"], justification: "Focal crackles." });
    expect(backend.requests[0]?.systemPrompt).toBe(persona.systemPrompt);
    expect(backend.requests[0]?.userPrompt.startsWith("You are expert_1, one of the experts reviewing this case.")).toBe(true);
    expect(backend.requests[0]).toMatchObject({ maxTokens: 700, temperature: 0.7, timeoutMs: 1000 });
    expect(usage.report("s1")).toEqual({
      totalTokens: { inputTokens: 10, outputTokens: 5 },
      perSource: { expert_1: { inputTokens: 10, outputTokens: 5 } },
      perRound: [{ round: 1, tokens: { inputTokens: 10, outputTokens: 5 } }],
      calls: 1,
    });
  });

  it("returns the recovery fallback instead of throwing", async () => {
    const backend = new ScriptedBackend([{ error: new Error("connection refused") }]);
    const onOutcome = vi.fn();
    const expert = new LlmExpert({ id: "expert_1", persona: resolvePersona("generalist"), backend, profile: PROFILE, onOutcome });

    const result = await expert.opine(EXPERT_REQUEST);

    expect(result).toEqual(recoveryFallbackOpinion("Error: connection refused"));
    expect(onOutcome).toHaveBeenCalledTimes(1);
    expect(onOutcome.mock.calls[0]?.[0]).toBe("expert_1");
    expect(onOutcome.mock.calls[0]?.[2]).toMatchObject({ recovered: false, attempts: 1 });
  });
});

describe("LlmCoordinator", () => {
  it("parses the decision and detects declared consensus", async () => {
    const backend = new ScriptedBackend([{ text: DECISION_TEXT }]);
    const usage = new UsageMeter();
    const coordinator = new LlmCoordinator({ backend, profile: PROFILE, usage });
    const request: DecisionRequest = {
      sessionId: "s1",
      context: CONTEXT,
      roundIndex: 2,
      maxRounds: 3,
      opinions: { expert_1: { hypotheses: ["Pneumonia"], tests: ["Chest X-ray"], justification: "" } },
      history: [],
    };

    const decision = await coordinator.decide(request);

    expect(decision.consensusHypotheses).toEqual(["Pneumonia"]);
    expect(decision.prioritizedTests).toEqual(["Chest X-ray"]);
    expect(decision.rationale).toBe("Shared by all.");
    expect(decision.terminationReason).not.toBeNull();
    expect(backend.requests[0]?.systemPrompt).toBe(COORDINATOR_PERSONA.systemPrompt);
    expect(usage.report("s1").perSource).toEqual({ coordinator: { inputTokens: 10, outputTokens: 5 } });
    expect(usage.report("s1").perRound).toEqual([{ round: 2, tokens: { inputTokens: 10, outputTokens: 5 } }]);
  });
});

describe("createPanel", () => {
  const config = ConfigSchema.parse({
    backend: { model: "base-model", timeoutMs: 5000 },
    panel: {
      size: 2,
      experts: [
        { id: "a", persona: "internist", model: "other-model" },
        { id: "b" },
      ],
    },
  });

  it("builds one expert per configured id", () => {
    const models: Array<string | undefined> = [];
    const factory = (_config: BackendConfig, model?: string) => {
      models.push(model);
      return new ScriptedBackend([], model ?? "default");
    };

    const panel = createPanel(config, { backendFactory: factory });

    expect(panel.map((e) => e.id)).toEqual(["a", "b"]);
    expect(panel.map((e) => e.persona.name)).toEqual(["internist", "generalist"]);
    expect(models).toEqual(["other-model", undefined]);
  });

  it("applies the expert generation profile", async () => {
    const backend = new ScriptedBackend([{ text: OPINION_TEXT }]);
    const [expert] = createPanel(config, { backendFactory: () => backend });
    await expert?.opine(EXPERT_REQUEST);
    expect(backend.requests[0]).toMatchObject({ maxTokens: 700, temperature: 0.7, timeoutMs: 5000 });
  });
});

describe("createCoordinator", () => {
  it("uses the coordinator profile and the base model", async () => {
    const config = ConfigSchema.parse({});
    const backend = new ScriptedBackend([{ text: DECISION_TEXT }]);
    const factory = vi.fn((_config: BackendConfig, _model?: string) => backend);
    const coordinator = createCoordinator(config, { backendFactory: factory });

    await coordinator.decide({
      sessionId: "s1",
      context: CONTEXT,
      roundIndex: 1,
      maxRounds: 7,
      opinions: {},
      history: [],
    });

    expect(factory).toHaveBeenCalledWith(config.backend);
    expect(backend.requests[0]).toMatchObject({ maxTokens: 600, temperature: 0.3, timeoutMs: 60_000 });
  });
});
