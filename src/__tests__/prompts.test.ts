import { describe, it, expect } from "vitest";
import {
  buildOpinionPrompt,
  buildDecisionPrompt,
  peerOpinions,
  renderOpinion,
  OPINION_FORMAT,
  DECISION_FORMAT,
} from "../prompts.js";
import type { CaseContext, Opinion } from "../contracts.js";
import type { Round } from "../session-store.js";

const CONTEXT: CaseContext = {
  demographics: {},
  history: {},
  symptoms: {},
  medications: {},
  vitals: {},
  imagingFinding: "",
  freeText: "fever and cough",
};

const MINE: Opinion = { hypotheses: ["flu"], tests: ["swab"], justification: "mine" };
const PEER: Opinion = { hypotheses: ["asthma"], tests: ["spirometry"], justification: "" };

describe("renderOpinion", () => {
  it("numbers list items and truncates long justifications", () => {
    const long = "x".repeat(301);
    expect(renderOpinion({ ...MINE, justification: long })).toBe(
      `Hypotheses:\n1. flu\nTests:\n1. swab\nJustification: ${"x".repeat(300)}... (301 chars total)`,
    );
  });

  it("can omit the justification", () => {
    expect(renderOpinion(MINE, false)).toBe("Hypotheses:\n1. flu\nTests:\n1. swab");
  });
});

describe("peerOpinions", () => {
  it("excludes the expert itself and sorts by id", () => {
    const peers = peerOpinions({ expert_3: PEER, expert_1: MINE, expert_2: PEER }, "expert_1");
    expect(peers.map(([id]) => id)).toEqual(["expert_2", "expert_3"]);
  });
});

describe("buildOpinionPrompt", () => {
  it("asks for an independent opinion in round 1", () => {
    const prompt = buildOpinionPrompt("expert_1", {
      sessionId: "s1",
      context: CONTEXT,
      roundIndex: 1,
      maxRounds: 3,
      priorOpinions: {},
      priorRationale: "",
    });
    expect(prompt).toBe(
      "You are expert_1, one of the experts reviewing this case.\n\n" +
      "--- Case ---\nPatient narrative:\nfever and cough\n\n" +
      "--- Round 1/3 ---\nGive your independent initial opinion.\n\n" +
      OPINION_FORMAT,
    );
  });

  it("shows the expert's own opinion apart from its peers in later rounds", () => {
    const prompt = buildOpinionPrompt("expert_1", {
      sessionId: "s1",
      context: CONTEXT,
      roundIndex: 2,
      maxRounds: 3,
      priorOpinions: { expert_1: MINE, expert_2: PEER },
      priorRationale: "round 1 summary",
    });
    expect(prompt).toContain("--- Your opinion from round 1 ---\nHypotheses:\n1. flu\nTests:\n1. swab\nJustification: mine");
    expect(prompt).toContain("--- Colleague opinions from round 1 ---\n[expert_2]\nHypotheses:\n1. asthma\nTests:\n1. spirometry\n\n");
    expect(prompt).toContain("--- Coordinator rationale from round 1 ---\nround 1 summary");
    expect(prompt).toContain("--- Round 2/3 ---\nCritique your colleagues' opinions");
    expect(prompt).not.toContain("[expert_1]");
  });

  it("skips the colleague section when there are no peers", () => {
    const prompt = buildOpinionPrompt("expert_1", {
      sessionId: "s1",
      context: CONTEXT,
      roundIndex: 2,
      maxRounds: 3,
      priorOpinions: { expert_1: MINE },
      priorRationale: "",
    });
    expect(prompt).not.toContain("Colleague opinions");
    expect(prompt).not.toContain("Coordinator rationale");
  });
});

describe("buildDecisionPrompt", () => {
  it("summarizes earlier rounds and lists this round's opinions", () => {
    const history: Round[] = [
      {
        index: 1,
        opinions: { expert_1: MINE },
        decision: {
          consensusHypotheses: ["flu", "covid"],
          prioritizedTests: ["swab"],
          rationale: "r",
          terminationReason: null,
        },
        consensus: {
          reachedConsensus: false,
          declaredByDecision: false,
          byOverlap: false,
          sharedHypotheses: [],
          sharedTests: [],
          expertCount: 1,
        },
      },
    ];
    const prompt = buildDecisionPrompt({
      sessionId: "s1",
      context: CONTEXT,
      roundIndex: 2,
      maxRounds: 3,
      opinions: { expert_2: PEER, expert_1: MINE },
      history,
    });
    expect(prompt).toBe(
      "--- Case ---\nPatient narrative:\nfever and cough\n\n" +
      "--- Previous rounds ---\nRound 1: flu, covid | consensus: no\n\n" +
      "--- Expert opinions, round 2/3 ---\n" +
      "[expert_1]\nHypotheses:\n1. flu\nTests:\n1. swab\nJustification: mine\n\n" +
      "[expert_2]\nHypotheses:\n1. asthma\nTests:\n1. spirometry\n\n" +
      DECISION_FORMAT,
    );
  });
});
