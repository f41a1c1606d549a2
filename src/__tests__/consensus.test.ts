import { describe, it, expect } from "vitest";
import type { Decision, Opinion } from "../contracts.js";
import { evaluateConsensus, describeConsensus } from "../consensus/evaluator.js";
import { OverlapConsensus, DeclaredConsensus, normalizeItem, sharedItems } from "../consensus/overlap.js";

function opinion(hypotheses: string[], tests: string[]): Opinion {
  return { hypotheses, tests, justification: "" };
}

function decision(terminationReason: string | null): Decision {
  return {
    consensusHypotheses: ["pneumonia"],
    prioritizedTests: ["chest x-ray"],
    rationale: "summary",
    terminationReason,
  };
}

describe("normalizeItem", () => {
  it("trims and lower-cases", () => {
    expect(normalizeItem("  Community-Acquired Pneumonia ")).toBe("community-acquired pneumonia");
  });

  it("keeps inner whitespace", () => {
    expect(normalizeItem("chest  x-ray")).toBe("chest  x-ray");
  });
});

describe("sharedItems", () => {
  it("counts distinct experts only", () => {
    const shared = sharedItems(new Map([
      ["a", ["Flu", "flu", "FLU"]],
      ["b", ["covid"]],
    ]));
    expect(shared).toEqual([]);
  });

  it("orders by support, then alphabetically", () => {
    const shared = sharedItems(new Map([
      ["a", ["pneumonia", "bronchitis"]],
      ["b", ["Pneumonia", "Bronchitis"]],
      ["c", ["pneumonia"]],
    ]));
    expect(shared).toEqual([
      { item: "pneumonia", experts: ["a", "b", "c"] },
      { item: "bronchitis", experts: ["a", "b"] },
    ]);
  });
});

describe("OverlapConsensus", () => {
  const overlap = new OverlapConsensus();

  it("holds when a hypothesis and a test are each shared", () => {
    const holds = overlap.holds({
      opinions: {
        a: opinion(["Pneumonia", "Asthma"], ["Chest X-ray"]),
        b: opinion(["pneumonia "], ["chest x-ray", "CBC"]),
        c: opinion(["gerd"], ["endoscopy"]),
      },
      decision: null,
    });
    expect(holds).toBe(true);
  });

  it("needs at least three opinions", () => {
    const holds = overlap.holds({
      opinions: {
        a: opinion(["pneumonia"], ["chest x-ray"]),
        b: opinion(["pneumonia"], ["chest x-ray"]),
      },
      decision: null,
    });
    expect(holds).toBe(false);
  });

  it("fails when only hypotheses are shared", () => {
    const holds = overlap.holds({
      opinions: {
        a: opinion(["pneumonia"], ["cbc"]),
        b: opinion(["pneumonia"], ["chest x-ray"]),
        c: opinion(["gerd"], ["endoscopy"]),
      },
      decision: null,
    });
    expect(holds).toBe(false);
  });

  it("fails for pairwise disjoint opinions", () => {
    const holds = overlap.holds({
      opinions: {
        a: opinion(["flu"], ["swab"]),
        b: opinion(["asthma"], ["spirometry"]),
        c: opinion(["gerd"], ["endoscopy"]),
      },
      decision: null,
    });
    expect(holds).toBe(false);
  });

  it("never holds for a single opinion", () => {
    expect(overlap.holds({ opinions: { a: opinion(["flu"], ["swab"]) }, decision: null })).toBe(false);
  });
});

describe("DeclaredConsensus", () => {
  const declared = new DeclaredConsensus();

  it("holds for a non-empty termination reason", () => {
    expect(declared.holds({ opinions: {}, decision: decision("consensus declared by coordinator") })).toBe(true);
  });

  it("does not hold without a decision or reason", () => {
    expect(declared.holds({ opinions: {}, decision: null })).toBe(false);
    expect(declared.holds({ opinions: {}, decision: decision(null) })).toBe(false);
  });
});

describe("evaluateConsensus", () => {
  it("reports overlap and declared signals separately", () => {
    const report = evaluateConsensus({
      opinions: {
        a: opinion(["flu"], ["swab"]),
        b: opinion(["asthma"], ["spirometry"]),
      },
      decision: decision("consensus declared by coordinator"),
    });
    expect(report).toEqual({
      reachedConsensus: true,
      declaredByDecision: true,
      byOverlap: false,
      sharedHypotheses: [],
      sharedTests: [],
      expertCount: 2,
    });
  });

  it("lists shared items but reports no overlap for a two-expert round", () => {
    const report = evaluateConsensus({
      opinions: {
        a: opinion(["pneumonia"], ["chest x-ray"]),
        b: opinion(["Pneumonia"], ["Chest X-ray"]),
      },
      decision: decision(null),
    });
    expect(report).toEqual({
      reachedConsensus: false,
      declaredByDecision: false,
      byOverlap: false,
      sharedHypotheses: [{ item: "pneumonia", experts: ["a", "b"] }],
      sharedTests: [{ item: "chest x-ray", experts: ["a", "b"] }],
      expertCount: 2,
    });
  });

  it("is false when neither signal holds", () => {
    const report = evaluateConsensus({
      opinions: {
        a: opinion(["flu"], ["swab"]),
        b: opinion(["asthma"], ["spirometry"]),
        c: opinion(["gerd"], ["endoscopy"]),
      },
      decision: decision(null),
    });
    expect(report.reachedConsensus).toBe(false);
    expect(describeConsensus(report)).toBe("no consensus (3 experts)");
  });

  it("is deterministic", () => {
    const input = {
      opinions: {
        a: opinion(["pneumonia"], ["chest x-ray"]),
        b: opinion(["Pneumonia"], ["Chest X-ray"]),
      },
      decision: decision(null),
    };
    expect(evaluateConsensus(input)).toEqual(evaluateConsensus(input));
  });
});

describe("describeConsensus", () => {
  it("names the signals and the top shared hypothesis", () => {
    const report = evaluateConsensus({
      opinions: {
        a: opinion(["pneumonia"], ["chest x-ray"]),
        b: opinion(["Pneumonia"], ["Chest X-ray"]),
        c: opinion(["asthma"], ["spirometry"]),
      },
      decision: decision("consensus declared by coordinator"),
    });
    expect(describeConsensus(report)).toBe("consensus via declared+overlap: pneumonia (2/3)");
  });
});
