import { describe, it, expect, afterEach } from "vitest";
import { redactForLog, maskSensitive, setSensitivePatterns, REDACTED } from "../redaction.js";

describe("setSensitivePatterns", () => {
  afterEach(() => setSensitivePatterns([]));

  it("returns the sources that do not compile", () => {
    expect(setSensitivePatterns(["\\d+", "(unclosed"])).toEqual(["(unclosed"]);
    expect(maskSensitive("room 101")).toBe(`room ${REDACTED}`);
  });

  it("masks case-insensitively and globally", () => {
    setSensitivePatterns(["secret"]);
    expect(maskSensitive("Secret and SECRET")).toBe(`${REDACTED} and ${REDACTED}`);
  });
});

describe("redactForLog", () => {
  afterEach(() => setSensitivePatterns([]));

  it("drops free-text keys at any depth", () => {
    const out = redactForLog({
      id: "s1",
      context: { freeText: "narrative", symptoms: { raw: "cough", present: "yes" } },
      rounds: [{ decision: { rationale: "why", consensusHypotheses: ["flu"] } }],
    });
    expect(out).toEqual({
      id: "s1",
      context: { symptoms: { present: "yes" } },
      rounds: [{ decision: { consensusHypotheses: ["flu"] } }],
    });
  });

  it("keeps only intake signals inside a case context", () => {
    const out = redactForLog({
      id: "s1",
      context: {
        demographics: { raw: "Jane Placeholder, 54, teacher", age: "54", sex: "female", mentions: ["age", "sex"] },
        history: "prior admission at Placeholder General",
        symptoms: ["cough", "night sweats"],
        medications: { present: "no", detail: "none since March" },
        vitals: { temperature: "38.4", heartRate: "104" },
        imagingFinding: "right lower lobe opacity",
        freeText: "Demographics: Jane Placeholder",
      },
    });
    expect(out).toEqual({
      id: "s1",
      context: {
        demographics: { age: "54", sex: "female", mentions: ["age", "sex"] },
        medications: { present: "no" },
        vitals: { temperature: "38.4", heartRate: "104" },
      },
    });
  });

  it("leaves keys named like case fields alone outside a case context", () => {
    expect(redactForLog({ history: ["round 1"] })).toEqual({ history: ["round 1"] });
  });

  it("masks remaining strings", () => {
    setSensitivePatterns(["\\b[\\w.]+@example\\.com\\b"]);
    expect(redactForLog({ contact: "jane.doe@example.com" })).toEqual({ contact: REDACTED });
  });

  it("flattens maps, sets and errors", () => {
    const out = redactForLog({
      perSource: new Map([["expert_1", 3]]),
      ids: new Set(["a", "b"]),
      error: new TypeError("bad"),
    });
    expect(out).toEqual({
      perSource: { expert_1: 3 },
      ids: ["a", "b"],
      error: { name: "TypeError", message: "bad" },
    });
  });

  it("marks cycles", () => {
    const node: { name: string; self?: unknown } = { name: "n" };
    node.self = node;
    expect(redactForLog(node)).toEqual({ name: "n", self: "[circular]" });
  });

  it("passes primitives through", () => {
    expect(redactForLog(3)).toBe(3);
    expect(redactForLog(null)).toBeNull();
  });
});
