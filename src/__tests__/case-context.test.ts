import { describe, it, expect } from "vitest";
import { buildCaseContext, extractIntakeSignals, renderCaseContext } from "../case-context.js";
import { CaseContextSchema } from "../contracts.js";

describe("extractIntakeSignals", () => {
  it("finds age, sex and occupation in demographics", () => {
    expect(extractIntakeSignals("demographics", "45 year old woman, works as a nurse")).toEqual({
      raw: "45 year old woman, works as a nurse",
      age: "45",
      sex: "female",
      mentions: ["age", "sex", "occupation"],
    });
  });

  it("reads the short age form", () => {
    expect(extractIntakeSignals("demographics", "32 yo man")).toEqual({
      raw: "32 yo man",
      age: "32",
      sex: "male",
      mentions: ["age", "sex"],
    });
  });

  it("does not read 'man' inside 'woman'", () => {
    expect(extractIntakeSignals("demographics", "a woman").sex).toBe("female");
  });

  it("marks negated history and medications as absent", () => {
    expect(extractIntakeSignals("history", "None")).toEqual({ raw: "None", present: "no" });
    expect(extractIntakeSignals("medications", "ibuprofen 400mg")).toEqual({ raw: "ibuprofen 400mg", present: "yes" });
  });

  it("recognizes symptom-free visits", () => {
    expect(extractIntakeSignals("symptoms", "Just a routine check-up").present).toBe("no");
    expect(extractIntakeSignals("symptoms", "denies chest pain").present).toBe("no");
    expect(extractIntakeSignals("symptoms", "fever and cough").present).toBe("yes");
  });

  it("keeps only raw for blank answers", () => {
    expect(extractIntakeSignals("symptoms", "   ")).toEqual({ raw: "" });
  });
});

describe("buildCaseContext", () => {
  it("assembles staged answers and the narrative", () => {
    const context = buildCaseContext({
      demographics: "45 year old woman, works as a nurse",
      history: "none",
      symptoms: "Fever and productive cough for 3 days",
      medications: "ibuprofen",
      vitals: { temp: "38.9C" },
      notes: "worse at night",
    });
    expect(context.history).toEqual({ raw: "none", present: "no" });
    expect(context.symptoms).toEqual({ raw: "Fever and productive cough for 3 days", present: "yes" });
    expect(context.vitals).toEqual({ temp: "38.9C" });
    expect(context.imagingFinding).toBe("");
    expect(context.freeText).toBe(
      "Demographics: 45 year old woman, works as a nurse\n" +
      "History: none\n" +
      "Symptoms: Fever and productive cough for 3 days\n" +
      "Medications: ibuprofen\n" +
      "Notes: worse at night",
    );
  });

  it("leaves unanswered stages empty", () => {
    const context = buildCaseContext({ symptoms: "cough" });
    expect(context.demographics).toEqual({});
    expect(context.medications).toEqual({});
    expect(context.freeText).toBe("Symptoms: cough");
  });

  it("passes the result through the contract", () => {
    const context = buildCaseContext({ symptoms: "cough" });
    expect(CaseContextSchema.safeParse(context).success).toBe(true);
  });
});

describe("renderCaseContext", () => {
  it("renders sections, skipping raw answers", () => {
    const context = buildCaseContext({
      symptoms: "cough",
      vitals: { temp: "38.9C" },
      imagingFinding: "Clear lungs.",
    });
    expect(renderCaseContext(context)).toBe(
      "Symptoms:\npresent: yes\n\n" +
      "Vitals:\ntemp: 38.9C\n\n" +
      "Imaging finding:\nClear lungs.\n\n" +
      "Patient narrative:\nSymptoms: cough",
    );
  });

  it("flattens lists and nested values", () => {
    const context = CaseContextSchema.parse({
      demographics: { age: "45", mentions: ["age"] },
      vitals: { bp: { systolic: "120" } },
    });
    expect(renderCaseContext(context)).toBe(
      "Demographics:\nage: 45\nmentions: age\n\n" +
      "Vitals:\nbp:\n  systolic: 120",
    );
  });

  it("has a placeholder for an empty case", () => {
    expect(renderCaseContext(CaseContextSchema.parse({}))).toBe("(no case details provided)");
  });
});
