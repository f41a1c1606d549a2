/**
 * Case context assembly.
 *
 * The intake answers arrive as free text per stage. Each is kept verbatim
 * under `raw` and tagged with a few keyword-derived signals; nothing here
 * interprets the text beyond substring and pattern checks.
 */

import type { CaseContext, CaseValue } from "./contracts.js";
import { CaseContextSchema } from "./contracts.js";
import { InvalidCaseContextError } from "./errors.js";

export type IntakeStage = "demographics" | "history" | "symptoms" | "medications";

export const INTAKE_STAGES: readonly IntakeStage[] = ["demographics", "history", "symptoms", "medications"];

export interface IntakeAnswers {
  demographics?: string;
  history?: string;
  symptoms?: string;
  medications?: string;
  vitals?: Record<string, string>;
  /** Caption from the imaging tool, already post-processed */
  imagingFinding?: string;
  /** Anything the patient added outside the staged questions */
  notes?: string;
}

const AGE_PATTERNS = [
  /\b(\d{1,3})\s*-?\s*(?:years?|yrs?)(?:\s*-?\s*old)?\b/i,
  /\b(\d{1,3})\s*y\/?o\b/i,
  /\bage[:\s]+(\d{1,3})\b/i,
];
const FEMALE = /\b(?:female|woman|girl|she)\b/i;
const MALE = /\b(?:male|man|boy|he)\b/i;
const OCCUPATION = /\b(?:work|works|working|job|occupation|employed|retired|student)\b/i;

/** "none", "no", "nothing" and friends at the start, or an explicit denial anywhere. */
const NEGATION = /^\s*(?:none|no|nothing|n\/a|nil)\b|\bdenies\b/i;
const NO_SYMPTOMS = /\b(?:no symptoms|asymptomatic|check-?up|screening)\b/i;

function presence(answer: string, absent: RegExp): "yes" | "no" {
  return absent.test(answer) ? "no" : "yes";
}

/** Keyword signals for one intake answer. The answer itself is kept as `raw`. */
export function extractIntakeSignals(stage: IntakeStage, answer: string): Record<string, CaseValue> {
  const raw = answer.trim();
  const signals: Record<string, CaseValue> = { raw };
  if (!raw) return signals;

  switch (stage) {
    case "demographics": {
      const mentions: string[] = [];
      for (const pattern of AGE_PATTERNS) {
        const match = raw.match(pattern);
        if (match?.[1]) {
          signals.age = match[1];
          mentions.push("age");
          break;
        }
      }
      if (FEMALE.test(raw)) {
        signals.sex = "female";
        mentions.push("sex");
      } else if (MALE.test(raw)) {
        signals.sex = "male";
        mentions.push("sex");
      }
      if (OCCUPATION.test(raw)) mentions.push("occupation");
      signals.mentions = mentions;
      break;
    }
    case "history":
      signals.present = presence(raw, NEGATION);
      break;
    case "symptoms":
      signals.present = NO_SYMPTOMS.test(raw) ? "no" : presence(raw, NEGATION);
      break;
    case "medications":
      signals.present = presence(raw, NEGATION);
      break;
  }
  return signals;
}

function label(stage: string): string {
  return stage.charAt(0).toUpperCase() + stage.slice(1);
}

/**
 * Build the immutable case snapshot a session starts from.
 * freeText concatenates every non-empty answer under its stage label.
 */
export function buildCaseContext(answers: IntakeAnswers): CaseContext {
  const lines: string[] = [];
  const staged: Partial<Record<IntakeStage, Record<string, CaseValue>>> = {};

  for (const stage of INTAKE_STAGES) {
    const answer = answers[stage]?.trim();
    if (!answer) continue;
    staged[stage] = extractIntakeSignals(stage, answer);
    lines.push(`${label(stage)}: ${answer}`);
  }
  const notes = answers.notes?.trim();
  if (notes) lines.push(`Notes: ${notes}`);

  const parsed = CaseContextSchema.safeParse({
    demographics: staged.demographics ?? {},
    history: staged.history ?? {},
    symptoms: staged.symptoms ?? {},
    medications: staged.medications ?? {},
    vitals: answers.vitals ?? {},
    imagingFinding: answers.imagingFinding?.trim() ?? "",
    freeText: lines.join("\n"),
  });
  if (!parsed.success) {
    throw new InvalidCaseContextError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}

/**
 * Render a case for a prompt. Nested values are flattened to
 * "key: value" lines. `raw` answers are skipped since freeText repeats them.
 */
export function renderCaseContext(context: CaseContext): string {
  const sections: string[] = [];
  const fields: Array<[string, CaseValue]> = [
    ["Demographics", context.demographics],
    ["History", context.history],
    ["Symptoms", context.symptoms],
    ["Medications", context.medications],
    ["Vitals", context.vitals],
  ];
  for (const [name, value] of fields) {
    const body = renderValue(value);
    if (body) sections.push(`${name}:\n${body}`);
  }
  if (context.imagingFinding) sections.push(`Imaging finding:\n${context.imagingFinding}`);
  if (context.freeText) sections.push(`Patient narrative:\n${context.freeText}`);
  return sections.length > 0 ? sections.join("\n\n") : "(no case details provided)";
}

function renderValue(value: CaseValue, indent = ""): string {
  if (typeof value === "string") return value ? `${indent}${value}` : "";
  if (Array.isArray(value)) return value.filter(Boolean).map((v) => `${indent}- ${v}`).join("\n");

  const lines: string[] = [];
  for (const [key, child] of Object.entries(value)) {
    if (typeof child === "string") {
      if (!child || key === "raw") continue;
      lines.push(`${indent}${key}: ${child}`);
    } else if (Array.isArray(child)) {
      if (child.length > 0) lines.push(`${indent}${key}: ${child.join(", ")}`);
    } else {
      const nested = renderValue(child, indent + "  ");
      if (nested) lines.push(`${indent}${key}:\n${nested}`);
    }
  }
  return lines.join("\n");
}
