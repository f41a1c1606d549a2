/**
 * Data contracts for the deliberation engine.
 *
 * Opinions and decisions cross the SessionStore boundary only after they
 * pass these schemas. Recovery and coordination code shape their output to
 * fit them; the store rejects anything that does not.
 */

import { z } from "zod";

/** Hypothesis and test lists never hold more than this many entries. */
export const MAX_LIST_ITEMS = 5;

const ListItemSchema = z.string().trim().min(1, "list items must be non-empty strings");

const BoundedListSchema = z
  .array(ListItemSchema)
  .min(1, "list must not be empty")
  .max(MAX_LIST_ITEMS, `list must hold at most ${MAX_LIST_ITEMS} items`);

// --- Case context ---

export type CaseValue = string | string[] | { [key: string]: CaseValue };

export const CaseValueSchema: z.ZodType<CaseValue> = z.lazy(() =>
  z.union([z.string(), z.array(z.string()), z.record(z.string(), CaseValueSchema)])
);

export const CaseContextSchema = z
  .object({
    demographics: CaseValueSchema.default({}),
    history: CaseValueSchema.default({}),
    symptoms: CaseValueSchema.default({}),
    medications: CaseValueSchema.default({}),
    vitals: CaseValueSchema.default({}),
    /** Imaging finding as produced by the captioning tool (possibly a generic demo caption). */
    imagingFinding: z.string().default(""),
    freeText: z.string().default(""),
  })
  .strict();

export type CaseContext = z.infer<typeof CaseContextSchema>;
export type CaseContextInput = z.input<typeof CaseContextSchema>;

// --- Opinion ---

export const OpinionSchema = z
  .object({
    /** Priority order, most likely first. */
    hypotheses: BoundedListSchema,
    /** Priority order, most important first. */
    tests: BoundedListSchema,
    justification: z.string(),
    critique: z.string().optional(),
  })
  .strict();

export type Opinion = z.infer<typeof OpinionSchema>;

// --- Decision ---

export const DecisionSchema = z
  .object({
    consensusHypotheses: BoundedListSchema,
    prioritizedTests: BoundedListSchema,
    rationale: z.string().trim().min(1, "rationale must not be empty"),
    /** Non-null only when this round triggers a stop. */
    terminationReason: z.string().min(1).nullable(),
  })
  .strict();

export type Decision = z.infer<typeof DecisionSchema>;

// --- Validation helpers ---

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: string[] };

function validate<S extends z.ZodTypeAny>(schema: S, payload: unknown): ValidationResult<z.output<S>> {
  const parsed = schema.safeParse(payload);
  if (parsed.success) return { ok: true, value: parsed.data };
  const issues = parsed.error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
  );
  return { ok: false, issues };
}

export function validateOpinion(payload: unknown): ValidationResult<Opinion> {
  return validate(OpinionSchema, payload);
}

export function validateDecision(payload: unknown): ValidationResult<Decision> {
  return validate(DecisionSchema, payload);
}

export function validateCaseContext(payload: unknown): ValidationResult<CaseContext> {
  return validate(CaseContextSchema, payload);
}

// --- Fallbacks ---

/**
 * Substitute opinion used by the round coordinator when an expert call
 * fails or returns something the contract rejects.
 */
export function expertFallbackOpinion(reason: string): Opinion {
  return {
    hypotheses: ["needs further review"],
    tests: ["specialist referral"],
    justification: `Opinion unavailable: ${reason}`,
  };
}

/** Substitute opinion produced by the recovery pipeline when generation or parsing fails. */
export function recoveryFallbackOpinion(reason: string): Opinion {
  return {
    hypotheses: ["requires further review"],
    tests: ["specialist consultation"],
    justification: `Opinion could not be recovered: ${reason}`,
  };
}

/** Substitute decision produced by the recovery pipeline or the orchestrator. */
export function fallbackDecision(reason: string): Decision {
  return {
    consensusHypotheses: ["requires further review"],
    prioritizedTests: ["specialist consultation"],
    rationale: `Decision could not be produced: ${reason}`,
    terminationReason: null,
  };
}

// --- Freezing ---

/** Structured clone followed by a recursive freeze. */
export function freezeDeep<T>(value: T): T {
  const copy = structuredClone(value);
  return deepFreeze(copy);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
