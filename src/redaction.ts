/**
 * Redaction hook applied wherever session data leaves the engine
 * (log lines, session log files, MCP status payloads).
 *
 * Free-text fields can carry patient-identifying narrative, so they are
 * removed outright. Inside a case context the intake fields keep only their
 * keyword signals; vitals stay as measurements. Remaining strings are masked
 * against the configured sensitive patterns.
 */

/** Keys whose values are free text and never leave the engine. */
export const FREE_TEXT_KEYS: ReadonlySet<string> = new Set([
  "freeText",
  "justification",
  "critique",
  "rationale",
  "raw",
  "text",
  "systemPrompt",
  "userPrompt",
  "imagingFinding",
]);

/** Case-context fields holding intake answers. Only their signal keys survive. */
export const CASE_NARRATIVE_KEYS: ReadonlySet<string> = new Set(["demographics", "history", "symptoms", "medications"]);

/** Keyword signals extracted at intake (see case-context.ts). */
export const CASE_SIGNAL_KEYS: ReadonlySet<string> = new Set(["age", "sex", "mentions", "present"]);

const CONTEXT_KEY = "context";

export const REDACTED = "[redacted]";

let sensitivePatterns: RegExp[] = [];

/** Install the sensitive-pattern list (regex sources from config.privacy). Invalid sources are skipped. */
export function setSensitivePatterns(sources: readonly string[]): string[] {
  const rejected: string[] = [];
  sensitivePatterns = [];
  for (const source of sources) {
    try {
      sensitivePatterns.push(new RegExp(source, "gi"));
    } catch {
      rejected.push(source);
    }
  }
  return rejected;
}

export function maskSensitive(text: string): string {
  return sensitivePatterns.reduce((acc, re) => acc.replace(re, REDACTED), text);
}

/**
 * Return a copy of `payload` with free-text keys stripped at any depth and
 * sensitive patterns masked in the strings that remain. Maps and Sets are
 * converted to plain objects/arrays so the result is JSON-serializable.
 */
export function redactForLog<T>(payload: T): unknown {
  return redactValue(payload, new WeakSet());
}

function redactValue(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === "string") return maskSensitive(value);
  if (value === null || typeof value !== "object") return value;
  if (seen.has(value)) return "[circular]";
  seen.add(value);

  if (value instanceof Error) {
    return { name: value.name, message: maskSensitive(value.message) };
  }
  if (Array.isArray(value)) {
    return value.map((v) => redactValue(v, seen));
  }
  if (value instanceof Set) {
    return [...value].map((v) => redactValue(v, seen));
  }

  const entries: Array<[string, unknown]> = value instanceof Map
    ? [...value.entries()].map(([k, v]): [string, unknown] => [String(k), v])
    : Object.entries(value);

  const out: Record<string, unknown> = {};
  for (const [key, child] of entries) {
    if (FREE_TEXT_KEYS.has(key)) continue;
    out[key] = key === CONTEXT_KEY && isRecord(child)
      ? redactCaseContext(child, seen)
      : redactValue(child, seen);
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    && !(value instanceof Map) && !(value instanceof Set) && !(value instanceof Error);
}

function redactCaseContext(context: Record<string, unknown>, seen: WeakSet<object>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(context)) {
    if (FREE_TEXT_KEYS.has(key)) continue;
    if (!CASE_NARRATIVE_KEYS.has(key)) {
      out[key] = redactValue(child, seen);
      continue;
    }
    // A bare string or list here is the answer itself.
    if (!isRecord(child)) continue;
    const signals: Record<string, unknown> = {};
    for (const [signal, v] of Object.entries(child)) {
      if (CASE_SIGNAL_KEYS.has(signal)) signals[signal] = redactValue(v, seen);
    }
    out[key] = signals;
  }
  return out;
}
