/**
 * Section scanner for free-form generation output.
 *
 * Headings may be markdown (`## Tests`), bold-only lines (`**Tests**`,
 * optionally followed by a parenthetical) or short `Label:` lines. Anything
 * after a label's colon is the first line of that section. List items use
 * `-`, `*`, `•`, `+` bullets or `1.` / `1)` numbering.
 */

import type { Decision, Opinion, ValidationResult } from "../contracts.js";
import { MAX_LIST_ITEMS, validateDecision, validateOpinion } from "../contracts.js";
import { normalizeItem } from "../consensus/overlap.js";

export interface Section {
  /** Normalized heading: lower-case letters and single spaces. "" before the first heading. */
  heading: string;
  lines: string[];
}

/** Length of the raw-text prefix used when a justification or rationale section is missing. */
export const RAW_EXCERPT_LENGTH = 500;

export const CONSENSUS_DECLARED = "consensus declared by coordinator";

const MARKDOWN_HEADING = /^#{1,6}\s+(.+?)\s*#*\s*$/;
const BOLD_HEADING = /^(\*\*|__)(.+?)\1\s*(?:\([^)]*\))?\s*:?\s*$/;
const LABEL_LINE = /^([A-Za-z][A-Za-z0-9 /&'()-]{0,48}?)\s*:\s*(.*)$/;
const LIST_ITEM = /^(?:[-*•+]|\d{1,2}[.)])\s+(.*)$/;
const MAX_LABEL_WORDS = 5;

export function normalizeHeading(text: string): string {
  return text
    .replace(/\([^)]*\)/g, " ")
    .toLowerCase()
    .replace(/[^a-z ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function stripEmphasis(text: string): string {
  return text.replace(/\*\*|__/g, "").trim();
}

/**
 * Split text into sections. `acceptLabel` decides whether a `Label:` line
 * opens a section; markdown and bold headings always do.
 */
export function scanSections(text: string, acceptLabel: (heading: string) => boolean = () => true): Section[] {
  let current: Section = { heading: "", lines: [] };
  const sections: Section[] = [current];

  const open = (heading: string): void => {
    current = { heading, lines: [] };
    sections.push(current);
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const md = line.match(MARKDOWN_HEADING);
    if (md?.[1]) {
      open(normalizeHeading(stripEmphasis(md[1])));
      continue;
    }

    const bold = line.match(BOLD_HEADING);
    if (bold?.[2]) {
      open(normalizeHeading(bold[2]));
      continue;
    }

    if (!LIST_ITEM.test(line)) {
      const label = stripEmphasis(line).match(LABEL_LINE);
      if (label?.[1]) {
        const heading = normalizeHeading(label[1]);
        const words = heading.split(" ").filter(Boolean).length;
        if (words > 0 && words <= MAX_LABEL_WORDS && acceptLabel(heading)) {
          open(heading);
          const inline = label[2]?.trim();
          if (inline) current.lines.push(inline);
          continue;
        }
      }
    }

    current.lines.push(line);
  }

  return sections.filter((s) => s.heading !== "" || s.lines.length > 0);
}

/**
 * List items from a section's lines. When no line carries a bullet or
 * number, every line is an item and `;` separates items within a line.
 */
export function extractListItems(lines: readonly string[]): string[] {
  const bulleted = lines
    .map((l) => l.match(LIST_ITEM)?.[1])
    .filter((item): item is string => item !== undefined)
    .map(stripEmphasis)
    .filter(Boolean);
  if (bulleted.length > 0) return bulleted;

  return lines
    .flatMap((l) => l.split(";"))
    .map(stripEmphasis)
    .filter(Boolean);
}

/** Drop normalized duplicates (first spelling wins) and cap the list. */
export function dedupeAndCap(items: readonly string[], max = MAX_LIST_ITEMS): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = normalizeItem(item);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(item.trim());
    if (out.length === max) break;
  }
  return out;
}

// --- Heading classification ---

type OpinionField = "hypotheses" | "tests" | "justification" | "critique";
type DecisionField = "hypotheses" | "tests" | "rationale" | "status";

export function classifyOpinionHeading(heading: string): OpinionField | null {
  if (/\btests?\b|work ?up|investigations?/.test(heading)) return "tests";
  if (/hypothes|differential|diagnos/.test(heading)) return "hypotheses";
  if (/critique|peer|colleague/.test(heading)) return "critique";
  if (/justification|reasoning|rationale/.test(heading)) return "justification";
  return null;
}

export function classifyDecisionHeading(heading: string): DecisionField | null {
  if (/\btests?\b|work ?up|investigations?/.test(heading)) return "tests";
  if (/hypothes|diagnos/.test(heading)) return "hypotheses";
  if (/rationale|reasoning|justification/.test(heading)) return "rationale";
  if (/status/.test(heading)) return "status";
  return null;
}

function collect<F extends string>(sections: readonly Section[], classify: (h: string) => F | null): Map<F, string[]> {
  const byField = new Map<F, string[]>();
  for (const section of sections) {
    const field = classify(section.heading);
    if (!field) continue;
    byField.set(field, [...(byField.get(field) ?? []), ...section.lines]);
  }
  return byField;
}

function excerpt(text: string): string {
  return text.trim().slice(0, RAW_EXCERPT_LENGTH);
}

// --- Consensus marker ---

const MARKER = /\b(?:clear|complete) consensus\b|\bconsensus reached\s*:\s*yes\b/;
const NEGATED_BEFORE = /\b(?:no|not|without|lacks?|lacking)\b(?:\s+\w+){0,3}\s+(?:clear|complete)\s+consensus\b/;
const NEGATED_AFTER = /\b(?:clear|complete) consensus\b.*(?:\b(?:no|not|never|cannot|without|lacking)\b|n't\b)/;
const TEMPLATE_ANSWER = /\byes\s*(?:or|\/)\s*no\b/;

/**
 * True when some line declares consensus ("Clear consensus", "Complete
 * consensus", "Consensus Reached: Yes") and that line neither negates it
 * nor echoes the "Yes or No" template.
 */
export function detectConsensusMarker(text: string): boolean {
  return text.split(/\r?\n/).some((rawLine) => {
    const line = stripEmphasis(rawLine).toLowerCase();
    return MARKER.test(line)
      && !NEGATED_BEFORE.test(line)
      && !NEGATED_AFTER.test(line)
      && !TEMPLATE_ANSWER.test(line);
  });
}

// --- Contract parsers ---

export function parseOpinionText(text: string): ValidationResult<Opinion> {
  const fields = collect(scanSections(text, (h) => classifyOpinionHeading(h) !== null), classifyOpinionHeading);

  const hypotheses = dedupeAndCap(extractListItems(fields.get("hypotheses") ?? []));
  const tests = dedupeAndCap(extractListItems(fields.get("tests") ?? []));

  const issues: string[] = [];
  if (hypotheses.length === 0) issues.push("no hypotheses found");
  if (tests.length === 0) issues.push("no tests found");
  if (issues.length > 0) return { ok: false, issues };

  const justification = (fields.get("justification") ?? []).join("\n").trim() || excerpt(text);
  const critique = (fields.get("critique") ?? []).join("\n").trim();

  return validateOpinion({
    hypotheses,
    tests,
    justification,
    ...(critique ? { critique } : {}),
  });
}

export function parseDecisionText(text: string): ValidationResult<Decision> {
  const fields = collect(scanSections(text, (h) => classifyDecisionHeading(h) !== null), classifyDecisionHeading);

  const consensusHypotheses = dedupeAndCap(extractListItems(fields.get("hypotheses") ?? []));
  const prioritizedTests = dedupeAndCap(extractListItems(fields.get("tests") ?? []));

  const issues: string[] = [];
  if (consensusHypotheses.length === 0) issues.push("no consensus hypotheses found");
  if (prioritizedTests.length === 0) issues.push("no prioritized tests found");
  if (issues.length > 0) return { ok: false, issues };

  const rationale = (fields.get("rationale") ?? []).join("\n").trim() || excerpt(text);
  // Only the status section can declare consensus; prose elsewhere cannot.
  const declared = detectConsensusMarker((fields.get("status") ?? []).join("\n"));

  return validateDecision({
    consensusHypotheses,
    prioritizedTests,
    rationale,
    terminationReason: declared ? CONSENSUS_DECLARED : null,
  });
}
