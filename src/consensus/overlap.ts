import type { IConsensusCheck, ConsensusInput, SharedItem } from "./base.js";

/** Experts that must share an item before it counts as agreement. */
export const MIN_SHARED_EXPERTS = 2;

/** Smaller panels cannot reach consensus by overlap; two experts agreeing is not a majority signal. */
export const MIN_OVERLAP_PANEL = 3;

/** Case-fold and trim. Inner whitespace is left alone. */
export function normalizeItem(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Group items by normalized text and keep the ones produced by at least
 * MIN_SHARED_EXPERTS distinct experts. An expert repeating an item within
 * its own list counts once.
 */
export function sharedItems(lists: ReadonlyMap<string, readonly string[]>): SharedItem[] {
  const support = new Map<string, Set<string>>();
  for (const [expertId, items] of lists) {
    for (const raw of items) {
      const item = normalizeItem(raw);
      if (!item) continue;
      const experts = support.get(item) ?? new Set<string>();
      experts.add(expertId);
      support.set(item, experts);
    }
  }

  const shared: SharedItem[] = [];
  for (const [item, experts] of support) {
    if (experts.size >= MIN_SHARED_EXPERTS) {
      shared.push({ item, experts: [...experts].sort() });
    }
  }
  shared.sort((a, b) => b.experts.length - a.experts.length || a.item.localeCompare(b.item));
  return shared;
}

/**
 * Opinion-overlap heuristic.
 *
 * Holds only if some hypothesis AND some test are each produced by two or
 * more distinct experts, in a round with at least MIN_OVERLAP_PANEL opinions.
 */
export class OverlapConsensus implements IConsensusCheck {
  readonly signal = "overlap" as const;

  sharedHypotheses(input: ConsensusInput): SharedItem[] {
    return sharedItems(new Map(Object.entries(input.opinions).map(([id, o]) => [id, o.hypotheses])));
  }

  sharedTests(input: ConsensusInput): SharedItem[] {
    return sharedItems(new Map(Object.entries(input.opinions).map(([id, o]) => [id, o.tests])));
  }

  holds(input: ConsensusInput): boolean {
    if (Object.keys(input.opinions).length < MIN_OVERLAP_PANEL) return false;
    return this.sharedHypotheses(input).length > 0 && this.sharedTests(input).length > 0;
  }
}

/** Decision-declared signal: a non-empty termination reason on the round's decision. */
export class DeclaredConsensus implements IConsensusCheck {
  readonly signal = "declared" as const;

  holds(input: ConsensusInput): boolean {
    const reason = input.decision?.terminationReason;
    return typeof reason === "string" && reason.trim().length > 0;
  }
}
