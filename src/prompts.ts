/**
 * Prompt construction for experts and the coordinator.
 *
 * Experts receive every prior opinion; their own is rendered separately
 * from the peers' so no expert is asked to critique itself.
 */

import type { Opinion } from "./contracts.js";
import { MAX_LIST_ITEMS } from "./contracts.js";
import type { DecisionRequest, ExpertRequest } from "./experts.js";
import { renderCaseContext } from "./case-context.js";
import { truncate } from "./logger.js";

/** Characters of a peer's justification shown in prompts. */
const JUSTIFICATION_PREVIEW = 300;

export const OPINION_FORMAT =
  "Respond in exactly this structure:\n\n" +
  "**Hypotheses** (most likely first)\n1. ...\n\n" +
  "**Tests** (most important first)\n1. ...\n\n" +
  "**Justification**\n...\n\n" +
  "**Peer Critique**\n...\n\n" +
  `List at most ${MAX_LIST_ITEMS} hypotheses and ${MAX_LIST_ITEMS} tests. ` +
  "Keep each list item short: the name of the condition or test only.";

export const DECISION_FORMAT =
  "Respond in exactly this structure:\n\n" +
  "**Consensus Hypotheses** (most likely first)\n1. ...\n\n" +
  "**Prioritized Tests** (most important first)\n1. ...\n\n" +
  "**Consensus Rationale**\n...\n\n" +
  "**Consensus Status**\nConsensus Reached: Yes or No\n\n" +
  `List at most ${MAX_LIST_ITEMS} hypotheses and ${MAX_LIST_ITEMS} tests. ` +
  "Under Consensus Status, write \"Clear consensus\" only if at least two experts share a hypothesis and a test.";

function renderList(items: readonly string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}`).join("\n");
}

export function renderOpinion(opinion: Opinion, withJustification = true): string {
  const parts = [
    `Hypotheses:\n${renderList(opinion.hypotheses)}`,
    `Tests:\n${renderList(opinion.tests)}`,
  ];
  if (withJustification && opinion.justification) {
    parts.push(`Justification: ${truncate(opinion.justification, JUSTIFICATION_PREVIEW)}`);
  }
  return parts.join("\n");
}

/** Prior opinions from everyone except `selfId`, in expert-id order. */
export function peerOpinions(
  prior: Readonly<Record<string, Opinion>>,
  selfId: string,
): Array<[string, Opinion]> {
  return Object.entries(prior)
    .filter(([id]) => id !== selfId)
    .sort(([a], [b]) => a.localeCompare(b));
}

export function buildOpinionPrompt(expertId: string, request: ExpertRequest): string {
  const { context, roundIndex, maxRounds, priorOpinions, priorRationale } = request;
  const sections: string[] = [
    `You are ${expertId}, one of the experts reviewing this case.`,
    `--- Case ---\n${renderCaseContext(context)}`,
  ];

  if (roundIndex > 1) {
    const own = priorOpinions[expertId];
    if (own) {
      sections.push(`--- Your opinion from round ${roundIndex - 1} ---\n${renderOpinion(own)}`);
    }

    const peers = peerOpinions(priorOpinions, expertId);
    if (peers.length > 0) {
      const rendered = peers.map(([id, opinion]) => `[${id}]\n${renderOpinion(opinion)}`).join("\n\n");
      sections.push(`--- Colleague opinions from round ${roundIndex - 1} ---\n${rendered}`);
    }

    if (priorRationale) {
      sections.push(`--- Coordinator rationale from round ${roundIndex - 1} ---\n${priorRationale}`);
    }

    sections.push(
      `--- Round ${roundIndex}/${maxRounds} ---\n` +
      "Critique your colleagues' opinions, acknowledge valid points, push back where " +
      "you disagree, and give your updated opinion."
    );
  } else {
    sections.push(`--- Round ${roundIndex}/${maxRounds} ---\nGive your independent initial opinion.`);
  }

  sections.push(OPINION_FORMAT);
  return sections.join("\n\n");
}

export function buildDecisionPrompt(request: DecisionRequest): string {
  const { context, roundIndex, maxRounds, opinions, history } = request;
  const sections: string[] = [`--- Case ---\n${renderCaseContext(context)}`];

  const summary = history
    .filter((r) => r.decision)
    .map((r) => {
      const hypotheses = r.decision?.consensusHypotheses.join(", ") ?? "";
      const consensus = r.consensus?.reachedConsensus ? "yes" : "no";
      return `Round ${r.index}: ${hypotheses} | consensus: ${consensus}`;
    });
  if (summary.length > 0) {
    sections.push(`--- Previous rounds ---\n${summary.join("\n")}`);
  }

  const rendered = Object.entries(opinions)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([id, opinion]) => `[${id}]\n${renderOpinion(opinion)}`)
    .join("\n\n");
  sections.push(`--- Expert opinions, round ${roundIndex}/${maxRounds} ---\n${rendered}`);

  sections.push(DECISION_FORMAT);
  return sections.join("\n\n");
}
