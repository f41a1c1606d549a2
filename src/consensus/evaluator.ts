import type { ConsensusInput, ConsensusReport } from "./base.js";
import { OverlapConsensus, DeclaredConsensus } from "./overlap.js";

const overlap = new OverlapConsensus();
const declared = new DeclaredConsensus();

/**
 * Judge one round. Pure: the same opinions and decision always give the
 * same report, and nothing is recorded here.
 */
export function evaluateConsensus(input: ConsensusInput): ConsensusReport {
  const sharedHypotheses = overlap.sharedHypotheses(input);
  const sharedTests = overlap.sharedTests(input);
  const byOverlap = overlap.holds(input);
  const declaredByDecision = declared.holds(input);

  return {
    reachedConsensus: byOverlap || declaredByDecision,
    declaredByDecision,
    byOverlap,
    sharedHypotheses,
    sharedTests,
    expertCount: Object.keys(input.opinions).length,
  };
}

/** One-line summary for logs and the CLI. */
export function describeConsensus(report: ConsensusReport): string {
  if (!report.reachedConsensus) {
    return `no consensus (${report.expertCount} experts)`;
  }
  const via = [report.declaredByDecision ? "declared" : "", report.byOverlap ? "overlap" : ""]
    .filter(Boolean)
    .join("+");
  const top = report.sharedHypotheses[0];
  return `consensus via ${via}` + (top ? `: ${top.item} (${top.experts.length}/${report.expertCount})` : "");
}
