import type { PersistedRound, TraceRecord } from "../shared/types.js";
import { validateTraceChain } from "./round_trace.js";

/**
 * Export a trace chain as JSONL string (one JSON line per record).
 */
export function exportJSONL(chain: TraceRecord[]): string {
  return chain.map((record) => JSON.stringify(record)).join("\n") + "\n";
}

/**
 * Generate a markdown audit summary for a persisted round.
 */
export function generateAuditSummaryMd(round: PersistedRound): string {
  const chain = round.trace;
  const validation = validateTraceChain(chain);
  const last = chain[chain.length - 1];

  const lines: string[] = [
    `# Oracle Round Audit — ${round.runId}`,
    "",
    `**Provenance**: ${round.provenance}`,
    `**Source**: ${round.sourceId}`,
    `**Record Digest**: \`${round.digest}\``,
    `**Ledger**: ${round.commitment.contractAddress} @ ${round.commitment.timestamp}`,
    `**Contributing Nodes**: ${round.contributingNodes.length > 0 ? round.contributingNodes.join(", ") : "none"}`,
  ];

  if (round.correctionReason) {
    lines.push(`**Correction Reason**: ${round.correctionReason}`);
  }

  lines.push("", "## Entities", "", "| Text | Label | Confidence |", "|------|-------|------------|");
  for (const e of round.entities) {
    lines.push(`| ${e.text} | ${e.label} | ${e.confidence.toFixed(2)} |`);
  }

  if (round.evaluation) {
    const ev = round.evaluation;
    lines.push(
      "",
      "## Rule Evaluation",
      "",
      `- Rule: ${ev.ruleId}`,
      `- Result: ${ev.reason}`,
      `- Action triggered: ${ev.actionTriggered ? "yes" : "no"}`,
    );
    if (ev.matchedCondition) lines.push(`- Matched: ${ev.matchedCondition}`);
    if (round.actionError) lines.push(`- Action error: ${round.actionError}`);
  }

  lines.push("", "## Trace", "", "| # | Step | Duration (ms) | Content Hash |", "|---|------|---------------|--------------|");
  for (const t of chain) {
    lines.push(`| ${t.chainPosition} | ${t.stepType} | ${t.durationMs} | \`${t.hashChain.contentHash.slice(0, 16)}…\` |`);
  }

  lines.push("");
  lines.push(`**Merkle Root**: \`${last ? last.hashChain.merkleRoot : "n/a"}\``);
  lines.push(`**Chain Integrity**: ${validation.valid ? "VALID" : `INVALID (${validation.errors.length} errors)`}`);

  return lines.join("\n");
}
