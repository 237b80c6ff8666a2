#!/usr/bin/env tsx
/**
 * CLI: oracle:round
 *
 * Usage: npm run oracle:round -- --text-file <path> [--run-id <id>]
 *          [--correction <json>] [--policy first_valid|plurality] [--threshold <n>]
 *
 * Runs one oracle round with three HMAC-signed nodes, persists the
 * record under the configured store directory and writes the audit
 * trail next to it.
 */

import "dotenv/config";
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { loadOracleConfig, parseConsensusPolicy } from "../shared/run_config.js";
import { createLogger } from "../shared/log.js";
import type { LedgerCommitment, PersistedRound } from "../shared/types.js";
import { PatternEntityExtractor } from "../extraction/extractor.js";
import { loadVocabulary } from "../vocabulary/loader.js";
import { loadRule } from "../rules/rule.js";
import { ScriptedReviewer } from "../arbitration/arbitrator.js";
import { LedgerStore } from "../ledger/ledger_store.js";
import { JsonFileRecordStore } from "../storage/record_store.js";
import { parseLedgerCommitment, parsePersistedRound } from "../storage/schemas.js";
import { buildHmacNetwork } from "../round/network_factory.js";
import { runOracleRound } from "../round/orchestrator.js";
import { exportJSONL, generateAuditSummaryMd } from "../trace/exporters.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

async function main() {
  const args = process.argv.slice(2);
  let textFile = path.join(ROOT, "data", "reports", "sample_report.txt");
  let runId: string | undefined;
  let correctionFile = path.join(ROOT, "data", "corrections", "sample_review.json");
  let policyArg: string | undefined;
  let thresholdArg: string | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--text-file" && i + 1 < args.length) {
      textFile = path.resolve(args[i + 1]);
      i++;
    } else if (args[i] === "--run-id" && i + 1 < args.length) {
      runId = args[i + 1];
      i++;
    } else if (args[i] === "--correction" && i + 1 < args.length) {
      correctionFile = path.resolve(args[i + 1]);
      i++;
    } else if (args[i] === "--policy" && i + 1 < args.length) {
      policyArg = args[i + 1];
      i++;
    } else if (args[i] === "--threshold" && i + 1 < args.length) {
      thresholdArg = args[i + 1];
      i++;
    }
  }

  if (!existsSync(textFile)) {
    console.error(`Error: report not found: ${textFile}`);
    process.exit(1);
  }

  const config = loadOracleConfig(
    thresholdArg ? { ...process.env, ORACLE_CONSENSUS_THRESHOLD: thresholdArg } : process.env,
  );
  const policy = parseConsensusPolicy(policyArg, config.consensusPolicy);
  const log = createLogger();
  const storeDir = path.resolve(ROOT, config.storeDir);
  const text = readFileSync(textFile, "utf-8");

  console.log("╔══════════════════════════════════════════════════════════════╗");
  console.log("║  Clinical Oracle Network — Consensus Round                   ║");
  console.log("║  Extract → Validate → Consensus → Ledger → Rule              ║");
  console.log("╚══════════════════════════════════════════════════════════════╝");
  console.log();

  const network = buildHmacNetwork(undefined, { confidenceThreshold: config.confidenceThreshold });
  const recordStore = new JsonFileRecordStore<PersistedRound>(path.join(storeDir, "records"), parsePersistedRound);

  const result = await runOracleRound(
    { text, runId },
    {
      extractor: new PatternEntityExtractor(),
      nodes: network.nodes,
      vocabulary: loadVocabulary(path.resolve(ROOT, config.vocabularyPath)),
      reviewer: ScriptedReviewer.fromFile(correctionFile),
      ledger: new LedgerStore({
        backend: new JsonFileRecordStore<LedgerCommitment>(path.join(storeDir, "ledger"), parseLedgerCommitment),
        contractAddress: config.contractAddress,
        logger: log,
      }),
      recordStore,
      consensus: { threshold: config.consensusThreshold, policy, signer: network.signer },
      nodeTimeoutMs: config.nodeTimeoutMs,
      rule: loadRule(path.resolve(ROOT, config.rulePath)),
      trigger: async (evaluation) => {
        log.info("ACTION", `reimbursement requested (${evaluation.matchedCondition})`);
      },
      logger: log,
    },
  );

  const auditDir = path.join(storeDir, "audit", result.runId);
  mkdirSync(auditDir, { recursive: true });
  const auditMd = generateAuditSummaryMd(result.persisted);
  writeFileSync(path.join(auditDir, "audit_summary.md"), auditMd);
  writeFileSync(path.join(auditDir, "trace.jsonl"), exportJSONL(result.persisted.trace));

  const ev = result.evaluation;
  console.log();
  console.log("╔══════════════════════════════════════════════════════════════╗");
  console.log("║                    ROUND COMPLETE                            ║");
  console.log("╠══════════════════════════════════════════════════════════════╣");
  console.log(`║  Run:          ${result.runId.padEnd(46)}║`);
  console.log(`║  Provenance:   ${result.record.provenance.padEnd(46)}║`);
  console.log(`║  Entities:     ${String(result.record.entities.length).padEnd(46)}║`);
  console.log(`║  Digest:       ${(result.commitment.digest.slice(0, 32) + "…").padEnd(46)}║`);
  console.log(`║  Rule:         ${(ev ? `${ev.ruleId} → ${ev.reason}` : "none").padEnd(46)}║`);
  console.log(`║  Action:       ${(ev?.actionTriggered ? "TRIGGERED" : "not triggered").padEnd(46)}║`);
  console.log("╚══════════════════════════════════════════════════════════════╝");
  console.log();
  console.log(`Record:  ${path.join(recordStore.dir, `${result.runId}.json`)}`);
  console.log(`Audit:   ${auditDir}`);
}

main().catch((err: unknown) => {
  console.error("Oracle round failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
