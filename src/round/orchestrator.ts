/**
 * Oracle Round Orchestrator
 *
 * text → extractor → nodes (concurrent) → consensus
 *      → [approved | human arbitration] → ledger commit
 *      → rule evaluation → record store
 *
 * Exactly one canonical record is produced per round. Consensus and
 * arbitration are mutually exclusive, and a round is never retried.
 */

import { v4 as uuidv4 } from "uuid";
import { sha256String } from "../shared/hash.js";
import { ExtractionUnavailableError } from "../shared/errors.js";
import { createLogger, type Logger } from "../shared/log.js";
import type {
  AnnotatedToken,
  ApprovedOutcome,
  CanonicalRecord,
  ConsensusOutcome,
  ConsensusPolicy,
  CorrectedRecord,
  LedgerCommitment,
  PersistedRound,
  RuleEvaluationResult,
  Vocabulary,
} from "../shared/types.js";
import type { EntityExtractor } from "../extraction/extractor.js";
import type { AttestingNode } from "../oracle/validator.js";
import type { Signer } from "../oracle/signer.js";
import { collectNodeResponses, type NodeResponse } from "../oracle/network.js";
import { reconcile, provenanceOf } from "../consensus/coordinator.js";
import { arbitrate, type Reviewer } from "../arbitration/arbitrator.js";
import type { LedgerStore } from "../ledger/ledger_store.js";
import { evaluateRule, type ActionTrigger } from "../rules/engine.js";
import type { Rule } from "../rules/rule.js";
import type { RecordStore } from "../storage/record_store.js";
import { RoundTraceRecorder } from "../trace/round_trace.js";

export interface RoundDependencies {
  extractor: EntityExtractor;
  nodes: AttestingNode[];
  vocabulary: Vocabulary;
  reviewer: Reviewer;
  ledger: LedgerStore;
  recordStore: RecordStore<PersistedRound>;
  consensus: {
    threshold: number;
    policy?: ConsensusPolicy;
    /** Verify node signatures before counting them. */
    signer?: Signer;
  };
  nodeTimeoutMs?: number;
  rule?: Rule;
  trigger?: ActionTrigger;
  logger?: Logger;
}

export interface RoundInput {
  text: string;
  runId?: string;
}

export interface RoundResult {
  runId: string;
  record: CanonicalRecord;
  outcome: ConsensusOutcome;
  correction?: CorrectedRecord;
  commitment: LedgerCommitment;
  evaluation?: RuleEvaluationResult;
  responses: NodeResponse[];
  persisted: PersistedRound;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function canonicalFromConsensus(
  runId: string,
  outcome: ApprovedOutcome,
): CanonicalRecord {
  return {
    runId,
    provenance: provenanceOf(outcome),
    entities: outcome.canonicalPackage.entities,
    timestamp: outcome.canonicalPackage.timestamp,
    sourceId: outcome.canonical.nodeId,
  };
}

export function canonicalFromCorrection(runId: string, correction: CorrectedRecord): CanonicalRecord {
  return {
    runId,
    provenance: "human",
    entities: correction.entities,
    timestamp: correction.timestamp,
    sourceId: correction.validatorId,
    correctionReason: correction.correctionReason,
  };
}

export async function runOracleRound(input: RoundInput, deps: RoundDependencies): Promise<RoundResult> {
  const runId = input.runId ?? uuidv4();
  const log = deps.logger ?? createLogger();
  const trace = new RoundTraceRecorder(runId);
  const textHash = sha256String(input.text);

  log.info("ROUND", `run ${runId} started (${deps.nodes.length} nodes, threshold ${deps.consensus.threshold})`);

  // ── Step 1: Extraction ────────────────────────────────────────────
  let t0 = new Date();
  let tokens: AnnotatedToken[];
  try {
    tokens = await deps.extractor.extract(input.text);
  } catch (err) {
    log.error("EXTRACT", `run ${runId} aborted: extractor unavailable`);
    throw new ExtractionUnavailableError(err);
  }
  trace.record({
    stepType: "EXTRACTION",
    initiatedAt: t0,
    completedAt: new Date(),
    inputs: [{ sourceId: "input_text", sourceHash: textHash, sourceType: "text" }],
    outputContent: { tokenCount: tokens.length, labelledTokens: tokens.filter((t) => t.recognizedLabel).length },
  });

  // ── Step 2: Node attestations ─────────────────────────────────────
  t0 = new Date();
  const responses = await collectNodeResponses(deps.nodes, tokens, deps.vocabulary, {
    timeoutMs: deps.nodeTimeoutMs,
    logger: log,
  });
  const attestations = responses.map((r) => r.attestation);
  trace.record({
    stepType: "NODE_ATTESTATION",
    initiatedAt: t0,
    completedAt: new Date(),
    inputs: responses.flatMap((r) =>
      r.attestation ? [{ sourceId: r.nodeId, sourceHash: r.attestation.digest, sourceType: "attestation" }] : [],
    ),
    outputContent: { responses: responses.map((r) => ({ nodeId: r.nodeId, status: r.status })) },
  });

  // ── Step 3: Consensus ─────────────────────────────────────────────
  t0 = new Date();
  const outcome = reconcile(attestations, {
    threshold: deps.consensus.threshold,
    policy: deps.consensus.policy,
    signer: deps.consensus.signer,
    logger: log,
  });
  trace.record({
    stepType: "CONSENSUS_DECISION",
    initiatedAt: t0,
    completedAt: new Date(),
    outputContent:
      outcome.status === "approved"
        ? {
            status: outcome.status,
            policy: outcome.policy,
            canonicalNode: outcome.canonical.nodeId,
            contributors: outcome.contributors,
            agreement: outcome.agreement,
          }
        : { status: outcome.status, policy: outcome.policy, reason: outcome.reason, validCount: outcome.validCount },
  });

  // ── Step 4: Canonical record (consensus XOR arbitration) ──────────
  let record: CanonicalRecord;
  let correction: CorrectedRecord | undefined;
  if (outcome.status === "approved") {
    record = canonicalFromConsensus(runId, outcome);
  } else {
    t0 = new Date();
    correction = await arbitrate(input.text, outcome.attestations, deps.reviewer, {
      runId,
      nodeIds: deps.nodes.map((n) => n.nodeId),
      logger: log,
    });
    record = canonicalFromCorrection(runId, correction);
    trace.record({
      stepType: "HUMAN_ARBITRATION",
      initiatedAt: t0,
      completedAt: new Date(),
      outputContent: {
        validatorId: correction.validatorId,
        correctionReason: correction.correctionReason,
        entityCount: correction.entities.length,
      },
    });
  }

  // ── Step 5: Ledger commit ─────────────────────────────────────────
  t0 = new Date();
  const commitment = await deps.ledger.commit(record);
  trace.record({
    stepType: "LEDGER_COMMIT",
    initiatedAt: t0,
    completedAt: new Date(),
    inputs: [{ sourceId: runId, sourceHash: commitment.digest, sourceType: "canonical_record" }],
    outputContent: { contractAddress: commitment.contractAddress, committedAt: commitment.timestamp },
  });

  // ── Step 6: Rule evaluation ───────────────────────────────────────
  // An action failure is recorded on the persisted round, then rethrown.
  let evaluation: RuleEvaluationResult | undefined;
  let actionError: unknown;
  if (deps.rule) {
    t0 = new Date();
    evaluation = await evaluateRule(record, commitment, deps.rule, { ledger: deps.ledger, logger: log });
    if (evaluation.actionTriggered && deps.trigger) {
      try {
        await deps.trigger(evaluation, record, deps.rule);
      } catch (err) {
        actionError = err;
        log.error("ACTION", `run ${runId}: action failed: ${errorMessage(err)}`);
      }
    }
    trace.record({
      stepType: "RULE_EVALUATION",
      initiatedAt: t0,
      completedAt: new Date(),
      inputs: [{ sourceId: runId, sourceHash: evaluation.computedDigest, sourceType: "canonical_record" }],
      outputContent: {
        ruleId: evaluation.ruleId,
        reason: evaluation.reason,
        actionTriggered: evaluation.actionTriggered,
        ...(actionError === undefined ? {} : { actionError: errorMessage(actionError) }),
      },
    });
  }

  // ── Step 7: Persist ───────────────────────────────────────────────
  const persisted: PersistedRound = {
    ...record,
    digest: commitment.digest,
    signatures: outcome.status === "approved" ? outcome.contributingSignatures : [],
    contributingDigests: outcome.status === "approved" ? outcome.contributingDigests : [],
    contributingNodes: outcome.status === "approved" ? outcome.contributors : [],
    commitment,
    evaluation,
    trace: trace.getChain(),
  };
  if (actionError !== undefined) persisted.actionError = errorMessage(actionError);
  await deps.recordStore.put(runId, persisted);
  if (actionError !== undefined) throw actionError;
  log.info("ROUND", `run ${runId} complete: provenance=${record.provenance}, action=${evaluation?.actionTriggered ?? false}`);

  return { runId, record, outcome, correction, commitment, evaluation, responses, persisted };
}

/**
 * Rebuild the committed canonical record from its persisted form.
 */
export function canonicalFromPersisted(round: PersistedRound): CanonicalRecord {
  const record: CanonicalRecord = {
    runId: round.runId,
    provenance: round.provenance,
    entities: round.entities,
    timestamp: round.timestamp,
    sourceId: round.sourceId,
  };
  if (round.correctionReason !== undefined) record.correctionReason = round.correctionReason;
  return record;
}
