import { z } from "zod";
import type { LedgerCommitment, PersistedRound } from "../shared/types.js";

const Sha256HexSchema = z.string().regex(/^[a-f0-9]{64}$/);

export const ValidatedEntitySchema = z.object({
  text: z.string().min(1),
  label: z.string().min(1),
  confidence: z.number().min(0).max(1),
});

export const LedgerCommitmentSchema = z.object({
  storeKey: z.string().min(1),
  digest: Sha256HexSchema,
  timestamp: z.string(),
  contractAddress: z.string(),
});

export const CanonicalRecordSchema = z.object({
  runId: z.string().min(1),
  provenance: z.enum(["consensus", "consensus_non_unanimous", "human"]),
  entities: z.array(ValidatedEntitySchema),
  timestamp: z.string(),
  sourceId: z.string().min(1),
  correctionReason: z.string().optional(),
});

/** Rejects unknown keys, so a presented record is digested exactly as sent. */
export const StrictCanonicalRecordSchema = CanonicalRecordSchema.extend({
  entities: z.array(ValidatedEntitySchema.strict()),
}).strict();

const RuleEvaluationResultSchema = z.object({
  ruleId: z.string(),
  matched: z.boolean(),
  matchedCondition: z.string().optional(),
  matches: z.array(z.object({ label: z.string(), value: z.string() })),
  actionTriggered: z.boolean(),
  reason: z.enum(["matched", "no_match", "integrity_mismatch"]),
  computedDigest: z.string(),
});

const TraceRecordSchema = z.object({
  traceId: z.string(),
  runId: z.string(),
  stepType: z.enum([
    "EXTRACTION",
    "NODE_ATTESTATION",
    "CONSENSUS_DECISION",
    "HUMAN_ARBITRATION",
    "LEDGER_COMMIT",
    "RULE_EVALUATION",
  ]),
  chainPosition: z.number().int().nonnegative(),
  initiatedAt: z.string(),
  completedAt: z.string(),
  durationMs: z.number(),
  inputs: z.array(z.object({ sourceId: z.string(), sourceHash: z.string(), sourceType: z.string() })),
  outputContent: z.record(z.unknown()).optional(),
  hashChain: z.object({
    contentHash: Sha256HexSchema,
    previousHash: Sha256HexSchema.nullable(),
    merkleRoot: Sha256HexSchema,
  }),
});

export const PersistedRoundSchema = CanonicalRecordSchema.extend({
  digest: Sha256HexSchema,
  signatures: z.array(z.string()),
  contributingDigests: z.array(Sha256HexSchema),
  contributingNodes: z.array(z.string()),
  commitment: LedgerCommitmentSchema,
  evaluation: RuleEvaluationResultSchema.optional(),
  actionError: z.string().optional(),
  trace: z.array(TraceRecordSchema),
});

export function parseLedgerCommitment(raw: unknown): LedgerCommitment {
  return LedgerCommitmentSchema.parse(raw);
}

export function parsePersistedRound(raw: unknown): PersistedRound {
  return PersistedRoundSchema.parse(raw);
}
