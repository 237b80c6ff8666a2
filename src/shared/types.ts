/** Labels assigned from the custom vocabularies. */
export type VocabularyLabel = "DRUG" | "SYMPTOM";

/** Vocabulary label, or whatever label the extractor assigned. */
export type EntityLabel = VocabularyLabel | (string & {});

/** Token produced by the external entity extractor. */
export interface AnnotatedToken {
  readonly text: string;
  readonly recognizedLabel?: string;
  /** Index of the token in the extractor output. */
  readonly position: number;
}

export interface Vocabulary {
  readonly drugs: ReadonlySet<string>;
  readonly symptoms: ReadonlySet<string>;
}

export interface ValidatedEntity {
  readonly text: string;
  readonly label: EntityLabel;
  readonly confidence: number;
}

export type PackageStatus = "validated" | "no_valid_entities";

export interface ValidationPackage {
  entities: ValidatedEntity[];
  timestamp: string;
  sourceNodeId: string;
  source: "NLP Module";
  status: PackageStatus;
}

export interface NodeAttestation {
  nodeId: string;
  package: ValidationPackage;
  /** SHA-256 hex of the canonical package serialization. */
  digest: string;
  signature: string;
}

export type ConsensusPolicy = "first_valid" | "plurality";

export type ConsensusFailureReason =
  | "insufficient_participation"
  | "insufficient_agreement";

export interface ApprovedOutcome {
  status: "approved";
  policy: ConsensusPolicy;
  canonical: NodeAttestation;
  canonicalPackage: ValidationPackage;
  contributingDigests: string[];
  contributingSignatures: string[];
  contributors: string[];
  agreement: "unanimous" | "non_unanimous";
}

export interface FailedOutcome {
  status: "failed";
  policy: ConsensusPolicy;
  attestations: Array<NodeAttestation | null>;
  reason: ConsensusFailureReason;
  validCount: number;
  threshold: number;
}

export type ConsensusOutcome = ApprovedOutcome | FailedOutcome;

export interface CorrectedRecord {
  entities: ValidatedEntity[];
  correctionReason: string;
  validatorId: string;
  timestamp: string;
}

export type Provenance = "consensus" | "consensus_non_unanimous" | "human";

/** The single record per round that is eligible for ledger commitment. */
export interface CanonicalRecord {
  runId: string;
  provenance: Provenance;
  entities: ValidatedEntity[];
  timestamp: string;
  /** Canonical node id, or the HITL validator id. */
  sourceId: string;
  correctionReason?: string;
}

export interface LedgerCommitment {
  storeKey: string;
  digest: string;
  timestamp: string;
  contractAddress: string;
}

export type RuleEvaluationReason = "matched" | "no_match" | "integrity_mismatch";

export interface PredicateMatch {
  label: EntityLabel;
  value: string;
}

export interface RuleEvaluationResult {
  ruleId: string;
  matched: boolean;
  matchedCondition?: string;
  matches: PredicateMatch[];
  actionTriggered: boolean;
  reason: RuleEvaluationReason;
  computedDigest: string;
}

/** Round trace step types */
export type TraceStepType =
  | "EXTRACTION"
  | "NODE_ATTESTATION"
  | "CONSENSUS_DECISION"
  | "HUMAN_ARBITRATION"
  | "LEDGER_COMMIT"
  | "RULE_EVALUATION";

export interface TraceRecord {
  traceId: string;
  runId: string;
  stepType: TraceStepType;
  chainPosition: number;
  initiatedAt: string;
  completedAt: string;
  durationMs: number;
  inputs: Array<{ sourceId: string; sourceHash: string; sourceType: string }>;
  outputContent?: Record<string, unknown>;
  hashChain: {
    contentHash: string;
    previousHash: string | null;
    merkleRoot: string;
  };
}

/** Shape written to the record store at the end of a round. */
export interface PersistedRound {
  runId: string;
  entities: ValidatedEntity[];
  timestamp: string;
  provenance: Provenance;
  sourceId: string;
  correctionReason?: string;
  digest: string;
  signatures: string[];
  contributingDigests: string[];
  contributingNodes: string[];
  commitment: LedgerCommitment;
  evaluation?: RuleEvaluationResult;
  /** Set when the rule matched but the downstream action threw. */
  actionError?: string;
  trace: TraceRecord[];
}
