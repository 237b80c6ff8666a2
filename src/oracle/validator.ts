/**
 * Oracle Node: validates extractor output against the custom
 * vocabularies and signs the resulting package.
 *
 * Classification priority per token:
 *   1. any drug term contained in the token      → DRUG    (0.95)
 *   2. any symptom term contained in the token   → SYMPTOM (0.90)
 *   3. label assigned by the extractor           → label   (0.85)
 * Entities below the confidence threshold are dropped.
 */

import { contentHash } from "../shared/hash.js";
import type {
  AnnotatedToken,
  NodeAttestation,
  ValidatedEntity,
  ValidationPackage,
  Vocabulary,
} from "../shared/types.js";
import type { Signer } from "./signer.js";

export const DRUG_CONFIDENCE = 0.95;
export const SYMPTOM_CONFIDENCE = 0.9;
export const EXTRACTOR_LABEL_CONFIDENCE = 0.85;
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

export interface OracleNodeOptions {
  confidenceThreshold?: number;
  /** Clock override for deterministic packages. */
  now?: () => Date;
}

/** Anything that can produce an attestation for the coordinator. */
export interface AttestingNode {
  readonly nodeId: string;
  attest(tokens: readonly AnnotatedToken[], vocab: Vocabulary): Promise<NodeAttestation>;
}

// Terms are compared lower-cased; blank terms never match.
function containsAny(haystack: string, terms: ReadonlySet<string>): boolean {
  for (const term of terms) {
    const needle = term.trim().toLowerCase();
    if (needle.length > 0 && haystack.includes(needle)) return true;
  }
  return false;
}

/**
 * Classify a single token. Returns null when nothing matches.
 */
export function classifyToken(token: AnnotatedToken, vocab: Vocabulary): ValidatedEntity | null {
  const lower = token.text.toLowerCase();
  if (containsAny(lower, vocab.drugs)) {
    return { text: token.text, label: "DRUG", confidence: DRUG_CONFIDENCE };
  }
  if (containsAny(lower, vocab.symptoms)) {
    return { text: token.text, label: "SYMPTOM", confidence: SYMPTOM_CONFIDENCE };
  }
  if (token.recognizedLabel) {
    return { text: token.text, label: token.recognizedLabel, confidence: EXTRACTOR_LABEL_CONFIDENCE };
  }
  return null;
}

export class OracleNode implements AttestingNode {
  readonly nodeId: string;
  private signer: Signer;
  private confidenceThreshold: number;
  private now: () => Date;

  constructor(nodeId: string, signer: Signer, options: OracleNodeOptions = {}) {
    this.nodeId = nodeId;
    this.signer = signer;
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.now = options.now ?? (() => new Date());
  }

  validate(tokens: readonly AnnotatedToken[], vocab: Vocabulary): ValidationPackage {
    const ordered = [...tokens].sort((a, b) => a.position - b.position);
    const entities: ValidatedEntity[] = [];

    for (const token of ordered) {
      const entity = classifyToken(token, vocab);
      if (entity && entity.confidence >= this.confidenceThreshold) {
        entities.push(Object.freeze(entity));
      }
    }

    return {
      entities,
      timestamp: this.now().toISOString(),
      sourceNodeId: this.nodeId,
      source: "NLP Module",
      status: entities.length > 0 ? "validated" : "no_valid_entities",
    };
  }

  sign(pkg: ValidationPackage): NodeAttestation {
    const digest = contentHash(pkg);
    return {
      nodeId: this.nodeId,
      package: pkg,
      digest,
      signature: this.signer.sign(digest, this.nodeId),
    };
  }

  async attest(tokens: readonly AnnotatedToken[], vocab: Vocabulary): Promise<NodeAttestation> {
    return this.sign(this.validate(tokens, vocab));
  }
}

/**
 * Check that an attestation's digest matches its package and that the
 * signature verifies for the claimed node.
 */
export function verifyAttestation(attestation: NodeAttestation, signer: Signer): boolean {
  if (contentHash(attestation.package) !== attestation.digest) return false;
  if (attestation.package.sourceNodeId !== attestation.nodeId) return false;
  return signer.verify(attestation.digest, attestation.signature, attestation.nodeId);
}
