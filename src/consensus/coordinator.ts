/**
 * Consensus Coordinator
 *
 * Reconciles node attestations into one approved package or a failure
 * that must go to human arbitration. Two policies:
 *
 * - first_valid: participation threshold. At least `threshold` nodes
 *   returned non-empty packages; the first of them in node order wins.
 * - plurality: content threshold. Valid packages are grouped by the
 *   hash of their entity list; the largest group must reach `threshold`.
 *
 * A failed outcome is final for the round. Nothing here retries.
 */

import { contentHash } from "../shared/hash.js";
import { createLogger, type Logger } from "../shared/log.js";
import type {
  ApprovedOutcome,
  ConsensusOutcome,
  ConsensusPolicy,
  NodeAttestation,
  Provenance,
} from "../shared/types.js";
import type { Signer } from "../oracle/signer.js";
import { verifyAttestation } from "../oracle/validator.js";

export interface ReconcileOptions {
  threshold: number;
  policy?: ConsensusPolicy;
  /** When given, attestations with a bad digest or signature are not counted. */
  signer?: Signer;
  logger?: Logger;
}

function isValid(a: NodeAttestation | null): a is NodeAttestation {
  return a !== null && a.package.entities.length > 0;
}

/** Hash of the entity list alone, so packages from different nodes compare by content. */
export function entityContentHash(attestation: NodeAttestation): string {
  return contentHash(attestation.package.entities);
}

export function reconcile(
  attestations: ReadonlyArray<NodeAttestation | null>,
  options: ReconcileOptions,
): ConsensusOutcome {
  const { threshold } = options;
  const policy = options.policy ?? "first_valid";
  const log = options.logger ?? createLogger();

  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new RangeError(`Consensus threshold must be a positive integer, got ${threshold}`);
  }

  log.info("CONSENSUS", `policy=${policy} threshold=${threshold} responses=${attestations.length}`);

  let valid = attestations.filter(isValid);
  if (options.signer) {
    const signer = options.signer;
    const rejected = valid.filter((a) => !verifyAttestation(a, signer));
    for (const r of rejected) log.warn("CONSENSUS", `${r.nodeId}: attestation failed verification, not counted`);
    valid = valid.filter((a) => !rejected.includes(a));
  }

  const failed = (reason: "insufficient_participation" | "insufficient_agreement"): ConsensusOutcome => {
    log.warn("CONSENSUS", `failed (${reason}): ${valid.length} valid of ${attestations.length}`);
    return {
      status: "failed",
      policy,
      attestations: [...attestations],
      reason,
      validCount: valid.length,
      threshold,
    };
  };

  if (valid.length < threshold) return failed("insufficient_participation");

  if (policy === "first_valid") {
    const canonical = valid[0];
    const first = entityContentHash(canonical);
    const unanimous = valid.every((a) => entityContentHash(a) === first);
    log.info("CONSENSUS", `approved with ${valid.length} valid responses, canonical=${canonical.nodeId}`);
    return {
      status: "approved",
      policy,
      canonical,
      canonicalPackage: canonical.package,
      contributingDigests: valid.map((a) => a.digest),
      contributingSignatures: valid.map((a) => a.signature),
      contributors: valid.map((a) => a.nodeId),
      agreement: unanimous ? "unanimous" : "non_unanimous",
    };
  }

  // Map preserves insertion order, so ties go to the group seen first.
  const groups = new Map<string, NodeAttestation[]>();
  for (const a of valid) {
    const key = entityContentHash(a);
    const group = groups.get(key);
    if (group) group.push(a);
    else groups.set(key, [a]);
  }

  let plurality: NodeAttestation[] = [];
  for (const group of groups.values()) {
    if (group.length > plurality.length) plurality = group;
  }

  if (plurality.length < threshold) return failed("insufficient_agreement");

  const canonical = plurality[0];
  log.info(
    "CONSENSUS",
    `approved by ${plurality.length}/${valid.length} agreeing nodes, canonical=${canonical.nodeId}`,
  );
  return {
    status: "approved",
    policy,
    canonical,
    canonicalPackage: canonical.package,
    contributingDigests: plurality.map((a) => a.digest),
    contributingSignatures: plurality.map((a) => a.signature),
    contributors: plurality.map((a) => a.nodeId),
    agreement: plurality.length === valid.length ? "unanimous" : "non_unanimous",
  };
}

/**
 * Provenance tag for an approved outcome. Only the plurality policy
 * distinguishes non-unanimous approvals.
 */
export function provenanceOf(outcome: ApprovedOutcome): Provenance {
  if (outcome.policy === "plurality" && outcome.agreement === "non_unanimous") {
    return "consensus_non_unanimous";
  }
  return "consensus";
}
