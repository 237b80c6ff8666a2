/**
 * Runs every oracle node concurrently over the same tokens and waits
 * at most `timeoutMs` per node. Throwing or silent nodes count as `null`.
 */

import { createLogger, type Logger } from "../shared/log.js";
import type { AnnotatedToken, NodeAttestation, Vocabulary } from "../shared/types.js";
import type { AttestingNode } from "./validator.js";

export const DEFAULT_NODE_TIMEOUT_MS = 2000;

export interface CollectOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export type NodeResponseStatus = "attested" | "abstained" | "failed" | "timed_out";

export interface NodeResponse {
  nodeId: string;
  status: NodeResponseStatus;
  attestation: NodeAttestation | null;
  durationMs: number;
  error?: string;
}

const TIMED_OUT = Symbol("timed_out");

async function runNode(
  node: AttestingNode,
  tokens: readonly AnnotatedToken[],
  vocab: Vocabulary,
  timeoutMs: number,
): Promise<NodeResponse> {
  const t0 = Date.now();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  try {
    const settled = await Promise.race([node.attest(tokens, vocab), timeout]);
    const durationMs = Date.now() - t0;
    if (settled === TIMED_OUT) {
      return { nodeId: node.nodeId, status: "timed_out", attestation: null, durationMs };
    }
    const status = settled.package.entities.length > 0 ? "attested" : "abstained";
    return { nodeId: node.nodeId, status, attestation: settled, durationMs };
  } catch (err) {
    return {
      nodeId: node.nodeId,
      status: "failed",
      attestation: null,
      durationMs: Date.now() - t0,
      error: err instanceof Error ? err.message : String(err),
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Collect one response per node, in node order.
 */
export async function collectNodeResponses(
  nodes: readonly AttestingNode[],
  tokens: readonly AnnotatedToken[],
  vocab: Vocabulary,
  options: CollectOptions = {},
): Promise<NodeResponse[]> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_NODE_TIMEOUT_MS;
  const log = options.logger ?? createLogger();
  const frozen = Object.freeze([...tokens]);

  const responses = await Promise.all(nodes.map((n) => runNode(n, frozen, vocab, timeoutMs)));

  for (const r of responses) {
    switch (r.status) {
      case "attested":
        log.info("NODE", `${r.nodeId}: ${r.attestation?.package.entities.length ?? 0} entities validated`);
        break;
      case "abstained":
        log.warn("NODE", `${r.nodeId}: no valid entities found`);
        break;
      case "timed_out":
        log.warn("NODE", `${r.nodeId}: no response within ${timeoutMs}ms`);
        break;
      case "failed":
        log.error("NODE", `${r.nodeId} failed: ${r.error}`);
        break;
    }
  }
  return responses;
}

/**
 * Attestations in node order; `null` for nodes that failed or timed out.
 */
export async function collectAttestations(
  nodes: readonly AttestingNode[],
  tokens: readonly AnnotatedToken[],
  vocab: Vocabulary,
  options: CollectOptions = {},
): Promise<Array<NodeAttestation | null>> {
  const responses = await collectNodeResponses(nodes, tokens, vocab, options);
  return responses.map((r) => r.attestation);
}
