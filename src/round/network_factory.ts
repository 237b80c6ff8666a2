/**
 * Builds the default oracle network used by the CLI and API.
 */

import { randomBytes } from "crypto";
import { HmacSigner, type Signer } from "../oracle/signer.js";
import { OracleNode } from "../oracle/validator.js";

export const DEFAULT_NODE_IDS = ["Oracle_A", "Oracle_B", "Oracle_C"] as const;

export interface OracleNetwork {
  nodes: OracleNode[];
  signer: Signer;
}

/**
 * One OracleNode per id sharing an HMAC key ring. Secrets not supplied
 * are generated for the lifetime of the process.
 */
export function buildHmacNetwork(
  nodeIds: readonly string[] = DEFAULT_NODE_IDS,
  options: { confidenceThreshold?: number; secrets?: Record<string, string> } = {},
): OracleNetwork {
  const secrets: Record<string, string> = {};
  for (const id of nodeIds) {
    secrets[id] = options.secrets?.[id] ?? randomBytes(32).toString("hex");
  }
  const signer = new HmacSigner(secrets);
  const nodes = nodeIds.map(
    (id) => new OracleNode(id, signer, { confidenceThreshold: options.confidenceThreshold }),
  );
  return { nodes, signer };
}
