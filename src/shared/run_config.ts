/**
 * Run Configuration Module
 *
 * Reads oracle settings from environment variables (a `.env` file is
 * loaded by the entry points through `dotenv/config`):
 * - thresholds for entity confidence and consensus participation
 * - per-node timeout and consensus policy
 * - file locations for vocabulary, rule and record store
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { ConsensusPolicy } from "./types.js";

export const DEFAULT_CONTRACT_ADDRESS = "0x1234567890abcdef1234567890abcdef12345678";

const OracleConfigSchema = z.object({
  ORACLE_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  ORACLE_CONSENSUS_THRESHOLD: z.coerce.number().int().min(1).default(2),
  ORACLE_NODE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  ORACLE_CONSENSUS_POLICY: z
    .string()
    .transform((v) => v.toLowerCase().replace(/-/g, "_"))
    .pipe(z.enum(["first_valid", "plurality"]))
    .default("first_valid"),
  ORACLE_CONTRACT_ADDRESS: z.string().regex(/^0x[0-9a-fA-F]{40}$/).default(DEFAULT_CONTRACT_ADDRESS),
  ORACLE_VOCABULARY_PATH: z.string().min(1).default("data/vocabulary.json"),
  ORACLE_RULE_PATH: z.string().min(1).default("data/rules/headache_reimbursement.json"),
  ORACLE_STORE_DIR: z.string().min(1).default("out/rounds"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

export interface OracleConfig {
  confidenceThreshold: number;
  consensusThreshold: number;
  nodeTimeoutMs: number;
  consensusPolicy: ConsensusPolicy;
  contractAddress: string;
  vocabularyPath: string;
  rulePath: string;
  storeDir: string;
  port: number;
}

/**
 * Parse oracle configuration from an environment map.
 * Empty strings count as unset so defaults apply.
 */
export function loadOracleConfig(env: NodeJS.ProcessEnv = process.env): OracleConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }

  const parsed = OracleConfigSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      "oracle configuration",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }

  const c = parsed.data;
  return {
    confidenceThreshold: c.ORACLE_CONFIDENCE_THRESHOLD,
    consensusThreshold: c.ORACLE_CONSENSUS_THRESHOLD,
    nodeTimeoutMs: c.ORACLE_NODE_TIMEOUT_MS,
    consensusPolicy: c.ORACLE_CONSENSUS_POLICY,
    contractAddress: c.ORACLE_CONTRACT_ADDRESS,
    vocabularyPath: c.ORACLE_VOCABULARY_PATH,
    rulePath: c.ORACLE_RULE_PATH,
    storeDir: c.ORACLE_STORE_DIR,
    port: c.PORT,
  };
}

/**
 * Parse a consensus policy from a CLI argument, falling back to the configured one.
 */
export function parseConsensusPolicy(cliArg: string | undefined, fallback: ConsensusPolicy): ConsensusPolicy {
  if (cliArg === undefined) return fallback;
  const raw = cliArg.toLowerCase().replace(/-/g, "_");
  if (raw === "plurality") return "plurality";
  if (raw === "first_valid") return "first_valid";
  throw new ConfigError("consensus policy", [`unknown policy "${cliArg}"`]);
}
