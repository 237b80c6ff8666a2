/**
 * Human Arbitration Fallback
 *
 * Runs only after a failed consensus round. The reviewer sees the
 * original text and every node's output, then supplies a corrected
 * entity list that replaces the oracle output outright.
 */

import { readFileSync } from "fs";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { ArbitrationError, ConfigError } from "../shared/errors.js";
import { createLogger, type Logger } from "../shared/log.js";
import type { CorrectedRecord, NodeAttestation } from "../shared/types.js";

export const HITL_PREFIX = "HITL_";

export interface ArbitrationRequest {
  requestId: string;
  runId: string;
  originalText: string;
  attestations: Array<NodeAttestation | null>;
  /** One line per node, e.g. `Oracle_A: headache(SYMPTOM), ibuprofen(DRUG)`. */
  discrepancies: string[];
  createdAt: string;
}

export const ReviewDecisionSchema = z.object({
  validatorId: z.string().startsWith(HITL_PREFIX, { message: `validatorId must start with ${HITL_PREFIX}` }),
  correctionReason: z.string().trim().min(1),
  entities: z
    .array(
      z.object({
        text: z.string().min(1),
        label: z.string().min(1),
        confidence: z.number().min(0).max(1),
      }),
    )
    .min(1),
});

export type ReviewDecision = z.infer<typeof ReviewDecisionSchema>;

export interface Reviewer {
  review(request: ArbitrationRequest): Promise<ReviewDecision>;
}

export interface ArbitrateOptions {
  runId: string;
  /** Node ids in the round; the reviewer id must not collide with them. */
  nodeIds?: string[];
  now?: () => Date;
  logger?: Logger;
}

/**
 * Summarize each node's output for the reviewer. Positions line up with
 * `nodeIds` when given; unknown null slots are labelled by index.
 */
export function describeDiscrepancies(
  attestations: ReadonlyArray<NodeAttestation | null>,
  nodeIds: readonly string[] = [],
): string[] {
  return attestations.map((a, i) => {
    const id = a?.nodeId ?? nodeIds[i] ?? `node#${i + 1}`;
    if (a === null) return `${id}: no response`;
    if (a.package.entities.length === 0) return `${id}: abstained`;
    return `${id}: ${a.package.entities.map((e) => `${e.text}(${e.label})`).join(", ")}`;
  });
}

export async function arbitrate(
  originalText: string,
  attestations: ReadonlyArray<NodeAttestation | null>,
  reviewer: Reviewer,
  options: ArbitrateOptions,
): Promise<CorrectedRecord> {
  const log = options.logger ?? createLogger();
  const now = options.now ?? (() => new Date());

  const request: ArbitrationRequest = {
    requestId: uuidv4(),
    runId: options.runId,
    originalText,
    attestations: [...attestations],
    discrepancies: describeDiscrepancies(attestations, options.nodeIds),
    createdAt: now().toISOString(),
  };

  log.warn("HITL", `consensus failed for run ${options.runId}; escalating request ${request.requestId}`);
  for (const line of request.discrepancies) log.info("HITL", `  - ${line}`);

  const raw = await reviewer.review(request);
  const parsed = ReviewDecisionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ArbitrationError(
      `Invalid review decision: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
    );
  }

  const decision = parsed.data;
  const nodeIds = new Set([
    ...(options.nodeIds ?? []),
    ...attestations.flatMap((a) => (a ? [a.nodeId] : [])),
  ]);
  if (nodeIds.has(decision.validatorId)) {
    throw new ArbitrationError(`Reviewer id ${decision.validatorId} collides with an oracle node id`);
  }

  log.info("HITL", `correction applied by ${decision.validatorId}: ${decision.entities.length} entities`);

  return {
    entities: decision.entities.map((e) => Object.freeze({ ...e })),
    correctionReason: decision.correctionReason,
    validatorId: decision.validatorId,
    timestamp: now().toISOString(),
  };
}

/**
 * Reviewer with a fixed decision, e.g. loaded from a correction file.
 */
export class ScriptedReviewer implements Reviewer {
  readonly requests: ArbitrationRequest[] = [];
  private decision: ReviewDecision;

  constructor(decision: ReviewDecision) {
    this.decision = decision;
  }

  static fromFile(filePath: string): ScriptedReviewer {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError("correction file", [`${filePath}: ${detail}`]);
    }
    const parsed = ReviewDecisionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        "correction file",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }
    return new ScriptedReviewer(parsed.data);
  }

  async review(request: ArbitrationRequest): Promise<ReviewDecision> {
    this.requests.push(request);
    return this.decision;
  }
}
