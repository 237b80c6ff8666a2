import { v4 as uuidv4 } from "uuid";
import { contentHash, merkleRoot } from "../shared/hash.js";
import type { TraceRecord, TraceStepType } from "../shared/types.js";

/**
 * Round Trace Recorder: hash-chained audit trail of one oracle round.
 */
export class RoundTraceRecorder {
  private chain: TraceRecord[] = [];
  private runId: string;

  constructor(runId: string) {
    this.runId = runId;
  }

  /**
   * Record a new step. Automatically chains hashes.
   */
  record(params: {
    stepType: TraceStepType;
    initiatedAt: Date;
    completedAt: Date;
    inputs?: TraceRecord["inputs"];
    outputContent?: TraceRecord["outputContent"];
  }): TraceRecord {
    const traceId = uuidv4();
    const chainPosition = this.chain.length;
    const previousHash =
      chainPosition > 0 ? this.chain[chainPosition - 1].hashChain.contentHash : null;

    const recordContent = {
      traceId,
      runId: this.runId,
      stepType: params.stepType,
      chainPosition,
      initiatedAt: params.initiatedAt.toISOString(),
      completedAt: params.completedAt.toISOString(),
      durationMs: params.completedAt.getTime() - params.initiatedAt.getTime(),
      inputs: params.inputs ?? [],
      outputContent: params.outputContent,
    };

    const cHash = contentHash({ ...recordContent, previousHash });
    const allHashes = [...this.chain.map((r) => r.hashChain.contentHash), cHash];

    const record: TraceRecord = {
      ...recordContent,
      hashChain: {
        contentHash: cHash,
        previousHash,
        merkleRoot: merkleRoot(allHashes),
      },
    };

    this.chain.push(record);
    return record;
  }

  getChain(): TraceRecord[] {
    return [...this.chain];
  }
}

/**
 * Validate a trace chain: positions, previous-hash links, content hashes
 * and the running Merkle root.
 */
export function validateTraceChain(chain: readonly TraceRecord[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (let i = 0; i < chain.length; i++) {
    const record = chain[i];

    if (record.chainPosition !== i) {
      errors.push(`Step ${i}: chain position mismatch (expected ${i}, got ${record.chainPosition})`);
    }

    const expectedPrevious = i === 0 ? null : chain[i - 1].hashChain.contentHash;
    if (record.hashChain.previousHash !== expectedPrevious) {
      errors.push(`Step ${i}: previous hash does not match prior step content hash`);
    }

    const { hashChain, ...content } = record;
    const expectedHash = contentHash({ ...content, previousHash: hashChain.previousHash });
    if (hashChain.contentHash !== expectedHash) {
      errors.push(`Step ${i}: content hash mismatch`);
    }

    const expectedRoot = merkleRoot(chain.slice(0, i + 1).map((r) => r.hashChain.contentHash));
    if (hashChain.merkleRoot !== expectedRoot) {
      errors.push(`Step ${i}: merkle root mismatch`);
    }
  }

  return { valid: errors.length === 0, errors };
}
