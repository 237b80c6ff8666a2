/**
 * Ledger Store: append-only digest commitments keyed by run id.
 *
 * A stored commitment is never replaced. Re-committing the same digest
 * returns the original commitment; a different digest under the same
 * key is store corruption. Commits to one key are serialized so the
 * check-then-write cannot interleave, even with an async backend.
 */

import { contentHash, digestsEqual } from "../shared/hash.js";
import { StoreCorruptionError } from "../shared/errors.js";
import { createLogger, type Logger } from "../shared/log.js";
import { DEFAULT_CONTRACT_ADDRESS } from "../shared/run_config.js";
import type { CanonicalRecord, LedgerCommitment } from "../shared/types.js";
import { InMemoryRecordStore, type RecordStore } from "../storage/record_store.js";

export interface LedgerStoreOptions {
  backend?: RecordStore<LedgerCommitment>;
  contractAddress?: string;
  now?: () => Date;
  logger?: Logger;
}

/** Canonical digest of a record as committed to the ledger. */
export function recordDigest(record: CanonicalRecord): string {
  return contentHash(record);
}

export class LedgerStore {
  readonly contractAddress: string;
  private backend: RecordStore<LedgerCommitment>;
  private now: () => Date;
  private log: Logger;
  private locks = new Map<string, Promise<unknown>>();

  constructor(options: LedgerStoreOptions = {}) {
    this.backend = options.backend ?? new InMemoryRecordStore<LedgerCommitment>();
    this.contractAddress = options.contractAddress ?? DEFAULT_CONTRACT_ADDRESS;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger();
  }

  /**
   * Run `fn` after every earlier operation on `key` has settled.
   */
  private withKeyLock<R>(key: string, fn: () => Promise<R>): Promise<R> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    const tail = run.catch(() => undefined);
    this.locks.set(key, tail);
    void tail.then(() => {
      if (this.locks.get(key) === tail) this.locks.delete(key);
    });
    return run;
  }

  async commit(record: CanonicalRecord): Promise<LedgerCommitment> {
    const storeKey = record.runId;
    const digest = recordDigest(record);

    return this.withKeyLock(storeKey, async () => {
      const existing = await this.backend.find(storeKey);
      if (existing) {
        if (digestsEqual(existing.digest, digest)) {
          this.log.info("LEDGER", `${storeKey} already committed with identical digest`);
          return existing;
        }
        this.log.error("LEDGER", `${storeKey}: conflicting commit refused`);
        throw new StoreCorruptionError(storeKey, existing.digest, digest);
      }

      const commitment: LedgerCommitment = {
        storeKey,
        digest,
        timestamp: this.now().toISOString(),
        contractAddress: this.contractAddress,
      };
      await this.backend.put(storeKey, commitment);
      this.log.info("LEDGER", `${storeKey} committed ${digest.slice(0, 16)}… at ${this.contractAddress}`);
      return commitment;
    });
  }

  /**
   * True only when the ledger holds a commitment for the presented key
   * whose digest equals both the presented commitment and the candidate.
   */
  async verify(candidateDigest: string, commitment: LedgerCommitment): Promise<boolean> {
    const stored = await this.backend.find(commitment.storeKey);
    if (!stored) return false;
    const presentedOk = digestsEqual(stored.digest, commitment.digest);
    const candidateOk = digestsEqual(stored.digest, candidateDigest);
    return presentedOk && candidateOk;
  }

  async get(storeKey: string): Promise<LedgerCommitment | undefined> {
    return this.backend.find(storeKey);
  }
}
