import { describe, it, expect } from "vitest";
import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { LedgerStore, recordDigest } from "../src/ledger/ledger_store.js";
import { InMemoryRecordStore, JsonFileRecordStore, type RecordStore } from "../src/storage/record_store.js";
import { parseLedgerCommitment } from "../src/storage/schemas.js";
import { StoreCorruptionError } from "../src/shared/errors.js";
import { contentHash } from "../src/shared/hash.js";
import { DEFAULT_CONTRACT_ADDRESS } from "../src/shared/run_config.js";
import type { LedgerCommitment } from "../src/shared/types.js";
import { FIXED_TIME, fixedClock, quietLog, sampleRecord } from "./helpers.js";

function ledger(backend: RecordStore<LedgerCommitment> = new InMemoryRecordStore<LedgerCommitment>()) {
  return new LedgerStore({ backend, now: fixedClock, logger: quietLog });
}

describe("recordDigest", () => {
  it("is the content hash of the record", () => {
    const record = sampleRecord();
    expect(recordDigest(record)).toBe(contentHash(record));
  });

  it("changes when any entity field changes", () => {
    const base = sampleRecord();
    const tampered = sampleRecord({
      entities: [{ ...base.entities[0], confidence: 0.99 }, base.entities[1]],
    });
    expect(recordDigest(tampered)).not.toBe(recordDigest(base));
  });
});

describe("LedgerStore.commit", () => {
  it("stores a commitment keyed by run id", async () => {
    const store = ledger();
    const record = sampleRecord();
    const commitment = await store.commit(record);

    expect(commitment).toEqual({
      storeKey: "run-001",
      digest: recordDigest(record),
      timestamp: FIXED_TIME,
      contractAddress: DEFAULT_CONTRACT_ADDRESS,
    });
    expect(await store.get("run-001")).toEqual(commitment);
  });

  it("uses the configured contract address", async () => {
    const store = new LedgerStore({ contractAddress: "0xfeed", logger: quietLog });
    const commitment = await store.commit(sampleRecord());
    expect(commitment.contractAddress).toBe("0xfeed");
  });

  it("is idempotent for an identical record", async () => {
    const store = ledger();
    const first = await store.commit(sampleRecord());
    const again = await store.commit(sampleRecord());
    expect(again).toEqual(first);
  });

  it("refuses a different digest under an existing key", async () => {
    const store = ledger();
    await store.commit(sampleRecord());
    await expect(store.commit(sampleRecord({ sourceId: "Oracle_B" }))).rejects.toThrow(StoreCorruptionError);
    expect((await store.get("run-001"))?.digest).toBe(recordDigest(sampleRecord()));
  });

  it("serializes concurrent commits to one key", async () => {
    const store = ledger();
    const results = await Promise.allSettled([
      store.commit(sampleRecord()),
      store.commit(sampleRecord({ sourceId: "Oracle_B" })),
      store.commit(sampleRecord()),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    const rejected = results[1];
    if (rejected.status === "rejected") expect(rejected.reason).toBeInstanceOf(StoreCorruptionError);
  });

  it("commits different keys independently", async () => {
    const backend = new InMemoryRecordStore<LedgerCommitment>();
    const store = ledger(backend);
    await Promise.all([
      store.commit(sampleRecord({ runId: "run-a" })),
      store.commit(sampleRecord({ runId: "run-b" })),
    ]);
    expect((await backend.keys()).sort()).toEqual(["run-a", "run-b"]);
  });
});

describe("LedgerStore.verify", () => {
  it("accepts the committed record", async () => {
    const store = ledger();
    const record = sampleRecord();
    const commitment = await store.commit(record);
    expect(await store.verify(recordDigest(record), commitment)).toBe(true);
  });

  it("rejects a mutated record", async () => {
    const store = ledger();
    const commitment = await store.commit(sampleRecord());
    const mutated = sampleRecord({ entities: [{ text: "headache", label: "SYMPTOM", confidence: 0.99 }] });
    expect(await store.verify(recordDigest(mutated), commitment)).toBe(false);
  });

  it("rejects a forged commitment even when it matches the candidate", async () => {
    const store = ledger();
    const commitment = await store.commit(sampleRecord());
    const forgedRecord = sampleRecord({ sourceId: "Oracle_Z" });
    const forged = { ...commitment, digest: recordDigest(forgedRecord) };
    expect(await store.verify(recordDigest(forgedRecord), forged)).toBe(false);
  });

  it("rejects commitments for unknown keys", async () => {
    const store = ledger();
    const record = sampleRecord();
    const commitment: LedgerCommitment = {
      storeKey: "never-committed",
      digest: recordDigest(record),
      timestamp: FIXED_TIME,
      contractAddress: DEFAULT_CONTRACT_ADDRESS,
    };
    expect(await store.verify(recordDigest(record), commitment)).toBe(false);
  });
});

describe("LedgerStore with a file backend", () => {
  it("keeps commitments across store instances", async () => {
    const dir = mkdtempSync(join(tmpdir(), "oracle-ledger-"));
    const record = sampleRecord();

    const first = ledger(new JsonFileRecordStore(dir, parseLedgerCommitment));
    const commitment = await first.commit(record);

    const reopened = ledger(new JsonFileRecordStore(dir, parseLedgerCommitment));
    expect(await reopened.verify(recordDigest(record), commitment)).toBe(true);
    await expect(reopened.commit(sampleRecord({ sourceId: "Oracle_C" }))).rejects.toThrow(StoreCorruptionError);
  });
});
