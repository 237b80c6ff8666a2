import { describe, it, expect } from "vitest";
import { RoundService } from "../src/round/round_service.js";
import { ScriptedReviewer } from "../src/arbitration/arbitrator.js";
import { StaticEntityExtractor } from "../src/extraction/extractor.js";
import { LedgerStore } from "../src/ledger/ledger_store.js";
import { OracleNode } from "../src/oracle/validator.js";
import { HmacSigner } from "../src/oracle/signer.js";
import { HEADACHE_REIMBURSEMENT_RULE } from "../src/rules/rule.js";
import { InMemoryRecordStore } from "../src/storage/record_store.js";
import { DuplicateRunError } from "../src/shared/errors.js";
import type { PersistedRound } from "../src/shared/types.js";
import { TEST_SECRETS, fixedClock, quietLog, tokens, vocab } from "./helpers.js";

const signer = new HmacSigner(TEST_SECRETS);

function service(trigger?: () => Promise<void>) {
  return new RoundService({
    extractor: new StaticEntityExtractor(tokens("headache", "after", "ibuprofen")),
    nodes: ["Oracle_A", "Oracle_B"].map((id) => new OracleNode(id, signer, { now: fixedClock })),
    vocabulary: vocab,
    reviewer: new ScriptedReviewer({
      validatorId: "HITL_001",
      correctionReason: "unused",
      entities: [{ text: "headache", label: "SYMPTOM", confidence: 0.9 }],
    }),
    ledger: new LedgerStore({ now: fixedClock, logger: quietLog }),
    recordStore: new InMemoryRecordStore<PersistedRound>(),
    consensus: { threshold: 2, signer },
    rule: HEADACHE_REIMBURSEMENT_RULE,
    trigger,
    logger: quietLog,
  });
}

describe("RoundService", () => {
  it("runs a round in the background and records completion", async () => {
    const rounds = service();
    expect(rounds.start("headache after ibuprofen", "svc-1").status).toBe("running");

    const done = await rounds.waitFor("svc-1");
    expect(done?.status).toBe("completed");
    expect(done?.result?.sourceId).toBe("Oracle_A");
  });

  it("refuses to start a run id twice", async () => {
    const rounds = service();
    rounds.start("headache after ibuprofen", "svc-2");
    expect(() => rounds.start("headache after ibuprofen", "svc-2")).toThrow(DuplicateRunError);
    await rounds.waitFor("svc-2");
  });

  it("keeps the error code of a failed round while the record stays persisted", async () => {
    const rounds = service(async () => {
      throw new Error("payment gateway down");
    });
    rounds.start("headache after ibuprofen", "svc-3");

    const done = await rounds.waitFor("svc-3");
    expect(done?.status).toBe("failed");
    expect(done?.error).toEqual({ code: undefined, message: "payment gateway down" });
    expect((await rounds.deps.recordStore.get("svc-3")).actionError).toBe("payment gateway down");
  });
});
