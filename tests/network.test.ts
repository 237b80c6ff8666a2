import { describe, it, expect } from "vitest";
import { collectAttestations, collectNodeResponses } from "../src/oracle/network.js";
import { OracleNode, verifyAttestation, type AttestingNode } from "../src/oracle/validator.js";
import { buildHmacNetwork } from "../src/round/network_factory.js";
import { HmacSigner } from "../src/oracle/signer.js";
import type { NodeAttestation } from "../src/shared/types.js";
import { TEST_SECRETS, fixedClock, quietLog, tokens, vocab } from "./helpers.js";

const signer = new HmacSigner(TEST_SECRETS);
const input = tokens("Patient", "reports", "headache", "after", "ibuprofen");

function oracle(id: string) {
  return new OracleNode(id, signer, { now: fixedClock });
}

function delayed(inner: AttestingNode, ms: number): AttestingNode {
  return {
    nodeId: inner.nodeId,
    attest: (t, v) =>
      new Promise<NodeAttestation>((resolve, reject) => {
        setTimeout(() => inner.attest(t, v).then(resolve, reject), ms);
      }),
  };
}

const hanging: AttestingNode = {
  nodeId: "Oracle_C",
  attest: () => new Promise<NodeAttestation>(() => {}),
};

const throwing: AttestingNode = {
  nodeId: "Oracle_B",
  attest: async () => {
    throw new Error("model crashed");
  },
};

describe("collectNodeResponses", () => {
  it("returns one response per node in registration order", async () => {
    const nodes = [delayed(oracle("Oracle_A"), 30), oracle("Oracle_B"), oracle("Oracle_C")];
    const responses = await collectNodeResponses(nodes, input, vocab, { timeoutMs: 500, logger: quietLog });

    expect(responses.map((r) => r.nodeId)).toEqual(["Oracle_A", "Oracle_B", "Oracle_C"]);
    expect(responses.map((r) => r.status)).toEqual(["attested", "attested", "attested"]);
  });

  it("treats a node that never answers as null after the timeout", async () => {
    const nodes = [oracle("Oracle_A"), oracle("Oracle_B"), hanging];
    const t0 = Date.now();
    const responses = await collectNodeResponses(nodes, input, vocab, { timeoutMs: 50, logger: quietLog });

    expect(Date.now() - t0).toBeLessThan(1000);
    expect(responses[2]).toMatchObject({ nodeId: "Oracle_C", status: "timed_out", attestation: null });
    expect(responses[0].status).toBe("attested");
  });

  it("degrades a throwing node to a null attestation", async () => {
    const responses = await collectNodeResponses([oracle("Oracle_A"), throwing], input, vocab, {
      timeoutMs: 200,
      logger: quietLog,
    });
    expect(responses[1]).toMatchObject({ status: "failed", attestation: null, error: "model crashed" });
  });

  it("reports abstaining nodes with their empty attestation", async () => {
    const responses = await collectNodeResponses([oracle("Oracle_A")], tokens("nothing", "relevant"), vocab, {
      logger: quietLog,
    });
    expect(responses[0].status).toBe("abstained");
    expect(responses[0].attestation?.package.entities).toEqual([]);
  });
});

describe("collectAttestations", () => {
  it("maps responses to attestations with nulls for missing nodes", async () => {
    const result = await collectAttestations([oracle("Oracle_A"), throwing, hanging], input, vocab, {
      timeoutMs: 50,
      logger: quietLog,
    });
    expect(result).toHaveLength(3);
    expect(result[0]?.nodeId).toBe("Oracle_A");
    expect(result[1]).toBeNull();
    expect(result[2]).toBeNull();
  });

  it("hands every node the same frozen token list", async () => {
    const seen: unknown[] = [];
    const spy: AttestingNode = {
      nodeId: "Spy",
      attest: async (t, v) => {
        seen.push(t);
        return oracle("Spy").attest(t, v);
      },
    };
    await collectAttestations([spy, { ...spy }], input, vocab, { logger: quietLog });
    expect(seen).toHaveLength(2);
    expect(seen[0]).toBe(seen[1]);
    expect(Object.isFrozen(seen[0])).toBe(true);
  });
});

describe("buildHmacNetwork", () => {
  it("builds one node per id sharing a verifying signer", async () => {
    const network = buildHmacNetwork(undefined, { secrets: TEST_SECRETS });
    expect(network.nodes.map((n) => n.nodeId)).toEqual(["Oracle_A", "Oracle_B", "Oracle_C"]);

    const att = await network.nodes[1].attest(input, vocab);
    expect(att.signature).toBe(signer.sign(att.digest, "Oracle_B"));
    expect(verifyAttestation(att, network.signer)).toBe(true);
  });

  it("generates keys for ids without a supplied secret", async () => {
    const network = buildHmacNetwork(["Oracle_X"]);
    const att = await network.nodes[0].attest(input, vocab);
    expect(verifyAttestation(att, network.signer)).toBe(true);
    expect(verifyAttestation(att, signer)).toBe(false);
  });
});
