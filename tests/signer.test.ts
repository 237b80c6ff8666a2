import { describe, it, expect } from "vitest";
import { HmacSigner, Ed25519Signer } from "../src/oracle/signer.js";
import { createHmac } from "crypto";
import { sha256String } from "../src/shared/hash.js";

const digest = sha256String("package");

describe("HmacSigner", () => {
  const signer = new HmacSigner({ Oracle_A: "test-secret-a", Oracle_B: "test-secret-b" });

  it("produces HMAC-SHA256 of the digest", () => {
    const expected = createHmac("sha256", "test-secret-a").update(digest).digest("hex");
    expect(signer.sign(digest, "Oracle_A")).toBe(expected);
  });

  it("verifies its own signatures", () => {
    expect(signer.verify(digest, signer.sign(digest, "Oracle_A"), "Oracle_A")).toBe(true);
  });

  it("rejects a signature made with another node's key", () => {
    expect(signer.verify(digest, signer.sign(digest, "Oracle_B"), "Oracle_A")).toBe(false);
  });

  it("rejects unknown nodes and malformed signatures", () => {
    expect(signer.verify(digest, "00", "Oracle_Z")).toBe(false);
    expect(signer.verify(digest, "abcd", "Oracle_A")).toBe(false);
  });

  it("refuses to sign for unregistered nodes", () => {
    expect(() => signer.sign(digest, "Oracle_Z")).toThrow(/no key registered/);
  });
});

describe("Ed25519Signer", () => {
  it("signs and verifies per node", () => {
    const signer = Ed25519Signer.generate(["Oracle_A", "Oracle_B"]);
    const sig = signer.sign(digest, "Oracle_A");
    expect(sig).toHaveLength(128);
    expect(signer.verify(digest, sig, "Oracle_A")).toBe(true);
    expect(signer.verify(digest, sig, "Oracle_B")).toBe(false);
    expect(signer.verify(sha256String("other"), sig, "Oracle_A")).toBe(false);
  });

  it("verifies with the public key alone", () => {
    const full = Ed25519Signer.generate(["Oracle_A"]);
    const sig = full.sign(digest, "Oracle_A");

    const verifier = new Ed25519Signer();
    const publicKey = full.publicKeyOf("Oracle_A");
    expect(publicKey).toBeDefined();
    if (publicKey) verifier.registerPublicKey("Oracle_A", publicKey);

    expect(verifier.verify(digest, sig, "Oracle_A")).toBe(true);
    expect(() => verifier.sign(digest, "Oracle_A")).toThrow(/no private key/);
  });
});
