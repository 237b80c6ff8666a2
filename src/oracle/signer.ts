/**
 * Signing primitives for node attestations.
 *
 * Nodes sign the hex digest of their package. Validators and the
 * coordinator only depend on the `Signer` interface, so HMAC and
 * Ed25519 are interchangeable.
 */

import {
  createHmac,
  generateKeyPairSync,
  sign as edSign,
  verify as edVerify,
  timingSafeEqual,
  type KeyObject,
} from "crypto";

export interface Signer {
  readonly algorithm: string;
  sign(digest: string, nodeId: string): string;
  verify(digest: string, signature: string, nodeId: string): boolean;
}

/**
 * HMAC-SHA256 over the digest with a per-node secret.
 * Verification needs the same key ring, so this fits a closed network of known nodes.
 */
export class HmacSigner implements Signer {
  readonly algorithm = "hmac-sha256";
  private secrets: Map<string, string>;

  constructor(secrets: Record<string, string> | Map<string, string>) {
    this.secrets = secrets instanceof Map ? new Map(secrets) : new Map(Object.entries(secrets));
  }

  private secretFor(nodeId: string): string {
    const secret = this.secrets.get(nodeId);
    if (secret === undefined) throw new Error(`HmacSigner: no key registered for node "${nodeId}"`);
    return secret;
  }

  sign(digest: string, nodeId: string): string {
    return createHmac("sha256", this.secretFor(nodeId)).update(digest, "utf8").digest("hex");
  }

  verify(digest: string, signature: string, nodeId: string): boolean {
    if (!this.secrets.has(nodeId)) return false;
    const expected = Buffer.from(this.sign(digest, nodeId), "hex");
    const actual = Buffer.from(signature, "hex");
    if (expected.length !== actual.length) return false;
    return timingSafeEqual(expected, actual);
  }
}

interface NodeKeyPair {
  publicKey: KeyObject;
  privateKey?: KeyObject;
}

/**
 * Ed25519 signatures. Nodes registered with only a public key can be
 * verified but not signed for.
 */
export class Ed25519Signer implements Signer {
  readonly algorithm = "ed25519";
  private keys = new Map<string, NodeKeyPair>();

  /** Generate a fresh key pair for each node id. */
  static generate(nodeIds: string[]): Ed25519Signer {
    const signer = new Ed25519Signer();
    for (const nodeId of nodeIds) {
      const { publicKey, privateKey } = generateKeyPairSync("ed25519");
      signer.keys.set(nodeId, { publicKey, privateKey });
    }
    return signer;
  }

  registerPublicKey(nodeId: string, publicKey: KeyObject): void {
    this.keys.set(nodeId, { publicKey });
  }

  publicKeyOf(nodeId: string): KeyObject | undefined {
    return this.keys.get(nodeId)?.publicKey;
  }

  sign(digest: string, nodeId: string): string {
    const privateKey = this.keys.get(nodeId)?.privateKey;
    if (!privateKey) throw new Error(`Ed25519Signer: no private key for node "${nodeId}"`);
    return edSign(null, Buffer.from(digest, "utf8"), privateKey).toString("hex");
  }

  verify(digest: string, signature: string, nodeId: string): boolean {
    const pair = this.keys.get(nodeId);
    if (!pair) return false;
    const sig = Buffer.from(signature, "hex");
    if (sig.length !== 64) return false;
    return edVerify(null, Buffer.from(digest, "utf8"), pair.publicKey, sig);
  }
}
