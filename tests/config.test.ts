import { describe, it, expect } from "vitest";
import { loadOracleConfig, parseConsensusPolicy, DEFAULT_CONTRACT_ADDRESS } from "../src/shared/run_config.js";
import { ConfigError } from "../src/shared/errors.js";

describe("loadOracleConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadOracleConfig({})).toEqual({
      confidenceThreshold: 0.7,
      consensusThreshold: 2,
      nodeTimeoutMs: 2000,
      consensusPolicy: "first_valid",
      contractAddress: DEFAULT_CONTRACT_ADDRESS,
      vocabularyPath: "data/vocabulary.json",
      rulePath: "data/rules/headache_reimbursement.json",
      storeDir: "out/rounds",
      port: 3000,
    });
  });

  it("reads and coerces environment values", () => {
    const config = loadOracleConfig({
      ORACLE_CONFIDENCE_THRESHOLD: "0.8",
      ORACLE_CONSENSUS_THRESHOLD: "3",
      ORACLE_NODE_TIMEOUT_MS: "150",
      ORACLE_CONSENSUS_POLICY: "Plurality",
      ORACLE_STORE_DIR: "/tmp/rounds",
      PORT: "8080",
    });
    expect(config).toMatchObject({
      confidenceThreshold: 0.8,
      consensusThreshold: 3,
      nodeTimeoutMs: 150,
      consensusPolicy: "plurality",
      storeDir: "/tmp/rounds",
      port: 8080,
    });
  });

  it("accepts dashed policy names", () => {
    expect(loadOracleConfig({ ORACLE_CONSENSUS_POLICY: "first-valid" }).consensusPolicy).toBe("first_valid");
  });

  it("treats blank values as unset", () => {
    expect(loadOracleConfig({ ORACLE_CONSENSUS_THRESHOLD: "  ", PORT: "" }).consensusThreshold).toBe(2);
  });

  it("rejects out-of-range and malformed values", () => {
    expect(() => loadOracleConfig({ ORACLE_CONFIDENCE_THRESHOLD: "1.5" })).toThrow(ConfigError);
    expect(() => loadOracleConfig({ ORACLE_CONSENSUS_THRESHOLD: "0" })).toThrow(/ORACLE_CONSENSUS_THRESHOLD/);
    expect(() => loadOracleConfig({ ORACLE_CONSENSUS_THRESHOLD: "2.5" })).toThrow(ConfigError);
    expect(() => loadOracleConfig({ ORACLE_CONSENSUS_POLICY: "majority" })).toThrow(/ORACLE_CONSENSUS_POLICY/);
    expect(() => loadOracleConfig({ ORACLE_CONTRACT_ADDRESS: "0x12" })).toThrow(/ORACLE_CONTRACT_ADDRESS/);
  });
});

describe("parseConsensusPolicy", () => {
  it("falls back when no argument is given", () => {
    expect(parseConsensusPolicy(undefined, "plurality")).toBe("plurality");
  });

  it("normalizes case and dashes", () => {
    expect(parseConsensusPolicy("FIRST-VALID", "plurality")).toBe("first_valid");
  });

  it("rejects unknown policies", () => {
    expect(() => parseConsensusPolicy("majority", "first_valid")).toThrow('Invalid consensus policy: unknown policy "majority"');
  });
});
