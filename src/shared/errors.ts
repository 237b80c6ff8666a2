/**
 * Error taxonomy for oracle rounds.
 *
 * Abstentions and consensus failures are outcomes, not errors; they never
 * appear here. Everything below stops the path it is raised on.
 */

export type OracleErrorCode =
  | "INTEGRITY_MISMATCH"
  | "STORE_CORRUPTION"
  | "EXTRACTION_UNAVAILABLE"
  | "ARBITRATION_REJECTED"
  | "CONFIG_INVALID"
  | "RECORD_NOT_FOUND"
  | "RUN_EXISTS";

export class OracleError extends Error {
  readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OracleError";
    this.code = code;
  }
}

export class IntegrityError extends OracleError {
  readonly expectedDigest: string;
  readonly computedDigest: string;

  constructor(storeKey: string, expectedDigest: string, computedDigest: string) {
    super(
      "INTEGRITY_MISMATCH",
      `Integrity check failed for "${storeKey}": committed ${expectedDigest.slice(0, 16)}…, computed ${computedDigest.slice(0, 16)}…`,
    );
    this.name = "IntegrityError";
    this.expectedDigest = expectedDigest;
    this.computedDigest = computedDigest;
  }
}

/** A second commit under an existing key with a different digest. Unrecoverable. */
export class StoreCorruptionError extends OracleError {
  readonly storeKey: string;

  constructor(storeKey: string, existingDigest: string, attemptedDigest: string) {
    super(
      "STORE_CORRUPTION",
      `Ledger key "${storeKey}" already committed with digest ${existingDigest}; refusing overwrite with ${attemptedDigest}`,
    );
    this.name = "StoreCorruptionError";
    this.storeKey = storeKey;
  }
}

export class ExtractionUnavailableError extends OracleError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("EXTRACTION_UNAVAILABLE", `Entity extractor unavailable: ${detail}`, { cause });
    this.name = "ExtractionUnavailableError";
  }
}

export class ArbitrationError extends OracleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ARBITRATION_REJECTED", message, options);
    this.name = "ArbitrationError";
  }
}

export class ConfigError extends OracleError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super("CONFIG_INVALID", `Invalid ${source}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class RecordNotFoundError extends OracleError {
  constructor(key: string) {
    super("RECORD_NOT_FOUND", `Record not found: ${key}`);
    this.name = "RecordNotFoundError";
  }
}

export class DuplicateRunError extends OracleError {
  constructor(runId: string) {
    super("RUN_EXISTS", `Run ${runId} already exists`);
    this.name = "DuplicateRunError";
  }
}
