import { createLogger, silentSink } from "../src/shared/log.js";
import type { AnnotatedToken, CanonicalRecord } from "../src/shared/types.js";
import { createVocabulary } from "../src/vocabulary/loader.js";

export const FIXED_TIME = "2025-07-14T12:34:56.000Z";
export const fixedClock = () => new Date(FIXED_TIME);
export const quietLog = createLogger("test", silentSink);

export const TEST_SECRETS = {
  Oracle_A: "test-secret-a",
  Oracle_B: "test-secret-b",
  Oracle_C: "test-secret-c",
};

export const vocab = createVocabulary(
  ["ibuprofen", "paracetamol", "aspirin", "naproxen", "penicillin"],
  ["headache", "fever", "cough", "fatigue", "nausea"],
);

/** Build tokens in order; a `LABEL` after `/` becomes the extractor label. */
export function tokens(...entries: string[]): AnnotatedToken[] {
  return entries.map((entry, position) => {
    const [text, recognizedLabel] = entry.split("/");
    return recognizedLabel ? { text, recognizedLabel, position } : { text, position };
  });
}

export function sampleRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    runId: "run-001",
    provenance: "consensus",
    entities: [
      { text: "headache", label: "SYMPTOM", confidence: 0.9 },
      { text: "ibuprofen", label: "DRUG", confidence: 0.95 },
    ],
    timestamp: FIXED_TIME,
    sourceId: "Oracle_A",
    ...overrides,
  };
}
