/**
 * Vocabulary Loader: reads the drug and symptom term lists once at start-up.
 *
 * Terms are lower-cased and trimmed so that matching can stay
 * case-insensitive without re-normalizing on every token.
 */

import { readFileSync, existsSync } from "fs";
import { z } from "zod";
import { ConfigError } from "../shared/errors.js";
import type { Vocabulary } from "../shared/types.js";

export const VocabularyFileSchema = z.object({
  version: z.string().optional(),
  drugs: z.array(z.string().trim().min(1)).min(1),
  symptoms: z.array(z.string().trim().min(1)).min(1),
});

export type VocabularyFile = z.infer<typeof VocabularyFileSchema>;

export function createVocabulary(drugs: Iterable<string>, symptoms: Iterable<string>): Vocabulary {
  const norm = (terms: Iterable<string>) =>
    new Set([...terms].map((t) => t.trim().toLowerCase()).filter((t) => t.length > 0));
  return Object.freeze({ drugs: norm(drugs), symptoms: norm(symptoms) });
}

/**
 * Load and validate a vocabulary file.
 */
export function loadVocabulary(filePath: string): Vocabulary {
  if (!existsSync(filePath)) {
    throw new ConfigError("vocabulary", [`file not found: ${filePath}`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError("vocabulary", [`${filePath} is not valid JSON: ${detail}`]);
  }
  const parsed = VocabularyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      "vocabulary",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return createVocabulary(parsed.data.drugs, parsed.data.symptoms);
}
