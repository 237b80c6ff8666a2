/**
 * Entity Extractor boundary.
 *
 * The oracle core consumes annotated tokens; how they are produced is
 * up to the extractor. `PatternEntityExtractor` is the default used by
 * the CLI and API: a word tokenizer plus regex label patterns.
 */

import type { AnnotatedToken } from "../shared/types.js";

export interface EntityExtractor {
  extract(text: string): Promise<AnnotatedToken[]>;
}

export interface LabelPattern {
  label: string;
  /** Tested against the whole token. */
  pattern: RegExp;
}

export const DEFAULT_LABEL_PATTERNS: readonly LabelPattern[] = [
  { label: "DATE", pattern: /^\d{4}-\d{2}-\d{2}$/ },
  { label: "QUANTITY", pattern: /^\d+(?:\.\d+)?(?:mg|mcg|g|ml|iu)$/i },
  { label: "CARDINAL", pattern: /^\d+(?:\.\d+)?$/ },
];

const TOKEN_RE = /[\p{L}\p{N}]+(?:[-'.][\p{L}\p{N}]+)*/gu;

export function tokenize(text: string): string[] {
  return text.match(TOKEN_RE) ?? [];
}

export class PatternEntityExtractor implements EntityExtractor {
  private patterns: readonly LabelPattern[];

  constructor(patterns: readonly LabelPattern[] = DEFAULT_LABEL_PATTERNS) {
    this.patterns = patterns;
  }

  async extract(text: string): Promise<AnnotatedToken[]> {
    return tokenize(text).map((word, position) => {
      const hit = this.patterns.find((p) => p.pattern.test(word));
      const token: AnnotatedToken = hit
        ? { text: word, recognizedLabel: hit.label, position }
        : { text: word, position };
      return Object.freeze(token);
    });
  }
}

/** Extractor over a fixed token list; for replaying a previous extraction. */
export class StaticEntityExtractor implements EntityExtractor {
  private tokens: AnnotatedToken[];

  constructor(tokens: Array<Omit<AnnotatedToken, "position"> & { position?: number }>) {
    this.tokens = tokens.map((t, i) => Object.freeze({ ...t, position: t.position ?? i }));
  }

  async extract(): Promise<AnnotatedToken[]> {
    return [...this.tokens];
  }
}
