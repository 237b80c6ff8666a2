import { readFileSync, existsSync } from "fs";
import { z } from "zod";
import { ConfigError } from "../shared/errors.js";

// ── Rule Definition ────────────────────────────────────────────────
// A rule is a conjunction of predicates. Each predicate holds when the
// record has an entity with `label` whose text equals one of `anyOf`.

export const RulePredicateSchema = z.object({
  label: z.string().min(1),
  anyOf: z.array(z.string().trim().min(1)).min(1),
});

export const RuleSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(""),
  predicates: z.array(RulePredicateSchema).min(1),
  /** Name of the downstream action, e.g. "reimbursement". */
  action: z.string().optional(),
});

export type RulePredicate = z.infer<typeof RulePredicateSchema>;
export type Rule = z.infer<typeof RuleSchema>;

export const HEADACHE_REIMBURSEMENT_RULE: Rule = {
  id: "headache-reimbursement",
  description: "Reimburse analgesic treatment of headache",
  predicates: [
    { label: "SYMPTOM", anyOf: ["headache", "headaches", "pain", "migraine"] },
    { label: "DRUG", anyOf: ["ibuprofen", "paracetamol", "aspirin"] },
  ],
  action: "reimbursement",
};

export function loadRule(filePath: string): Rule {
  if (!existsSync(filePath)) {
    throw new ConfigError("rule", [`file not found: ${filePath}`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError("rule", [`${filePath} is not valid JSON: ${detail}`]);
  }
  const parsed = RuleSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("rule", parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}
