/**
 * Conditional Rule Engine
 *
 * Re-verifies a canonical record against its ledger commitment, then
 * evaluates a rule over the record's entities. Predicates are only
 * evaluated on records whose digest matches the stored commitment.
 */

import { IntegrityError } from "../shared/errors.js";
import { createLogger, type Logger } from "../shared/log.js";
import type {
  CanonicalRecord,
  LedgerCommitment,
  PredicateMatch,
  RuleEvaluationResult,
} from "../shared/types.js";
import { recordDigest, type LedgerStore } from "../ledger/ledger_store.js";
import type { Rule, RulePredicate } from "./rule.js";

/** Downstream side effect (e.g. reimbursement); only called on a match. */
export type ActionTrigger = (
  result: RuleEvaluationResult,
  record: CanonicalRecord,
  rule: Rule,
) => Promise<void>;

export interface EvaluateOptions {
  ledger: LedgerStore;
  trigger?: ActionTrigger;
  logger?: Logger;
}

/**
 * First `anyOf` value (array order) equal, ignoring case, to the text
 * of an entity carrying the predicate's label.
 */
export function matchPredicate(record: CanonicalRecord, predicate: RulePredicate): PredicateMatch | null {
  const texts = new Set(
    record.entities.filter((e) => e.label === predicate.label).map((e) => e.text.trim().toLowerCase()),
  );
  for (const candidate of predicate.anyOf) {
    if (texts.has(candidate.trim().toLowerCase())) {
      return { label: predicate.label, value: candidate };
    }
  }
  return null;
}

export async function evaluateRule(
  record: CanonicalRecord,
  commitment: LedgerCommitment,
  rule: Rule,
  options: EvaluateOptions,
): Promise<RuleEvaluationResult> {
  const log = options.logger ?? createLogger();
  const computedDigest = recordDigest(record);

  // Step 1: integrity gate
  const verified = await options.ledger.verify(computedDigest, commitment);
  if (!verified) {
    log.error("RULES", `${rule.id}: digest mismatch for ${commitment.storeKey}, evaluation halted`);
    return {
      ruleId: rule.id,
      matched: false,
      matches: [],
      actionTriggered: false,
      reason: "integrity_mismatch",
      computedDigest,
    };
  }

  // Step 2: conjunction of predicates
  const matches: PredicateMatch[] = [];
  for (const predicate of rule.predicates) {
    const hit = matchPredicate(record, predicate);
    if (!hit) {
      log.info("RULES", `${rule.id}: no ${predicate.label} in [${predicate.anyOf.join(", ")}]; no action`);
      return {
        ruleId: rule.id,
        matched: false,
        matches,
        actionTriggered: false,
        reason: "no_match",
        computedDigest,
      };
    }
    matches.push(hit);
  }

  const result: RuleEvaluationResult = {
    ruleId: rule.id,
    matched: true,
    matchedCondition: matches.map((m) => `'${m.value}'`).join(" + "),
    matches,
    actionTriggered: true,
    reason: "matched",
    computedDigest,
  };

  log.info("RULES", `${rule.id}: condition matched ${result.matchedCondition}; triggering ${rule.action ?? "action"}`);
  if (options.trigger) await options.trigger(result, record, rule);
  return result;
}

/**
 * Throwing variant of the integrity gate.
 */
export async function assertIntegrity(
  record: CanonicalRecord,
  commitment: LedgerCommitment,
  ledger: LedgerStore,
): Promise<void> {
  const computed = recordDigest(record);
  if (!(await ledger.verify(computed, commitment))) {
    const stored = await ledger.get(commitment.storeKey);
    throw new IntegrityError(commitment.storeKey, stored?.digest ?? commitment.digest, computed);
  }
}
