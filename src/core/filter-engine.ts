import { compilePattern, isRegexLiteral } from '../utils/filter-conditions.js';
import type { FilterConditions, FilterRule } from '../utils/db-types.js';

/** The message attributes a rule can look at. */
export interface FilterSubject {
  author: string;
  authorEmail: string | null;
  subject: string;
}

export interface FilterDecision {
  allow: boolean;
  /** Names of the rules that matched and count toward the decision. */
  matched: string[];
}

function matchesSingle(candidate: string, value: string): boolean {
  if (isRegexLiteral(value)) {
    return compilePattern(value)?.test(candidate) ?? false;
  }
  return candidate.toLowerCase().includes(value.toLowerCase());
}

/** `/…/` values are regexes, others substrings; lists match on any element. */
export function matchesValue(candidate: string | null, value: string | string[]): boolean {
  if (!candidate) return false;
  const values = Array.isArray(value) ? value : [value];
  return values.some((entry) => matchesSingle(candidate, entry));
}

/** Every condition present must hold. A rule without conditions matches nothing. */
export function matchesConditions(message: FilterSubject, conditions: FilterConditions): boolean {
  const checks: boolean[] = [];

  if (conditions.author !== undefined) {
    checks.push(matchesValue(message.author, conditions.author));
  }
  if (conditions.author_email !== undefined) {
    checks.push(matchesValue(message.authorEmail, conditions.author_email));
  }
  if (conditions.subject_keywords !== undefined) {
    checks.push(matchesValue(message.subject, conditions.subject_keywords));
  }
  if (conditions.subject_regex !== undefined) {
    checks.push(compilePattern(conditions.subject_regex)?.test(message.subject) ?? false);
  }

  return checks.length > 0 && checks.every(Boolean);
}

/**
 * Decide whether a message earns a card.
 *
 * Without exclusive rules everything is allowed and `matched` lists the
 * matching rules. With at least one enabled exclusive rule, a message is
 * rejected unless it matches some rule; an exclusive match reports every
 * matching rule, otherwise only the non-exclusive ones matched.
 */
export function evaluateFilters(message: FilterSubject, rules: readonly FilterRule[]): FilterDecision {
  const enabled = rules.filter((rule) => rule.enabled);
  if (enabled.length === 0) return { allow: true, matched: [] };

  const matching = enabled.filter((rule) => matchesConditions(message, rule.conditions));
  const hasExclusiveRules = enabled.some((rule) => rule.exclusive);

  // When no exclusive rule matched, `matching` holds only non-exclusive rules.
  if (!hasExclusiveRules || matching.length > 0) {
    return { allow: true, matched: matching.map((rule) => rule.name) };
  }

  return { allow: false, matched: [] };
}
