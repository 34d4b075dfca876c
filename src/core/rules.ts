/**
 * Rule matcher
 * Picks the rule that applies to a path from an ordered rule list
 */

import { PolicyError, PolicyErrorCode } from './errors';

export interface PathRule {
  path_regex?: string | null;
}

export interface RuleMatch<R> {
  rule: R;
  index: number;
  /** Pattern that matched, or "" for a catch-all rule */
  pattern: string;
}

/**
 * Compile a rule's path pattern.
 * Patterns are unanchored: "\.prod\.yaml$" matches anywhere it finds.
 *
 * @throws PolicyError with REGEX_COMPILE code
 */
export function compilePattern(pattern: string, index?: number): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const where = index === undefined ? '' : ` in rule #${index + 1}`;
    throw new PolicyError(
      PolicyErrorCode.REGEX_COMPILE,
      `Cannot compile path pattern "${pattern}"${where}: ${reason}`,
      { rule: pattern, fields: ['path_regex'], cause: err }
    );
  }
}

/**
 * Find the first rule applying to `subject`.
 *
 * Logic:
 * 1. Rules are checked in order; the first match wins
 * 2. An empty pattern matches everything (catch-all)
 * 3. A catch-all placed before a specific rule shadows it
 * 4. No rules or no match → NO_MATCHING_RULE
 *
 * @param patternOf - extracts the pattern to use for a rule
 * @param kind - rule list name used in error messages
 */
export function findMatchingRule<R>(
  rules: readonly R[] | null | undefined,
  subject: string,
  patternOf: (rule: R, index: number) => string,
  kind = 'creation'
): RuleMatch<R> {
  const list = rules ?? [];

  for (let index = 0; index < list.length; index++) {
    const rule = list[index];
    const pattern = patternOf(rule, index);
    if (pattern === '') {
      return { rule, index, pattern };
    }
    if (compilePattern(pattern, index).test(subject)) {
      return { rule, index, pattern };
    }
  }

  throw new PolicyError(
    PolicyErrorCode.NO_MATCHING_RULE,
    list.length === 0
      ? `No ${kind} rules defined`
      : `No matching ${kind} rule found for "${subject}"`,
    { value: subject }
  );
}

/** Pattern of a rule that only knows path_regex */
export function pathPatternOf(rule: PathRule): string {
  return rule.path_regex ?? '';
}

/**
 * Validate the patterns of a rule list without matching anything.
 * Returns array of validation errors (empty = valid)
 */
export function validateRulePatterns(rules: readonly PathRule[] | null | undefined, kind = 'creation'): string[] {
  const errors: string[] = [];
  (rules ?? []).forEach((rule, i) => {
    const pattern = pathPatternOf(rule);
    if (pattern === '') return;
    try {
      new RegExp(pattern);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      errors.push(`${kind}_rules[${i}].path_regex invalid: "${pattern}" (${reason})`);
    }
  });
  return errors;
}
