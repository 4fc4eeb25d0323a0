import type { Rule } from './Rule.js';

/**
 * How a rule is addressed while building. A direct key carries the rule value
 * itself; a named key is looked up in the grammar, which is what lets a rule
 * mention itself (or a rule defined later) by name.
 */
export type RuleKey =
  | { kind: 'direct'; rule: Rule }
  | { kind: 'named'; name: string };

/** A rule value, or the name of a rule registered in the grammar. */
export type RuleReference = Rule | string;

export function directKey(rule: Rule): RuleKey {
  return { kind: 'direct', rule };
}

export function namedKey(name: string): RuleKey {
  return { kind: 'named', name };
}

export function toRuleKey(ref: RuleReference): RuleKey {
  return typeof ref === 'string' ? namedKey(ref) : directKey(ref);
}
