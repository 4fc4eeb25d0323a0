import { type Item, type ItemRef, type ItemClass, EMPTY, choice, createItem, seq, terminal } from './Item.js';
import { type RuleKey, type RuleReference, directKey, toRuleKey } from './RuleKey.js';
import { InvalidTerminalError } from './GrammarError.js';

export type Resolver = (key: RuleKey) => ItemRef;

export abstract class Rule {
  readonly name: string | undefined;

  constructor(name?: string) {
    this.name = name;
  }

  abstract buildItem(resolve: Resolver): Item;
}

export class Terminal extends Rule {
  readonly value: number;

  constructor(value: number | string, name?: string) {
    const byte = toByte(value);
    super(name ?? String.fromCharCode(byte));
    this.value = byte;
  }

  buildItem(_resolve: Resolver): Item {
    return createItem(terminal(this.value), 'normal', this.name);
  }
}

function toByte(value: number | string): number {
  if (typeof value === 'string') {
    if (value.length !== 1) {
      throw new InvalidTerminalError(value);
    }
    value = value.charCodeAt(0);
  }
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new InvalidTerminalError(value);
  }
  return value;
}

/**
 * Concatenation. Expands to a right-folded chain: the head is resolved as
 * given and the remaining elements become an elided Sequence, down to an
 * elided empty tail.
 */
export class Sequence extends Rule {
  readonly elements: readonly RuleReference[];

  constructor(elements: readonly RuleReference[], name?: string) {
    super(name);
    this.elements = Object.freeze([...elements]);
  }

  buildItem(resolve: Resolver): Item {
    if (this.elements.length === 0) {
      return createItem(EMPTY, 'normal', this.name);
    }
    const [head, ...rest] = this.elements;
    return createItem(
      seq(resolve(toRuleKey(head)), resolve(directKey(new Elide(new Sequence(rest))))),
      'normal',
      this.name,
    );
  }
}

/** Alternation; same chain encoding as Sequence, built from choice nodes. */
export class Choice extends Rule {
  readonly alternatives: readonly RuleReference[];
  readonly isPassthrough: boolean;

  constructor(alternatives: readonly RuleReference[], name?: string, passthrough: boolean = false) {
    super(name);
    this.alternatives = Object.freeze([...alternatives]);
    this.isPassthrough = passthrough;
  }

  passthrough(): Choice {
    return new Choice(this.alternatives, this.name, true);
  }

  buildItem(resolve: Resolver): Item {
    const itemClass: ItemClass = this.isPassthrough ? 'passthrough' : 'normal';
    if (this.alternatives.length === 0) {
      return createItem(EMPTY, itemClass, this.name);
    }
    const [head, ...rest] = this.alternatives;
    return createItem(
      choice(resolve(toRuleKey(head)), resolve(directKey(new Elide(new Choice(rest))))),
      itemClass,
      this.name,
    );
  }
}

/** Builds the wrapped rule's item and marks it as structural only. */
export class Elide extends Rule {
  readonly rule: Rule;

  constructor(rule: Rule) {
    super();
    this.rule = rule;
  }

  buildItem(resolve: Resolver): Item {
    return createItem(this.rule.buildItem(resolve).combinator, 'elide');
  }
}
