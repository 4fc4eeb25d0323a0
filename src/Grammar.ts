import { type Rule, Terminal, Sequence, Choice } from './Rule.js';
import type { RuleReference } from './RuleKey.js';

export interface GrammarOptions {
  rules?: Record<string, Rule>;
}

export interface ChoiceOptions {
  passthrough?: boolean;
}

/**
 * Registry of named rules. Names may be referenced by other rules before they
 * are registered here; they only have to exist by the time items are built.
 */
export class Grammar {
  private readonly namedRules: Map<string, Rule> = new Map();

  constructor(options?: GrammarOptions) {
    for (const [name, rule] of Object.entries(options?.rules ?? {})) {
      this.put(name, rule);
    }
  }

  get size(): number {
    return this.namedRules.size;
  }

  /** Registers `rule` under `name`, returning the rule it replaced, if any. */
  put(name: string, rule: Rule): Rule | undefined {
    const previous = this.namedRules.get(name);
    this.namedRules.set(name, rule);
    return previous;
  }

  get(name: string): Rule | undefined {
    return this.namedRules.get(name);
  }

  has(name: string): boolean {
    return this.namedRules.has(name);
  }

  names(): string[] {
    return [...this.namedRules.keys()];
  }

  terminal(name: string, value: number | string): Terminal {
    return this.register(name, new Terminal(value, name));
  }

  sequence(name: string, elements: RuleReference[]): Sequence {
    return this.register(name, new Sequence(elements, name));
  }

  choice(name: string, alternatives: RuleReference[], options?: ChoiceOptions): Choice {
    return this.register(name, new Choice(alternatives, name, options?.passthrough ?? false));
  }

  private register<T extends Rule>(name: string, rule: T): T {
    this.put(name, rule);
    return rule;
  }
}
