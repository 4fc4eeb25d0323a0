import type { ForwardRef } from './ForwardArena.js';

export type ItemRef = ForwardRef<Item>;

export type ItemClass = 'normal' | 'passthrough' | 'elide';

export interface SeqCombinator {
  kind: 'seq';
  left: ItemRef;
  right: ItemRef;
}

export interface ChoiceCombinator {
  kind: 'choice';
  left: ItemRef;
  right: ItemRef;
}

export interface TerminalCombinator {
  kind: 'terminal';
  value: number;
}

export interface EmptyCombinator {
  kind: 'empty';
}

/** End marker for recognizers; no rule produces it. */
export interface DoneCombinator {
  kind: 'done';
}

export type Combinator =
  | SeqCombinator
  | ChoiceCombinator
  | TerminalCombinator
  | EmptyCombinator
  | DoneCombinator;

export type CombinatorKind = Combinator['kind'];

export interface Item {
  readonly combinator: Combinator;
  readonly class: ItemClass;
  readonly name?: string;
}

export function seq(left: ItemRef, right: ItemRef): SeqCombinator {
  return { kind: 'seq', left, right };
}

export function choice(left: ItemRef, right: ItemRef): ChoiceCombinator {
  return { kind: 'choice', left, right };
}

export function terminal(value: number): TerminalCombinator {
  return { kind: 'terminal', value };
}

export const EMPTY: EmptyCombinator = Object.freeze({ kind: 'empty' });

export const DONE: DoneCombinator = Object.freeze({ kind: 'done' });

export function createItem(combinator: Combinator, itemClass: ItemClass, name?: string): Item {
  const item: Item = name === undefined
    ? { combinator: Object.freeze(combinator), class: itemClass }
    : { combinator: Object.freeze(combinator), class: itemClass, name };
  return Object.freeze(item);
}

/** Child references of a combinator, left to right. */
export function operands(combinator: Combinator): ItemRef[] {
  switch (combinator.kind) {
    case 'seq':
    case 'choice':
      return [combinator.left, combinator.right];
    case 'terminal':
    case 'empty':
    case 'done':
      return [];
  }
}
