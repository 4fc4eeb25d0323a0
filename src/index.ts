export { Grammar } from './Grammar.js';
export type { GrammarOptions, ChoiceOptions } from './Grammar.js';

export { Rule, Terminal, Sequence, Choice, Elide } from './Rule.js';
export type { Resolver } from './Rule.js';

export { directKey, namedKey, toRuleKey } from './RuleKey.js';
export type { RuleKey, RuleReference } from './RuleKey.js';

export { EMPTY, DONE, seq, choice, terminal, createItem, operands } from './Item.js';
export type {
  Item,
  ItemRef,
  ItemClass,
  Combinator,
  CombinatorKind,
  SeqCombinator,
  ChoiceCombinator,
  TerminalCombinator,
  EmptyCombinator,
  DoneCombinator,
} from './Item.js';

export { ForwardArena } from './ForwardArena.js';
export type { ForwardCell, ForwardRef } from './ForwardArena.js';

export { DedupCache } from './DedupCache.js';

export { ItemGraph } from './ItemGraph.js';
export type { GraphNode } from './ItemGraph.js';

export { buildItems } from './GraphBuilder.js';
export type { BuildOptions } from './GraphBuilder.js';

export {
  GrammarError,
  UnknownRuleNameError,
  DoubleBindError,
  UnboundReferenceError,
  InvalidTerminalError,
} from './GrammarError.js';
