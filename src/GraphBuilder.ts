import { ForwardArena } from './ForwardArena.js';
import type { Grammar } from './Grammar.js';
import type { Item, ItemRef } from './Item.js';
import { ItemGraph } from './ItemGraph.js';
import { DedupCache } from './DedupCache.js';
import type { Rule } from './Rule.js';
import { type RuleKey, type RuleReference, toRuleKey } from './RuleKey.js';
import { UnboundReferenceError, UnknownRuleNameError } from './GrammarError.js';

// ─── Public API ────────────────────────────────────────────────────────────────

export interface BuildOptions {
  /** Collapse structurally equal items into one node. Defaults to false. */
  dedup?: boolean;
}

/**
 * Materializes `root` and everything reachable from it into an item graph.
 * Named references are looked up in `grammar` and built at most once each.
 */
export function buildItems(root: RuleReference, grammar: Grammar, options?: BuildOptions): ItemGraph {
  const builder = new GraphBuilder(grammar, options ?? {});
  return builder.build(toRuleKey(root));
}

// ─── Internal: Builder ─────────────────────────────────────────────────────────

class GraphBuilder {
  private readonly grammar: Grammar;
  private readonly arena = new ForwardArena<Item>();
  // Entries go in before the rule is built, so a reference back to a rule
  // still under construction gets its pending ref.
  private readonly lookup: Map<string, ItemRef> = new Map();
  private readonly dedup: DedupCache | null;

  constructor(grammar: Grammar, options: BuildOptions) {
    this.grammar = grammar;
    this.dedup = options.dedup ? new DedupCache() : null;
  }

  build(key: RuleKey): ItemGraph {
    const root = this.resolve(key);
    const pending = this.arena.pending();
    if (pending.length > 0) {
      throw new UnboundReferenceError(pending[0]);
    }
    return new ItemGraph(root, this.arena);
  }

  private readonly resolve = (key: RuleKey): ItemRef => {
    if (key.kind === 'direct') {
      return this.construct(key.rule);
    }

    const memoized = this.lookup.get(key.name);
    if (memoized) {
      return memoized;
    }
    const rule = this.grammar.get(key.name);
    if (!rule) {
      throw new UnknownRuleNameError(key.name);
    }
    return this.construct(rule, key.name);
  };

  private construct(rule: Rule, name?: string): ItemRef {
    const cell = this.arena.reserve();
    if (name !== undefined) {
      this.lookup.set(name, cell.ref);
    }
    const item = rule.buildItem(this.resolve);

    if (!this.dedup) {
      return cell.bind(item);
    }
    const existing = this.dedup.lookup(item);
    if (existing) {
      cell.bind(existing.value);
      this.dedup.record(cell.ref, item);
      // The memo already handed out this cell's ref, keep returning it.
      return name !== undefined ? cell.ref : existing;
    }
    return this.dedup.record(cell.bind(item), item);
  }
}
