import type { Item, ItemRef } from './Item.js';

/**
 * Hash-consing table for items. Keys are built from item content: the
 * combinator kind, the class, and either the terminal byte or the canonical
 * ids of the operand refs. Display names are not part of the key.
 */
export class DedupCache {
  private readonly canonical: Map<string, ItemRef> = new Map();
  // ref id -> id of the ref it was collapsed into
  private readonly aliases: Map<number, number> = new Map();

  get size(): number {
    return this.canonical.size;
  }

  canonicalId(ref: ItemRef): number {
    return this.aliases.get(ref.id) ?? ref.id;
  }

  keyOf(item: Item): string {
    const c = item.combinator;
    switch (c.kind) {
      case 'seq':
      case 'choice':
        return `${c.kind}:${item.class}:${this.canonicalId(c.left)},${this.canonicalId(c.right)}`;
      case 'terminal':
        return `terminal:${item.class}:${c.value}`;
      case 'empty':
      case 'done':
        return `${c.kind}:${item.class}`;
    }
  }

  lookup(item: Item): ItemRef | undefined {
    return this.canonical.get(this.keyOf(item));
  }

  /**
   * Registers `ref` as holding `item`. Returns the representative ref: `ref`
   * itself when the content is new, otherwise the earlier equal ref, in which
   * case `ref` becomes an alias of it.
   */
  record(ref: ItemRef, item: Item): ItemRef {
    const key = this.keyOf(item);
    const existing = this.canonical.get(key);
    if (existing === undefined) {
      this.canonical.set(key, ref);
      return ref;
    }
    if (existing.id !== ref.id) {
      this.aliases.set(ref.id, this.canonicalId(existing));
    }
    return existing;
  }
}
