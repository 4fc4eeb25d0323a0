import type { ForwardArena } from './ForwardArena.js';
import { type CombinatorKind, type Item, type ItemClass, type ItemRef, operands } from './Item.js';

export interface GraphNode {
  id: number;
  kind: CombinatorKind;
  class: ItemClass;
  name?: string;
  value?: number;
  operands: number[];
}

/** The items produced by one build. Owns the arena they were allocated in. */
export class ItemGraph {
  readonly root: ItemRef;
  private readonly arena: ForwardArena<Item>;

  constructor(root: ItemRef, arena: ForwardArena<Item>) {
    this.root = root;
    this.arena = arena;
  }

  get rootItem(): Item {
    return this.root.value;
  }

  /** Number of arena slots, including slots collapsed by deduplication. */
  get allocated(): number {
    return this.arena.size;
  }

  /** Number of distinct items reachable from the root. */
  get size(): number {
    return this.walk().size;
  }

  items(): IterableIterator<Item> {
    return this.walk().keys();
  }

  /**
   * Breadth-first table of the reachable items. Ids are assigned in visit
   * order, so two graphs with the same shape produce equal tables.
   */
  nodes(): GraphNode[] {
    const ids = this.walk();
    const table: GraphNode[] = [];
    for (const [item, id] of ids) {
      const node: GraphNode = {
        id,
        kind: item.combinator.kind,
        class: item.class,
        operands: operands(item.combinator).map(ref => idOf(ids, ref.value)),
      };
      if (item.name !== undefined) node.name = item.name;
      if (item.combinator.kind === 'terminal') node.value = item.combinator.value;
      table.push(node);
    }
    return table;
  }

  private walk(): Map<Item, number> {
    const ids = new Map<Item, number>();
    const queue: Item[] = [this.root.value];
    ids.set(this.root.value, 0);
    for (let i = 0; i < queue.length; i++) {
      for (const ref of operands(queue[i].combinator)) {
        const child = ref.value;
        if (!ids.has(child)) {
          ids.set(child, ids.size);
          queue.push(child);
        }
      }
    }
    return ids;
  }
}

function idOf(ids: Map<Item, number>, item: Item): number {
  const id = ids.get(item);
  if (id === undefined) {
    throw new Error('Item reached outside of graph walk');
  }
  return id;
}
