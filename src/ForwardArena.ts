import { DoubleBindError, UnboundReferenceError } from './GrammarError.js';

export type SlotState<T> = { bound: false } | { bound: true; value: T };

/** Shared between a slot's cell and its refs; `state` flips once, on bind. */
export interface Slot<T> {
  state: SlotState<T>;
}

/**
 * Read handle onto an arena slot. Handles can be copied and embedded in other
 * values before the slot is bound; two handles are the same reference when
 * their ids are equal.
 */
export class ForwardRef<T> {
  readonly id: number;
  private readonly slot: Slot<T>;

  constructor(id: number, slot: Slot<T>) {
    this.id = id;
    this.slot = slot;
  }

  get isBound(): boolean {
    return this.slot.state.bound;
  }

  /** The bound value, or undefined while the slot is pending. */
  get(): T | undefined {
    const state = this.slot.state;
    return state.bound ? state.value : undefined;
  }

  get value(): T {
    const state = this.slot.state;
    if (!state.bound) {
      throw new UnboundReferenceError(this.id);
    }
    return state.value;
  }
}

/** Write-once side of a reserved slot. */
export class ForwardCell<T> {
  readonly ref: ForwardRef<T>;
  private readonly slot: Slot<T>;

  constructor(ref: ForwardRef<T>, slot: Slot<T>) {
    this.ref = ref;
    this.slot = slot;
  }

  bind(value: T): ForwardRef<T> {
    if (this.slot.state.bound) {
      throw new DoubleBindError(this.ref.id);
    }
    this.slot.state = { bound: true, value };
    return this.ref;
  }
}

/**
 * Owning store with two-phase allocation: `reserve()` hands out a stable
 * reference first, the value is supplied later through the cell. Slots live
 * as long as the arena.
 */
export class ForwardArena<T> {
  private readonly slots: Slot<T>[] = [];

  get size(): number {
    return this.slots.length;
  }

  reserve(): ForwardCell<T> {
    const slot: Slot<T> = { state: { bound: false } };
    const id = this.slots.length;
    this.slots.push(slot);
    return new ForwardCell(new ForwardRef(id, slot), slot);
  }

  /** Ids of slots that were reserved but never bound. */
  pending(): number[] {
    const ids: number[] = [];
    this.slots.forEach((slot, id) => {
      if (!slot.state.bound) ids.push(id);
    });
    return ids;
  }

  *values(): IterableIterator<T> {
    for (const slot of this.slots) {
      const state = slot.state;
      if (state.bound) {
        yield state.value;
      }
    }
  }
}
