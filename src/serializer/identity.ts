/**
 * Identity bookkeeping for sharing mode. The writer numbers objects in the
 * order it meets them; the reader maps those numbers back to instances and
 * remembers which handle owns each one.
 */

import { SharedRef } from "./shared";

export class WriteIdentityMap {
  private readonly ids = new Map<object, number>();
  private idCounter = 0;

  idOf(object: object): number | undefined {
    return this.ids.get(object);
  }

  assign(object: object): number {
    const existing = this.ids.get(object);
    if (existing !== undefined) {
      return existing;
    }
    this.idCounter += 1;
    this.ids.set(object, this.idCounter);
    return this.idCounter;
  }

  get size(): number {
    return this.ids.size;
  }
}

/** Where the canonical handle of a shared object lives. */
export type SlotOwner =
  | { kind: "handle"; handle: SharedRef<unknown> }
  | { kind: "element"; items: readonly unknown[]; index: number };

export interface SharedSlot {
  readonly id: number;
  readonly object: object;
  owner: SlotOwner | null;
}

export class ReadIdentityMap {
  private readonly slots = new Map<number, SharedSlot>();
  private readonly byObject = new WeakMap<object, SharedSlot>();

  /** A later `@id` with the same number replaces the earlier entry. */
  register(id: number, object: object): SharedSlot {
    const slot: SharedSlot = { id, object, owner: null };
    this.slots.set(id, slot);
    this.byObject.set(object, slot);
    return slot;
  }

  get(id: number): SharedSlot | undefined {
    return this.slots.get(id);
  }

  slotOf(value: unknown): SharedSlot | undefined {
    if (typeof value !== "object" || value === null) {
      return undefined;
    }
    return this.byObject.get(value);
  }

  claim(slot: SharedSlot, handle: SharedRef<unknown>): void {
    if (!slot.owner) {
      slot.owner = { kind: "handle", handle };
    }
  }

  /** Records an owner that is still an element of a container being read. */
  claimElement(slot: SharedSlot, items: readonly unknown[], index: number) {
    if (!slot.owner) {
      slot.owner = { kind: "element", items, index };
    }
  }

  /** Points an element owner at the container's final storage. */
  relocate(slot: SharedSlot, items: readonly unknown[], index: number) {
    slot.owner = { kind: "element", items, index };
  }

  handleOf(slot: SharedSlot): SharedRef<unknown> | undefined {
    const { owner } = slot;
    if (!owner) {
      return undefined;
    }
    if (owner.kind === "handle") {
      return owner.handle;
    }
    const element = owner.items[owner.index];
    return element instanceof SharedRef ? element : undefined;
  }

  get size(): number {
    return this.slots.size;
  }
}
