/**
 * Container value types and the adapters that fill them while an array is
 * read.
 */

import { ErrorKind } from "../errors";
import type { SharedSlot } from "./identity";
import type {
  ContainerAdapter,
  Token,
  ValueReader,
  ValueType,
} from "./types";

/**
 * Growable sequence. Elements are staged and committed to the target array
 * at `end()`. Shared handles first claimed by an element are recorded by
 * index and moved to the final array there as well.
 */
export class SequenceAdapter<V> implements ContainerAdapter {
  private readonly staging: V[] = [];
  private readonly pending: Array<{ slot: SharedSlot; index: number }> = [];

  constructor(
    private readonly element: ValueType<V>,
    private readonly target: V[],
  ) {}

  add(
    reader: ValueReader,
    create: (() => unknown) | undefined,
    token: Token,
  ): void {
    const index = this.staging.length;
    const value = reader.readValue(this.element, token, {
      create,
      onClaim: (slot) => {
        reader.identity.claimElement(slot, this.staging, index);
        this.pending.push({ slot, index });
      },
    });
    this.staging.push(value);
  }

  end(reader: ValueReader): void {
    this.target.length = 0;
    for (const value of this.staging) {
      this.target.push(value);
    }
    for (const { slot, index } of this.pending) {
      reader.identity.relocate(slot, this.target, index);
    }
  }
}

/** Writes in place; elements past the ones read keep their values. */
export class FixedAdapter<V> implements ContainerAdapter {
  private count = 0;

  constructor(
    private readonly element: ValueType<V>,
    private readonly target: V[],
    private readonly capacity: number,
  ) {}

  add(
    reader: ValueReader,
    create: (() => unknown) | undefined,
    token: Token,
  ): void {
    if (this.count >= this.capacity) {
      reader.fail(
        ErrorKind.CantAddToArray,
        `(capacity ${this.capacity}) at '${token.text}'`,
      );
    }
    this.target[this.count] = reader.readValue(this.element, token, {
      current: this.target[this.count],
      create,
    });
    this.count += 1;
  }

  end(): void {
    // elements are already in place
  }
}

export class SetAdapter<V> implements ContainerAdapter {
  constructor(
    private readonly element: ValueType<V>,
    private readonly target: Set<V>,
  ) {}

  add(
    reader: ValueReader,
    create: (() => unknown) | undefined,
    token: Token,
  ): void {
    this.target.add(reader.readValue(this.element, token, { create }));
  }

  end(): void {
    // insertion order is final
  }
}

export function array<V>(element: ValueType<V>): ValueType<V[]> {
  return {
    name: `array<${element.name}>`,
    read(reader, token, options) {
      const target = options.current ?? [];
      reader.readElements(
        token,
        new SequenceAdapter(element, target),
        options.create,
      );
      return target;
    },
    write(writer, value) {
      writer.writeElements(value, (item) => element.write(writer, item));
    },
  };
}

/** At most `capacity` elements; one more raises CantAddToArray. */
export function fixedArray<V>(
  element: ValueType<V>,
  capacity: number,
): ValueType<V[]> {
  return {
    name: `${element.name}[${capacity}]`,
    read(reader, token, options) {
      const target = options.current ?? [];
      reader.readElements(
        token,
        new FixedAdapter(element, target, capacity),
        options.create,
      );
      return target;
    },
    write(writer, value) {
      writer.writeElements(value, (item) => element.write(writer, item));
    },
  };
}

export function set<V>(element: ValueType<V>): ValueType<Set<V>> {
  return {
    name: `set<${element.name}>`,
    read(reader, token, options) {
      const target = options.current ?? new Set<V>();
      target.clear();
      reader.readElements(
        token,
        new SetAdapter(element, target),
        options.create,
      );
      return target;
    },
    write(writer, value) {
      writer.writeElements(value, (item) => element.write(writer, item));
    },
  };
}

/** String-keyed map, written as an object. */
export function map<V>(valueType: ValueType<V>): ValueType<Map<string, V>> {
  return {
    name: `map<${valueType.name}>`,
    read(reader, token, options) {
      const target = options.current ?? new Map<string, V>();
      target.clear();
      reader.readEntries(token, (key, value) => {
        target.set(
          key,
          reader.readValue(valueType, value, { create: options.create }),
        );
      });
      return target;
    },
    write(writer, value) {
      writer.writeEntries(value.entries(), (item) =>
        valueType.write(writer, item),
      );
    },
  };
}

export function record<V>(
  valueType: ValueType<V>,
): ValueType<Record<string, V>> {
  return {
    name: `record<${valueType.name}>`,
    read(reader, token, options) {
      const target: Record<string, V> = {};
      reader.readEntries(token, (key, value) => {
        // defineProperty keeps "__proto__" an ordinary key
        Object.defineProperty(target, key, {
          value: reader.readValue(valueType, value, { create: options.create }),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      });
      return target;
    },
    write(writer, value) {
      writer.writeEntries(Object.entries(value), (item) =>
        valueType.write(writer, item),
      );
    },
  };
}
