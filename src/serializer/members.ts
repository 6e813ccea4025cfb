import type { Token, ValueReader, ValueType, ValueWriter } from "./types";

/**
 * One named slot of a class: how its value is read into an instance and
 * written out of it.
 */
export interface Member<T> {
  readonly name: string;
  read(reader: ValueReader, target: T, token: Token): void;
  write(writer: ValueWriter, target: T): void;
}

export interface FieldOptions<T> {
  /** Key in the document; defaults to the property name. */
  name?: string;
  /** Creates the pointee, or each element of a container, for `owner`. */
  create?: (owner: T) => unknown;
  /** The member is written only when this returns true. */
  writeIf?: (owner: T) => boolean;
}

/** Handed to custom writers; emits `"<member>": value`. */
export interface MemberWriter {
  readonly writer: ValueWriter;
  writeMember<V>(type: ValueType<V>, value: V): void;
}

export type CustomRead<T> = (
  target: T,
  token: Token,
  reader: ValueReader,
) => void;

export type CustomWrite<T> = (target: T, out: MemberWriter) => void;

export function fieldMember<T, K extends keyof T & string>(
  key: K,
  type: ValueType<T[K]>,
  options: FieldOptions<T> = {},
): Member<T> {
  const name = options.name ?? key;
  const { create, writeIf } = options;
  return {
    name,
    read(reader, target, token) {
      target[key] = reader.readValue(type, token, {
        current: target[key],
        create: create && (() => create(target)),
      });
    },
    write(writer, target) {
      if (writeIf && !writeIf(target)) return;
      writer.writeField(name, type, target[key]);
    },
  };
}

export function accessorMember<T, V>(
  name: string,
  type: ValueType<V>,
  get: (target: T) => V,
  set: (target: T, value: V) => void,
): Member<T> {
  return {
    name,
    read(reader, target, token) {
      set(target, reader.readValue(type, token, { current: get(target) }));
    },
    write(writer, target) {
      writer.writeField(name, type, get(target));
    },
  };
}

/**
 * A value that lives outside the instance, such as a static property.
 * It is written with every instance of the class.
 */
export function globalMember<T, V>(
  name: string,
  type: ValueType<V>,
  access: { get(): V; set(value: V): void },
): Member<T> {
  return {
    name,
    read(reader, _target, token) {
      access.set(reader.readValue(type, token, { current: access.get() }));
    },
    write(writer) {
      writer.writeField(name, type, access.get());
    },
  };
}

export function customMember<T>(
  name: string,
  read: CustomRead<T>,
  write: CustomWrite<T>,
): Member<T> {
  return {
    name,
    read(reader, target, token) {
      read(target, token, reader);
    },
    write(writer, target) {
      write(target, {
        writer,
        writeMember<V>(type: ValueType<V>, value: V) {
          writer.writeField(name, type, value);
        },
      });
    },
  };
}
