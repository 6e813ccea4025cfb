/**
 * Value types: one per kind of member value. Each knows how to read its
 * value from a token and how to write it back. They are collected on `t`.
 */

import type { AbstractConstructor } from "../types/utilities";
import { array, fixedArray, map, record, set } from "./containers";
import { isSharedOf, SharedRef } from "./shared";
import type { Token, ValueReader, ValueType, ValueWriter } from "./types";
import { isInteger, isNull, isNumber } from "./validation";

/** A registered class, or a value type, that a pointer points at. */
export type Target<T> = AbstractConstructor<T> | ValueType<T>;

export const isValueType = <T>(target: Target<T>): target is ValueType<T> =>
  typeof target === "object";

export const toValueType = <T>(target: Target<T>): ValueType<T> =>
  isValueType(target) ? target : object(target);

function scalar<V>(
  name: string,
  read: (reader: ValueReader, token: Token) => V,
  write: (writer: ValueWriter, value: V) => void,
): ValueType<V> {
  return { name, read: (reader, token) => read(reader, token), write };
}

const NON_FINITE: Readonly<Record<string, number>> = {
  NaN: NaN,
  Infinity: Infinity,
  "-Infinity": -Infinity,
};

export const int = (): ValueType<number> =>
  scalar(
    "int",
    (reader, token) =>
      isInteger(token.text) ? Number(token.text) : reader.invalid(token),
    (writer, value) => {
      if (Number.isSafeInteger(value)) {
        writer.writeRaw(String(value));
      } else if (Number.isInteger(value)) {
        writer.invalid(
          String(value),
          "outside the safe integer range, use t.bigint()",
        );
      } else {
        writer.invalid(String(value));
      }
    },
  );

/** Non-finite numbers are written as the quoted strings "NaN", "Infinity" and "-Infinity". */
export const float = (): ValueType<number> =>
  scalar(
    "float",
    (reader, token) => {
      if (isNumber(token.text)) {
        return Number(token.text);
      }
      const special = NON_FINITE[token.text];
      return special === undefined ? reader.invalid(token) : special;
    },
    (writer, value) =>
      Number.isFinite(value)
        ? writer.writeRaw(String(value))
        : writer.writeString(String(value)),
  );

export const bigint = (): ValueType<bigint> =>
  scalar(
    "bigint",
    (reader, token) =>
      isInteger(token.text) ? BigInt(token.text) : reader.invalid(token),
    (writer, value) => writer.writeRaw(value.toString()),
  );

export const bool = (): ValueType<boolean> =>
  scalar(
    "bool",
    (reader, token) => {
      if (token.text === "true") return true;
      if (token.text === "false") return false;
      return reader.invalid(token);
    },
    (writer, value) => writer.writeRaw(value ? "true" : "false"),
  );

/** A single character; reading keeps the first code point of the token. */
export const char = (): ValueType<string> =>
  scalar(
    "char",
    (_reader, token) => (isNull(token) ? "" : Array.from(token.text)[0] ?? ""),
    (writer, value) => writer.writeString(Array.from(value)[0] ?? ""),
  );

/** An unquoted `null` reads as the empty string. */
export const string = (): ValueType<string> =>
  scalar(
    "string",
    (_reader, token) => (isNull(token) ? "" : token.text),
    (writer, value) => writer.writeString(value),
  );

export const nullableString = (): ValueType<string | null> =>
  scalar(
    "string?",
    (_reader, token) => (isNull(token) ? null : token.text),
    (writer, value) =>
      value === null ? writer.writeRaw("null") : writer.writeString(value),
  );

export type EnumValue<E> = E[Extract<keyof E, string>];

/**
 * Members of a TypeScript enum. Numeric members are written as numbers,
 * string members as strings.
 */
export function enumOf<E extends Record<string, string | number>>(
  values: E,
): ValueType<EnumValue<E>> {
  const members: EnumValue<E>[] = [];
  for (const key in values) {
    // numeric enums also map each number back to its name
    if (Number.isNaN(Number(key))) {
      members.push(values[key]);
    }
  }
  return scalar(
    "enum",
    (reader, token) =>
      members.find((member) => String(member) === token.text) ??
      reader.invalid(token),
    (writer, value) =>
      typeof value === "number"
        ? writer.writeRaw(String(value))
        : writer.writeString(String(value)),
  );
}

/**
 * An embedded instance of a registered class. A `@<id>` reference in its
 * place reads as the object registered under that id.
 */
export function object<T>(type: AbstractConstructor<T>): ValueType<T> {
  return {
    name: type.name,
    read(reader, token, options) {
      return reader.readObject(type, token, {
        current: options.current,
        create: options.create,
      });
    },
    write(writer, value) {
      writer.writeObject(type, value);
    },
  };
}

function pointer<T>(label: string, target: Target<T>): ValueType<T | null> {
  const pointee = toValueType(target);
  return {
    name: `${label}<${pointee.name}>`,
    read(reader, token, options) {
      if (isNull(token)) {
        return null;
      }
      return pointee.read(reader, token, {
        current: options.current ?? undefined,
        create: options.create,
      });
    },
    write(writer, value) {
      if (value === null) {
        writer.writeRaw("null");
      } else {
        pointee.write(writer, value);
      }
    },
  };
}

/** A non-owning pointer; `null` when empty. */
export const ref = <T>(target: Target<T>): ValueType<T | null> =>
  pointer("ref", target);

/** An exclusively owned pointer; same text and run-time shape as `ref`. */
export const owned = <T>(target: Target<T>): ValueType<T | null> =>
  pointer("owned", target);

/**
 * A shared-ownership handle. With sharing, every handle to one object reads
 * back as the same SharedRef: the first handle read for an `@id` becomes its
 * owner and later references alias it.
 */
export function shared<T>(
  target: Target<T>,
): ValueType<SharedRef<T> | null> {
  if (isValueType(target)) {
    return {
      name: `shared<${target.name}>`,
      read(reader, token, options) {
        return isNull(token)
          ? null
          : new SharedRef(target.read(reader, token, { create: options.create }));
      },
      write(writer, value) {
        if (value === null) {
          writer.writeRaw("null");
        } else {
          target.write(writer, value.value);
        }
      },
    };
  }

  const type = target;
  return {
    name: `shared<${type.name}>`,
    read(reader, token, options) {
      if (isNull(token)) {
        return null;
      }
      const accepts = (value: unknown): value is T =>
        reader.registry.conforms(value, type);
      const pointee = reader.readObject(type, token, { create: options.create });
      const slot = reader.identity.slotOf(pointee);
      if (slot) {
        const existing = reader.identity.handleOf(slot);
        if (existing && isSharedOf(existing, accepts)) {
          return existing;
        }
      }
      const handle = new SharedRef(pointee);
      if (slot && options.onClaim) {
        options.onClaim(slot);
      } else if (slot) {
        reader.identity.claim(slot, handle);
      }
      return handle;
    },
    write(writer, value) {
      if (value === null) {
        writer.writeRaw("null");
      } else {
        writer.writeObject(type, value.value);
      }
    },
  };
}

/** Value type factories. */
export const t = {
  int,
  float,
  bigint,
  bool,
  char,
  string,
  nullableString,
  enumOf,
  object,
  ref,
  owned,
  shared,
  array,
  fixedArray,
  set,
  map,
  record,
};
