/**
 * Type definitions shared by the reader, the writer and the value types.
 */

import type { ErrorKind, SerialErrorRecord } from "../errors";
import type { Logger } from "../models/Logger";
import type { AbstractConstructor } from "../types/utilities";
import type { ClassRegistry } from "./class-registry";
import type { ReadIdentityMap, SharedSlot } from "./identity";

export type { AbstractConstructor };

/** One token from the input; `quoted` tells `"}"` apart from `}`. */
export interface Token {
  text: string;
  quoted: boolean;
}

/**
 * Result of one tokenizer step. Inside an object `name` and `value` form a
 * pair; inside an array only `name` is used and holds the element.
 */
export interface TokenPair {
  name: Token;
  value: Token;
  hasName: boolean;
  hasValue: boolean;
  /** End of input was reached before any token. */
  atEnd: boolean;
}

export interface ReadOptions<V> {
  /** Value already in the target slot; objects are read into it when the class matches. */
  current?: V;
  /** Creates objects in place of the class constructor. */
  create?: () => unknown;
  /**
   * Lets a container take over recording where a shared handle lives.
   * Without it the handle itself becomes the owner.
   */
  onClaim?(slot: SharedSlot): void;
}

export interface ObjectReadOptions {
  current?: unknown;
  create?: () => unknown;
}

export interface ValueReader {
  readonly registry: ClassRegistry;
  readonly identity: ReadIdentityMap;
  next(inObject: boolean): TokenPair;
  fail(kind: ErrorKind, arg?: string): never;
  warn(kind: ErrorKind, arg?: string): void;
  /** Raises InvalidValue for the token, naming the member being read. */
  invalid(token: Token): never;
  readValue<V>(type: ValueType<V>, token: Token, options?: ReadOptions<V>): V;
  readObject<T>(
    type: AbstractConstructor<T>,
    token: Token,
    options?: ObjectReadOptions,
  ): T;
  /** The slot a `@<id>` token points at, or undefined when the token is no reference. */
  lookupReference(token: Token): SharedSlot | undefined;
  readElements(
    token: Token,
    adapter: ContainerAdapter,
    create?: () => unknown,
  ): void;
  readEntries(token: Token, onEntry: (key: string, value: Token) => void): void;
}

export interface ValueWriter {
  readonly registry: ClassRegistry;
  writeRaw(text: string): void;
  writeString(text: string): void;
  writeObject<T>(type: AbstractConstructor<T>, value: T): void;
  writeElements<E>(items: Iterable<E>, each: (item: E) => void): void;
  writeEntries<E>(
    entries: Iterable<[string, E]>,
    each: (value: E) => void,
  ): void;
  writeField<V>(name: string, type: ValueType<V>, value: V): void;
  /** Raises InvalidValue for a value that has no text form, naming the member. */
  invalid(text: string, note?: string): never;
}

/**
 * How one value is read from its token and written back.
 */
export interface ValueType<V> {
  readonly name: string;
  read(reader: ValueReader, token: Token, options: ReadOptions<V>): V;
  write(writer: ValueWriter, value: V): void;
}

/**
 * Appends the elements of one array. `end()` runs once the closing bracket
 * has been read.
 */
export interface ContainerAdapter {
  add(
    reader: ValueReader,
    create: (() => unknown) | undefined,
    token: Token,
  ): void;
  end(reader: ValueReader): void;
}

export type ErrorHandler = (record: SerialErrorRecord) => void;

export interface IndentOptions {
  char: string;
  count: number;
}

export interface SerializerOptions {
  /** Write shared objects once and refer to them with `@<id>`. */
  sharing?: boolean;
  /** Mask of Syntax flags accepted when reading. */
  syntax?: number;
  indent?: IndentOptions;
  /** Replaces the default sink, which logs every record. */
  onError?: ErrorHandler;
  logger?: Logger;
}

export interface Slot<V> {
  value?: V;
}

export type Source =
  | { path: string }
  | { text: string; name?: string; line?: number };

export interface TextStream {
  write(chunk: string): unknown;
}

export type Sink =
  | { path: string }
  | { stream: TextStream; name?: string; line?: number };
