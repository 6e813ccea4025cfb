/**
 * Object graph reader. One instance per read call: it pulls tokens, builds
 * objects through the class registry and keeps the `@id` map that resolves
 * back-references.
 */

import { ErrorKind } from "../errors";
import type { ClassDescriptor, ClassRegistry } from "./class-registry";
import { Diagnostics } from "./diagnostics";
import { ReadIdentityMap, type SharedSlot } from "./identity";
import { unescapeMarkerKey } from "./marker-key-escapes";
import { Tokenizer } from "./tokenizer";
import type {
  AbstractConstructor,
  ContainerAdapter,
  ErrorHandler,
  ObjectReadOptions,
  ReadOptions,
  Token,
  TokenPair,
  ValueReader,
  ValueType,
} from "./types";
import { isStructural, parseId, parseReference } from "./validation";

export interface GraphReaderOptions {
  registry: ClassRegistry;
  syntax: number;
  source: string;
  line: number;
  report: ErrorHandler;
}

const CLASS_KEY = "@class";
const ID_KEY = "@id";

const describeToken = (token: Token): string =>
  token.quoted ? `"${token.text}"` : `'${token.text}'`;

export class GraphReader implements ValueReader {
  readonly registry: ClassRegistry;
  readonly identity = new ReadIdentityMap();
  private readonly tokenizer: Tokenizer;
  private readonly diagnostics: Diagnostics;
  private readonly members: string[] = [];
  private created = 0;

  constructor(text: string, options: GraphReaderOptions) {
    this.registry = options.registry;
    this.diagnostics = new Diagnostics(
      "read",
      options.source,
      () => this.tokenizer.line,
      options.report,
    );
    this.tokenizer = new Tokenizer(
      text,
      { syntax: options.syntax, line: options.line },
      (kind, arg) => this.fail(kind, arg),
    );
  }

  /** Number of objects constructed so far. */
  get objectCount(): number {
    return this.created;
  }

  readDocument<V>(type: ValueType<V>, current?: V): V {
    const pair = this.next(false);
    if (pair.atEnd) {
      return this.fail(ErrorKind.NoData);
    }
    if (!pair.hasName) {
      return this.fail(ErrorKind.ExpectingValueOrBracket);
    }
    return this.readValue(type, pair.name, { current });
  }

  next(inObject: boolean): TokenPair {
    return this.tokenizer.next(inObject);
  }

  fail(kind: ErrorKind, arg?: string): never {
    return this.diagnostics.fail(kind, arg);
  }

  warn(kind: ErrorKind, arg?: string): void {
    this.diagnostics.warn(kind, arg);
  }

  invalid(token: Token): never {
    const member = this.members[this.members.length - 1];
    return this.fail(
      ErrorKind.InvalidValue,
      member === undefined
        ? describeToken(token)
        : `${describeToken(token)} for member '${member}'`,
    );
  }

  readValue<V>(
    type: ValueType<V>,
    token: Token,
    options: ReadOptions<V> = {},
  ): V {
    return type.read(this, token, options);
  }

  readObject<T>(
    type: AbstractConstructor<T>,
    token: Token,
    options: ObjectReadOptions = {},
  ): T {
    const expected =
      this.registry.lookupByRuntimeType(type) ??
      this.fail(ErrorKind.UnknownClass, `'${type.name}'`);
    const instance = this.readInstance(expected, token, options);
    if (!this.registry.conforms(instance, type)) {
      return this.fail(
        ErrorKind.InvalidID,
        `${describeToken(token)} is not a '${expected.name}'`,
      );
    }
    return instance;
  }

  lookupReference(token: Token): SharedSlot | undefined {
    const id = parseReference(token.text);
    if (id === undefined) {
      return undefined;
    }
    return (
      this.identity.get(id) ??
      this.fail(ErrorKind.InvalidID, describeToken(token))
    );
  }

  readElements(
    token: Token,
    adapter: ContainerAdapter,
    create?: () => unknown,
  ): void {
    if (!isStructural(token, "[")) {
      this.fail(ErrorKind.ExpectingBracket, `'[' before ${describeToken(token)}`);
    }
    for (;;) {
      const pair = this.next(false);
      if (pair.atEnd) {
        this.fail(ErrorKind.PrematureEOF, "in array");
      }
      if (!pair.hasName) {
        this.fail(ErrorKind.ExpectingValueOrBracket);
      }
      if (isStructural(pair.name, "]")) {
        break;
      }
      if (isStructural(pair.name, "}")) {
        this.fail(ErrorKind.ExpectingBracket, "']' before '}'");
      }
      adapter.add(this, create, pair.name);
    }
    adapter.end(this);
  }

  readEntries(
    token: Token,
    onEntry: (key: string, value: Token) => void,
  ): void {
    if (!isStructural(token, "{")) {
      this.fail(ErrorKind.ExpectingBrace, `'{' before ${describeToken(token)}`);
    }
    for (;;) {
      const pair = this.nextPair();
      if (!pair) {
        break;
      }
      const key = unescapeMarkerKey(pair.name.text);
      if (key === undefined) {
        this.fail(ErrorKind.WrongKeyword, describeToken(pair.name));
      }
      this.withMember(key, () => onEntry(key, pair.value));
    }
  }

  /**
   * Next name/value pair of the current object, or undefined at its
   * closing brace.
   */
  private nextPair(): TokenPair | undefined {
    const pair = this.next(true);
    if (pair.atEnd) {
      return this.fail(ErrorKind.PrematureEOF, "in object");
    }
    if (!pair.hasName) {
      return this.fail(ErrorKind.ExpectingPairOrBrace);
    }
    const { name } = pair;
    if (isStructural(name, "}")) {
      return undefined;
    }
    if (isStructural(name, "]")) {
      return this.fail(ErrorKind.ExpectingBrace, "'}' before ']'");
    }
    if (isStructural(name, "{") || isStructural(name, "[")) {
      return this.fail(ErrorKind.ExpectingPairOrBrace, describeToken(name));
    }
    if (!pair.hasValue) {
      return this.fail(
        ErrorKind.ExpectingPairOrBrace,
        `value missing after ${describeToken(name)}`,
      );
    }
    return pair;
  }

  private readInstance(
    expected: ClassDescriptor,
    token: Token,
    options: ObjectReadOptions,
  ): object {
    const referenced = this.lookupReference(token);
    if (referenced) {
      return referenced.object;
    }
    if (!isStructural(token, "{")) {
      return this.fail(
        ErrorKind.ExpectingBrace,
        `'{' before ${describeToken(token)}`,
      );
    }

    let descriptor = expected;
    let instance: object | undefined;
    let first = true;
    for (;;) {
      const pair = this.nextPair();
      if (!pair) {
        break;
      }
      const { name, value } = pair;
      if (name.text === CLASS_KEY) {
        if (!first) {
          this.fail(
            ErrorKind.WrongKeyword,
            `'${CLASS_KEY}' must be the first member`,
          );
        }
        descriptor = this.resolveClass(expected, value);
        first = false;
        continue;
      }
      first = false;
      if (!instance) {
        instance = this.createInstance(descriptor, options);
      }
      if (name.text === ID_KEY) {
        const id =
          parseId(value.text) ??
          this.fail(ErrorKind.InvalidID, describeToken(value));
        this.identity.register(id, instance);
        continue;
      }
      if (name.text.startsWith("@")) {
        this.fail(ErrorKind.WrongKeyword, describeToken(name));
      }
      this.readMember(descriptor, instance, name.text, value);
    }

    if (!instance) {
      instance = this.createInstance(descriptor, options);
    }
    descriptor.afterRead(instance);
    return instance;
  }

  private readMember(
    descriptor: ClassDescriptor,
    instance: object,
    name: string,
    value: Token,
  ): void {
    this.withMember(name, () => {
      if (!descriptor.readMember(this, instance, name, value)) {
        this.warn(
          ErrorKind.UnknownMember,
          `'${name}' in class '${descriptor.name}'`,
        );
        this.skipValue(value);
      }
    });
  }

  private withMember(name: string, read: () => void): void {
    this.members.push(name);
    try {
      read();
    } finally {
      this.members.pop();
    }
  }

  private resolveClass(expected: ClassDescriptor, token: Token): ClassDescriptor {
    const resolved =
      this.registry.lookupByName(token.text) ??
      this.fail(ErrorKind.UnknownClass, describeToken(token));
    if (!this.registry.inherits(resolved, expected)) {
      this.fail(
        ErrorKind.UnknownClass,
        `'${resolved.name}' is not a '${expected.name}'`,
      );
    }
    return resolved;
  }

  /**
   * Reuses `current` when it is exactly of the resolved class; otherwise
   * the member's creator, then the class constructor, make a new instance.
   */
  private createInstance(
    descriptor: ClassDescriptor,
    options: ObjectReadOptions,
  ): object {
    const { current, create } = options;
    if (
      typeof current === "object" &&
      current !== null &&
      this.registry.lookupByInstance(current) === descriptor
    ) {
      return current;
    }
    if (!create && descriptor.abstract) {
      return this.fail(ErrorKind.AbstractClass, `'${descriptor.name}'`);
    }
    const created = create ? create() : descriptor.construct();
    if (
      typeof created !== "object" ||
      created === null ||
      !this.registry.conforms(created, descriptor.type)
    ) {
      return this.fail(ErrorKind.CantCreateObject, `'${descriptor.name}'`);
    }
    this.created += 1;
    return created;
  }

  /** Consumes the rest of a value, nested objects and arrays included. */
  private skipValue(token: Token): void {
    if (isStructural(token, "{")) {
      for (;;) {
        const pair = this.nextPair();
        if (!pair) {
          return;
        }
        this.skipValue(pair.value);
      }
    }
    if (isStructural(token, "[")) {
      this.readElements(token, {
        add: (_reader, _create, element) => this.skipValue(element),
        end: () => undefined,
      });
    }
  }
}
