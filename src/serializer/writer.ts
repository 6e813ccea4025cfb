/**
 * Object graph writer. One instance per write call; it owns the identity
 * map used in sharing mode.
 */

import { ErrorKind } from "../errors";
import type { ClassRegistry } from "./class-registry";
import { Diagnostics } from "./diagnostics";
import { Emitter, quote } from "./emitter";
import { WriteIdentityMap } from "./identity";
import { escapeMarkerKey } from "./marker-key-escapes";
import type {
  AbstractConstructor,
  ErrorHandler,
  IndentOptions,
  ValueType,
  ValueWriter,
} from "./types";

export interface GraphWriterOptions {
  registry: ClassRegistry;
  sharing: boolean;
  indent: IndentOptions;
  source: string;
  line: number;
  report: ErrorHandler;
}

export class GraphWriter implements ValueWriter {
  readonly registry: ClassRegistry;
  readonly identity = new WriteIdentityMap();
  private readonly sharing: boolean;
  private readonly emitter: Emitter;
  private readonly diagnostics: Diagnostics;
  private written = 0;
  private readonly members: string[] = [];

  constructor(options: GraphWriterOptions) {
    this.registry = options.registry;
    this.sharing = options.sharing;
    this.emitter = new Emitter(
      options.indent.char.repeat(options.indent.count),
    );
    this.diagnostics = new Diagnostics(
      "write",
      options.source,
      () => options.line + this.emitter.lines,
      options.report,
    );
  }

  /** Number of object bodies written so far. */
  get objectCount(): number {
    return this.written;
  }

  writeDocument<V>(type: ValueType<V>, value: V): string {
    type.write(this, value);
    return `${this.emitter.toString()}\n`;
  }

  writeRaw(text: string): void {
    this.emitter.raw(text);
  }

  writeString(text: string): void {
    this.emitter.raw(quote(text));
  }

  /**
   * Writes `value` as an object whose static type is `type`. `@class` is
   * added when the runtime class differs. With sharing on, an object met
   * before is written as `"@<id>"` and a new one gets an `@id`.
   */
  writeObject<T>(type: AbstractConstructor<T>, value: T): void {
    if (typeof value !== "object" || value === null) {
      return this.diagnostics.fail(
        ErrorKind.InvalidValue,
        `'${String(value)}' is not an object of class '${type.name}'`,
      );
    }
    const expected =
      this.registry.lookupByRuntimeType(type) ??
      this.diagnostics.fail(ErrorKind.UnknownClass, `'${type.name}'`);
    const actual =
      this.registry.lookupByInstance(value) ??
      this.diagnostics.fail(
        ErrorKind.UnknownClass,
        `'${value.constructor.name}'`,
      );

    if (this.sharing) {
      const id = this.identity.idOf(value);
      if (id !== undefined) {
        this.writeString(`@${id}`);
        return;
      }
    }
    if (!this.registry.inherits(actual, expected)) {
      this.diagnostics.fail(
        ErrorKind.UnknownClass,
        `'${actual.name}' is not a '${expected.name}'`,
      );
    }

    this.emitter.open("{");
    if (actual !== expected) {
      this.emitter.key("@class");
      this.writeString(actual.name);
    }
    if (this.sharing) {
      this.emitter.key("@id");
      this.writeString(String(this.identity.assign(value)));
    }
    this.written += 1;
    actual.writeMembers(this, value);
    this.emitter.close("}");
    actual.afterWrite(value);
  }

  writeElements<E>(items: Iterable<E>, each: (item: E) => void): void {
    this.emitter.open("[");
    for (const item of items) {
      this.emitter.item();
      each(item);
    }
    this.emitter.close("]");
  }

  writeEntries<E>(
    entries: Iterable<[string, E]>,
    each: (value: E) => void,
  ): void {
    this.emitter.open("{");
    for (const [key, value] of entries) {
      this.emitter.key(escapeMarkerKey(key));
      this.withMember(key, () => each(value));
    }
    this.emitter.close("}");
  }

  writeField<V>(name: string, type: ValueType<V>, value: V): void {
    this.emitter.key(name);
    this.withMember(name, () => type.write(this, value));
  }

  invalid(text: string, note?: string): never {
    const member = this.members[this.members.length - 1];
    const subject =
      member === undefined ? `'${text}'` : `'${text}' for member '${member}'`;
    return this.diagnostics.fail(
      ErrorKind.InvalidValue,
      note === undefined ? subject : `${subject} (${note})`,
    );
  }

  private withMember(name: string, run: () => void): void {
    this.members.push(name);
    try {
      run();
    } finally {
      this.members.pop();
    }
  }
}
