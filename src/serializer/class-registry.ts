/**
 * Registry of serializable classes. Each class gets a descriptor holding its
 * name, how to construct it, its members in declaration order, its
 * superclass links and its post-read/post-write hooks.
 */

import { ErrorKind, serialError } from "../errors";
import {
  accessorMember,
  customMember,
  CustomRead,
  CustomWrite,
  fieldMember,
  FieldOptions,
  globalMember,
  Member,
} from "./members";
import type {
  AbstractConstructor,
  Token,
  ValueReader,
  ValueType,
  ValueWriter,
} from "./types";

/** Type-erased view of a registered class, as the engine sees it. */
export interface ClassDescriptor {
  readonly name: string;
  readonly type: AbstractConstructor<unknown>;
  /** True when the class has no constructor function. */
  readonly abstract: boolean;
  readonly superclasses: readonly ClassDescriptor[];
  readonly memberNames: readonly string[];
  construct(): unknown;
  /**
   * Reads `name` into `target`: own members first, then each superclass in
   * declaration order. False when no class in the chain declares it.
   */
  readMember(
    reader: ValueReader,
    target: unknown,
    name: string,
    token: Token,
  ): boolean;
  /**
   * Superclass members first, then own members, in declaration order. A
   * class reached through two superclasses is written once; `written`
   * holds the classes already written for this object.
   */
  writeMembers(
    writer: ValueWriter,
    target: unknown,
    written?: Set<ClassDescriptor>,
  ): void;
  afterRead(target: unknown): void;
  afterWrite(target: unknown): void;
}

interface SuperclassLink<T> {
  readonly base: ClassDescriptor;
  readonly upcast: (target: T) => unknown;
}

const definitionError = (kind: ErrorKind, where: string, arg: string): never =>
  serialError.throw({ kind, fatal: true, where, arg, source: "", line: 0 });

export class ClassDefinition<T> implements ClassDescriptor {
  private readonly members: Member<T>[] = [];
  private readonly memberIndex = new Map<string, Member<T>>();
  private readonly links: SuperclassLink<T>[] = [];
  private postReadHook?: (target: T) => void;
  private postWriteHook?: (target: T) => void;

  constructor(
    private readonly registry: ClassRegistry,
    readonly name: string,
    readonly type: AbstractConstructor<T>,
    private readonly factory: (() => T) | null,
  ) {}

  get abstract(): boolean {
    return this.factory === null;
  }

  get superclasses(): readonly ClassDescriptor[] {
    return this.links.map((link) => link.base);
  }

  get memberNames(): readonly string[] {
    return this.members.map((member) => member.name);
  }

  /** Declares a property member. */
  field<K extends keyof T & string>(
    key: K,
    type: ValueType<T[K]>,
    options?: FieldOptions<T>,
  ): this {
    return this.member(fieldMember(key, type, options));
  }

  /** Declares a member read and written through a getter/setter pair. */
  accessor<V>(
    name: string,
    type: ValueType<V>,
    get: (target: T) => V,
    set: (target: T, value: V) => void,
  ): this {
    return this.member(accessorMember(name, type, get, set));
  }

  global<V>(
    name: string,
    type: ValueType<V>,
    access: { get(): V; set(value: V): void },
  ): this {
    return this.member(globalMember<T, V>(name, type, access));
  }

  /**
   * Declares a member with its own read and write functions. The writer
   * decides whether the member appears at all by calling `writeMember`.
   */
  custom(name: string, read: CustomRead<T>, write: CustomWrite<T>): this {
    return this.member(customMember(name, read, write));
  }

  member(member: Member<T>): this {
    if (member.name.startsWith("@")) {
      definitionError(
        ErrorKind.WrongKeyword,
        "member()",
        `'${member.name}' in class '${this.name}'`,
      );
    }
    if (this.memberIndex.has(member.name)) {
      definitionError(
        ErrorKind.RedefinedMember,
        "member()",
        `'${member.name}' in class '${this.name}'`,
      );
    }
    this.members.push(member);
    this.memberIndex.set(member.name, member);
    return this;
  }

  /**
   * Links a registered superclass. `upcast` maps an instance to the object
   * holding the superclass members; it defaults to the instance itself.
   */
  extends<B>(base: AbstractConstructor<B>, upcast?: (target: T) => B): this {
    const descriptor = this.registry.lookupByRuntimeType(base);
    if (!descriptor) {
      return definitionError(
        ErrorKind.UnknownSuperclass,
        "extends()",
        `'${base.name}' for class '${this.name}'`,
      );
    }
    if (
      descriptor === this ||
      this.links.some((link) => link.base === descriptor) ||
      this.registry.inherits(descriptor, this)
    ) {
      return definitionError(
        ErrorKind.RedefinedSuperclass,
        "extends()",
        `'${descriptor.name}' for class '${this.name}'`,
      );
    }
    this.links.push({
      base: descriptor,
      upcast: upcast ?? ((target: T): unknown => target),
    });
    return this;
  }

  postRead(hook: (target: T) => void): this {
    this.postReadHook = hook;
    return this;
  }

  postWrite(hook: (target: T) => void): this {
    this.postWriteHook = hook;
    return this;
  }

  construct(): T | undefined {
    return this.factory ? this.factory() : undefined;
  }

  readMember(
    reader: ValueReader,
    target: unknown,
    name: string,
    token: Token,
  ): boolean {
    if (!this.owns(target)) {
      return false;
    }
    const member = this.memberIndex.get(name);
    if (member) {
      member.read(reader, target, token);
      return true;
    }
    return this.links.some((link) =>
      link.base.readMember(reader, link.upcast(target), name, token),
    );
  }

  writeMembers(
    writer: ValueWriter,
    target: unknown,
    written = new Set<ClassDescriptor>(),
  ): void {
    if (written.has(this) || !this.owns(target)) {
      return;
    }
    written.add(this);
    for (const link of this.links) {
      link.base.writeMembers(writer, link.upcast(target), written);
    }
    for (const member of this.members) {
      member.write(writer, target);
    }
  }

  afterRead(target: unknown): void {
    if (this.postReadHook && this.owns(target)) {
      this.postReadHook(target);
    }
  }

  afterWrite(target: unknown): void {
    if (this.postWriteHook && this.owns(target)) {
      this.postWriteHook(target);
    }
  }

  private owns(target: unknown): target is T {
    return this.registry.conforms(target, this.type);
  }
}

/**
 * Owned by the caller and passed to each Serializer. Read-only once
 * populated, so one registry can serve any number of serializers.
 */
export class ClassRegistry {
  private readonly byName = new Map<string, ClassDescriptor>();
  private readonly byType = new Map<unknown, ClassDescriptor>();

  /**
   * Registers `type` under `name`. `create` builds new instances; null marks
   * the class abstract.
   */
  register<T>(
    name: string,
    type: AbstractConstructor<T>,
    create: (() => T) | null,
  ): ClassDefinition<T> {
    if (name === "" || name.startsWith("@")) {
      definitionError(ErrorKind.WrongKeyword, "register()", `'${name}'`);
    }
    const existing = this.byName.get(name) ?? this.byType.get(type);
    if (existing) {
      definitionError(
        ErrorKind.RedefinedClass,
        "register()",
        existing.name === name
          ? `'${name}'`
          : `'${name}' (${type.name} is already registered as '${existing.name}')`,
      );
    }
    const definition = new ClassDefinition(this, name, type, create);
    this.byName.set(name, definition);
    this.byType.set(type, definition);
    return definition;
  }

  define<T>(name: string, type: new () => T): ClassDefinition<T> {
    return this.register(name, type, () => new type());
  }

  defineAbstract<T>(
    name: string,
    type: AbstractConstructor<T>,
  ): ClassDefinition<T> {
    return this.register(name, type, null);
  }

  defineWith<T>(
    name: string,
    type: AbstractConstructor<T>,
    create: () => T,
  ): ClassDefinition<T> {
    return this.register(name, type, create);
  }

  lookupByName(name: string): ClassDescriptor | undefined {
    return this.byName.get(name);
  }

  /** Exact match: a subclass that was not registered itself is not found. */
  lookupByRuntimeType(type: unknown): ClassDescriptor | undefined {
    return this.byType.get(type);
  }

  lookupByInstance(value: object): ClassDescriptor | undefined {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (typeof prototype !== "object" || prototype === null) {
      return undefined;
    }
    return this.byType.get(prototype.constructor);
  }

  require(type: AbstractConstructor<unknown>): ClassDescriptor {
    return (
      this.lookupByRuntimeType(type) ??
      definitionError(ErrorKind.UnknownClass, "lookup", `'${type.name}'`)
    );
  }

  inherits(descriptor: ClassDescriptor, base: ClassDescriptor): boolean {
    return (
      descriptor === base ||
      descriptor.superclasses.some((link) => this.inherits(link, base))
    );
  }

  /**
   * True when `value` is an instance of `type`, or of a registered class
   * linked to `type`'s class through `extends()`.
   */
  conforms<T>(value: unknown, type: AbstractConstructor<T>): value is T {
    if (value instanceof type) {
      return true;
    }
    if (typeof value !== "object" || value === null) {
      return false;
    }
    const actual = this.lookupByInstance(value);
    const expected = this.lookupByRuntimeType(type);
    return !!actual && !!expected && this.inherits(actual, expected);
  }

  get names(): string[] {
    return Array.from(this.byName.keys());
  }
}
