/**
 * Main export module for the Serializer
 */

export { Serializer } from "./Serializer";
export { ClassRegistry, ClassDefinition } from "./class-registry";
export type { ClassDescriptor } from "./class-registry";
export type {
  CustomRead,
  CustomWrite,
  FieldOptions,
  MemberWriter,
} from "./members";
export { SharedRef, isSharedOf } from "./shared";
export { Syntax, DEFAULT_SYNTAX, hasSyntax } from "./syntax";
export {
  t,
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
  toValueType,
} from "./value-types";
export type { EnumValue, Target } from "./value-types";
export {
  array,
  fixedArray,
  set,
  map,
  record,
  SequenceAdapter,
  FixedAdapter,
  SetAdapter,
} from "./containers";
export { Tokenizer } from "./tokenizer";
export type { TokenizerOptions } from "./tokenizer";
export { escapeMarkerKey, unescapeMarkerKey } from "./marker-key-escapes";
export type {
  ContainerAdapter,
  ErrorHandler,
  IndentOptions,
  ReadOptions,
  SerializerOptions,
  Sink,
  Slot,
  Source,
  TextStream,
  Token,
  TokenPair,
  ValueReader,
  ValueType,
  ValueWriter,
} from "./types";
