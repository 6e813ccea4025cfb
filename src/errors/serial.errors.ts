import { z } from "zod";
import { error } from "../definers/builders/error";
import type { DefaultErrorType } from "../types/error";
import { WeaveErrorId } from "./error-ids";

/**
 * Closed set of conditions a read, a write or a class definition can raise.
 */
export enum ErrorKind {
  CantReadFile = "CantReadFile",
  CantWriteFile = "CantWriteFile",
  NoData = "NoData",
  PrematureEOF = "PrematureEOF",
  InvalidCharacter = "InvalidCharacter",
  ExpectingComma = "ExpectingComma",
  ExpectingDelimiter = "ExpectingDelimiter",
  ExpectingBrace = "ExpectingBrace",
  ExpectingBracket = "ExpectingBracket",
  ExpectingPairOrBrace = "ExpectingPairOrBrace",
  ExpectingValueOrBracket = "ExpectingValueOrBracket",
  ExpectingString = "ExpectingString",
  UnknownClass = "UnknownClass",
  UnknownSuperclass = "UnknownSuperclass",
  RedefinedClass = "RedefinedClass",
  RedefinedSuperclass = "RedefinedSuperclass",
  UnknownMember = "UnknownMember",
  RedefinedMember = "RedefinedMember",
  AbstractClass = "AbstractClass",
  CantCreateObject = "CantCreateObject",
  CantAddToArray = "CantAddToArray",
  InvalidValue = "InvalidValue",
  InvalidID = "InvalidID",
  WrongKeyword = "WrongKeyword",
}

export const ERROR_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  [ErrorKind.CantReadFile]: "Can't read file",
  [ErrorKind.CantWriteFile]: "Can't write file",
  [ErrorKind.NoData]: "No data",
  [ErrorKind.PrematureEOF]: "Premature end of file",
  [ErrorKind.InvalidCharacter]: "Invalid character",
  [ErrorKind.ExpectingComma]: "Expecting a comma",
  [ErrorKind.ExpectingDelimiter]: "Expecting a ':' delimiter",
  [ErrorKind.ExpectingBrace]: "Expecting a brace",
  [ErrorKind.ExpectingBracket]: "Expecting a bracket",
  [ErrorKind.ExpectingPairOrBrace]: "Expecting a name:value pair or a '}'",
  [ErrorKind.ExpectingValueOrBracket]: "Expecting a value or a ']'",
  [ErrorKind.ExpectingString]: "Expecting a quoted string",
  [ErrorKind.UnknownClass]: "Unknown class",
  [ErrorKind.UnknownSuperclass]: "Unknown superclass",
  [ErrorKind.RedefinedClass]: "Class already defined",
  [ErrorKind.RedefinedSuperclass]: "Superclass already defined",
  [ErrorKind.UnknownMember]: "Unknown member",
  [ErrorKind.RedefinedMember]: "Member already defined",
  [ErrorKind.AbstractClass]: "Can't instantiate abstract class",
  [ErrorKind.CantCreateObject]: "Can't create object",
  [ErrorKind.CantAddToArray]: "Can't add element to array",
  [ErrorKind.InvalidValue]: "Invalid value",
  [ErrorKind.InvalidID]: "Invalid ID",
  [ErrorKind.WrongKeyword]: "Wrong keyword",
};

export const serialErrorRecordSchema = z.object({
  kind: z.nativeEnum(ErrorKind),
  fatal: z.boolean(),
  /** "read", "write", or the registry operation that failed */
  where: z.string().min(1),
  arg: z.string(),
  source: z.string(),
  line: z.number().int().min(0),
});

export type SerialErrorRecord = z.infer<typeof serialErrorRecordSchema>;

const verbs: Readonly<Record<string, string>> = {
  read: "reading",
  write: "writing",
};

/**
 * Renders a record the way the default sink prints it:
 * a location header followed by `- <message> <arg>`.
 */
export function formatSerialError(record: SerialErrorRecord): string {
  const verb = verbs[record.where];
  const header = verb
    ? `Error while ${verb} '${record.source}' at or before line ${record.line}:`
    : `Error in ${record.where}:`;
  const detail = record.arg
    ? `${ERROR_MESSAGES[record.kind]} ${record.arg}`
    : ERROR_MESSAGES[record.kind];
  return `${header}\n- ${detail}`;
}

const remediations: Partial<Record<ErrorKind, string>> = {
  [ErrorKind.UnknownClass]:
    "Register the class with ClassRegistry.define() before reading or writing it.",
  [ErrorKind.UnknownMember]:
    "The key is not a member of the class; it was skipped. Declare it with .field() to read it.",
  [ErrorKind.AbstractClass]:
    "Add '@class' naming a concrete subclass, or register the class with a constructor.",
  [ErrorKind.InvalidID]:
    "Back-references need sharing enabled on the writer and must point at an '@id' read earlier.",
  [ErrorKind.ExpectingString]:
    "Quote the name, or enable Syntax.NoQuotes.",
  [ErrorKind.ExpectingComma]:
    "Separate pairs with commas, or enable Syntax.NoCommas.",
};

export const serialError = error<SerialErrorRecord & DefaultErrorType>(
  WeaveErrorId.Serial,
)
  .format(formatSerialError)
  .remediation(
    ({ kind }) =>
      remediations[kind] ??
      "Check the document against the classes registered for it.",
  )
  .dataSchema(serialErrorRecordSchema)
  .build();

export const invalidOptionsError = error<
  { message: string } & DefaultErrorType
>(WeaveErrorId.InvalidOptions)
  .format(({ message }) => `Invalid serializer options: ${message}`)
  .remediation(
    "Indent takes a single character and a non-negative count; syntax is a mask of Syntax flags.",
  )
  .build();
