/**
 * Predicates over token text.
 */

import type { Token } from "./types";

const NUMBER_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const REFERENCE_PATTERN = /^@(\d+)$/;
const ID_PATTERN = /^\d+$/;

/**
 * An optional leading "-", digits with at most one ".", and an optional
 * exponent with its own sign.
 */
export const isNumber = (text: string): boolean => NUMBER_PATTERN.test(text);

export const isInteger = (text: string): boolean => /^-?\d+$/.test(text);

/** Unquoted text that ends a token as soon as whitespace follows it. */
export const isBareLiteral = (text: string): boolean =>
  isNumber(text) ||
  text === "true" ||
  text === "false" ||
  text === "null" ||
  REFERENCE_PATTERN.test(text);

export const isStructural = (token: Token, char: string): boolean =>
  !token.quoted && token.text === char;

export const isNull = (token: Token): boolean => isStructural(token, "null");

/** The id of a `@<digits>` back-reference, quoted or not. */
export const parseReference = (text: string): number | undefined => {
  const match = REFERENCE_PATTERN.exec(text);
  return match ? Number(match[1]) : undefined;
};

export const parseId = (text: string): number | undefined =>
  ID_PATTERN.test(text) ? Number(text) : undefined;

export const isWhitespace = (char: string): boolean =>
  char === " " ||
  char === "\t" ||
  char === "\n" ||
  char === "\r" ||
  char === "\v" ||
  char === "\f";

/** Control characters other than whitespace. */
export const isInvalidControl = (char: string): boolean =>
  char.charCodeAt(0) < 0x20 && !isWhitespace(char);
