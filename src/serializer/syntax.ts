/**
 * Leniency flags for the reader. They combine as a bit mask.
 */
export enum Syntax {
  /** Plain JSON. */
  Strict = 0,
  /** Line (`//`) and block comments. */
  Comments = 1,
  /** Unquoted names, and unquoted values that are not literals. */
  NoQuotes = 2,
  /** A newline may stand in for the comma between pairs or elements. */
  NoCommas = 4,
  /** Literal newlines in strings, and `"""` raw blocks. */
  Newlines = 8,
  Relaxed = Comments | NoQuotes | NoCommas | Newlines,
}

export const DEFAULT_SYNTAX = Syntax.Comments;

export const hasSyntax = (mask: number, flag: Syntax): boolean =>
  (mask & flag) === flag;
