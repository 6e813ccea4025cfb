/**
 * Character-level tokenizer for the relaxed JSON dialect. Each call to
 * `next()` yields one name/value pair inside an object, or one element
 * inside an array. Structural `{` and `[` come back on their own so the
 * caller can descend; `}` and `]` come back as a name together with the
 * separator that follows them.
 */

import { ErrorKind } from "../errors";
import { hasSyntax, Syntax } from "./syntax";
import type { Token, TokenPair } from "./types";
import {
  isBareLiteral,
  isInvalidControl,
  isWhitespace,
} from "./validation";

type Fail = (kind: ErrorKind, arg?: string) => never;

enum State {
  Begin,
  QuotedName,
  UnquotedName,
  AfterName,
  AfterColon,
  QuotedValue,
  UnquotedValue,
  AfterValue,
}

export interface TokenizerOptions {
  syntax: number;
  /** Line number of the first character. */
  line?: number;
}

const REPLACEMENT_CHARACTER = "\uFFFD";
const HEX4 = /^[0-9a-fA-F]{4}$/;

const isHighSurrogate = (unit: number) => unit >= 0xd800 && unit <= 0xdbff;
const isLowSurrogate = (unit: number) => unit >= 0xdc00 && unit <= 0xdfff;
const isCloser = (char: string) => char === "}" || char === "]";

const describe = (char: string): string =>
  `'\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}'`;

export class Tokenizer {
  private pos = 0;
  private currentLine: number;

  constructor(
    private readonly input: string,
    private readonly options: TokenizerOptions,
    private readonly fail: Fail,
  ) {
    this.currentLine = options.line ?? 1;
  }

  get line(): number {
    return this.currentLine;
  }

  next(inObject: boolean): TokenPair {
    const pair: TokenPair = {
      name: { text: "", quoted: false },
      value: { text: "", quoted: false },
      hasName: false,
      hasValue: false,
      atEnd: false,
    };
    let state = State.Begin;
    let buffer = "";

    for (;;) {
      const char = this.get();
      if (char === undefined) {
        return this.endOfInput(pair, state, buffer, inObject);
      }

      switch (state) {
        case State.Begin:
          if (isWhitespace(char)) continue;
          if (char === "/" && this.skipComment()) continue;
          if (char === '"') {
            state = State.QuotedName;
            continue;
          }
          if (char === "{" || char === "[") {
            this.setName(pair, char, false, inObject);
            return pair;
          }
          if (isCloser(char)) {
            this.setName(pair, char, false, inObject);
            state = State.AfterValue;
            continue;
          }
          if (char === ",") return pair;
          if (isInvalidControl(char)) {
            return this.fail(ErrorKind.InvalidCharacter, describe(char));
          }
          if (char === ":" && inObject) {
            return this.fail(ErrorKind.ExpectingString, "''");
          }
          buffer = char;
          state = State.UnquotedName;
          continue;

        case State.QuotedName:
        case State.QuotedValue:
          if (char === '"') {
            if (state === State.QuotedName) {
              this.setName(pair, buffer, true, inObject);
              state = inObject ? State.AfterName : State.AfterValue;
            } else {
              this.setValue(pair, buffer, true);
              state = State.AfterValue;
            }
            continue;
          }
          buffer += char === "\\" ? this.readEscape() : this.checkQuoted(char);
          continue;

        case State.UnquotedName:
          if (char === ":" && inObject) {
            this.setName(pair, buffer, false, inObject);
            state = State.AfterColon;
            continue;
          }
          if (char === ",") {
            this.setName(pair, buffer, false, inObject);
            return pair;
          }
          if (isCloser(char)) {
            this.unget();
            this.setName(pair, buffer, false, inObject);
            return pair;
          }
          if (char === "/" && this.skipComment()) continue;
          if (char === "\n" && this.noCommas) {
            this.setName(pair, buffer, false, inObject);
            if (!inObject) return pair;
            state = State.AfterName;
            continue;
          }
          if (
            this.splitsLiterals &&
            isWhitespace(char) &&
            isBareLiteral(buffer)
          ) {
            this.setName(pair, buffer, false, inObject);
            state = inObject ? State.AfterName : State.AfterValue;
            continue;
          }
          buffer += this.checkUnquoted(char);
          continue;

        case State.AfterName:
          if (isWhitespace(char)) continue;
          if (char === "/" && this.skipComment()) continue;
          if (char === ":") {
            state = State.AfterColon;
            continue;
          }
          if (char === ",") return pair;
          if (isCloser(char)) {
            this.unget();
            return pair;
          }
          return this.fail(
            ErrorKind.ExpectingDelimiter,
            `after '${pair.name.text}'`,
          );

        case State.AfterColon:
          if (isWhitespace(char)) continue;
          if (char === "/" && this.skipComment()) continue;
          if (char === '"') {
            if (this.readEmptyOrRaw(pair)) {
              state = State.AfterValue;
            } else {
              buffer = "";
              state = State.QuotedValue;
            }
            continue;
          }
          if (char === "{" || char === "[") {
            this.setValue(pair, char, false);
            return pair;
          }
          if (char === ",") return pair;
          if (isCloser(char)) {
            this.unget();
            return pair;
          }
          buffer = this.checkUnquoted(char);
          state = State.UnquotedValue;
          continue;

        case State.UnquotedValue:
          if (char === ",") {
            this.setValue(pair, buffer, false);
            return pair;
          }
          if (isCloser(char)) {
            this.unget();
            this.setValue(pair, buffer, false);
            return pair;
          }
          if (char === "/" && this.skipComment()) continue;
          if (char === "\n" && this.noCommas) {
            this.setValue(pair, buffer, false);
            return pair;
          }
          if (
            this.splitsLiterals &&
            isWhitespace(char) &&
            isBareLiteral(buffer)
          ) {
            this.setValue(pair, buffer, false);
            state = State.AfterValue;
            continue;
          }
          buffer += this.checkUnquoted(char);
          continue;

        case State.AfterValue:
          if (char === "\n" && this.noCommas) return pair;
          if (isWhitespace(char)) continue;
          if (char === "/" && this.skipComment()) continue;
          if (char === ",") return pair;
          if (isCloser(char) || this.noCommas) {
            this.unget();
            return pair;
          }
          return this.fail(ErrorKind.ExpectingComma, `before '${char}'`);
      }
    }
  }

  private get noCommas(): boolean {
    return hasSyntax(this.options.syntax, Syntax.NoCommas);
  }

  /**
   * Whether whitespace ends an unquoted literal. With NoQuotes alone an
   * unquoted value runs to the next delimiter, spaces included.
   */
  private get splitsLiterals(): boolean {
    return this.noCommas || !hasSyntax(this.options.syntax, Syntax.NoQuotes);
  }

  private get(): string | undefined {
    if (this.pos >= this.input.length) {
      return undefined;
    }
    const char = this.input[this.pos];
    this.pos += 1;
    if (char === "\n") this.currentLine += 1;
    return char;
  }

  /** Steps back over the character returned by the last `get()`. */
  private unget(): void {
    this.pos -= 1;
    if (this.input[this.pos] === "\n") this.currentLine -= 1;
  }

  private endOfInput(
    pair: TokenPair,
    state: State,
    buffer: string,
    inObject: boolean,
  ): TokenPair {
    switch (state) {
      case State.Begin:
        pair.atEnd = !pair.hasName;
        return pair;
      case State.QuotedName:
      case State.QuotedValue:
        return this.fail(ErrorKind.PrematureEOF, "in quoted string");
      case State.UnquotedName:
        this.setName(pair, buffer, false, inObject);
        return pair;
      case State.UnquotedValue:
        this.setValue(pair, buffer, false);
        return pair;
      default:
        return pair;
    }
  }

  /**
   * Stores the first token. Inside an object it is a name; inside an array
   * it is an element and is checked like a value.
   */
  private setName(
    pair: TokenPair,
    raw: string,
    quoted: boolean,
    inObject: boolean,
  ): void {
    const text = quoted ? raw : raw.trimEnd();
    pair.name = { text, quoted };
    pair.hasName = true;
    if (quoted || this.isStructuralText(text)) {
      return;
    }
    if (inObject) {
      this.checkName(text);
    } else {
      this.checkValue(text);
    }
  }

  private setValue(pair: TokenPair, raw: string, quoted: boolean): void {
    const text = quoted ? raw : raw.trimEnd();
    pair.value = { text, quoted };
    pair.hasValue = true;
    if (!quoted && !this.isStructuralText(text)) {
      this.checkValue(text);
    }
  }

  private isStructuralText(text: string): boolean {
    return text === "{" || text === "[" || text === "}" || text === "]";
  }

  private checkName(text: string): void {
    if (text === "") {
      this.fail(ErrorKind.ExpectingString, "''");
    }
    if (!hasSyntax(this.options.syntax, Syntax.NoQuotes)) {
      this.fail(ErrorKind.ExpectingString, `'${text}'`);
    }
  }

  private checkValue(text: string): void {
    if (isBareLiteral(text)) {
      return;
    }
    if (!hasSyntax(this.options.syntax, Syntax.NoQuotes)) {
      this.fail(ErrorKind.InvalidValue, `'${text}' (should be quoted?)`);
    }
  }

  private checkQuoted(char: string): string {
    if (isInvalidControl(char)) {
      return this.fail(ErrorKind.InvalidCharacter, describe(char));
    }
    if (
      char !== " " &&
      isWhitespace(char) &&
      !hasSyntax(this.options.syntax, Syntax.Newlines)
    ) {
      return this.fail(ErrorKind.InvalidCharacter, describe(char));
    }
    return char;
  }

  private checkUnquoted(char: string): string {
    if (isInvalidControl(char)) {
      return this.fail(ErrorKind.InvalidCharacter, describe(char));
    }
    return char;
  }

  /**
   * Called after the opening quote of a value. Reads `""` as the empty
   * string and, with Syntax.Newlines, `"""` as the start of a raw block.
   * Returns false when an ordinary quoted value follows.
   */
  private readEmptyOrRaw(pair: TokenPair): boolean {
    const second = this.get();
    if (second !== '"') {
      if (second !== undefined) this.unget();
      return false;
    }
    const third = this.get();
    if (third === '"' && hasSyntax(this.options.syntax, Syntax.Newlines)) {
      this.setValue(pair, this.readRawBlock(), true);
      return true;
    }
    if (third !== undefined) this.unget();
    this.setValue(pair, "", true);
    return true;
  }

  private readRawBlock(): string {
    let text = "";
    for (;;) {
      const char = this.get();
      if (char === undefined) {
        return this.fail(ErrorKind.PrematureEOF, `in '"""' block`);
      }
      text += char;
      if (text.endsWith('"""')) {
        return text.slice(0, -3);
      }
    }
  }

  /** Skips a comment after its leading "/"; false when none starts here. */
  private skipComment(): boolean {
    if (!hasSyntax(this.options.syntax, Syntax.Comments)) {
      return false;
    }
    const second = this.get();
    if (second === "/") {
      for (;;) {
        const char = this.get();
        if (char === undefined) return true;
        if (char === "\n") {
          // the newline still separates tokens
          this.unget();
          return true;
        }
      }
    }
    if (second === "*") {
      let previous = "";
      for (;;) {
        const char = this.get();
        if (char === undefined) {
          return this.fail(ErrorKind.PrematureEOF, "in comment");
        }
        if (previous === "*" && char === "/") return true;
        previous = char;
      }
    }
    if (second !== undefined) this.unget();
    return false;
  }

  private readEscape(): string {
    const char = this.get();
    switch (char) {
      case undefined:
        return this.fail(ErrorKind.PrematureEOF, "in escape sequence");
      case "b":
        return "\b";
      case "f":
        return "\f";
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      case "u":
        return this.decodeUnit(this.readHex4());
      default:
        return char;
    }
  }

  private readHex4(): number {
    let hex = "";
    for (let i = 0; i < 4; i++) {
      const char = this.get();
      if (char === undefined) {
        return this.fail(ErrorKind.PrematureEOF, "in escape sequence");
      }
      hex += char;
    }
    if (!HEX4.test(hex)) {
      return this.fail(ErrorKind.InvalidCharacter, `'\\u${hex}'`);
    }
    return parseInt(hex, 16);
  }

  /** Joins a high surrogate with a following `\u` low surrogate. */
  private decodeUnit(unit: number): string {
    if (isHighSurrogate(unit)) {
      if (!this.input.startsWith("\\u", this.pos)) {
        return REPLACEMENT_CHARACTER;
      }
      this.pos += 2;
      const low = this.readHex4();
      if (isLowSurrogate(low)) {
        return String.fromCharCode(unit, low);
      }
      return REPLACEMENT_CHARACTER + this.decodeUnit(low);
    }
    if (isLowSurrogate(unit)) {
      return REPLACEMENT_CHARACTER;
    }
    return String.fromCharCode(unit);
  }
}
