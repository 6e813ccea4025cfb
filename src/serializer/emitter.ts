/**
 * Text output for the writer: one pair or element per line, indented by
 * nesting depth, `{}` and `[]` for empty blocks.
 */

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

export const quote = (text: string): string => {
  let out = '"';
  for (const char of text) {
    const escape = ESCAPES[char];
    if (escape !== undefined) {
      out += escape;
    } else if (char.charCodeAt(0) < 0x20) {
      out += `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`;
    } else {
      out += char;
    }
  }
  return `${out}"`;
};

export class Emitter {
  private readonly chunks: string[] = [];
  /** Items written so far in each open block, innermost last. */
  private readonly counts: number[] = [];
  private newlines = 0;

  constructor(private readonly indentUnit: string) {}

  get lines(): number {
    return this.newlines;
  }

  raw(text: string): void {
    this.chunks.push(text);
  }

  open(bracket: "{" | "["): void {
    this.chunks.push(bracket);
    this.counts.push(0);
  }

  /** Starts the next element of the innermost block. */
  item(): void {
    const depth = this.counts.length;
    const count = this.counts[depth - 1] ?? 0;
    if (count > 0) {
      this.chunks.push(",");
    }
    this.newline(depth);
    this.counts[depth - 1] = count + 1;
  }

  key(name: string): void {
    this.item();
    this.chunks.push(quote(name), ": ");
  }

  close(bracket: "}" | "]"): void {
    const count = this.counts.pop() ?? 0;
    if (count > 0) {
      this.newline(this.counts.length);
    }
    this.chunks.push(bracket);
  }

  toString(): string {
    return this.chunks.join("");
  }

  private newline(depth: number): void {
    this.chunks.push("\n", this.indentUnit.repeat(depth));
    this.newlines += 1;
  }
}
