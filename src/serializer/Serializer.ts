/**
 * Entry point: reads and writes object graphs for the classes of one
 * registry. Options persist across calls; each call builds a fresh reader
 * or writer, so identity maps never leak from one document to the next.
 */

import {
  formatSerialError,
  serialError,
  SerialErrorRecord,
} from "../errors";
import { Logger } from "../models/Logger";
import type { ClassRegistry } from "./class-registry";
import { loadSource, describeSink, storeOutput } from "./io";
import {
  normalizeIndent,
  normalizeSerializerOptions,
  normalizeSyntax,
} from "./option-normalizers";
import { GraphReader } from "./reader";
import type {
  ErrorHandler,
  IndentOptions,
  SerializerOptions,
  Sink,
  Slot,
  Source,
} from "./types";
import { Target, toValueType } from "./value-types";
import { GraphWriter } from "./writer";

export class Serializer {
  private sharing: boolean;
  private syntax: number;
  private indent: IndentOptions;
  private readonly onError?: ErrorHandler;
  private readonly logger: Logger;
  private lastError: SerialErrorRecord | null = null;

  constructor(
    private readonly registry: ClassRegistry,
    options: SerializerOptions = {},
  ) {
    const normalized = normalizeSerializerOptions(options);
    this.sharing = normalized.sharing;
    this.syntax = normalized.syntax;
    this.indent = normalized.indent;
    this.onError = options.onError;
    this.logger = (
      options.logger ??
      new Logger({ printThreshold: "info", printStrategy: "pretty" })
    ).with({ source: "jsonweave" });
  }

  /**
   * Reads one document into `slot.value`. An object already in the slot is
   * filled in place when the document names the same class. False when a
   * fatal error stopped the read; the error went to the handler first.
   */
  read<V>(slot: Slot<V>, type: Target<V>, source: Source): boolean {
    return this.attempt(() => {
      const { text, name, line } = loadSource(source, this.report);
      const reader = new GraphReader(text, {
        registry: this.registry,
        syntax: this.syntax,
        source: name,
        line,
        report: this.report,
      });
      slot.value = reader.readDocument(toValueType(type), slot.value);
      this.logger.debug(`Read '${name}'`, {
        data: { objects: reader.objectCount, ids: reader.identity.size },
      });
    });
  }

  /** Writes `value` followed by a newline. False when a fatal error stopped it. */
  write<V>(value: V, type: Target<V>, sink: Sink): boolean {
    return this.attempt(() => {
      const output = this.render(value, type, describeSink(sink));
      storeOutput(sink, output, this.report);
    });
  }

  /** Like `read()`, but returns the value and throws the error. */
  parse<V>(type: Target<V>, text: string, name?: string): V {
    this.lastError = null;
    const reader = new GraphReader(text, {
      registry: this.registry,
      syntax: this.syntax,
      source: name ?? "<string>",
      line: 1,
      report: this.report,
    });
    return reader.readDocument(toValueType(type));
  }

  /** Like `write()`, but returns the text and throws the error. */
  stringify<V>(type: Target<V>, value: V): string {
    this.lastError = null;
    return this.render(value, type, { name: "<string>", line: 1 });
  }

  setSharing(sharing: boolean): this {
    this.sharing = sharing;
    return this;
  }

  getSharing(): boolean {
    return this.sharing;
  }

  setSyntax(syntax: number): this {
    this.syntax = normalizeSyntax(syntax);
    return this;
  }

  getSyntax(): number {
    return this.syntax;
  }

  setIndent(char: string, count: number): this {
    this.indent = normalizeIndent({ char, count });
    return this;
  }

  getIndent(): IndentOptions {
    return { ...this.indent };
  }

  /** The last record reported by the most recent call, or null. */
  getLastError(): SerialErrorRecord | null {
    return this.lastError;
  }

  getRegistry(): ClassRegistry {
    return this.registry;
  }

  private render<V>(
    value: V,
    type: Target<V>,
    where: { name: string; line: number },
  ): string {
    const writer = new GraphWriter({
      registry: this.registry,
      sharing: this.sharing,
      indent: this.indent,
      source: where.name,
      line: where.line,
      report: this.report,
    });
    const text = writer.writeDocument(toValueType(type), value);
    this.logger.debug(`Wrote '${where.name}'`, {
      data: { objects: writer.objectCount },
    });
    return text;
  }

  private readonly report: ErrorHandler = (record) => {
    this.lastError = record;
    if (this.onError) {
      this.onError(record);
      return;
    }
    const message = formatSerialError(record);
    if (record.fatal) {
      this.logger.error(message, { data: { kind: record.kind } });
    } else {
      this.logger.warn(message, { data: { kind: record.kind } });
    }
  };

  private attempt(run: () => void): boolean {
    this.lastError = null;
    try {
      run();
      return true;
    } catch (error) {
      if (serialError.is(error)) {
        return false;
      }
      throw error;
    }
  }
}
