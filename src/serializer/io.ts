import { readFileSync, writeFileSync } from "node:fs";
import { ErrorKind } from "../errors";
import { Diagnostics } from "./diagnostics";
import type { ErrorHandler, Sink, Source } from "./types";

export interface LoadedSource {
  text: string;
  name: string;
  line: number;
}

const STRING_SOURCE = "<string>";
const STREAM_SINK = "<stream>";
const BOM = "\uFEFF";

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Reads a file source whole; text sources pass through. */
export function loadSource(source: Source, report: ErrorHandler): LoadedSource {
  if ("path" in source) {
    let text: string;
    try {
      text = readFileSync(source.path, "utf8");
    } catch (error) {
      return new Diagnostics("read", source.path, () => 0, report).fail(
        ErrorKind.CantReadFile,
        `'${source.path}': ${messageOf(error)}`,
      );
    }
    return {
      text: text.startsWith(BOM) ? text.slice(BOM.length) : text,
      name: source.path,
      line: 1,
    };
  }
  return {
    text: source.text,
    name: source.name ?? STRING_SOURCE,
    line: source.line ?? 1,
  };
}

export function describeSink(sink: Sink): { name: string; line: number } {
  if ("path" in sink) {
    return { name: sink.path, line: 1 };
  }
  return { name: sink.name ?? STREAM_SINK, line: sink.line ?? 1 };
}

export function storeOutput(
  sink: Sink,
  text: string,
  report: ErrorHandler,
): void {
  const { name, line } = describeSink(sink);
  try {
    if ("path" in sink) {
      writeFileSync(sink.path, text, "utf8");
    } else {
      sink.stream.write(text);
    }
  } catch (error) {
    new Diagnostics("write", name, () => line, report).fail(
      ErrorKind.CantWriteFile,
      `'${name}': ${messageOf(error)}`,
    );
  }
}
