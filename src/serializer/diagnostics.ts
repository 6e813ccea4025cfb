import { ErrorKind, serialError, SerialErrorRecord } from "../errors";
import type { ErrorHandler } from "./types";

/**
 * Builds error records for one read or write call. Every record goes to
 * `report`; fatal ones are then thrown and unwind the call.
 */
export class Diagnostics {
  constructor(
    private readonly where: "read" | "write",
    private readonly source: string,
    private readonly line: () => number,
    private readonly report: ErrorHandler,
  ) {}

  fail(kind: ErrorKind, arg = ""): never {
    const record = this.record(kind, true, arg);
    this.report(record);
    return serialError.throw(record);
  }

  warn(kind: ErrorKind, arg = ""): void {
    this.report(this.record(kind, false, arg));
  }

  private record(
    kind: ErrorKind,
    fatal: boolean,
    arg: string,
  ): SerialErrorRecord {
    return {
      kind,
      fatal,
      where: this.where,
      arg,
      source: this.source,
      line: this.line(),
    };
  }
}
