import { symbolError } from "./symbols";
import type { IValidationSchema } from "./utilities";

export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Advice appended by `toString()` after the main message.
   */
  remediation?: string | ((data: TData) => string);
  /**
   * Validate error data on throw(). If provided, data is parsed first.
   */
  dataSchema?: IValidationSchema<TData>;
}

/**
 * Error thrown by every helper. `name` carries the helper id so `is()` can
 * tell errors apart without a class per error.
 */
export class WeaveError<
  TData extends DefaultErrorType = DefaultErrorType,
> extends Error {
  constructor(
    public readonly id: string,
    public readonly data: TData,
    message: string,
    public readonly remediation?: string,
  ) {
    super(message);
    this.name = id;
  }
}

/**
 * Runtime helper returned by defineError()/error().build().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id of the error */
  id: string;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is WeaveError<TData>;
  /** Message followed by the remediation advice, when there is one */
  toString(error: WeaveError<TData>): string;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}
