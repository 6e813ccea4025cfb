import {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  WeaveError,
} from "../types/error";
import { symbolError } from "../types/symbols";

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;
  constructor(private readonly definition: IErrorDefinition<TData>) {}
  get id(): string {
    return this.definition.id;
  }
  throw(data: TData): never {
    const parsed = this.definition.dataSchema
      ? this.definition.dataSchema.parse(data)
      : data;
    throw new WeaveError(
      this.definition.id,
      parsed,
      this.formatMessage(parsed),
      this.formatRemediation(parsed),
    );
  }
  is(error: unknown): error is WeaveError<TData> {
    return error instanceof WeaveError && error.name === this.definition.id;
  }
  toString(error: WeaveError<TData>): string {
    return error.remediation
      ? `${error.message}\n\nRemediation: ${error.remediation}`
      : error.message;
  }

  private formatMessage(data: TData): string {
    if (this.definition.format) {
      return this.definition.format(data);
    }
    return typeof data.message === "string" ? data.message : this.definition.id;
  }

  private formatRemediation(data: TData): string | undefined {
    const { remediation } = this.definition;
    return typeof remediation === "function" ? remediation(data) : remediation;
  }
}

/**
 * Create a new error helper from a plain definition.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
) {
  return new ErrorHelper<TData>(definition);
}
