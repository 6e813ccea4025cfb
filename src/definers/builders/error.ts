import type { DefaultErrorType, IErrorHelper } from "../../types/error";
import type { IValidationSchema } from "../../types/utilities";
import { deepFreeze } from "../../tools/deepFreeze";
import { defineError } from "../defineError";

type Remediation<TData> = string | ((data: TData) => string);

type BuilderState<TData extends DefaultErrorType> = Readonly<{
  id: string;
  format?: (data: TData) => string;
  remediation?: Remediation<TData>;
  dataSchema?: IValidationSchema<TData>;
}>;

export interface ErrorFluentBuilder<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  /** Validates (and may transform) the data passed to `throw`. */
  dataSchema(schema: IValidationSchema<TData>): ErrorFluentBuilder<TData>;
  format(fn: (data: TData) => string): ErrorFluentBuilder<TData>;
  /** Advice appended to the stringified error, after the message. */
  remediation(advice: Remediation<TData>): ErrorFluentBuilder<TData>;
  build(): IErrorHelper<TData>;
}

function makeErrorBuilder<TData extends DefaultErrorType>(
  state: BuilderState<TData>,
): ErrorFluentBuilder<TData> {
  const next = (patch: Partial<BuilderState<TData>>) =>
    makeErrorBuilder<TData>(Object.freeze({ ...state, ...patch }));

  return {
    id: state.id,
    dataSchema: (dataSchema) => next({ dataSchema }),
    format: (format) => next({ format }),
    remediation: (remediation) => next({ remediation }),
    build: () => deepFreeze(defineError<TData>({ ...state })),
  };
}

export function error<TData extends DefaultErrorType = DefaultErrorType>(
  id: string,
): ErrorFluentBuilder<TData> {
  return makeErrorBuilder<TData>(Object.freeze({ id }));
}
