export * from "./serializer";
export * from "./models";
export * from "./errors";
export { error } from "./definers/builders/error";
export { defineError, ErrorHelper } from "./definers/defineError";
export { WeaveError } from "./types/error";
export type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
} from "./types/error";
