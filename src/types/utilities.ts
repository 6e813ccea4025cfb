export * from "./symbols";

/**
 * Generic validation schema interface that can be implemented by any validation library.
 * Compatible with Zod, Yup, Joi, and other validation libraries.
 */
export interface IValidationSchema<T = unknown> {
  /**
   * Parse and validate the input data.
   * Should throw an error if validation fails.
   * Can transform the data if the schema supports transformations.
   */
  parse(input: unknown): T;
}

/** A class, abstract or not, whose instances are `T`. */
export type AbstractConstructor<T> = abstract new (...args: never[]) => T;
