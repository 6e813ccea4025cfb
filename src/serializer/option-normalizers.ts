import { z } from "zod";
import { invalidOptionsError } from "../errors";
import { DEFAULT_SYNTAX, Syntax } from "./syntax";
import type { IndentOptions } from "./types";

export const indentSchema = z.object({
  char: z.string().length(1),
  count: z.number().int().min(0),
});

export const syntaxSchema = z.number().int().min(0).max(Syntax.Relaxed);

export const serializerOptionsSchema = z.object({
  sharing: z.boolean().default(false),
  syntax: syntaxSchema.default(DEFAULT_SYNTAX),
  indent: indentSchema.default({ char: " ", count: 2 }),
});

export type NormalizedSerializerOptions = z.infer<
  typeof serializerOptionsSchema
>;

const parseOrThrow = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T => {
  const result = schema.safeParse(input);
  if (!result.success) {
    return invalidOptionsError.throw({
      message: result.error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message,
        )
        .join("; "),
    });
  }
  return result.data;
};

export const normalizeSerializerOptions = (input: {
  sharing?: boolean;
  syntax?: number;
  indent?: IndentOptions;
}): NormalizedSerializerOptions =>
  parseOrThrow(serializerOptionsSchema, {
    sharing: input.sharing,
    syntax: input.syntax,
    indent: input.indent,
  });

export const normalizeIndent = (input: IndentOptions): IndentOptions =>
  parseOrThrow(indentSchema, input);

export const normalizeSyntax = (input: number): number =>
  parseOrThrow(syntaxSchema, input);
