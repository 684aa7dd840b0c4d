/**
 * Zod validation middleware.
 *
 * Validates the request body or query string against a Zod schema.
 * Returns 400 with error envelope on validation failure; handlers read
 * the parsed value with `c.req.valid("json")` / `c.req.valid("query")`.
 */

import { validator } from "hono/validator";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate the JSON request body against a Zod schema.
 */
export function validateBody<Out, In>(schema: ZodType<Out, ZodTypeDef, In>) {
  return validator("json", (value, c) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
  });
}

/**
 * Validate query parameters against a Zod schema.
 */
export function validateQuery<Out, In>(schema: ZodType<Out, ZodTypeDef, In>) {
  return validator("query", (value, c) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
  });
}

export function formatZodErrors(
  error: ZodError,
): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
