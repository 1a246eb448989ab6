/**
 * Zod validation helpers.
 *
 * Parse a request body or query against a Zod schema. Failures throw
 * an ApiError that the error handler renders as 400 with the issues.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

/**
 * Validate the JSON request body against a Zod schema.
 */
export async function parseBody<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/**
 * Validate the query string against a Zod schema.
 */
export function parseQuery<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): z.output<S> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Query validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
