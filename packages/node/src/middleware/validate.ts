/**
 * Zod validation helpers.
 *
 * Parse a request body or query against a Zod schema. An empty body
 * parses as `{}`. Failures throw ApiError("VALIDATION_ERROR"), which
 * the error handler renders as 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ApiError } from "../types/error.js";

export async function parseBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  const text = await c.req.text();
  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function parseQuery<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid query parameters", {
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
