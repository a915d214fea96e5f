/**
 * Zod request validation.
 *
 * Route handlers call these with the schema for the request; a failure
 * throws RequestValidationError, which the error handler turns into a
 * 400 with structured issues.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { RequestValidationError } from "../types/error.js";
import type { ValidationIssue } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Parse and validate the JSON request body.
 */
export async function readBody<T>(c: Context, schema: Schema<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }
  return parseWith(schema, body, "Request body validation failed");
}

/**
 * Validate the query string.
 */
export function readQuery<T>(c: Context, schema: Schema<T>): T {
  return parseWith(schema, c.req.query(), "Invalid query parameters");
}

function parseWith<T>(schema: Schema<T>, value: unknown, message: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
