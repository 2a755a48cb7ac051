/**
 * Zod request validation.
 *
 * Handlers parse their body or query through these helpers and get
 * the schema's output type back. Failures throw VALIDATION_ERROR
 * with one issue per offending path; the error handler turns that
 * into a 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, output } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function parseWith<S extends ZodTypeAny>(schema: S, input: unknown, what: string): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", `Request ${what} validation failed`, {
      details: { issues: formatZodErrors(result.error) },
    });
  }
  return result.data;
}

/**
 * Parse and validate the JSON request body.
 */
export async function readBody<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new ApiError("VALIDATION_ERROR", "Invalid JSON in request body", { cause: err });
  }
  return parseWith(schema, body, "body");
}

/**
 * Validate the query string.
 */
export function readQuery<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): output<S> {
  return parseWith(schema, c.req.query(), "query");
}
