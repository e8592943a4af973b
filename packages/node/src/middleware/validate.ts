/**
 * Zod request readers.
 *
 * Parse the JSON body, the query string or a path id against a Zod
 * schema. Failures throw ApiError, which the error handler turns into a
 * 400 envelope with one issue per offending path.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";
import { IdParamSchema } from "../types/dto.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Read and validate the JSON request body.
 */
export async function readBody<T>(c: Context<AppEnv>, schema: Schema<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
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
 * Validate the query string. Repeated keys keep their first value.
 */
export function readQuery<T>(c: Context<AppEnv>, schema: Schema<T>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Query validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/**
 * Positive integer path parameter.
 */
export function readId(c: Context<AppEnv>, name = "id"): number {
  const raw = c.req.param(name);
  const result = IdParamSchema.safeParse(raw);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, `Invalid ${name}: "${raw ?? ""}"`);
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
