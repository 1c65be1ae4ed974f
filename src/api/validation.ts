import type { Context } from "hono";
import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Flatten zod issues to `"path -> to -> field: message"` strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(" -> ") : "body";
    return `${path}: ${issue.message}`;
  });
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new ValidationError("Validation failed", formatIssues(parsed.error));
  return parsed.data;
}

/** Parse and validate a JSON request body. */
export async function parseJsonBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
  return parseOrThrow(schema, body);
}

export const paginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(100),
});

export type Pagination = z.infer<typeof paginationSchema>;

export function parsePagination(c: Context): Pagination {
  return parseOrThrow(paginationSchema, { skip: c.req.query("skip"), limit: c.req.query("limit") });
}

const idSchema = z.coerce.number().int().min(1).max(2_147_483_647);

/** Parse a positive integer path parameter. */
export function parseIdParam(c: Context, name = "id"): number {
  return parseOrThrow(idSchema, c.req.param(name));
}
