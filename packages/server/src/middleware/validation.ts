/**
 * Zod request-body helpers.
 */

import type { Context } from 'hono';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Format Zod validation errors into a consistent API response shape.
 */
export function formatZodErrors(error: ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export type BodyResult<T> =
  | { ok: true; data: T }
  | { ok: false; reason: 'invalid_json' }
  | { ok: false; reason: 'invalid_body'; details: { path: string; message: string }[] };

/**
 * Parse `await c.req.json()` against a schema. Never throws.
 * The schema's input type is left open so defaults and coercions are allowed.
 */
export async function readJsonBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<BodyResult<T>> {
  const rawBody: unknown = await c.req.json().catch(() => undefined);
  if (rawBody === undefined) return { ok: false, reason: 'invalid_json' };

  const result = schema.safeParse(rawBody);
  if (!result.success) {
    return { ok: false, reason: 'invalid_body', details: formatZodErrors(result.error) };
  }
  return { ok: true, data: result.data };
}
