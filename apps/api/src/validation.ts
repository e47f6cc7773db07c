import type { Context } from 'hono';
import type { z } from 'zod';
import { validationError } from './errors.js';

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join(', ');
}

export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw validationError('Request body must be valid JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw validationError(describeIssues(parsed.error));
  }
  return parsed.data;
}
