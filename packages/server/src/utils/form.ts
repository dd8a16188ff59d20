import type { Context } from 'hono';

/**
 * Form fields with string values only; file parts are dropped
 */
export type FormFields = Record<string, string>;

/**
 * Parse an `application/x-www-form-urlencoded` or multipart body
 *
 * Returns an empty object for other content types. Hono caches the parsed
 * body, so middleware and handlers can both call this.
 */
export async function parseForm(c: Context): Promise<FormFields> {
  const contentType = c.req.header('content-type') ?? '';
  if (
    !contentType.includes('application/x-www-form-urlencoded') &&
    !contentType.includes('multipart/form-data')
  ) {
    return {};
  }

  const body = await c.req.parseBody();
  const fields: FormFields = {};

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      fields[key] = value;
    }
  }

  return fields;
}
