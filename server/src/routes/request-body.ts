import type { Context } from 'hono';
import { ValidationError } from '../lib/errors';

export type BodyFields = Record<string, unknown>;

function isRecord(value: unknown): value is BodyFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJsonObject(c: Context): Promise<BodyFields> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }

  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

/**
 * Reads multipart or urlencoded form fields.
 */
export async function readForm(c: Context): Promise<FormData> {
  try {
    return await c.req.formData();
  } catch {
    throw new ValidationError('Request body must be multipart/form-data or application/x-www-form-urlencoded');
  }
}

export function optionalText(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function requiredText(value: unknown, field: string): string {
  const text = optionalText(value);
  if (text === undefined) {
    throw new ValidationError(`${field} is required`, { field });
  }
  return text;
}
