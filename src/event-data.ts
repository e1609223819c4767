/**
 * Event data helpers
 *
 * Most streams carry JSON in `data`. These helpers return a result value
 * instead of throwing, so a malformed payload is just another branch.
 *
 * Format: { ok: true, value } | { ok: false, error }
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { formatZodError, toError } from './errors.js';
import type { SSEEvent } from './types.js';

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse `event.data` as JSON
 */
export function parseEventJson(event: SSEEvent): ParseResult<unknown> {
  try {
    const value: unknown = JSON.parse(event.data);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: toError(err).message };
  }
}

/**
 * Parse `event.data` as JSON and validate it against a schema
 */
export function parseEventData<T>(event: SSEEvent, schema: ZodType<T, ZodTypeDef, unknown>): ParseResult<T> {
  const json = parseEventJson(event);
  if (!json.ok) {
    return json;
  }

  const result = schema.safeParse(json.value);
  if (!result.success) {
    return { ok: false, error: formatZodError(result.error) };
  }
  return { ok: true, value: result.data };
}

/**
 * True when `data` is a JSON object or array
 */
export function isJsonEvent(event: SSEEvent): boolean {
  const json = parseEventJson(event);
  return json.ok && typeof json.value === 'object' && json.value !== null;
}

/**
 * Read a top-level scalar field from JSON object data, as a string.
 * Returns null when the data is not an object or the field is missing,
 * null, an object or an array.
 */
export function extractField(event: SSEEvent, field: string): string | null {
  const json = parseEventJson(event);
  if (!json.ok || !isRecord(json.value)) {
    return null;
  }

  const value = json.value[field];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}
