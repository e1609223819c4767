/**
 * Request Builder
 *
 * createSSERequest() validates at construction time, so a blank URL or a
 * POST without body never reaches the network. buildTransportRequest()
 * turns the logical request into what the transport sends.
 */

import { z } from 'zod';
import { formatZodError, sseError } from './errors.js';
import { setHeader, toHeaderEntries } from './headers.js';
import type { HeaderInput } from './headers.js';
import type { TransportRequest } from './transport.js';
import type { SSEMethod, SSERequest } from './types.js';

/**
 * POST bodies are always sent with this content type, whether or not they
 * actually hold JSON.
 */
export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export interface SSERequestInput {
  url: string;
  method?: SSEMethod;
  headers?: HeaderInput;
  body?: string | null;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const requestSchema = z
  .object({
    url: z
      .string()
      .refine((url) => url.trim().length > 0, 'URL cannot be blank')
      .refine((url) => url.trim().length === 0 || isHttpUrl(url), 'URL must be an absolute http(s) URL'),
    method: z.enum(['GET', 'POST']).default('GET'),
    headers: z
      .union([z.record(z.string()), z.array(z.tuple([z.string(), z.string()]))])
      .optional(),
    body: z.string().nullish(),
  })
  .superRefine((request, ctx) => {
    if (request.method === 'POST' && (request.body === undefined || request.body === null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['body'],
        message: 'Body is required for POST requests',
      });
    }
  });

/**
 * Build an immutable request. Throws SSEError INVALID_REQUEST for a blank or
 * non-http(s) URL and for POST without body.
 */
export function createSSERequest(input: SSERequestInput): SSERequest {
  const result = requestSchema.safeParse(input);
  if (!result.success) {
    throw sseError.invalidRequest(formatZodError(result.error));
  }

  const { url, method, headers, body } = result.data;
  return Object.freeze({
    url,
    method,
    headers: Object.freeze(toHeaderEntries(headers)),
    body: body ?? null,
  });
}

const encoder = new TextEncoder();

/**
 * Transport-level request: POST carries the UTF-8 bytes of the body and a
 * fixed JSON content type (replacing any caller value). GET carries no body.
 */
export function buildTransportRequest(request: SSERequest): TransportRequest {
  if (request.method === 'POST') {
    return {
      url: request.url,
      method: 'POST',
      headers: setHeader(request.headers, 'Content-Type', JSON_CONTENT_TYPE),
      body: encoder.encode(request.body ?? ''),
    };
  }

  return {
    url: request.url,
    method: 'GET',
    headers: request.headers,
    body: null,
  };
}
