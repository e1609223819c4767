/**
 * SSE Error Utilities
 *
 * One error type for everything the connector raises itself, tagged with a
 * code for programmatic handling. Construction errors are thrown to the
 * caller; runtime errors only ever reach the listener's onFailure.
 */

import type { ZodError } from 'zod';

/**
 * Error codes for programmatic error handling
 */
export type SSEErrorCode =
  | 'INVALID_REQUEST'
  | 'INVALID_CONFIG'
  | 'HTTP_STATUS'
  | 'INVALID_CONTENT_TYPE'
  | 'CHAIN_CONTRACT'
  | 'INTERCEPTOR_AFTER_BUILD'
  | 'CLIENT_DESTROYED';

export interface SSEErrorOptions {
  /** HTTP status of the handshake response, for HTTP_STATUS errors */
  status?: number;
  cause?: unknown;
}

export class SSEError extends Error {
  readonly code: SSEErrorCode;
  readonly status: number | undefined;

  constructor(message: string, code: SSEErrorCode, options: SSEErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'SSEError';
    this.code = code;
    this.status = options.status;
  }
}

/**
 * Common error helpers
 */
export const sseError = {
  invalidRequest: (message: string) =>
    new SSEError(message, 'INVALID_REQUEST'),

  invalidConfig: (message: string) =>
    new SSEError(message, 'INVALID_CONFIG'),

  httpStatus: (status: number, statusText: string) =>
    new SSEError(`Unexpected response status: ${status} ${statusText}`.trimEnd(), 'HTTP_STATUS', { status }),

  invalidContentType: (contentType: string | null) =>
    new SSEError(`Invalid content-type: ${contentType ?? '(none)'}`, 'INVALID_CONTENT_TYPE'),

  chainContract: (message: string) =>
    new SSEError(message, 'CHAIN_CONTRACT'),

  interceptorAfterBuild: () =>
    new SSEError('Interceptors must be added before the first connect()', 'INTERCEPTOR_AFTER_BUILD'),

  clientDestroyed: () =>
    new SSEError('Client has been destroyed', 'CLIENT_DESTROYED'),
};

export function isSSEError(error: unknown): error is SSEError {
  return error instanceof SSEError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Render zod issues as one line: "path: message; path: message"
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Error codes of transport errors that mean "the stream was reset".
 * undici, node:http2 and raw sockets each report it differently.
 */
const STREAM_RESET_CODES = new Set([
  'UND_ERR_ABORTED',
  'UND_ERR_SOCKET',
  'ERR_HTTP2_STREAM_CANCEL',
  'ERR_HTTP2_STREAM_ERROR',
  'ECONNRESET',
]);

const CANCEL_MARKER = /cancel/i;

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isStreamReset(error: Error): boolean {
  const code = errorCode(error);
  return code !== undefined && STREAM_RESET_CODES.has(code);
}

/**
 * True when a transport error means the local side cancelled the stream.
 *
 * Walks the `cause` chain: an AbortError anywhere, or a stream-reset error
 * whose message carries a cancellation marker, counts as cancellation.
 * Anything else is a failure.
 */
export function isCancellation(error: unknown): boolean {
  const seen = new Set<Error>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    if (current.name === 'AbortError') {
      return true;
    }
    if (isStreamReset(current) && CANCEL_MARKER.test(current.message)) {
      return true;
    }
    current = current.cause;
  }

  return false;
}
