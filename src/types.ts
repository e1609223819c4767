/**
 * Shared types for the SSE connector
 */

import type { HeaderEntries } from './headers.js';

/**
 * Connection states. `idle` is initial; `closed`, `failed` and `cancelled`
 * end a connection attempt, after which a new connect() may start another.
 */
export const CONNECTION_STATES = ['idle', 'connecting', 'connected', 'closed', 'failed', 'cancelled'] as const;

export type ConnectionState = (typeof CONNECTION_STATES)[number];

export type SSEMethod = 'GET' | 'POST';

/**
 * Logical request for one connection attempt. Build with createSSERequest().
 */
export interface SSERequest {
  readonly url: string;
  readonly method: SSEMethod;
  readonly headers: HeaderEntries;
  /** Present for every POST request */
  readonly body: string | null;
}

/**
 * One dispatched event frame. Events carry no identity beyond their fields:
 * a repeated `id` is delivered again.
 */
export interface SSEEvent {
  readonly id: string | null;
  /** Value of the `event:` field */
  readonly type: string | null;
  readonly data: string;
  /** Reconnection hint in milliseconds, surfaced as-is; never acted upon */
  readonly retry: number | null;
}

/**
 * Connection callbacks. Only onEvent is required.
 *
 * For each transition onStateChanged fires first, then the callback for the
 * state reached (onConnected, onClosed, onFailure or onCancelled).
 */
export interface SSEEventListener {
  onEvent(event: SSEEvent): void;
  onStateChanged?(state: ConnectionState): void;
  onConnected?(): void;
  onClosed?(): void;
  onFailure?(error: Error): void;
  onCancelled?(): void;
}
