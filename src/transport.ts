/**
 * Transport - the HTTP engine behind the connector
 *
 * The connector only needs "send this request, give me status, headers and
 * a chunked body". Pooling, TLS, redirects and sockets stay inside undici.
 */

import { STATUS_CODES } from 'http';
import { Agent, request } from 'undici';
import type { Dispatcher } from 'undici';
import type { Timeouts } from './config.js';
import { flattenHeaders } from './headers.js';
import type { HeaderEntries, HeaderEntry } from './headers.js';
import type { SSEMethod } from './types.js';

export interface TransportRequest {
  readonly url: string;
  readonly method: SSEMethod;
  readonly headers: HeaderEntries;
  readonly body: Uint8Array | null;
}

export interface TransportResponse {
  readonly statusCode: number;
  readonly statusText: string;
  readonly headers: HeaderEntries;
  readonly body: AsyncIterable<Uint8Array>;
  /** Release the body without reading it. Safe to call more than once. */
  dispose(): void;
}

export interface Transport {
  /** Resolves once response headers arrive; rejects on abort or network error */
  execute(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse>;
  close(): Promise<void>;
}

export type TransportFactory = (timeouts: Timeouts) => Transport;

export interface UndiciTransportOptions {
  /**
   * Use this dispatcher instead of a private Agent (e.g. undici's MockAgent).
   * Timeouts are then whatever the dispatcher was configured with, and
   * close() leaves it open.
   */
  dispatcher?: Dispatcher;
}

function fromIncomingHeaders(headers: Record<string, string | string[] | undefined>): HeaderEntries {
  const entries: HeaderEntry[] = [];
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) entries.push([name, item]);
    } else {
      entries.push([name, value]);
    }
  }
  return entries;
}

/**
 * Timeout mapping onto undici:
 * - connectTimeoutMs → connect.timeout (TCP/TLS establishment)
 * - writeTimeoutMs   → headersTimeout (request sent until response headers)
 * - readTimeoutMs    → bodyTimeout (idle time between body chunks)
 */
export function createUndiciTransport(timeouts: Timeouts, options: UndiciTransportOptions = {}): Transport {
  const ownsDispatcher = options.dispatcher === undefined;
  const dispatcher: Dispatcher =
    options.dispatcher ??
    new Agent({
      connect: { timeout: timeouts.connectTimeoutMs },
      headersTimeout: timeouts.writeTimeoutMs,
      bodyTimeout: timeouts.readTimeoutMs,
    });

  return {
    async execute(req: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
      const response = await request(req.url, {
        method: req.method,
        headers: flattenHeaders(req.headers),
        body: req.body,
        signal,
        dispatcher,
      });
      const body = response.body;

      return {
        statusCode: response.statusCode,
        statusText: STATUS_CODES[response.statusCode] ?? '',
        headers: fromIncomingHeaders(response.headers),
        body,
        dispose: () => {
          if (!body.destroyed) body.destroy();
        },
      };
    },

    async close(): Promise<void> {
      if (ownsDispatcher) {
        await dispatcher.close();
      }
    },
  };
}
