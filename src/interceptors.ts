/**
 * Interceptor Chain
 *
 * Ordered request/response stages wrapped around the transport call:
 *
 *   logging → headers → user stages (append order) → transport
 *
 * Each stage receives a Chain, may replace the request, must call
 * chain.proceed() exactly once, and returns the (possibly inspected)
 * response. Short-circuiting is not supported: a stage that returns without
 * proceeding, or proceeds twice, fails the call with CHAIN_CONTRACT.
 */

import { sseError } from './errors.js';
import { setHeader, toHeaderEntries } from './headers.js';
import type { HeaderInput } from './headers.js';
import { httpLog } from './logger.js';
import type { Logger } from './logger.js';
import type { TransportRequest, TransportResponse } from './transport.js';

export const HEADER_ACCEPT = 'Accept';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const EVENT_STREAM = 'text/event-stream';
export const NO_CACHE = 'no-cache';

export interface Chain {
  readonly request: TransportRequest;
  readonly signal: AbortSignal;
  proceed(request: TransportRequest): Promise<TransportResponse>;
}

export interface Interceptor {
  /** Used in contract-violation messages */
  readonly name?: string;
  intercept(chain: Chain): Promise<TransportResponse>;
}

export type TerminalCall = (request: TransportRequest, signal: AbortSignal) => Promise<TransportResponse>;

class StageChain implements Chain {
  private proceeded = false;

  constructor(
    readonly request: TransportRequest,
    readonly signal: AbortSignal,
    private readonly stageName: string,
    private readonly next: (request: TransportRequest) => Promise<TransportResponse>,
  ) {}

  get hasProceeded(): boolean {
    return this.proceeded;
  }

  proceed(request: TransportRequest): Promise<TransportResponse> {
    if (this.proceeded) {
      return Promise.reject(
        sseError.chainContract(`Interceptor "${this.stageName}" called proceed() more than once`),
      );
    }
    this.proceeded = true;
    return this.next(request);
  }
}

/**
 * Run `request` through the stages and finally the terminal call
 */
export function executeChain(
  interceptors: readonly Interceptor[],
  request: TransportRequest,
  signal: AbortSignal,
  terminal: TerminalCall,
): Promise<TransportResponse> {
  const dispatch = async (index: number, current: TransportRequest): Promise<TransportResponse> => {
    if (index >= interceptors.length) {
      return terminal(current, signal);
    }

    const stage = interceptors[index];
    const name = stage.name ?? `#${index}`;
    const chain = new StageChain(current, signal, name, (next) => dispatch(index + 1, next));

    const response = await stage.intercept(chain);
    if (!chain.hasProceeded) {
      response.dispose();
      throw sseError.chainContract(`Interceptor "${name}" returned without calling proceed()`);
    }
    return response;
  };

  return dispatch(0, request);
}

/**
 * Copy of `request` with one header set (replacing existing values)
 */
export function withHeader(request: TransportRequest, name: string, value: string): TransportRequest {
  return { ...request, headers: setHeader(request.headers, name, value) };
}

export interface LoggingInterceptorOptions {
  enabled: boolean;
  logger?: Logger;
}

/**
 * Logs "→ METHOD url" before and "← status text" after the call.
 * Passes straight through when disabled.
 */
export function createLoggingInterceptor(options: LoggingInterceptorOptions): Interceptor {
  const logger = options.logger ?? httpLog;

  return {
    name: 'logging',
    async intercept(chain: Chain): Promise<TransportResponse> {
      if (!options.enabled) {
        return chain.proceed(chain.request);
      }

      const { method, url } = chain.request;
      logger.debug(`→ ${method} ${url}`);
      try {
        const response = await chain.proceed(chain.request);
        logger.debug(`← ${response.statusCode} ${response.statusText}`);
        return response;
      } catch (err) {
        logger.debug(`✗ ${method} ${url}`, { error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
    },
  };
}

/**
 * Sets Accept: text/event-stream and Cache-Control: no-cache, then any
 * headers bound to this stage instance.
 */
export function createHeaderInterceptor(additionalHeaders: HeaderInput = {}): Interceptor {
  const extra = toHeaderEntries(additionalHeaders);

  return {
    name: 'headers',
    intercept(chain: Chain): Promise<TransportResponse> {
      let request = withHeader(chain.request, HEADER_ACCEPT, EVENT_STREAM);
      request = withHeader(request, HEADER_CACHE_CONTROL, NO_CACHE);
      for (const [name, value] of extra) {
        request = withHeader(request, name, value);
      }
      return chain.proceed(request);
    },
  };
}
