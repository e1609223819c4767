/**
 * SSE Client
 *
 * Owns one streaming call at a time and the state machine that describes it.
 *
 * Every connect() starts an ActiveCall (generation + AbortController). All
 * async continuations check that their call is still the active one and
 * that the client has not been destroyed before touching state or calling
 * the listener; stale callbacks are dropped.
 *
 * Lifecycle: pass an AbortSignal as `lifecycle` (or call destroy()). On
 * teardown the client disconnects, closes the transport and releases the
 * listener and interceptors. No listener callback fires after that.
 */

import { DEFAULT_CONFIG, toTimeouts } from './config.js';
import type { SSEConfig } from './config.js';
import { ConnectionStateMachine } from './connection-state.js';
import { isCancellation, sseError, toError } from './errors.js';
import { getHeader } from './headers.js';
import { createHeaderInterceptor, createLoggingInterceptor, executeChain, EVENT_STREAM } from './interceptors.js';
import type { Interceptor } from './interceptors.js';
import { clientLog } from './logger.js';
import type { Logger } from './logger.js';
import { parseEventStream, splitLines } from './sse-parser.js';
import { buildTransportRequest } from './sse-request.js';
import { createUndiciTransport } from './transport.js';
import type { Transport, TransportFactory, TransportResponse } from './transport.js';
import type { ConnectionState, SSEEventListener, SSERequest } from './types.js';

export interface SSEClientOptions {
  config?: SSEConfig;
  /** Aborting this signal tears the client down */
  lifecycle?: AbortSignal;
  listener?: SSEEventListener;
  /** Appended after the built-in logging and header stages */
  interceptors?: readonly Interceptor[];
  logger?: Logger;
  /** Defaults to an undici transport */
  createTransport?: TransportFactory;
}

interface ActiveCall {
  readonly generation: number;
  readonly controller: AbortController;
}

/** Transport plus the interceptor list frozen at build time */
interface HttpClient {
  readonly transport: Transport;
  readonly interceptors: readonly Interceptor[];
}

function checkHandshake(response: TransportResponse): Error | null {
  if (response.statusCode < 200 || response.statusCode > 299) {
    return sseError.httpStatus(response.statusCode, response.statusText);
  }
  const contentType = getHeader(response.headers, 'content-type');
  const mediaType = contentType?.split(';')[0].trim().toLowerCase();
  if (contentType === null || mediaType !== EVENT_STREAM) {
    return sseError.invalidContentType(contentType);
  }
  return null;
}

export class SSEClient {
  private readonly machine = new ConnectionStateMachine();
  private readonly config: SSEConfig;
  private readonly logger: Logger;
  private readonly createTransport: TransportFactory;
  private readonly lifecycle: AbortSignal | null;

  private interceptors: Interceptor[];
  private listener: SSEEventListener | null;
  private httpClient: HttpClient | null = null;
  private activeCall: ActiveCall | null = null;
  private generation = 0;
  private destroyed = false;

  private readonly onLifecycleAbort = (): void => {
    this.logger.debug('Lifecycle ended, tearing down');
    this.destroy();
  };

  constructor(options: SSEClientOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? clientLog;
    this.createTransport = options.createTransport ?? ((timeouts) => createUndiciTransport(timeouts));
    this.lifecycle = options.lifecycle ?? null;
    this.listener = options.listener ?? null;
    this.interceptors = [...(options.interceptors ?? [])];

    if (this.lifecycle) {
      if (this.lifecycle.aborted) {
        this.destroy();
      } else {
        this.lifecycle.addEventListener('abort', this.onLifecycleAbort, { once: true });
      }
    }
  }

  /**
   * Start streaming `request`. No-op while already connecting or connected.
   * Outcome is reported only through the listener.
   */
  connect(request: SSERequest): void {
    if (this.isDestroyed()) {
      this.logger.warn('connect() ignored, client destroyed', { url: request.url });
      return;
    }
    if (this.machine.isActive()) {
      this.logger.debug('connect() ignored, connection already active', { state: this.machine.state });
      return;
    }

    const http = this.getHttpClient();
    const call: ActiveCall = { generation: ++this.generation, controller: new AbortController() };
    this.activeCall = call;
    this.transition('connecting');

    this.runCall(call, http, request).catch((err: unknown) => {
      this.logger.error('Stream task crashed', { generation: call.generation, error: toError(err).message });
    });
  }

  /**
   * Cancel the active call. An attempt that was connecting or connected ends
   * as `cancelled` right away; whatever the transport reports afterwards for
   * that call is ignored. No-op when nothing is active.
   */
  disconnect(): void {
    const call = this.activeCall;
    if (!call) {
      return;
    }

    this.activeCall = null;
    call.controller.abort();
    if (this.machine.isActive()) {
      this.transition('cancelled', (listener) => listener.onCancelled?.());
    }
  }

  isConnecting(): boolean {
    return this.machine.isActive();
  }

  getState(): ConnectionState {
    return this.machine.state;
  }

  /**
   * Replace the listener. Applies to callbacks dispatched from now on.
   */
  setEventListener(listener: SSEEventListener): this {
    if (this.isDestroyed()) {
      this.logger.warn('setEventListener() ignored, client destroyed');
      return this;
    }
    this.listener = listener;
    return this;
  }

  /**
   * Append a stage. Only possible before the first connect(), which freezes
   * the chain; later calls throw INTERCEPTOR_AFTER_BUILD.
   */
  addInterceptor(interceptor: Interceptor): this {
    if (this.isDestroyed()) {
      throw sseError.clientDestroyed();
    }
    if (this.httpClient) {
      throw sseError.interceptorAfterBuild();
    }
    this.interceptors.push(interceptor);
    return this;
  }

  /**
   * Tear down: disconnect, close the transport, release listener and
   * interceptors. Idempotent.
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.lifecycle?.removeEventListener('abort', this.onLifecycleAbort);

    this.disconnect();

    const http = this.httpClient;
    this.httpClient = null;
    this.listener = null;
    this.interceptors = [];

    if (http) {
      http.transport.close().catch((err: unknown) => {
        this.logger.warn('Failed to close transport', { error: toError(err).message });
      });
    }
  }

  isDestroyed(): boolean {
    return this.destroyed || (this.lifecycle?.aborted ?? false);
  }

  private getHttpClient(): HttpClient {
    if (this.httpClient) {
      return this.httpClient;
    }

    const transport = this.createTransport(toTimeouts(this.config));
    const interceptors = Object.freeze([
      createLoggingInterceptor({ enabled: this.config.enableLogging, logger: this.logger }),
      createHeaderInterceptor(),
      ...this.interceptors,
    ]);
    this.httpClient = { transport, interceptors };
    return this.httpClient;
  }

  private isCurrent(call: ActiveCall): boolean {
    return !this.isDestroyed() && this.activeCall === call;
  }

  private async runCall(call: ActiveCall, http: HttpClient, request: SSERequest): Promise<void> {
    if (!this.isCurrent(call)) {
      return;
    }

    let response: TransportResponse;
    try {
      response = await executeChain(
        http.interceptors,
        buildTransportRequest(request),
        call.controller.signal,
        (req, signal) => http.transport.execute(req, signal),
      );
    } catch (err) {
      this.finishWithError(call, err);
      return;
    }

    if (!this.isCurrent(call)) {
      response.dispose();
      return;
    }

    const handshakeError = checkHandshake(response);
    if (handshakeError) {
      response.dispose();
      this.finishWithError(call, handshakeError);
      return;
    }

    this.transition('connected', (listener) => listener.onConnected?.());

    try {
      for await (const event of parseEventStream(splitLines(response.body))) {
        if (!this.isCurrent(call)) break;
        this.dispatch((listener) => listener.onEvent(event));
      }
    } catch (err) {
      response.dispose();
      this.finishWithError(call, err);
      return;
    }

    if (!this.isCurrent(call)) {
      response.dispose();
      return;
    }

    this.activeCall = null;
    this.transition('closed', (listener) => listener.onClosed?.());
  }

  private finishWithError(call: ActiveCall, err: unknown): void {
    if (!this.isCurrent(call)) {
      this.logger.debug('Dropping error from stale call', { generation: call.generation });
      return;
    }

    // Releases a response a stage may still hold after proceed()
    call.controller.abort();
    this.activeCall = null;
    if (isCancellation(err)) {
      this.transition('cancelled', (listener) => listener.onCancelled?.());
      return;
    }

    const error = toError(err);
    this.logger.warn('Stream failed', { generation: call.generation, error: error.message });
    this.transition('failed', (listener) => listener.onFailure?.(error));
  }

  /**
   * Apply a transition, then notify: onStateChanged first, then `notify`.
   * Both go to the listener registered when the transition happened.
   */
  private transition(next: ConnectionState, notify?: (listener: SSEEventListener) => void): void {
    const previous = this.machine.state;
    if (!this.machine.transition(next)) {
      this.logger.warn('Illegal state transition ignored', { from: previous, to: next });
      return;
    }

    const listener = this.listener;
    if (!listener) {
      return;
    }
    this.invoke(listener, (l) => l.onStateChanged?.(next));
    if (notify) {
      this.invoke(listener, notify);
    }
  }

  private dispatch(callback: (listener: SSEEventListener) => void): void {
    const listener = this.listener;
    if (listener) {
      this.invoke(listener, callback);
    }
  }

  private invoke(listener: SSEEventListener, callback: (listener: SSEEventListener) => void): void {
    if (this.isDestroyed()) {
      return;
    }
    try {
      callback(listener);
    } catch (err) {
      this.logger.error('Listener callback threw', { error: toError(err).message });
    }
  }
}
