/**
 * SSEConnector - convenience surface over SSEClient
 *
 * Validates configuration once, then turns url/body/headers into requests.
 *
 * @example
 * const connector = createSSEConnector({
 *   config: { readTimeout: 30, timeUnit: 'seconds' },
 *   listener: { onEvent: (event) => console.log(event.data) },
 * });
 * connector.connectGet('https://example.com/events', { Authorization: 'Bearer test-token' });
 */

import { createConfig } from './config.js';
import type { SSEConfigInput } from './config.js';
import type { HeaderInput } from './headers.js';
import type { Interceptor } from './interceptors.js';
import type { Logger } from './logger.js';
import { SSEClient } from './sse-client.js';
import { createSSERequest } from './sse-request.js';
import type { TransportFactory } from './transport.js';
import type { ConnectionState, SSEEventListener, SSERequest } from './types.js';

export interface SSEConnectorOptions {
  /** Omitted fields take the defaults; invalid values throw INVALID_CONFIG */
  config?: SSEConfigInput;
  lifecycle?: AbortSignal;
  listener?: SSEEventListener;
  interceptors?: readonly Interceptor[];
  logger?: Logger;
  createTransport?: TransportFactory;
}

export class SSEConnector {
  constructor(private readonly client: SSEClient) {}

  /** Throws INVALID_REQUEST for a blank or non-http(s) URL */
  connectGet(url: string, headers: HeaderInput = {}): void {
    this.client.connect(createSSERequest({ url, method: 'GET', headers }));
  }

  /** Body is sent as UTF-8 with Content-Type application/json */
  connectPost(url: string, body: string, headers: HeaderInput = {}): void {
    this.client.connect(createSSERequest({ url, method: 'POST', headers, body }));
  }

  connect(request: SSERequest): void {
    this.client.connect(request);
  }

  disconnect(): void {
    this.client.disconnect();
  }

  isConnecting(): boolean {
    return this.client.isConnecting();
  }

  getState(): ConnectionState {
    return this.client.getState();
  }

  setEventListener(listener: SSEEventListener): this {
    this.client.setEventListener(listener);
    return this;
  }

  destroy(): void {
    this.client.destroy();
  }
}

export function createSSEConnector(options: SSEConnectorOptions = {}): SSEConnector {
  const client = new SSEClient({
    config: createConfig(options.config),
    lifecycle: options.lifecycle,
    listener: options.listener,
    interceptors: options.interceptors,
    logger: options.logger,
    createTransport: options.createTransport,
  });
  return new SSEConnector(client);
}
