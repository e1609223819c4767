export { SSEClient } from './sse-client.js';
export type { SSEClientOptions } from './sse-client.js';
export { SSEConnector, createSSEConnector } from './sse-connector.js';
export type { SSEConnectorOptions } from './sse-connector.js';

export { createSSERequest, buildTransportRequest, JSON_CONTENT_TYPE } from './sse-request.js';
export type { SSERequestInput } from './sse-request.js';

export {
  createConfig,
  toTimeouts,
  DEFAULT_CONFIG,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_READ_TIMEOUT,
  DEFAULT_WRITE_TIMEOUT,
  DEFAULT_TIME_UNIT,
  TIME_UNITS,
} from './config.js';
export type { SSEConfig, SSEConfigInput, Timeouts, TimeUnit } from './config.js';

export { ConnectionStateMachine, isActiveState, isTerminalState } from './connection-state.js';

export {
  executeChain,
  withHeader,
  createLoggingInterceptor,
  createHeaderInterceptor,
  HEADER_ACCEPT,
  HEADER_CACHE_CONTROL,
  EVENT_STREAM,
  NO_CACHE,
} from './interceptors.js';
export type { Chain, Interceptor, LoggingInterceptorOptions, TerminalCall } from './interceptors.js';

export { createUndiciTransport } from './transport.js';
export type {
  Transport,
  TransportFactory,
  TransportRequest,
  TransportResponse,
  UndiciTransportOptions,
} from './transport.js';

export { LineSplitter, EventFrameBuilder, splitLines, parseEventStream, parseSSEText } from './sse-parser.js';
export { parseEventJson, parseEventData, isJsonEvent, extractField } from './event-data.js';
export type { ParseResult } from './event-data.js';

export { toHeaderEntries, getHeader, getAllHeaders, setHeader, addHeader, flattenHeaders } from './headers.js';
export type { HeaderEntry, HeaderEntries, HeaderInput } from './headers.js';

export { SSEError, sseError, isSSEError, isCancellation, toError } from './errors.js';
export type { SSEErrorCode, SSEErrorOptions } from './errors.js';

export { createLogger, formatContext, silentLogger, clientLog, httpLog } from './logger.js';
export type { Logger, LoggerOptions, LogContext, LogLevel } from './logger.js';

export { createListener } from './listener.js';
export { CONNECTION_STATES } from './types.js';
export type { ConnectionState, SSEEvent, SSEEventListener, SSEMethod, SSERequest } from './types.js';
