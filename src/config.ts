/**
 * Client Configuration
 *
 * Transport timeouts and logging switch, supplied once per client.
 * Configuration is programmatic only; nothing is read from the environment.
 */

import { z } from 'zod';
import { formatZodError, sseError } from './errors.js';

// ─────────────────────────────────────────────────────────────
// Defaults
// ─────────────────────────────────────────────────────────────

export const TIME_UNITS = ['milliseconds', 'seconds', 'minutes'] as const;

export type TimeUnit = (typeof TIME_UNITS)[number];

/** Connect timeout, in DEFAULT_TIME_UNIT */
export const DEFAULT_CONNECT_TIMEOUT = 1;

/** Read (idle between body chunks) timeout, in DEFAULT_TIME_UNIT */
export const DEFAULT_READ_TIMEOUT = 2;

/** Write (request sent until response headers) timeout, in DEFAULT_TIME_UNIT */
export const DEFAULT_WRITE_TIMEOUT = 1;

/**
 * Minutes. Coarse for a streaming client; most callers will want to
 * override it, but it stays the documented default.
 */
export const DEFAULT_TIME_UNIT: TimeUnit = 'minutes';

const MS_PER_UNIT: Record<TimeUnit, number> = {
  milliseconds: 1,
  seconds: 1000,
  minutes: 60 * 1000,
};

// ─────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────

/** A timeout of 0 disables that timeout in the transport. */
const timeoutSchema = z.number().int().nonnegative();

const configSchema = z
  .object({
    connectTimeout: timeoutSchema.default(DEFAULT_CONNECT_TIMEOUT),
    readTimeout: timeoutSchema.default(DEFAULT_READ_TIMEOUT),
    writeTimeout: timeoutSchema.default(DEFAULT_WRITE_TIMEOUT),
    timeUnit: z.enum(TIME_UNITS).default(DEFAULT_TIME_UNIT),
    enableLogging: z.boolean().default(false),
  })
  .strict();

export type SSEConfigInput = z.input<typeof configSchema>;

export interface SSEConfig {
  readonly connectTimeout: number;
  readonly readTimeout: number;
  readonly writeTimeout: number;
  readonly timeUnit: TimeUnit;
  readonly enableLogging: boolean;
}

export interface Timeouts {
  readonly connectTimeoutMs: number;
  readonly readTimeoutMs: number;
  readonly writeTimeoutMs: number;
}

/**
 * Build a validated, frozen configuration. Omitted fields take the defaults.
 * Throws SSEError INVALID_CONFIG on bad input.
 */
export function createConfig(overrides: SSEConfigInput = {}): SSEConfig {
  const result = configSchema.safeParse(overrides);
  if (!result.success) {
    throw sseError.invalidConfig(formatZodError(result.error));
  }
  return Object.freeze(result.data);
}

export const DEFAULT_CONFIG: SSEConfig = createConfig();

/**
 * Convert configured timeouts to milliseconds
 */
export function toTimeouts(config: SSEConfig): Timeouts {
  const factor = MS_PER_UNIT[config.timeUnit];
  return {
    connectTimeoutMs: config.connectTimeout * factor,
    readTimeoutMs: config.readTimeout * factor,
    writeTimeoutMs: config.writeTimeout * factor,
  };
}
