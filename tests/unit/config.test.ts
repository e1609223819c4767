/**
 * Tests for config.ts
 */
import { describe, it, expect } from 'vitest';
import { createConfig, DEFAULT_CONFIG, toTimeouts } from '../../src/config.js';
import { isSSEError } from '../../src/errors.js';

describe('createConfig', () => {
  it('uses the documented defaults', () => {
    expect(createConfig()).toEqual({
      connectTimeout: 1,
      readTimeout: 2,
      writeTimeout: 1,
      timeUnit: 'minutes',
      enableLogging: false,
    });
  });

  it('merges overrides with defaults', () => {
    const config = createConfig({ readTimeout: 30, timeUnit: 'seconds', enableLogging: true });
    expect(config.readTimeout).toBe(30);
    expect(config.connectTimeout).toBe(1);
    expect(config.enableLogging).toBe(true);
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(createConfig())).toBe(true);
  });

  it('rejects negative timeouts', () => {
    let caught: unknown;
    try {
      createConfig({ readTimeout: -1 });
    } catch (err) {
      caught = err;
    }
    expect(isSSEError(caught) && caught.code).toBe('INVALID_CONFIG');
  });

  it('rejects fractional timeouts', () => {
    expect(() => createConfig({ connectTimeout: 1.5 })).toThrow(/connectTimeout/);
  });
});

describe('toTimeouts', () => {
  it('converts the defaults to milliseconds', () => {
    expect(toTimeouts(DEFAULT_CONFIG)).toEqual({
      connectTimeoutMs: 60_000,
      readTimeoutMs: 120_000,
      writeTimeoutMs: 60_000,
    });
  });

  it('honours the time unit', () => {
    expect(toTimeouts(createConfig({ connectTimeout: 5, timeUnit: 'seconds' }))).toEqual({
      connectTimeoutMs: 5_000,
      readTimeoutMs: 2_000,
      writeTimeoutMs: 1_000,
    });
    expect(toTimeouts(createConfig({ readTimeout: 250, timeUnit: 'milliseconds' })).readTimeoutMs).toBe(250);
  });

  it('keeps zero as zero', () => {
    expect(toTimeouts(createConfig({ readTimeout: 0 })).readTimeoutMs).toBe(0);
  });
});
