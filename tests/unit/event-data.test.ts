/**
 * Tests for event-data.ts
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { extractField, isJsonEvent, parseEventData, parseEventJson } from '../../src/event-data.js';
import type { SSEEvent } from '../../src/types.js';

function event(data: string): SSEEvent {
  return { id: null, type: null, data, retry: null };
}

describe('parseEventJson', () => {
  it('parses JSON data', () => {
    expect(parseEventJson(event('{"a":1}'))).toEqual({ ok: true, value: { a: 1 } });
  });

  it('reports malformed JSON as an error result', () => {
    const result = parseEventJson(event('{oops'));
    expect(result.ok).toBe(false);
  });
});

describe('parseEventData', () => {
  const schema = z.object({ n: z.number() });

  it('returns validated data', () => {
    expect(parseEventData(event('{"n":1}'), schema)).toEqual({ ok: true, value: { n: 1 } });
  });

  it('reports schema mismatches with the field path', () => {
    const result = parseEventData(event('{"n":"x"}'), schema);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^n: /);
    }
  });

  it('passes JSON errors through', () => {
    expect(parseEventData(event('nope'), schema).ok).toBe(false);
  });
});

describe('isJsonEvent', () => {
  it('is true for objects and arrays', () => {
    expect(isJsonEvent(event('{}'))).toBe(true);
    expect(isJsonEvent(event('[1,2]'))).toBe(true);
  });

  it('is false for scalars and text', () => {
    expect(isJsonEvent(event('42'))).toBe(false);
    expect(isJsonEvent(event('null'))).toBe(false);
    expect(isJsonEvent(event('hello'))).toBe(false);
  });
});

describe('extractField', () => {
  const data = event('{"a":"x","b":2,"c":true,"d":null,"e":{}}');

  it('returns scalar fields as strings', () => {
    expect(extractField(data, 'a')).toBe('x');
    expect(extractField(data, 'b')).toBe('2');
    expect(extractField(data, 'c')).toBe('true');
  });

  it('returns null for null, nested and missing fields', () => {
    expect(extractField(data, 'd')).toBeNull();
    expect(extractField(data, 'e')).toBeNull();
    expect(extractField(data, 'z')).toBeNull();
  });

  it('returns null when data is not an object', () => {
    expect(extractField(event('[1]'), '0')).toBeNull();
    expect(extractField(event('plain'), 'a')).toBeNull();
  });
});
