/**
 * Tests for sse-parser.ts
 */
import { describe, it, expect } from 'vitest';
import {
  EventFrameBuilder,
  LineSplitter,
  parseEventStream,
  parseSSEText,
  splitLines,
} from '../../src/sse-parser.js';

async function* chunks(...parts: Array<string | Uint8Array>): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) {
    yield part;
  }
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

describe('parseSSEText', () => {
  describe('complete events', () => {
    it('parses a single data frame', () => {
      expect(parseSSEText('data: hello\n\n')).toEqual([
        { id: null, type: null, data: 'hello', retry: null },
      ]);
    });

    it('joins multiple data lines with newline', () => {
      const [event] = parseSSEText('data: line1\ndata: line2\n\n');
      expect(event.data).toBe('line1\nline2');
    });

    it('reads id, event and retry fields', () => {
      const events = parseSSEText('event: update\nid: 7\nretry: 3000\ndata: {}\n\n');
      expect(events).toEqual([{ id: '7', type: 'update', data: '{}', retry: 3000 }]);
    });

    it('parses consecutive frames separated by extra blank lines', () => {
      const events = parseSSEText('data: a\n\n\n\ndata: b\n\n');
      expect(events.map((e) => e.data)).toEqual(['a', 'b']);
    });

    it('does not carry fields over to the next frame', () => {
      const events = parseSSEText('event: first\nid: 1\ndata: a\n\ndata: b\n\n');
      expect(events[1]).toEqual({ id: null, type: null, data: 'b', retry: null });
    });
  });

  describe('field handling', () => {
    it('ignores unknown fields', () => {
      expect(parseSSEText('foo: bar\ndata: x\n\n')).toEqual([
        { id: null, type: null, data: 'x', retry: null },
      ]);
    });

    it('skips comment lines', () => {
      const events = parseSSEText(': keep-alive\ndata: a\n: another\n\n');
      expect(events.map((e) => e.data)).toEqual(['a']);
    });

    it('strips exactly one leading space from values', () => {
      expect(parseSSEText('data:nospace\n\n')[0].data).toBe('nospace');
      expect(parseSSEText('data:  two\n\n')[0].data).toBe(' two');
    });

    it('treats a line without colon as a field with empty value', () => {
      expect(parseSSEText('data\n\n')[0].data).toBe('');
    });

    it('ignores non-numeric retry values', () => {
      expect(parseSSEText('retry: soon\ndata: a\n\n')[0].retry).toBeNull();
    });

    it('ignores retry values beyond the safe integer range', () => {
      expect(parseSSEText(`retry: ${'9'.repeat(400)}\ndata: a\n\n`)[0].retry).toBeNull();
      expect(parseSSEText('retry: 9007199254740993\ndata: a\n\n')[0].retry).toBeNull();
    });

    it('maps an empty event field to null', () => {
      expect(parseSSEText('event:\ndata: a\n\n')[0].type).toBeNull();
    });

    it('keeps colons inside the value', () => {
      expect(parseSSEText('data: {"a":1}\n\n')[0].data).toBe('{"a":1}');
    });
  });

  describe('frames that emit nothing', () => {
    it('drops frames without data lines', () => {
      expect(parseSSEText('event: ping\nid: 3\n\n')).toEqual([]);
    });

    it('drops an unterminated frame at end of input', () => {
      expect(parseSSEText('data: a\n\ndata: partial')).toHaveLength(1);
    });

    it('returns nothing for empty input', () => {
      expect(parseSSEText('')).toEqual([]);
    });
  });

  describe('line terminators', () => {
    it('accepts CRLF and bare CR', () => {
      const events = parseSSEText('data: a\r\n\r\ndata: b\r\r');
      expect(events.map((e) => e.data)).toEqual(['a', 'b']);
    });
  });
});

describe('LineSplitter', () => {
  it('buffers a partial line until its terminator arrives', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('dat')).toEqual([]);
    expect(splitter.push('a: x\n')).toEqual(['data: x']);
  });

  it('treats a CRLF split across pushes as one terminator', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('a\r')).toEqual(['a']);
    expect(splitter.push('\nb\n')).toEqual(['b']);
    expect(splitter.end()).toEqual([]);
  });

  it('returns the unterminated tail on end', () => {
    const splitter = new LineSplitter();
    splitter.push('abc');
    expect(splitter.end()).toEqual(['abc']);
    expect(splitter.end()).toEqual([]);
  });
});

describe('EventFrameBuilder', () => {
  it('ignores an id containing NUL', () => {
    const builder = new EventFrameBuilder();
    builder.pushLine('id: a\0b');
    builder.pushLine('data: x');
    expect(builder.pushLine('')).toEqual({ id: null, type: null, data: 'x', retry: null });
  });

  it('returns frozen events', () => {
    const builder = new EventFrameBuilder();
    builder.pushLine('data: x');
    expect(Object.isFrozen(builder.pushLine(''))).toBe(true);
  });

  it('discards accumulated fields on reset', () => {
    const builder = new EventFrameBuilder();
    builder.pushLine('data: x');
    builder.reset();
    expect(builder.pushLine('')).toBeNull();
  });
});

describe('splitLines', () => {
  it('yields a final line without terminator', async () => {
    expect(await collect(splitLines(chunks('a\nb')))).toEqual(['a', 'b']);
  });

  it('decodes a UTF-8 character split across chunks', async () => {
    const bytes = new TextEncoder().encode('data: é\n\n');
    const lines = await collect(splitLines(chunks(bytes.slice(0, 7), bytes.slice(7))));
    expect(lines).toEqual(['data: é', '']);
  });
});

describe('parseEventStream', () => {
  it('parses events as chunks arrive', async () => {
    const events = await collect(parseEventStream(splitLines(chunks('data: a\r', '\ndata: b\n', '\n'))));
    expect(events).toEqual([{ id: null, type: null, data: 'a\nb', retry: null }]);
  });

  it('yields events from byte chunks', async () => {
    const encoder = new TextEncoder();
    const source = chunks(encoder.encode('event: tick\ndata: 1\n\n'), encoder.encode('data: 2\n\n'));
    const events = await collect(parseEventStream(splitLines(source)));
    expect(events.map((e) => [e.type, e.data])).toEqual([
      ['tick', '1'],
      [null, '2'],
    ]);
  });
});
