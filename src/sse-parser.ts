/**
 * SSE (Server-Sent Events) parsing utilities
 *
 * Two layers, both free of I/O:
 * - LineSplitter / splitLines: bytes or text → lines (LF, CRLF or CR)
 * - EventFrameBuilder / parseEventStream: lines → SSEEvent per frame
 *
 * SSE format:
 *   id: 42
 *   event: eventType
 *   data: {"json": "payload"}
 *   data: second line
 *   retry: 3000
 *
 * A blank line ends a frame. Unknown fields and comment lines (":") are
 * skipped without interrupting the stream.
 */

import type { SSEEvent } from './types.js';

/**
 * Incremental line splitter. A CR at the very end of a chunk is taken as a
 * terminator; an LF opening the next chunk is then dropped, so a CRLF split
 * across chunks still ends exactly one line.
 */
export class LineSplitter {
  private buffer = '';
  private pendingCR = false;

  push(text: string): string[] {
    let input = text;
    if (this.pendingCR && input.length > 0) {
      if (input.startsWith('\n')) {
        input = input.slice(1);
      }
      this.pendingCR = false;
    }

    const data = this.buffer + input;
    const lines: string[] = [];
    let start = 0;

    for (let i = 0; i < data.length; i++) {
      const ch = data[i];
      if (ch !== '\n' && ch !== '\r') continue;

      lines.push(data.slice(start, i));
      if (ch === '\r') {
        if (i + 1 < data.length) {
          if (data[i + 1] === '\n') i++;
        } else {
          this.pendingCR = true;
        }
      }
      start = i + 1;
    }

    this.buffer = data.slice(start);
    return lines;
  }

  /**
   * Return the unterminated tail (if any) and reset
   */
  end(): string[] {
    const rest = this.buffer;
    this.buffer = '';
    this.pendingCR = false;
    return rest === '' ? [] : [rest];
  }
}

/**
 * Split a chunked body into lines. UTF-8 sequences split across chunks are
 * decoded correctly; a final line without terminator is still yielded.
 */
export async function* splitLines(
  chunks: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder('utf-8');
  const splitter = new LineSplitter();

  for await (const chunk of chunks) {
    const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    yield* splitter.push(text);
  }

  yield* splitter.push(decoder.decode());
  yield* splitter.end();
}

/**
 * Accumulates the fields of one frame. pushLine() returns the event when a
 * blank line completes a frame that carried at least one data line.
 */
export class EventFrameBuilder {
  private id: string | null = null;
  private type: string | null = null;
  private dataLines: string[] = [];
  private retry: number | null = null;

  pushLine(line: string): SSEEvent | null {
    if (line === '') {
      return this.complete();
    }
    if (line.startsWith(':')) {
      return null;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'data':
        this.dataLines.push(value);
        break;
      case 'event':
        this.type = value === '' ? null : value;
        break;
      case 'id':
        if (!value.includes('\0')) {
          this.id = value;
        }
        break;
      case 'retry':
        if (/^\d+$/.test(value) && Number.isSafeInteger(Number(value))) {
          this.retry = Number(value);
        }
        break;
      default:
        // Unknown field
        break;
    }
    return null;
  }

  reset(): void {
    this.id = null;
    this.type = null;
    this.dataLines = [];
    this.retry = null;
  }

  private complete(): SSEEvent | null {
    const event: SSEEvent | null =
      this.dataLines.length > 0
        ? Object.freeze({
            id: this.id,
            type: this.type,
            data: this.dataLines.join('\n'),
            retry: this.retry,
          })
        : null;
    this.reset();
    return event;
  }
}

/**
 * Lazily turn a line stream into events. Single pass: iterating again does
 * not restart the source. A frame left open when the stream ends is dropped.
 */
export async function* parseEventStream(
  lines: AsyncIterable<string>,
): AsyncGenerator<SSEEvent, void, undefined> {
  const builder = new EventFrameBuilder();
  for await (const line of lines) {
    const event = builder.pushLine(line);
    if (event) {
      yield event;
    }
  }
}

/**
 * Parse a complete SSE text in one go
 */
export function parseSSEText(text: string): SSEEvent[] {
  const splitter = new LineSplitter();
  const builder = new EventFrameBuilder();
  const events: SSEEvent[] = [];

  for (const line of [...splitter.push(text), ...splitter.end()]) {
    const event = builder.pushLine(line);
    if (event) {
      events.push(event);
    }
  }
  return events;
}
