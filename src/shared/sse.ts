/**
 * SSE (Server-Sent Events) framing for consuming a text/event-stream body.
 *
 * Only the `event: ` and `data: ` fields are understood. Every other line
 * (comments starting with ':', `id:`, `retry:`) is skipped.
 */

export interface SseEvent {
  eventType?: string;
  data: string;
}

const DATA_PREFIX = 'data: ';
const EVENT_PREFIX = 'event: ';

/**
 * Line-at-a-time SSE decoder. Feed it lines without their terminator;
 * it returns an event when a blank line closes a block that carried data.
 */
export class SseLineDecoder {
  private eventType: string | undefined;
  private dataLines: string[] = [];

  push(line: string): SseEvent | null {
    if (line === '') {
      return this.flush();
    }

    if (line.startsWith(DATA_PREFIX)) {
      this.dataLines.push(line.slice(DATA_PREFIX.length));
    } else if (line.startsWith(EVENT_PREFIX)) {
      this.eventType = line.slice(EVENT_PREFIX.length);
    }
    return null;
  }

  /** True when a block has started but no blank line has closed it yet. */
  get pending(): boolean {
    return this.dataLines.length > 0 || this.eventType !== undefined;
  }

  reset(): void {
    this.eventType = undefined;
    this.dataLines = [];
  }

  private flush(): SseEvent | null {
    const event: SseEvent | null =
      this.dataLines.length > 0
        ? {
            ...(this.eventType !== undefined ? { eventType: this.eventType } : {}),
            data: this.dataLines.join('\n'),
          }
        : null;
    this.reset();
    return event;
  }
}

/**
 * Parse a complete SSE body into events.
 * A trailing block without its closing blank line is discarded.
 */
export function parseSSEEvents(raw: string): SseEvent[] {
  const decoder = new SseLineDecoder();
  const events: SseEvent[] = [];

  for (const line of raw.split('\n')) {
    const event = decoder.push(stripCR(line));
    if (event) events.push(event);
  }

  return events;
}

/**
 * Async generator that yields lines from a ReadableStream (e.g. fetch
 * response body). Handles partial chunks across read boundaries and
 * `\r\n` terminators. A final line without a terminator is still yielded.
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        yield stripCR(buffer.slice(0, newline));
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield stripCR(buffer);
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Async generator that yields SSE events from a ReadableStream.
 * Ends quietly when the stream ends; an unterminated trailing block is dropped.
 */
export async function* streamSSEEvents(
  stream: ReadableStream<Uint8Array>,
): AsyncGenerator<SseEvent> {
  const decoder = new SseLineDecoder();

  for await (const line of readLines(stream)) {
    const event = decoder.push(line);
    if (event) yield event;
  }
}

function stripCR(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
