/**
 * Server-sent event framing shared by the event-stream transport and by
 * event-stream bodies returned inline from a direct POST.
 *
 * Events end at a blank line; `event:` names the event; `data:` lines are
 * trimmed and joined with `\n`; lines starting with `:` are heartbeats.
 * A pending event is emitted once more at end of input.
 */

export interface SseEvent {
  name: string;
  data: string;
}

export class SseEventParser {
  private name = '';
  private data = '';
  private pending = false;

  /**
   * Feed one line without its terminator. Returns the event this line completed, if any.
   */
  pushLine(rawLine: string): SseEvent | undefined {
    const line = rawLine.replace(/[\r\n]+$/, '');

    if (line === '') {
      return this.take();
    }
    if (line.startsWith(':')) {
      return undefined;
    }
    if (line.startsWith('event:')) {
      this.name = line.slice('event:'.length).trim();
      this.pending = true;
    } else if (line.startsWith('data:')) {
      const part = line.slice('data:'.length).trim();
      this.data = this.data === '' ? part : `${this.data}\n${part}`;
      this.pending = true;
    }
    return undefined;
  }

  /**
   * Signal end of input.
   */
  flush(): SseEvent | undefined {
    return this.take();
  }

  private take(): SseEvent | undefined {
    if (!this.pending) {
      return undefined;
    }
    const event = { name: this.name, data: this.data };
    this.name = '';
    this.data = '';
    this.pending = false;
    return event;
  }
}

export function parseSseText(text: string): SseEvent[] {
  const parser = new SseEventParser();
  const events: SseEvent[] = [];
  for (const line of text.split('\n')) {
    const event = parser.pushLine(line);
    if (event) {
      events.push(event);
    }
  }
  const last = parser.flush();
  if (last) {
    events.push(last);
  }
  return events;
}

/**
 * Decode a byte stream into lines split on `\n`. The final unterminated line is yielded at end of stream.
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      yield* lines;
    }
    buffer += decoder.decode();
    if (buffer !== '') {
      yield buffer;
    }
  } finally {
    reader.releaseLock();
  }
}

export async function* parseSseEvents(lines: AsyncIterable<string>): AsyncGenerator<SseEvent> {
  const parser = new SseEventParser();
  for await (const line of lines) {
    const event = parser.pushLine(line);
    if (event) {
      yield event;
    }
  }
  const last = parser.flush();
  if (last) {
    yield last;
  }
}
