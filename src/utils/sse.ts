/**
 * Server-Sent Events framing shared by the relay, the upstream client and the CLI.
 *
 * Each event is one `data: <json>` line followed by a blank line; the literal
 * `[DONE]` payload closes the stream.
 */

export const SSE_DONE = '[DONE]';

export type SseMessage =
  | { type: 'data'; data: string }
  | { type: 'done' };

export function encodeEvent(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function encodeDone(): string {
  return `data: ${SSE_DONE}\n\n`;
}

/**
 * Incremental decoder. Lines may arrive split across network chunks; blank
 * lines dispatch the current event, non-`data:` lines (comments, `event:`,
 * `id:`) are ignored, and the sentinel ends decoding.
 */
export class SseDecoder {
  private buffer = '';
  private dataLines: string[] = [];
  private done = false;

  get finished(): boolean {
    return this.done;
  }

  feed(text: string): SseMessage[] {
    if (this.done) return [];
    this.buffer += text;

    const messages: SseMessage[] = [];
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1 && !this.done) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      this.consumeLine(line, messages);
      newline = this.buffer.indexOf('\n');
    }
    if (this.done) this.buffer = '';
    return messages;
  }

  /** Dispatch whatever is left once the underlying stream has ended. */
  flush(): SseMessage[] {
    const messages: SseMessage[] = [];
    if (!this.done && this.buffer) {
      this.consumeLine(this.buffer.replace(/\r$/, ''), messages);
    }
    this.buffer = '';
    if (!this.done) this.dispatch(messages);
    return messages;
  }

  private consumeLine(line: string, out: SseMessage[]): void {
    if (line === '') {
      this.dispatch(out);
      return;
    }
    if (!line.startsWith('data:')) return;
    this.dataLines.push(line.slice(5).replace(/^ /, ''));
  }

  private dispatch(out: SseMessage[]): void {
    if (this.dataLines.length === 0) return;
    const data = this.dataLines.join('\n');
    this.dataLines = [];

    if (data.trim() === SSE_DONE) {
      this.done = true;
      out.push({ type: 'done' });
      return;
    }
    out.push({ type: 'data', data });
  }
}

/**
 * Decode an SSE byte stream into event payloads, stopping at the sentinel.
 */
export async function* readSseStream(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  const sse = new SseDecoder();

  for await (const bytes of body) {
    for (const message of sse.feed(decoder.decode(bytes, { stream: true }))) {
      if (message.type === 'done') return;
      yield message.data;
    }
  }

  for (const message of sse.feed(decoder.decode())) {
    if (message.type === 'done') return;
    yield message.data;
  }
  for (const message of sse.flush()) {
    if (message.type === 'done') return;
    yield message.data;
  }
}
