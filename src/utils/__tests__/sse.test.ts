import { describe, it, expect } from 'vitest';
import { SseDecoder, encodeDone, encodeEvent, readSseStream } from '../sse.js';

async function* bytes(parts: string[]): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) {
    yield encoder.encode(part);
  }
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

describe('encodeEvent', () => {
  it('frames a payload as one data line and a blank line', () => {
    expect(encodeEvent({ a: 1 })).toBe('data: {"a":1}\n\n');
    expect(encodeDone()).toBe('data: [DONE]\n\n');
  });
});

describe('SseDecoder', () => {
  it('decodes events split across feeds', () => {
    const decoder = new SseDecoder();

    expect(decoder.feed('data: {"a"')).toEqual([]);
    expect(decoder.feed(':1}\n')).toEqual([]);
    expect(decoder.feed('\n')).toEqual([{ type: 'data', data: '{"a":1}' }]);
  });

  it('tolerates blank lines and ignores non-data lines', () => {
    const decoder = new SseDecoder();

    const messages = decoder.feed('\n\n: keep-alive\n\nevent: ping\nid: 3\ndata: x\n\n\n');

    expect(messages).toEqual([{ type: 'data', data: 'x' }]);
  });

  it('handles CRLF line endings', () => {
    const decoder = new SseDecoder();

    expect(decoder.feed('data: one\r\n\r\ndata: two\r\n\r\n')).toEqual([
      { type: 'data', data: 'one' },
      { type: 'data', data: 'two' },
    ]);
  });

  it('joins multi-line data fields', () => {
    const decoder = new SseDecoder();

    expect(decoder.feed('data: a\ndata: b\n\n')).toEqual([{ type: 'data', data: 'a\nb' }]);
  });

  it('treats the sentinel as termination and ignores anything after it', () => {
    const decoder = new SseDecoder();

    expect(decoder.feed('data: 1\n\ndata: [DONE]\n\ndata: 2\n\n')).toEqual([
      { type: 'data', data: '1' },
      { type: 'done' },
    ]);
    expect(decoder.finished).toBe(true);
    expect(decoder.feed('data: 3\n\n')).toEqual([]);
  });

  it('dispatches a trailing event without a blank line on flush', () => {
    const decoder = new SseDecoder();

    expect(decoder.feed('data: last')).toEqual([]);
    expect(decoder.flush()).toEqual([{ type: 'data', data: 'last' }]);
  });
});

describe('readSseStream', () => {
  it('yields payloads until the sentinel', async () => {
    const payloads = await collect(readSseStream(bytes([
      'data: {"n":1}\n\nda',
      'ta: {"n":2}\n\n',
      'data: [DONE]\n\n',
      'data: {"n":3}\n\n',
    ])));

    expect(payloads).toEqual(['{"n":1}', '{"n":2}']);
  });

  it('yields a final unterminated event when the stream ends', async () => {
    const payloads = await collect(readSseStream(bytes(['data: {"n":1}\n\ndata: {"n":2}'])));

    expect(payloads).toEqual(['{"n":1}', '{"n":2}']);
  });

  it('decodes multi-byte characters split between chunks', async () => {
    const encoded = new TextEncoder().encode('data: é\n\n');
    async function* split(): AsyncGenerator<Uint8Array> {
      yield encoded.slice(0, 7);
      yield encoded.slice(7);
    }

    expect(await collect(readSseStream(split()))).toEqual(['é']);
  });
});
