import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { DeepSeekModel } from '../deepseek.js';
import type { Delta } from '../base.js';
import { ModelError } from '../../utils/errors.js';
import { logger, LogLevel } from '../../utils/logger.js';

const ENDPOINT = 'https://upstream.test/beta/chat/completions';

function sseResponse(parts: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part));
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'content-type': 'text/event-stream' } });
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function event(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

async function collect(iterable: AsyncIterable<Delta>): Promise<Delta[]> {
  const deltas: Delta[] = [];
  for await (const delta of iterable) deltas.push(delta);
  return deltas;
}

function requestBody(fetchMock: ReturnType<typeof vi.fn>, call = 0): unknown {
  const init: unknown = fetchMock.mock.calls[call]?.[1];
  if (typeof init !== 'object' || init === null || !('body' in init) || typeof init.body !== 'string') {
    throw new Error('fetch was not called with a JSON body');
  }
  return JSON.parse(init.body);
}

describe('DeepSeekModel', () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  let model: DeepSeekModel;

  beforeAll(() => {
    logger.setLogLevel(LogLevel.SILENT);
  });

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    model = new DeepSeekModel({
      endpoint: ENDPOINT,
      apiKey: 'test-key',
      model: 'deepseek-reasoner',
      retryBaseDelayMs: 1,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('streamChat', () => {
    it('maps reasoning and answer fields to deltas', async () => {
      const stream = event({ choices: [{ delta: { reasoning_content: 'Hm' } }] }) +
        ': keep-alive\n\n' +
        event({ choices: [{ delta: { content: 'Hi' } }] }) +
        event({ choices: [{ delta: {}, finish_reason: 'stop' }] }) +
        'data: [DONE]\n\n';
      fetchMock.mockResolvedValue(sseResponse([stream.slice(0, 30), stream.slice(30)]));

      const deltas = await collect(model.streamChat({ messages: [{ role: 'user', content: 'hello' }] }));

      expect(deltas).toEqual([{ reasoningText: 'Hm' }, { answerText: 'Hi' }]);
    });

    it('sends the trailing assistant message as a prefix', async () => {
      fetchMock.mockResolvedValue(sseResponse(['data: [DONE]\n\n']));

      await collect(model.streamChat({
        messages: [
          { role: 'user', content: 'q' },
          { role: 'assistant', content: '<think>\n', isPrefix: true },
        ],
        temperature: 0.2,
      }));

      expect(fetchMock).toHaveBeenCalledWith(ENDPOINT, expect.objectContaining({
        method: 'POST',
        headers: expect.objectContaining({ Authorization: 'Bearer test-key' }),
      }));
      expect(requestBody(fetchMock)).toEqual({
        model: 'deepseek-reasoner',
        messages: [
          { role: 'user', content: 'q' },
          { role: 'assistant', content: '<think>\n', prefix: true },
        ],
        stream: true,
        temperature: 0.2,
      });
    });

    it('skips malformed events', async () => {
      fetchMock.mockResolvedValue(sseResponse([
        'data: {not json\n\n',
        event({ choices: [{ delta: { content: 'ok' } }] }),
      ]));

      expect(await collect(model.streamChat({ messages: [] }))).toEqual([{ answerText: 'ok' }]);
    });

    it('raises on an error payload mid-stream', async () => {
      fetchMock.mockResolvedValue(sseResponse([
        event({ choices: [{ delta: { content: 'par' } }] }),
        event({ error: { message: 'overloaded' } }),
      ]));

      const deltas: Delta[] = [];
      const consume = (async () => {
        for await (const delta of model.streamChat({ messages: [] })) deltas.push(delta);
      })();

      await expect(consume).rejects.toThrow('DeepSeek stream error: overloaded');
      expect(deltas).toEqual([{ answerText: 'par' }]);
    });

    it('accepts a plain completion in place of a stream', async () => {
      fetchMock.mockResolvedValue(jsonResponse({
        choices: [{ message: { content: 'answer', reasoning_content: 'why' } }],
      }));

      expect(await collect(model.streamChat({ messages: [] }))).toEqual([
        { reasoningText: 'why', answerText: 'answer' },
      ]);
    });

    it('retries rate-limited requests before streaming starts', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
        .mockResolvedValueOnce(sseResponse([event({ choices: [{ delta: { content: 'ok' } }] })]));

      expect(await collect(model.streamChat({ messages: [] }))).toEqual([{ answerText: 'ok' }]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('gives up after the retry budget', async () => {
      fetchMock.mockImplementation(async () => new Response('busy', { status: 503 }));

      await expect(collect(model.streamChat({ messages: [] }))).rejects.toThrow('DeepSeek API error (503): busy');
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('does not retry client errors', async () => {
      fetchMock.mockResolvedValue(new Response('bad request', { status: 400 }));

      const error = await collect(model.streamChat({ messages: [] })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ModelError);
      expect(error).toMatchObject({ message: 'DeepSeek API error (400): bad request', status: 400 });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('wraps network failures', async () => {
      fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(collect(model.streamChat({ messages: [] }))).rejects.toThrow(
        'Failed to communicate with DeepSeek API: connect ECONNREFUSED'
      );
    });
  });

  describe('chat', () => {
    it('returns the completion with usage', async () => {
      fetchMock.mockResolvedValue(jsonResponse({
        choices: [{ message: { content: '42', reasoning_content: 'six sevens' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      }));

      const response = await model.chat({ messages: [{ role: 'user', content: 'q' }] });

      expect(response).toEqual({
        content: '42',
        reasoning: 'six sevens',
        finishReason: 'stop',
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      });
      expect(requestBody(fetchMock)).toMatchObject({ stream: false });
    });

    it('raises when the response has no choices', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));

      await expect(model.chat({ messages: [] })).rejects.toThrow('No choices in response');
    });
  });
});
