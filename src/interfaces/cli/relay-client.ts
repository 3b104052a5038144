/**
 * Client side of the relay: posts a conversation and decodes the SSE reply.
 */

import type { Delta, Message } from '../../models/base.js';
import { hasText } from '../../models/base.js';
import { parseChunk, parseErrorPayload } from '../../models/completion-chunk.js';
import { readSseStream } from '../../utils/sse.js';
import { RuminateError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type RelayEvent =
  | { type: 'delta'; delta: Delta }
  | { type: 'error'; message: string };

export async function* streamFromRelay(
  apiUrl: string,
  messages: Message[],
  signal?: AbortSignal
): AsyncGenerator<RelayEvent> {
  const response = await fetch(apiUrl, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'Accept': 'text/event-stream',
    },
    body: JSON.stringify({
      messages: messages.map(({ role, content }) => ({ role, content })),
      stream: true,
    }),
    signal,
  });

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    const message = parseErrorPayload(safeJson(body)) ?? body;
    throw new RuminateError(`Relay error (${response.status}): ${message}`, 'RELAY_ERROR');
  }
  if (!response.body) {
    throw new RuminateError('Relay returned an empty body', 'RELAY_ERROR');
  }

  for await (const data of readSseStream(response.body)) {
    const payload = safeJson(data);
    if (payload === undefined) {
      logger.debug(`Skipping malformed event: ${data.substring(0, 100)}`);
      continue;
    }

    const error = parseErrorPayload(payload);
    if (error) {
      yield { type: 'error', message: error };
      continue;
    }

    const parsed = parseChunk(payload);
    if (parsed && hasText(parsed.delta)) {
      yield { type: 'delta', delta: parsed.delta };
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
