/**
 * Chat completions route - OpenAI-compatible, with Server-Sent Events streaming
 */

import { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { Delta, IStreamingModel, Message } from '../../../models/base.js';
import type { ToolLoopOrchestrator, TurnRequest } from '../../../core/tool-loop.js';
import {
  buildChunk,
  buildCompletion,
  buildErrorPayload,
  createChunkMeta,
} from '../../../models/completion-chunk.js';
import { encodeDone, encodeEvent } from '../../../utils/sse.js';
import { RequestValidationError, errorMessage } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const ChatRequestSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1, 'messages must not be empty'),
  stream: z.boolean().default(false),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface ChatRouteDependencies<N> {
  model: IStreamingModel;
  /** Absent when the tool loop is switched off; streams are then relayed as-is. */
  orchestrator?: ToolLoopOrchestrator<N>;
}

export function parseChatRequest(body: unknown): ChatRequest {
  const result = ChatRequestSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new RequestValidationError(`Invalid request: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Split the request into the history and the message being answered.
 */
export function toTurnRequest(messages: Message[]): TurnRequest {
  const userMessage = messages[messages.length - 1];
  if (!userMessage || userMessage.role !== 'user') {
    throw new RequestValidationError('Invalid request: the last message must come from the user');
  }
  return { conversation: messages.slice(0, -1), userMessage };
}

export function setupChatRoutes<N>(app: Express, deps: ChatRouteDependencies<N>): void {
  /**
   * POST /v1/chat/completions
   */
  app.post('/v1/chat/completions', async (req: Request, res: Response, next: NextFunction) => {
    let request: ChatRequest;
    let turn: TurnRequest | undefined;
    try {
      request = parseChatRequest(req.body);
      if (request.stream && deps.orchestrator) {
        turn = toTurnRequest(request.messages);
      }
    } catch (error) {
      if (error instanceof RequestValidationError) {
        res.status(400).json(buildErrorPayload(error.message));
        return;
      }
      next(error);
      return;
    }

    const meta = createChunkMeta(deps.model.name);

    if (!request.stream) {
      try {
        const response = await deps.model.chat({
          messages: request.messages,
          temperature: request.temperature,
          maxTokens: request.max_tokens,
        });
        res.status(200).json(buildCompletion(meta, response));
      } catch (error) {
        logger.error('[HTTP] Completion failed:', error);
        res.status(502).json(buildErrorPayload(errorMessage(error)));
      }
      return;
    }

    // Setup SSE
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        logger.debug('[HTTP] Client disconnected mid-stream');
        disconnect.abort();
      }
    });

    const sendDelta = (delta: Delta, finishReason: string | null = null) => {
      res.write(encodeEvent(buildChunk(meta, delta, finishReason)));
    };

    if (deps.orchestrator && turn) {
      for await (const chunk of deps.orchestrator.runTurn(turn, disconnect.signal)) {
        if (disconnect.signal.aborted) break;
        if (chunk.type === 'delta') {
          sendDelta(chunk.delta);
        } else if (chunk.type === 'done') {
          sendDelta({}, chunk.finishReason);
        } else {
          res.write(encodeEvent(buildErrorPayload(chunk.message)));
        }
      }
    } else {
      try {
        const stream = deps.model.streamChat({
          messages: request.messages,
          temperature: request.temperature,
          maxTokens: request.max_tokens,
          signal: disconnect.signal,
        });
        for await (const delta of stream) {
          sendDelta(delta);
        }
        sendDelta({}, 'stop');
      } catch (error) {
        if (!disconnect.signal.aborted) {
          logger.error('[HTTP] Stream relay failed:', error);
          res.write(encodeEvent(buildErrorPayload(errorMessage(error))));
        }
      }
    }

    if (!disconnect.signal.aborted) {
      res.write(encodeDone());
    }
    res.end();
  });
}
