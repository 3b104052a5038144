/**
 * OpenAI-compatible `chat.completion.chunk` payloads, in both directions:
 * parsing what the upstream streams and building what the relay streams.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { Delta, ModelResponse } from './base.js';

const ChunkDeltaSchema = z.object({
  content: z.string().nullish(),
  reasoning_content: z.string().nullish(),
}).passthrough();

const ChunkChoiceSchema = z.object({
  index: z.number().optional(),
  delta: ChunkDeltaSchema.optional(),
  finish_reason: z.string().nullish(),
}).passthrough();

export const ChatCompletionChunkSchema = z.object({
  id: z.string().optional(),
  choices: z.array(ChunkChoiceSchema).default([]),
}).passthrough();

const ErrorPayloadSchema = z.object({
  error: z.union([
    z.object({ message: z.string() }).passthrough(),
    z.string(),
  ]),
});

export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;

export interface ParsedChunk {
  delta: Delta;
  finishReason?: string;
}

export interface ChunkMeta {
  id: string;
  model: string;
  created: number;
}

export function createChunkMeta(model: string): ChunkMeta {
  return {
    id: `chatcmpl-${randomUUID()}`,
    model,
    created: Math.floor(Date.now() / 1000),
  };
}

/**
 * Read the first choice of an upstream chunk. Returns undefined for payloads
 * that are not chunks at all.
 */
export function parseChunk(payload: unknown): ParsedChunk | undefined {
  const result = ChatCompletionChunkSchema.safeParse(payload);
  if (!result.success) return undefined;

  const choice = result.data.choices[0];
  if (!choice) return { delta: {} };

  const delta: Delta = {};
  if (choice.delta?.reasoning_content) delta.reasoningText = choice.delta.reasoning_content;
  if (choice.delta?.content) delta.answerText = choice.delta.content;

  return {
    delta,
    finishReason: choice.finish_reason ?? undefined,
  };
}

/** Extract the message of an `{ error }` payload, if that is what this is. */
export function parseErrorPayload(payload: unknown): string | undefined {
  const result = ErrorPayloadSchema.safeParse(payload);
  if (!result.success) return undefined;
  const { error } = result.data;
  return typeof error === 'string' ? error : error.message;
}

export function buildChunk(meta: ChunkMeta, delta: Delta, finishReason: string | null = null) {
  const wireDelta: { reasoning_content?: string; content?: string } = {};
  if (delta.reasoningText !== undefined) wireDelta.reasoning_content = delta.reasoningText;
  if (delta.answerText !== undefined) wireDelta.content = delta.answerText;

  return {
    id: meta.id,
    object: 'chat.completion.chunk' as const,
    created: meta.created,
    model: meta.model,
    choices: [
      {
        index: 0,
        delta: wireDelta,
        finish_reason: finishReason,
      },
    ],
  };
}

export function buildErrorPayload(message: string) {
  return { error: { message } };
}

export function buildCompletion(meta: ChunkMeta, response: ModelResponse) {
  const message: { role: 'assistant'; content: string; reasoning_content?: string } = {
    role: 'assistant',
    content: response.content,
  };
  if (response.reasoning) message.reasoning_content = response.reasoning;

  return {
    id: meta.id,
    object: 'chat.completion' as const,
    created: meta.created,
    model: meta.model,
    choices: [
      {
        index: 0,
        message,
        finish_reason: response.finishReason ?? 'stop',
      },
    ],
    usage: response.usage ? {
      prompt_tokens: response.usage.promptTokens,
      completion_tokens: response.usage.completionTokens,
      total_tokens: response.usage.totalTokens,
    } : undefined,
  };
}
