/**
 * DeepSeek API Client
 *
 * Talks to DeepSeek's OpenAI-compatible chat-completions endpoint. Streaming
 * requests use prefix completion: the trailing assistant message is sent with
 * `prefix: true` so the model keeps writing from where that message stops.
 */

import { z } from 'zod';
import type { IStreamingModel, ChatCompletionOptions, ModelResponse, Delta, Message } from './base.js';
import { hasText } from './base.js';
import { parseChunk, parseErrorPayload } from './completion-chunk.js';
import { readSseStream } from '../utils/sse.js';
import { ModelError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface DeepSeekConfig {
  endpoint: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Connection attempts after the first one, for 429 and 503 responses. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

interface WireMessage {
  role: Message['role'];
  content: string;
  prefix?: true;
}

const CompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
      reasoning_content: z.string().nullish(),
    }).passthrough(),
    finish_reason: z.string().nullish(),
  }).passthrough()).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  }).passthrough().optional(),
}).passthrough();

const RETRYABLE_STATUS = new Set([429, 503]);

export class DeepSeekModel implements IStreamingModel {
  private config: DeepSeekConfig;

  constructor(config: DeepSeekConfig) {
    this.config = config;
  }

  get name(): string {
    return this.config.model;
  }

  async *streamChat(options: ChatCompletionOptions): AsyncGenerator<Delta> {
    const response = await this.send(options, true);

    if (!response.body) {
      throw new ModelError('DeepSeek API returned an empty stream', this.config.model);
    }

    const contentType = (response.headers.get('content-type') || '').toLowerCase();
    if (!contentType.includes('text/event-stream')) {
      // Some proxies answer stream requests with a plain completion
      const completion = this.toModelResponse(await response.json());
      const delta: Delta = {};
      if (completion.reasoning) delta.reasoningText = completion.reasoning;
      if (completion.content) delta.answerText = completion.content;
      if (hasText(delta)) yield delta;
      return;
    }

    try {
      for await (const data of readSseStream(response.body)) {
        let payload: unknown;
        try {
          payload = JSON.parse(data);
        } catch {
          logger.debug(`[DeepSeek] Skipping malformed event: ${data.substring(0, 100)}`);
          continue;
        }

        const upstreamError = parseErrorPayload(payload);
        if (upstreamError) {
          throw new ModelError(`DeepSeek stream error: ${upstreamError}`, this.config.model);
        }

        const parsed = parseChunk(payload);
        if (parsed && hasText(parsed.delta)) {
          yield parsed.delta;
        }
      }
    } catch (error) {
      if (error instanceof ModelError) throw error;
      throw new ModelError(`DeepSeek stream interrupted: ${errorMessage(error)}`, this.config.model);
    }
  }

  async chat(options: ChatCompletionOptions): Promise<ModelResponse> {
    const response = await this.send(options, false);
    return this.toModelResponse(await response.json());
  }

  private async send(options: ChatCompletionOptions, stream: boolean): Promise<Response> {
    const maxRetries = this.config.maxRetries ?? 2;
    const baseDelay = this.config.retryBaseDelayMs ?? 1000;
    let lastError: ModelError | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const waitTime = Math.pow(2, attempt) * baseDelay;
        logger.warn(`[DeepSeek] Retrying after ${waitTime}ms (attempt ${attempt + 1}/${maxRetries + 1})...`);
        await new Promise(resolve => setTimeout(resolve, waitTime));
      }

      try {
        return await this.attempt(options, stream);
      } catch (error) {
        if (!(error instanceof ModelError)) throw error;
        lastError = error;

        const retryable = error.status !== undefined && RETRYABLE_STATUS.has(error.status);
        if (!retryable || attempt === maxRetries || options.signal?.aborted) {
          throw error;
        }
        logger.warn(`[DeepSeek] Got ${error.status}, will retry...`);
      }
    }

    throw lastError ?? new ModelError('DeepSeek request failed', this.config.model);
  }

  private async attempt(options: ChatCompletionOptions, stream: boolean): Promise<Response> {
    const requestBody: Record<string, unknown> = {
      model: options.model || this.config.model,
      messages: options.messages.map(toWireMessage),
      stream,
    };

    const temperature = options.temperature ?? this.config.temperature;
    if (temperature !== undefined) requestBody.temperature = temperature;

    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    if (maxTokens !== undefined) requestBody.max_tokens = maxTokens;

    logger.debug(`[DeepSeek] Request (${options.messages.length} messages, stream=${stream})`);

    let response: Response;
    try {
      response = await fetch(this.config.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.config.apiKey}`,
          'Accept': stream ? 'text/event-stream' : 'application/json',
        },
        body: JSON.stringify(requestBody),
        signal: options.signal,
      });
    } catch (error) {
      throw new ModelError(
        `Failed to communicate with DeepSeek API: ${errorMessage(error)}`,
        this.config.model
      );
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      logger.error(`[DeepSeek] API Error Response (${response.status}): ${errorText}`);
      throw new ModelError(
        `DeepSeek API error (${response.status}): ${errorText}`,
        this.config.model,
        response.status
      );
    }

    return response;
  }

  private toModelResponse(data: unknown): ModelResponse {
    const parsed = CompletionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ModelError('No choices in response', this.config.model);
    }

    const choice = parsed.data.choices[0];
    const usage = parsed.data.usage;

    return {
      content: choice.message.content ?? '',
      reasoning: choice.message.reasoning_content ?? undefined,
      finishReason: choice.finish_reason ?? undefined,
      usage: usage ? {
        promptTokens: usage.prompt_tokens || 0,
        completionTokens: usage.completion_tokens || 0,
        totalTokens: usage.total_tokens || 0,
      } : undefined,
    };
  }
}

function toWireMessage(message: Message): WireMessage {
  const wire: WireMessage = { role: message.role, content: message.content };
  if (message.isPrefix && message.role === 'assistant') {
    wire.prefix = true;
  }
  return wire;
}

/**
 * Factory function to create DeepSeek model instances
 */
export function createDeepSeekModel(config: DeepSeekConfig): DeepSeekModel {
  return new DeepSeekModel(config);
}
