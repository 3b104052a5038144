/**
 * Base model interfaces and types
 */

export type Role = 'system' | 'user' | 'assistant';

export interface Message {
  role: Role;
  content: string;
  /**
   * Marks a partial assistant message that seeds continuation instead of
   * closing a turn. Only meaningful on the trailing assistant message.
   */
  isPrefix?: boolean;
}

/**
 * One incremental unit of model output. Upstream clients produce these per
 * network event and the relay forwards them to its own clients.
 */
export interface Delta {
  reasoningText?: string;
  answerText?: string;
}

export interface ModelResponse {
  content: string;
  reasoning?: string;
  finishReason?: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface ChatCompletionOptions {
  model?: string;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Upstream client contract: one request per call, a finite stream of deltas
 * that either ends or throws.
 */
export interface IStreamingModel {
  readonly name: string;
  streamChat(options: ChatCompletionOptions): AsyncIterable<Delta>;
  chat(options: ChatCompletionOptions): Promise<ModelResponse>;
}

export function hasText(delta: Delta): boolean {
  return Boolean(delta.reasoningText) || Boolean(delta.answerText);
}
