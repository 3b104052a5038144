/**
 * Tool-Loop Orchestrator
 *
 * Turns one client turn into as many upstream sub-requests as the model's
 * reasoning needs. Each sub-request continues from `prefix`; when a code block
 * closes, the block is executed, its output is spliced into `prefix` and the
 * sub-request is abandoned for a fresh one. Everything forwarded downstream is
 * taken from `prefix` past the `alreadySent` cursor, so no text goes out twice.
 */

import { randomUUID } from 'crypto';
import type { Delta, IStreamingModel, Message } from '../models/base.js';
import type { ExecutionAdapter } from '../tools/executor.js';
import { TagScanner, CODE_TAG, REASONING_END } from '../stream/tag-scanner.js';
import { DEFAULT_SEED, TOOL_INSTRUCTIONS, buildTurnMessages, formatOutputBlock } from './prompts.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type TurnPhase =
  | 'requesting'
  | 'streaming'
  | 'executing'
  | 'restarting'
  | 'forwarding'
  | 'done'
  | 'failed';

export type FinishReason = 'stop' | 'cancelled';

export type TurnChunk =
  | { type: 'delta'; delta: Delta }
  | { type: 'done'; finishReason: FinishReason }
  | { type: 'error'; message: string };

export interface TurnRequest {
  /** Messages before the one being answered. */
  conversation: Message[];
  userMessage: Message;
}

export interface ToolLoopOptions {
  /** Code blocks executed per turn; later blocks pass through as text. */
  maxExecutions?: number;
  temperature?: number;
  maxTokens?: number;
  seed?: string;
  instructions?: string;
}

/**
 * Everything one turn works with. Created per turn and dropped with it; the
 * namespace is the only state that survives restarts.
 */
export interface TurnContext<N> {
  readonly id: string;
  readonly model: IStreamingModel;
  readonly executor: ExecutionAdapter<N>;
  readonly namespace: N;
}

/**
 * `alreadySent` is always a prefix of `prefix`; both only grow.
 */
export class TurnState {
  private text: string;
  private sentLength: number;
  thinkingOpen = true;
  /** The upstream has sent reasoning apart from answer text. */
  reasoningSeen = false;
  executions = 0;
  restarts = 0;
  phase: TurnPhase = 'requesting';

  constructor(seed: string) {
    this.text = seed;
    // The seed is ours, not the model's: the client never sees it
    this.sentLength = seed.length;
  }

  get prefix(): string {
    return this.text;
  }

  get alreadySent(): string {
    return this.text.slice(0, this.sentLength);
  }

  append(text: string): void {
    this.text += text;
  }

  /** Claim everything past the cursor for forwarding. */
  takeUnsent(): string {
    const unsent = this.text.slice(this.sentLength);
    this.sentLength = this.text.length;
    return unsent;
  }

  /** Append text that is part of the transcript but never forwarded. */
  appendSilently(text: string): void {
    if (this.sentLength !== this.text.length) {
      throw new Error('Unsent text must be forwarded before appending silently');
    }
    this.text += text;
    this.sentLength = this.text.length;
  }
}

type SubRequestOutcome = 'restart' | 'finished';

interface ToolLoopConfig<N> {
  model: IStreamingModel;
  executor: ExecutionAdapter<N>;
  options?: ToolLoopOptions;
}

export class ToolLoopOrchestrator<N> {
  private model: IStreamingModel;
  private executor: ExecutionAdapter<N>;
  private maxExecutions: number;
  private options: ToolLoopOptions;

  constructor(config: ToolLoopConfig<N>) {
    this.model = config.model;
    this.executor = config.executor;
    this.options = config.options ?? {};
    this.maxExecutions = this.options.maxExecutions ?? 8;
  }

  createContext(): TurnContext<N> {
    return {
      id: randomUUID().slice(0, 8),
      model: this.model,
      executor: this.executor,
      namespace: this.executor.createNamespace(),
    };
  }

  async *runTurn(request: TurnRequest, signal?: AbortSignal): AsyncGenerator<TurnChunk> {
    const context = this.createContext();
    const state = new TurnState(this.options.seed ?? DEFAULT_SEED);

    logger.debug(`[ToolLoop] Turn ${context.id} started (${request.conversation.length} prior messages)`);

    try {
      for (;;) {
        if (signal?.aborted) {
          this.transition(context, state, 'done');
          yield { type: 'done', finishReason: 'cancelled' };
          return;
        }

        this.transition(context, state, 'requesting');
        const messages = buildTurnMessages(
          request.conversation,
          request.userMessage,
          state.prefix,
          this.options.instructions ?? TOOL_INSTRUCTIONS
        );

        const controller = new AbortController();
        const cancel = () => controller.abort();
        signal?.addEventListener('abort', cancel, { once: true });

        let outcome: SubRequestOutcome;
        try {
          outcome = yield* this.streamSubRequest(context, state, messages, controller.signal);
        } catch (error) {
          if (signal?.aborted) {
            this.transition(context, state, 'done');
            yield { type: 'done', finishReason: 'cancelled' };
            return;
          }
          this.transition(context, state, 'failed');
          logger.error(`[ToolLoop] Turn ${context.id} failed`, error);
          yield { type: 'error', message: errorMessage(error) };
          return;
        } finally {
          // Drops the in-flight connection before anything else is issued
          controller.abort();
          signal?.removeEventListener('abort', cancel);
        }

        if (outcome === 'finished') {
          this.transition(context, state, 'done');
          yield { type: 'done', finishReason: 'stop' };
          return;
        }

        state.restarts++;
        this.transition(context, state, 'restarting');
      }
    } finally {
      this.executor.releaseNamespace(context.namespace);
      logger.debug(
        `[ToolLoop] Turn ${context.id} ended in ${state.phase} ` +
        `(${state.executions} executions, ${state.restarts} restarts)`
      );
    }
  }

  /**
   * One upstream request. Returns 'restart' when the prefix moved on and the
   * request must be re-issued, 'finished' when the upstream ran out.
   */
  private async *streamSubRequest(
    context: TurnContext<N>,
    state: TurnState,
    messages: Message[],
    signal: AbortSignal
  ): AsyncGenerator<TurnChunk, SubRequestOutcome> {
    this.transition(context, state, state.thinkingOpen ? 'streaming' : 'forwarding');

    const scanner = new TagScanner();
    // Offset in prefix where the source of the open code block starts
    let codeStart = -1;

    const stream = context.model.streamChat({
      messages,
      signal,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });

    for await (const delta of stream) {
      if (!state.thinkingOpen) {
        yield { type: 'delta', delta };
        continue;
      }

      if (delta.reasoningText) state.reasoningSeen = true;
      // Answer text from an upstream that streams reasoning separately ends the
      // reasoning implicitly; otherwise the answer field carries the prefix continuation
      const answerText = state.reasoningSeen ? delta.answerText : undefined;
      const text = answerText
        ? delta.reasoningText ?? ''
        : (delta.reasoningText ?? '') + (delta.answerText ?? '');

      for (const event of scanner.feed(text)) {
        if (event.type === 'text') {
          state.append(event.text);
          continue;
        }

        if (event.type === 'marker') {
          if (event.name !== REASONING_END || codeStart >= 0) {
            state.append(event.raw);
            continue;
          }
          yield* this.forward(state);
          state.appendSilently(event.raw);
          state.thinkingOpen = false;
          logger.debug(`[ToolLoop] Turn ${context.id} closed its reasoning`);
          return 'restart';
        }

        state.append(event.raw);
        if (event.name !== CODE_TAG) continue;

        if (!event.closing) {
          codeStart = state.prefix.length;
          continue;
        }
        if (codeStart < 0) continue;

        const source = state.prefix.slice(codeStart, state.prefix.length - event.raw.length);
        codeStart = -1;

        if (state.executions >= this.maxExecutions) {
          logger.warn(`[ToolLoop] Turn ${context.id} hit the execution limit (${this.maxExecutions}); passing code through`);
          continue;
        }

        this.transition(context, state, 'executing');
        const output = context.executor.execute(source, context.namespace);
        state.executions++;
        state.append(formatOutputBlock(output));

        yield* this.forward(state);
        return 'restart';
      }

      if (answerText) {
        for (const event of scanner.flush()) {
          if (event.type === 'text') state.append(event.text);
        }
        yield* this.forward(state);
        state.thinkingOpen = false;
        this.transition(context, state, 'forwarding');
        logger.debug(`[ToolLoop] Turn ${context.id} moved to the answer without an end marker`);
        yield { type: 'delta', delta: { answerText } };
        continue;
      }

      // Code is held back until its block closes
      if (codeStart < 0) {
        yield* this.forward(state);
      }
    }

    if (state.thinkingOpen) {
      for (const event of scanner.flush()) {
        if (event.type === 'text') state.append(event.text);
      }
      yield* this.forward(state);
    }

    return 'finished';
  }

  private *forward(state: TurnState): Generator<TurnChunk> {
    const unsent = state.takeUnsent();
    if (unsent) {
      yield { type: 'delta', delta: { reasoningText: unsent } };
    }
  }

  private transition(context: TurnContext<N>, state: TurnState, next: TurnPhase): void {
    if (state.phase === next) return;
    logger.debug(`[ToolLoop] Turn ${context.id}: ${state.phase} -> ${next}`);
    state.phase = next;
  }
}
