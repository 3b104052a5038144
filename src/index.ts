/**
 * Ruminate - reasoning relay with in-thought code execution
 *
 * Main exports for programmatic usage
 */

export { ToolLoopOrchestrator, TurnState } from './core/tool-loop.js';
export type { TurnChunk, TurnContext, TurnPhase, TurnRequest, ToolLoopOptions, FinishReason } from './core/tool-loop.js';
export { ConfigManager, resolveConfig, validateForServing } from './core/config.js';
export type { RuminateConfig, StoredConfig } from './core/config.js';
export * from './core/prompts.js';

export { TagScanner, coalesce, rawText, DEFAULT_VOCABULARY } from './stream/tag-scanner.js';
export type { ScanEvent, Region, TagVocabulary } from './stream/tag-scanner.js';

export { DeepSeekModel, createDeepSeekModel } from './models/deepseek.js';
export type { DeepSeekConfig } from './models/deepseek.js';
export * from './models/base.js';

export type { ExecutionAdapter } from './tools/executor.js';
export { EMPTY_OUTPUT } from './tools/executor.js';
export { VmExecutor, VmNamespace } from './tools/vm-executor.js';

export { createApp, bootstrap, start } from './interfaces/http/index.js';

export { SseDecoder, encodeEvent, encodeDone, readSseStream, SSE_DONE } from './utils/sse.js';
export { logger, LogLevel } from './utils/logger.js';
export * from './utils/errors.js';
