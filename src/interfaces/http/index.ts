#!/usr/bin/env node
/**
 * HTTP Interface for Ruminate
 *
 * OpenAI-compatible chat-completions relay. Streaming requests run through the
 * tool loop so the model can execute code while it reasons.
 *
 * Usage:
 *   - ruminate serve
 *   - Local dev: npm run serve
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import { createServer, Server as HttpServer } from 'http';
import dotenv from 'dotenv';
import { logger, LogLevel, parseLogLevel } from '../../utils/logger.js';
import { ConfigManager, RuminateConfig, validateForServing } from '../../core/config.js';
import { ToolLoopOrchestrator } from '../../core/tool-loop.js';
import { createDeepSeekModel } from '../../models/deepseek.js';
import type { IStreamingModel } from '../../models/base.js';
import { buildErrorPayload } from '../../models/completion-chunk.js';
import { VmExecutor } from '../../tools/vm-executor.js';
import { setupHealthRoutes } from './routes/health.js';
import { setupChatRoutes } from './routes/chat.js';

export interface AppDependencies<N> {
  model: IStreamingModel;
  orchestrator?: ToolLoopOrchestrator<N>;
  allowedOrigins: string[];
}

export function createApp<N>(deps: AppDependencies<N>): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10mb' }));

  // CORS ('*' allows every origin)
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    const allowAll = deps.allowedOrigins.includes('*');
    if (allowAll || (origin && deps.allowedOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', allowAll ? '*' : origin ?? '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    }
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  setupHealthRoutes(app, { model: deps.model.name, toolLoop: Boolean(deps.orchestrator) });
  setupChatRoutes(app, { model: deps.model, orchestrator: deps.orchestrator });

  // Error handling
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json(buildErrorPayload('Invalid JSON'));
      return;
    }
    if (res.headersSent) {
      next(err);
      return;
    }
    logger.error('[HTTP] Unhandled error:', err);
    res.status(500).json(buildErrorPayload(err.message));
  });

  return app;
}

export function bootstrap(config: RuminateConfig): { app: Express; server: HttpServer } {
  validateForServing(config);

  const model = createDeepSeekModel({
    endpoint: config.upstream.endpoint,
    apiKey: config.upstream.apiKey,
    model: config.upstream.model,
    temperature: config.upstream.temperature,
    maxTokens: config.upstream.maxTokens,
  });

  const orchestrator = config.toolLoop.enabled
    ? new ToolLoopOrchestrator({
        model,
        executor: new VmExecutor({ timeoutMs: config.toolLoop.executionTimeoutMs }),
        options: {
          maxExecutions: config.toolLoop.maxExecutions,
          temperature: config.upstream.temperature,
          maxTokens: config.upstream.maxTokens,
        },
      })
    : undefined;

  const app = createApp({ model, orchestrator, allowedOrigins: config.server.allowedOrigins });
  const server = createServer(app);
  return { app, server };
}

/**
 * Snippets can leave rejected promises behind that no block returns; log
 * them instead of letting the process exit. Returns the uninstaller.
 */
export function installProcessGuards(): () => void {
  const onRejection = (reason: unknown) => {
    logger.error('[HTTP] Unhandled rejection:', reason);
  };
  process.on('unhandledRejection', onRejection);
  return () => {
    process.off('unhandledRejection', onRejection);
  };
}

export async function start(config: RuminateConfig): Promise<HttpServer> {
  logger.info('[HTTP] Starting Ruminate relay...');
  installProcessGuards();
  logger.info(`[HTTP] Upstream: ${config.upstream.endpoint} (${config.upstream.model})`);
  logger.info(`[HTTP] Tool loop: ${config.toolLoop.enabled ? `on (max ${config.toolLoop.maxExecutions} executions)` : 'off'}`);

  const { server } = bootstrap(config);
  const { port, host } = config.server;

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info(`[HTTP] Server listening on ${host}:${port}`);
  logger.info(`[HTTP] Completions: http://${host}:${port}/v1/chat/completions`);

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`[HTTP] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      logger.info('[HTTP] Server closed');
      process.exit(0);
    });

    // Force exit after 10s
    setTimeout(() => {
      logger.error('[HTTP] Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return server;
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  dotenv.config();
  const config = ConfigManager.getInstance().load();
  logger.setLogLevel(config.debug ? LogLevel.DEBUG : parseLogLevel(process.env.LOG_LEVEL));
  start(config).catch(error => {
    logger.error('[HTTP] Failed to start server:', error);
    process.exit(1);
  });
}
