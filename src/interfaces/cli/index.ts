#!/usr/bin/env node

/**
 * Ruminate CLI Entry Point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { ConfigManager } from '../../core/config.js';
import { start } from '../http/index.js';
import { runSetupWizard, showConfiguration } from './setup-wizard.js';
import { startREPL, streamReply } from './repl.js';
import { logger, LogLevel, parseLogLevel } from '../../utils/logger.js';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../../../package.json'), 'utf-8')
);

dotenv.config();

const configManager = ConfigManager.getInstance();

const program = new Command();

program
  .name('ruminate')
  .description('Reasoning-model relay that runs JavaScript inside the chain of thought')
  .version(packageJson.version);

program
  .command('serve')
  .description('Start the OpenAI-compatible relay')
  .option('-p, --port <number>', 'Port to listen on', parseInt)
  .option('-H, --host <host>', 'Interface to bind')
  .option('--no-tools', 'Relay streams without the code-execution loop')
  .option('--debug', 'Enable debug logging')
  .action(async (options: { port?: number; host?: string; tools: boolean; debug?: boolean }) => {
    try {
      const config = configManager.load();
      if (options.port !== undefined) config.server.port = options.port;
      if (options.host) config.server.host = options.host;
      if (!options.tools) config.toolLoop.enabled = false;

      logger.setLogLevel(options.debug || config.debug ? LogLevel.DEBUG : parseLogLevel(process.env.LOG_LEVEL));
      await start(config);
    } catch (error) {
      logger.error('Failed to start relay', error);
      process.exit(1);
    }
  });

program
  .command('chat')
  .description('Start interactive chat against a running relay')
  .option('-u, --url <url>', 'Relay chat-completions URL')
  .option('--debug', 'Enable debug logging')
  .action(async (options: { url?: string; debug?: boolean }) => {
    try {
      const config = configManager.load();
      logger.setLogLevel(options.debug || config.debug ? LogLevel.DEBUG : LogLevel.WARN);
      await startREPL({ apiUrl: options.url ?? config.client.apiUrl });
    } catch (error) {
      logger.error('Chat session failed', error);
      process.exit(1);
    }
  });

program
  .command('ask')
  .description('Send a single prompt to a running relay')
  .argument('<prompt>', 'Prompt to send')
  .option('-u, --url <url>', 'Relay chat-completions URL')
  .action(async (prompt: string, options: { url?: string }) => {
    try {
      const config = configManager.load();
      logger.setLogLevel(config.debug ? LogLevel.DEBUG : LogLevel.WARN);
      const reply = await streamReply(options.url ?? config.client.apiUrl, [{ role: 'user', content: prompt }]);
      if (reply.failed) process.exitCode = 1;
    } catch (error) {
      logger.error('Request failed', error);
      process.exit(1);
    }
  });

program
  .command('config')
  .description('Configure the upstream model and tool loop')
  .option('--show', 'Print the effective configuration')
  .option('--reset', 'Clear the stored configuration')
  .action(async (options: { show?: boolean; reset?: boolean }) => {
    try {
      if (options.reset) {
        configManager.reset();
        console.log(chalk.yellow('✓ Configuration cleared'));
        return;
      }
      if (options.show) {
        showConfiguration(configManager.load(), configManager.getConfigPath());
        return;
      }
      await runSetupWizard(configManager);
    } catch (error) {
      logger.error('Configuration update failed', error);
      process.exit(1);
    }
  });

program.parseAsync().catch(error => {
  logger.error('Command failed', error);
  process.exit(1);
});
