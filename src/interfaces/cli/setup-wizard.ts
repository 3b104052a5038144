/**
 * Setup Wizard for the upstream and tool-loop configuration
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { ConfigManager, DEFAULT_ENDPOINT, DEFAULT_MODEL, RuminateConfig, maskSecret } from '../../core/config.js';
import { logger } from '../../utils/logger.js';

interface UpstreamAnswers {
  endpoint: string;
  apiKey: string;
  model: string;
}

interface ToolLoopAnswers {
  enabled: boolean;
  maxExecutions: number;
}

export async function runSetupWizard(configManager: ConfigManager = ConfigManager.getInstance()): Promise<void> {
  console.log(chalk.bold.cyan('\nRuminate Setup\n'));
  console.log('This wizard configures the upstream model and the code-execution loop.\n');

  const current = configManager.getStored();

  console.log(chalk.bold('Upstream Model'));
  console.log(chalk.gray('An OpenAI-compatible endpoint that supports assistant prefix completion.\n'));

  const upstream = await inquirer.prompt<UpstreamAnswers>([
    {
      type: 'input',
      name: 'endpoint',
      message: 'API Endpoint URL:',
      default: current.upstream?.endpoint ?? DEFAULT_ENDPOINT,
      validate: (input: string) => {
        try {
          new URL(input);
          return true;
        } catch {
          return 'Please enter a valid URL';
        }
      },
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'API Key:',
      validate: (input: string) => input.length > 0 || 'API key is required',
    },
    {
      type: 'input',
      name: 'model',
      message: 'Model name:',
      default: current.upstream?.model ?? DEFAULT_MODEL,
    },
  ]);

  configManager.setUpstream(upstream);
  logger.success('Upstream model configured');

  console.log(chalk.bold('\nCode Execution'));
  console.log(chalk.gray('Code written by the model runs on this machine with your privileges.\n'));

  const toolLoop = await inquirer.prompt<ToolLoopAnswers>([
    {
      type: 'confirm',
      name: 'enabled',
      message: 'Let the model run JavaScript while it reasons?',
      default: current.toolLoop?.enabled ?? true,
    },
    {
      type: 'number',
      name: 'maxExecutions',
      message: 'Maximum code blocks per answer:',
      default: current.toolLoop?.maxExecutions ?? 8,
      validate: (input: number) => (Number.isInteger(input) && input >= 0) || 'Enter a whole number',
    },
  ]);

  configManager.setToolLoop(toolLoop);
  logger.success('Tool loop configured');

  console.log(chalk.gray(`\nConfiguration saved to ${configManager.getConfigPath()}\n`));
}

export function showConfiguration(config: RuminateConfig, configPath: string): void {
  console.log(chalk.bold('\nEffective Configuration:'));
  console.log(`  Upstream:    ${config.upstream.endpoint}`);
  console.log(`  Model:       ${config.upstream.model}`);
  console.log(`  API key:     ${maskSecret(config.upstream.apiKey)}`);
  console.log(`  Listen:      ${config.server.host}:${config.server.port}`);
  console.log(`  Origins:     ${config.server.allowedOrigins.join(', ')}`);
  console.log(`  Tool loop:   ${config.toolLoop.enabled ? 'on' : 'off'} (max ${config.toolLoop.maxExecutions}, ${config.toolLoop.executionTimeoutMs}ms each)`);
  console.log(`  Client URL:  ${config.client.apiUrl}`);
  console.log(`  Debug:       ${config.debug}`);
  console.log(chalk.gray(`\n  Stored in ${configPath}\n`));
}
