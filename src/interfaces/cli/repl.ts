/**
 * REPL (Read-Eval-Print Loop) for interactive chat through a running relay
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import ora from 'ora';
import type { Message } from '../../models/base.js';
import { streamFromRelay } from './relay-client.js';
import { TranscriptRenderer } from './renderer.js';
import { errorMessage } from '../../utils/errors.js';

export interface REPLOptions {
  apiUrl: string;
}

export interface ReplyResult {
  answer: string;
  failed: boolean;
}

/**
 * Stream one reply to stdout. Returns the answer text for the history.
 */
export async function streamReply(apiUrl: string, history: Message[]): Promise<ReplyResult> {
  const spinner = ora('Thinking...').start();
  const renderer = new TranscriptRenderer();
  let started = false;
  let answer = '';
  let failed = false;

  const begin = () => {
    if (started) return;
    started = true;
    spinner.stop();
    process.stdout.write(chalk.bold.green('AI: '));
  };

  try {
    for await (const event of streamFromRelay(apiUrl, history)) {
      begin();
      if (event.type === 'error') {
        failed = true;
        process.stdout.write(chalk.red(`\n✗ Error: ${event.message}`));
        continue;
      }
      answer += event.delta.answerText ?? '';
      process.stdout.write(renderer.render(event.delta));
    }
    begin();
    process.stdout.write(`${renderer.finish()}\n\n`);
  } catch (error) {
    spinner.stop();
    failed = true;
    console.log(chalk.red('\n✗ Request error:'), errorMessage(error));
    console.log('');
  }

  return { answer, failed };
}

export async function startREPL(options: REPLOptions): Promise<void> {
  console.log(chalk.bold.cyan('\nRuminate - Interactive Mode\n'));
  console.log(chalk.gray('A reasoning model that can run JavaScript while it thinks.'));
  console.log(chalk.gray('Type your message and press Enter. Type /help for commands or /exit to quit.\n'));
  console.log(chalk.gray(`Relay: ${options.apiUrl}\n`));

  const history: Message[] = [];

  // REPL loop
  while (true) {
    const { message } = await inquirer.prompt<{ message: string }>([
      {
        type: 'input',
        name: 'message',
        message: chalk.bold.blue('You:'),
        prefix: '',
      },
    ]);

    const trimmedMessage = message.trim();

    // Handle commands with / prefix
    if (trimmedMessage.startsWith('/')) {
      const command = trimmedMessage.substring(1).toLowerCase();

      if (command === 'exit' || command === 'quit') {
        console.log(chalk.gray('\nBye!\n'));
        break;
      }

      if (command === 'help') {
        showHelp();
        continue;
      }

      if (command === 'clear') {
        history.length = 0;
        console.clear();
        console.log(chalk.yellow('✓ Context cleared\n'));
        continue;
      }

      // Unknown command
      console.log(chalk.red(`\n✗ Unknown command: /${command}`));
      console.log(chalk.gray('Type /help for available commands\n'));
      continue;
    }

    if (!trimmedMessage) {
      continue;
    }

    history.push({ role: 'user', content: trimmedMessage });
    const reply = await streamReply(options.apiUrl, history);

    if (reply.failed && !reply.answer) {
      // Keep the history answerable: drop the question that got no reply
      history.pop();
      continue;
    }
    history.push({ role: 'assistant', content: reply.answer });
  }
}

function showHelp() {
  console.log(chalk.bold('\nAvailable Commands:'));
  console.log('  /clear         - Reset conversation');
  console.log('  /exit, /quit   - Exit the REPL');
  console.log('  /help          - Show this help message');
  console.log('');
}
