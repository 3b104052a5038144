/**
 * Example: Programmatic Usage of Ruminate
 *
 * Runs one turn through the tool loop and prints the transcript as it streams.
 */

import {
  ToolLoopOrchestrator,
  VmExecutor,
  createDeepSeekModel,
  logger,
  LogLevel,
} from '../src/index.js';

async function main() {
  logger.setLogLevel(LogLevel.DEBUG);

  // 1. Upstream model (prefix completion lives on the beta endpoint)
  const model = createDeepSeekModel({
    endpoint: 'https://api.deepseek.com/beta/chat/completions',
    apiKey: process.env.DEEPSEEK_API_KEY || 'your-api-key-here',
    model: 'deepseek-reasoner',
  });

  // 2. Tool loop with a JavaScript executor
  const orchestrator = new ToolLoopOrchestrator({
    model,
    executor: new VmExecutor({ timeoutMs: 2000 }),
    options: { maxExecutions: 4 },
  });

  // 3. Stream one turn
  const turn = orchestrator.runTurn({
    conversation: [],
    userMessage: { role: 'user', content: 'What is the 20th Fibonacci number?' },
  });

  for await (const chunk of turn) {
    if (chunk.type === 'delta') {
      process.stdout.write(chunk.delta.reasoningText ?? chunk.delta.answerText ?? '');
    } else if (chunk.type === 'error') {
      console.error(`\nError: ${chunk.message}`);
    }
  }
  process.stdout.write('\n');
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
