/**
 * Prompt material for the tool loop: the instruction appended to the user's
 * message and the seed that opens the assistant's reasoning.
 */

import type { Message } from '../models/base.js';
import { CODE_TAG, OUTPUT_TAG, REASONING_END_MARKER, openTag, closeTag } from '../stream/tag-scanner.js';

export const REASONING_START_MARKER = '<think>';

export const TOOL_INSTRUCTIONS = `While you reason, you can run JavaScript. Write the code between ${openTag(CODE_TAG)} and ${closeTag(CODE_TAG)} inside your thinking and stop; the printed result is inserted between ${openTag(OUTPUT_TAG)} and ${closeTag(OUTPUT_TAG)} and you continue from there.

Rules:
1. Use print(...) or console.log(...) to show values; a bare expression shows its own value
2. Variables and functions persist between blocks in the same answer
3. Never write ${openTag(OUTPUT_TAG)} blocks yourself
4. Use code for arithmetic, data handling and checking your work
5. Close your reasoning with ${REASONING_END_MARKER}, then give the final answer without code tags`;

/**
 * Opening of every reasoning section: a short worked example so the model
 * picks up the convention before it starts on the real question.
 */
export const DEFAULT_SEED = `${REASONING_START_MARKER}
I can run JavaScript while thinking. Quick check that it works:
${openTag(CODE_TAG)}
print(1 + 1)
${closeTag(CODE_TAG)}
${openTag(OUTPUT_TAG)}
2
${closeTag(OUTPUT_TAG)}
Good, the tool works. Now to the actual question.
`;

export function formatOutputBlock(output: string): string {
  return `\n${openTag(OUTPUT_TAG)}\n${output}\n${closeTag(OUTPUT_TAG)}\n`;
}

/**
 * Outgoing message list for one sub-request. The instruction is appended to
 * the latest user message and the trailing assistant message carries the
 * prefix the model continues from.
 */
export function buildTurnMessages(
  conversation: readonly Message[],
  userMessage: Message,
  prefix: string,
  instructions: string = TOOL_INSTRUCTIONS
): Message[] {
  const history = conversation
    .filter(message => !message.isPrefix)
    .map(({ role, content }) => ({ role, content }));

  return [
    ...history,
    { role: 'user', content: `${userMessage.content}\n\n${instructions}` },
    { role: 'assistant', content: prefix, isPrefix: true },
  ];
}
