/**
 * Response Generation Prompt
 */

import type { IHistoryEntry } from '../../../domain/conversation/turn.js';

/** Number of history entries embedded in the reply prompt */
export const REPLY_HISTORY_LIMIT = 5;

export function formatHistoryEntry(entry: IHistoryEntry): string {
  return `${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.content}`;
}

export function buildResponsePrompt(
  history: IHistoryEntry[],
  input: string,
  attributes: Record<string, string>
): string {
  const historyText = history
    .slice(-REPLY_HISTORY_LIMIT)
    .map(entry => `${formatHistoryEntry(entry)}\n`)
    .join('');

  const names = Object.keys(attributes);
  const attributesText = names.length > 0
    ? `\n<User Attribute Information>\n${names.map(name => `- ${name}: ${attributes[name]}\n`).join('')}</User Attribute Information>\n`
    : '';

  return `You are a helpful assistant.
Please generate an appropriate response considering the user's attribute information.
${attributesText}
<Conversation History>
${historyText}
</Conversation History>

<User Input>
${input}
</User Input>

Response:`;
}
