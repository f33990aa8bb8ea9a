/**
 * Translation Prompt
 */

import type { IHistoryEntry } from '../../../domain/conversation/turn.js';
import { formatHistoryEntry } from './response-generation.js';

/** Number of prior turns given to the translator for disambiguation */
export const TRANSLATION_CONTEXT_LIMIT = 2;

export function buildTranslationPrompt(
  text: string,
  fromLanguage: string,
  toLanguage: string,
  context?: IHistoryEntry[]
): string {
  let contextText = '';
  if (context && context.length > 0) {
    const lines = context
      .slice(-TRANSLATION_CONTEXT_LIMIT)
      .map(entry => `${formatHistoryEntry(entry)}\n`)
      .join('');
    contextText = `\n<Recent Conversation Context>\n${lines}</Recent Conversation Context>\n\n`;
  }

  return `Translate the ${fromLanguage} text to ${toLanguage}. Output only the translation.
${contextText}
<${fromLanguage} Text>
${text}
</${fromLanguage} Text>`;
}
