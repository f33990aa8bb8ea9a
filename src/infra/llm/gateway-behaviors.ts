/**
 * Template behaviors layered on top of `generate`.
 *
 * A gateway may supply its own `judge`, `extract` or `generateReply`; the
 * `*With` dispatchers prefer those and otherwise fall back to the defaults
 * below.
 */

import type { IHistoryEntry } from '../../domain/conversation/turn.js';
import { DEFAULT_ANSWER_VOCABULARY } from '../../domain/conversation/language.js';
import type { IAnswerVocabulary } from '../../domain/conversation/language.js';
import { buildJudgmentPrompt } from '../conversation/prompts/attribute-judgment.js';
import { buildExtractionPrompt } from '../conversation/prompts/attribute-extraction.js';
import { buildResponsePrompt } from '../conversation/prompts/response-generation.js';
import type { ILLMGateway } from './llm-gateway.js';

/** Leading window searched for a "nothing found" sentinel */
export const SENTINEL_WINDOW = 10;

export function isAffirmative(answer: string, vocabulary: IAnswerVocabulary = DEFAULT_ANSWER_VOCABULARY): boolean {
  const normalized = answer.trim().toLowerCase();
  return vocabulary.affirmativeTokens.some(token => normalized.includes(token));
}

/**
 * Returns the extracted content, or null when the answer means "nothing".
 *
 * NOTE: the leading-window check also rejects genuine values that start
 * with sentinel-like text (e.g. "Nonet player").
 */
export function parseExtraction(
  answer: string,
  vocabulary: IAnswerVocabulary = DEFAULT_ANSWER_VOCABULARY
): string | null {
  const content = answer.trim();
  if (content === '') {
    return null;
  }

  const lowered = content.toLowerCase();
  const head = lowered.slice(0, SENTINEL_WINDOW);
  for (const sentinel of vocabulary.nothingSentinels) {
    if (lowered === sentinel || head.includes(sentinel)) {
      return null;
    }
  }
  return content;
}

// ============================================================================
// Defaults
// ============================================================================

export async function defaultJudge(
  gateway: ILLMGateway,
  question: string,
  input: string,
  attributeName?: string,
  vocabulary: IAnswerVocabulary = DEFAULT_ANSWER_VOCABULARY
): Promise<boolean> {
  const response = await gateway.generate(buildJudgmentPrompt(question, input), 'judgment', attributeName);
  return isAffirmative(response.text, vocabulary);
}

export async function defaultExtract(
  gateway: ILLMGateway,
  instruction: string,
  input: string,
  attributeName?: string,
  vocabulary: IAnswerVocabulary = DEFAULT_ANSWER_VOCABULARY
): Promise<string | null> {
  const prompt = buildExtractionPrompt(instruction, input, vocabulary.nothingSentinels[0]);
  const response = await gateway.generate(prompt, 'extraction', attributeName);
  return parseExtraction(response.text, vocabulary);
}

export async function defaultGenerateReply(
  gateway: ILLMGateway,
  window: IHistoryEntry[],
  input: string,
  attributes: Record<string, string>
): Promise<string> {
  const response = await gateway.generate(buildResponsePrompt(window, input, attributes), 'response');
  return response.text.trim();
}

// ============================================================================
// Dispatchers
// ============================================================================

export function judgeWith(
  gateway: ILLMGateway,
  question: string,
  input: string,
  attributeName?: string,
  vocabulary?: IAnswerVocabulary
): Promise<boolean> {
  if (gateway.judge) {
    return gateway.judge(question, input, attributeName);
  }
  return defaultJudge(gateway, question, input, attributeName, vocabulary);
}

export function extractWith(
  gateway: ILLMGateway,
  instruction: string,
  input: string,
  attributeName?: string,
  vocabulary?: IAnswerVocabulary
): Promise<string | null> {
  if (gateway.extract) {
    return gateway.extract(instruction, input, attributeName);
  }
  return defaultExtract(gateway, instruction, input, attributeName, vocabulary);
}

export function generateReplyWith(
  gateway: ILLMGateway,
  window: IHistoryEntry[],
  input: string,
  attributes: Record<string, string>
): Promise<string> {
  if (gateway.generateReply) {
    return gateway.generateReply(window, input, attributes);
  }
  return defaultGenerateReply(gateway, window, input, attributes);
}
