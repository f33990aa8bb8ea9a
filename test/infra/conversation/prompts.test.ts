import { buildJudgmentPrompt } from '../../../src/infra/conversation/prompts/attribute-judgment.js';
import { buildExtractionPrompt } from '../../../src/infra/conversation/prompts/attribute-extraction.js';
import { buildResponsePrompt } from '../../../src/infra/conversation/prompts/response-generation.js';
import { buildTranslationPrompt } from '../../../src/infra/conversation/prompts/translation.js';
import type { IHistoryEntry } from '../../../src/domain/conversation/turn.js';

describe('prompt templates', () => {
  it('embeds the judgment question and input', () => {
    const prompt = buildJudgmentPrompt('is profile needed?', 'I am an engineer');

    expect(prompt).toContain('<Judgment Question>\nis profile needed?\n</Judgment Question>');
    expect(prompt).toContain('<User Input>\nI am an engineer\n</User Input>');
    expect(prompt.endsWith("Answer (only 'yes' or 'no'):")).toBe(true);
  });

  it('names the sentinel in the extraction prompt', () => {
    const prompt = buildExtractionPrompt('extract profile', 'I am an engineer', 'なし');

    expect(prompt).toContain('<Extraction Instructions>\nextract profile\n</Extraction Instructions>');
    expect(prompt.endsWith("please respond with 'なし'.\nExtracted content:")).toBe(true);
  });

  describe('buildResponsePrompt', () => {
    it('omits the attribute section when there are no attributes', () => {
      expect(buildResponsePrompt([], 'Hello', {})).toBe(
        'You are a helpful assistant.\n' +
          "Please generate an appropriate response considering the user's attribute information.\n" +
          '\n' +
          '<Conversation History>\n' +
          '\n' +
          '</Conversation History>\n' +
          '\n' +
          '<User Input>\n' +
          'Hello\n' +
          '</User Input>\n' +
          '\n' +
          'Response:'
      );
    });

    it('lists attributes one per line', () => {
      const prompt = buildResponsePrompt([], 'Hello', { Profile: 'engineer', Skills: 'TypeScript' });

      expect(prompt).toContain(
        '\n<User Attribute Information>\n- Profile: engineer\n- Skills: TypeScript\n</User Attribute Information>\n'
      );
    });

    it('keeps only the five most recent history entries', () => {
      const history: IHistoryEntry[] = Array.from({ length: 7 }, (_, i): IHistoryEntry => ({
        role: i % 2 === 0 ? 'user' : 'assistant',
        content: `m${i + 1}`,
      }));

      const prompt = buildResponsePrompt(history, 'Hello', {});

      expect(prompt).toContain(
        '<Conversation History>\nUser: m3\nAssistant: m4\nUser: m5\nAssistant: m6\nUser: m7\n\n</Conversation History>'
      );
      expect(prompt).not.toContain('m1');
      expect(prompt).not.toContain('m2');
    });
  });

  describe('buildTranslationPrompt', () => {
    it('works without context', () => {
      expect(buildTranslationPrompt('こんにちは', 'Japanese', 'English')).toBe(
        'Translate the Japanese text to English. Output only the translation.\n' +
          '\n' +
          '<Japanese Text>\n' +
          'こんにちは\n' +
          '</Japanese Text>'
      );
    });

    it('includes at most the last two context turns', () => {
      const context: IHistoryEntry[] = [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
        { role: 'user', content: 'Bye' },
      ];

      expect(buildTranslationPrompt('こんにちは', 'Japanese', 'English', context)).toBe(
        'Translate the Japanese text to English. Output only the translation.\n' +
          '\n' +
          '<Recent Conversation Context>\n' +
          'Assistant: Hello\n' +
          'User: Bye\n' +
          '</Recent Conversation Context>\n' +
          '\n' +
          '\n' +
          '<Japanese Text>\n' +
          'こんにちは\n' +
          '</Japanese Text>'
      );
    });
  });
});
