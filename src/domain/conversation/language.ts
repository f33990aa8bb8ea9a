/**
 * Language profiles used by translation and by the yes/no and
 * nothing-to-extract heuristics.
 */

export type LanguageCode = 'en' | 'ja';

export interface ILanguageProfile {
  code: LanguageCode;
  /** English name used inside translation prompts */
  name: string;
  affirmative: string;
  negative: string;
  /** Word the model answers with when there is nothing to extract */
  nothing: string;
}

export const LANGUAGES: Record<LanguageCode, ILanguageProfile> = {
  en: { code: 'en', name: 'English', affirmative: 'yes', negative: 'no', nothing: 'none' },
  ja: { code: 'ja', name: 'Japanese', affirmative: 'はい', negative: 'いいえ', nothing: 'なし' },
};

export const DEFAULT_PIVOT_LANGUAGE: LanguageCode = 'en';
export const DEFAULT_DISPLAY_LANGUAGE: LanguageCode = 'ja';

export function isLanguageCode(value: unknown): value is LanguageCode {
  return value === 'en' || value === 'ja';
}

/**
 * Tokens accepted by the judgment and extraction heuristics, covering both
 * the pivot and the display language.
 */
export interface IAnswerVocabulary {
  affirmativeTokens: string[];
  nothingSentinels: string[];
}

export function buildAnswerVocabulary(
  pivot: LanguageCode = DEFAULT_PIVOT_LANGUAGE,
  display: LanguageCode = DEFAULT_DISPLAY_LANGUAGE
): IAnswerVocabulary {
  const profiles = pivot === display ? [LANGUAGES[pivot]] : [LANGUAGES[pivot], LANGUAGES[display]];
  return {
    affirmativeTokens: profiles.map(p => p.affirmative.toLowerCase()),
    nothingSentinels: profiles.map(p => p.nothing.toLowerCase()),
  };
}

export const DEFAULT_ANSWER_VOCABULARY: IAnswerVocabulary = buildAnswerVocabulary();
