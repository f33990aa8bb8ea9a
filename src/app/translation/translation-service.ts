import type { LLMTaskKind } from '../../domain/audit/types.js';
import { DEFAULT_DISPLAY_LANGUAGE, DEFAULT_PIVOT_LANGUAGE, LANGUAGES } from '../../domain/conversation/language.js';
import type { LanguageCode } from '../../domain/conversation/language.js';
import type { IHistoryEntry } from '../../domain/conversation/turn.js';
import { buildTranslationPrompt } from '../../infra/conversation/prompts/translation.js';
import type { ILLMGateway } from '../../infra/llm/llm-gateway.js';

export interface TranslationLanguages {
  /** Working language of judgment, extraction and reply generation */
  pivot: LanguageCode;
  /** Language the user writes in and reads replies in */
  display: LanguageCode;
}

/**
 * Translates between the display and pivot languages through the gateway's
 * `generate`. Direction is always chosen by the caller.
 */
export class TranslationService {
  readonly languages: TranslationLanguages;

  constructor(
    private gateway: ILLMGateway,
    languages: Partial<TranslationLanguages> = {}
  ) {
    this.languages = {
      pivot: languages.pivot ?? DEFAULT_PIVOT_LANGUAGE,
      display: languages.display ?? DEFAULT_DISPLAY_LANGUAGE,
    };
  }

  toPivot(text: string, context?: IHistoryEntry[]): Promise<string> {
    return this.translate(text, this.languages.display, this.languages.pivot, 'translation_to_pivot', context);
  }

  toDisplay(text: string, context?: IHistoryEntry[]): Promise<string> {
    return this.translate(text, this.languages.pivot, this.languages.display, 'translation_to_display', context);
  }

  private async translate(
    text: string,
    from: LanguageCode,
    to: LanguageCode,
    taskKind: LLMTaskKind,
    context?: IHistoryEntry[]
  ): Promise<string> {
    const prompt = buildTranslationPrompt(text, LANGUAGES[from].name, LANGUAGES[to].name, context);
    const response = await this.gateway.generate(prompt, taskKind);
    return response.text.trim();
  }
}
