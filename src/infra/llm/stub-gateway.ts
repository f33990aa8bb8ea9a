import type { LLMTaskKind } from '../../domain/audit/types.js';
import { DEFAULT_ANSWER_VOCABULARY } from '../../domain/conversation/language.js';
import type { IAnswerVocabulary } from '../../domain/conversation/language.js';
import { BaseLLMGateway } from './llm-gateway.js';
import type { BaseGatewayOptions, GenerateResult } from './llm-gateway.js';
import { defaultExtract, defaultJudge, parseExtraction } from './gateway-behaviors.js';

export const STUB_PLACEHOLDER_REPLY = 'This is a stub response.';

export type StubCall =
  | { type: 'generate'; taskKind: LLMTaskKind; prompt: string; attributeName?: string }
  | { type: 'judge'; question: string; input: string; attributeName?: string }
  | { type: 'extract'; instruction: string; input: string; attributeName?: string };

export interface StubGatewayOptions extends BaseGatewayOptions {
  vocabulary?: IAnswerVocabulary;
}

const TRANSLATION_SOURCE = /<([^>\n]+) Text>\n([\s\S]*)\n<\/\1 Text>/;

/**
 * Deterministic gateway with pre-programmed answers.
 *
 * Judgment and extraction rules are keyed by attribute name; calls without
 * a matching rule run the template behaviors against this stub's own
 * `generate`, which answers "no" to judgments and the sentinel to
 * extractions. Replies are served from a queue, then a fixed placeholder.
 * Translations are served from their own queue, then echo the source text.
 */
export class StubLLMGateway extends BaseLLMGateway {
  readonly model = 'stub';
  readonly calls: StubCall[] = [];

  private judgmentRules = new Map<string, boolean>();
  private extractionRules = new Map<string, string | null>();
  private replies: string[] = [];
  private translations: string[] = [];
  private vocabulary: IAnswerVocabulary;

  constructor(options: StubGatewayOptions = {}) {
    super(options);
    this.vocabulary = options.vocabulary ?? DEFAULT_ANSWER_VOCABULARY;
  }

  getName(): string {
    return 'stub';
  }

  setJudgment(attributeName: string, required: boolean): this {
    this.judgmentRules.set(attributeName, required);
    return this;
  }

  /** A null rule means "nothing to extract" */
  setExtraction(attributeName: string, content: string | null): this {
    this.extractionRules.set(attributeName, content);
    return this;
  }

  addReply(text: string): this {
    this.replies.push(text);
    return this;
  }

  addTranslation(text: string): this {
    this.translations.push(text);
    return this;
  }

  reset(): void {
    this.judgmentRules.clear();
    this.extractionRules.clear();
    this.replies = [];
    this.translations = [];
    this.calls.length = 0;
  }

  async judge(question: string, input: string, attributeName?: string): Promise<boolean> {
    this.calls.push({ type: 'judge', question, input, attributeName });

    const rule = this.findRule(this.judgmentRules, question, attributeName);
    if (rule !== undefined) {
      return rule;
    }
    return defaultJudge(this, question, input, attributeName, this.vocabulary);
  }

  async extract(instruction: string, input: string, attributeName?: string): Promise<string | null> {
    this.calls.push({ type: 'extract', instruction, input, attributeName });

    const rule = this.findRule(this.extractionRules, instruction, attributeName);
    if (rule !== undefined) {
      return rule === null ? null : parseExtraction(rule, this.vocabulary);
    }
    return defaultExtract(this, instruction, input, attributeName, this.vocabulary);
  }

  protected async send(prompt: string, taskKind: LLMTaskKind, attributeName?: string): Promise<GenerateResult> {
    this.calls.push({ type: 'generate', taskKind, prompt, attributeName });

    switch (taskKind) {
      case 'judgment':
        return { text: 'no' };
      case 'extraction':
        return { text: this.vocabulary.nothingSentinels[0] };
      case 'translation_to_pivot':
      case 'translation_to_display':
        return { text: this.translations.shift() ?? this.translationSource(prompt) };
      case 'response':
      case 'general':
        return { text: this.replies.shift() ?? STUB_PLACEHOLDER_REPLY };
    }
  }

  /**
   * Rules match on the attribute name when one is given, otherwise on the
   * rule key appearing in the prompt fragment.
   */
  private findRule<T>(rules: Map<string, T>, fragment: string, attributeName?: string): T | undefined {
    if (attributeName !== undefined && rules.has(attributeName)) {
      return rules.get(attributeName);
    }
    for (const [key, value] of rules) {
      if (fragment.includes(key)) {
        return value;
      }
    }
    return undefined;
  }

  private translationSource(prompt: string): string {
    const match = TRANSLATION_SOURCE.exec(prompt);
    return match ? match[2] : prompt;
  }
}
