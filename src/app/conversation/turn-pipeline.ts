/**
 * Turn Pipeline
 * Runs one user message through translation, attribute judgment, reply
 * generation and attribute extraction, reporting progress as StepStatus
 * emissions.
 */

import { randomUUID } from 'node:crypto';

import type { IAttributeStore } from '../../domain/attribute/types.js';
import { buildAnswerVocabulary, DEFAULT_ANSWER_VOCABULARY } from '../../domain/conversation/language.js';
import type { IAnswerVocabulary } from '../../domain/conversation/language.js';
import { StepStatus } from '../../domain/conversation/turn.js';
import type { ExtractedAttribute, IChatTurn, IHistoryEntry, ITurnResult } from '../../domain/conversation/turn.js';
import { REPLY_HISTORY_LIMIT } from '../../infra/conversation/prompts/response-generation.js';
import { TRANSLATION_CONTEXT_LIMIT } from '../../infra/conversation/prompts/translation.js';
import { extractWith, generateReplyWith, judgeWith } from '../../infra/llm/gateway-behaviors.js';
import type { ILLMGateway } from '../../infra/llm/llm-gateway.js';
import type { TranslationService } from '../translation/translation-service.js';
import { debug } from '../../debug/index.js';

/** Receives every status emission, in both batch and streaming mode */
export type StatusSink = (status: StepStatus) => void;

export interface TurnPipelineOptions {
  store: IAttributeStore;
  gateway: ILLMGateway;
  translation?: TranslationService;
  statusSink?: StatusSink;
  /** Defaults to the tokens of the translation languages, or English and Japanese */
  vocabulary?: IAnswerVocabulary;
}

export interface ITurnPipeline {
  process(input: string): Promise<ITurnResult>;
  processStreaming(input: string): AsyncGenerator<StepStatus, ITurnResult, void>;
  history(): IChatTurn[];
  clearHistory(): void;
}

/**
 * Owns the in-memory chat history of one conversation. Turns must not
 * overlap: run one turn to completion (or failure) before starting the next.
 *
 * A failing stage leaves its status in `processing`; nothing already
 * appended to history or persisted to the store is undone.
 */
export class TurnPipeline implements ITurnPipeline {
  private turns: IChatTurn[] = [];
  private store: IAttributeStore;
  private gateway: ILLMGateway;
  private translation?: TranslationService;
  private statusSink?: StatusSink;
  private vocabulary: IAnswerVocabulary;

  constructor(options: TurnPipelineOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.translation = options.translation;
    this.statusSink = options.statusSink;
    this.vocabulary =
      options.vocabulary ??
      (options.translation
        ? buildAnswerVocabulary(options.translation.languages.pivot, options.translation.languages.display)
        : DEFAULT_ANSWER_VOCABULARY);
  }

  async process(input: string): Promise<ITurnResult> {
    const driver = this.drive(input);
    let step = await driver.next();
    while (!step.done) {
      step = await driver.next();
    }
    return step.value;
  }

  async *processStreaming(input: string): AsyncGenerator<StepStatus, ITurnResult, void> {
    return yield* this.drive(input);
  }

  history(): IChatTurn[] {
    return this.turns.map(turn => ({ ...turn }));
  }

  clearHistory(): void {
    this.turns = [];
  }

  /**
   * The single driver behind both modes. Yields a status after every
   * mutation: once when it starts processing and once when it completes.
   */
  private async *drive(input: string): AsyncGenerator<StepStatus, ITurnResult, void> {
    const turnId = randomUUID();
    const startedAt = Date.now();
    const statuses: StepStatus[] = [];
    let stage = 'start';

    const begin = (status: StepStatus): StepStatus => {
      statuses.push(status);
      stage = status.kind;
      return this.notify(status);
    };
    const finish = (status: StepStatus): StepStatus => {
      status.complete();
      return this.notify(status);
    };

    debug.setContext({ turnId });
    debug.turnStarted(turnId, input, this.translation !== undefined);

    try {
      // 1. Input translation
      let pivotInput = input;
      if (this.translation) {
        const status = StepStatus.start('input_translation');
        yield begin(status);
        const context = this.turns
          .slice(-TRANSLATION_CONTEXT_LIMIT)
          .filter(turn => turn.pivotContent !== undefined)
          .map(turn => ({ role: turn.role, content: turn.pivotContent ?? turn.content }));
        pivotInput = await this.translation.toPivot(input, context.length > 0 ? context : undefined);
        yield finish(status);
      }

      // 2. User turn
      stage = 'history';
      const priorTurns = [...this.turns];
      this.append('user', input, pivotInput);

      // 3. Judgment, with the latest value of every definition judged required
      stage = 'definitions';
      const definitions = this.store.listDefinitions();
      const usedAttributes: Record<string, string> = {};

      for (const definition of definitions) {
        const status = StepStatus.start('judgment', definition.name);
        yield begin(status);
        const required = await judgeWith(
          this.gateway,
          definition.judgmentPrompt,
          pivotInput,
          definition.name,
          this.vocabulary
        );
        yield finish(status);

        if (required) {
          const latest = this.store.latestValue(definition.id);
          if (latest) {
            usedAttributes[definition.name] = latest.content;
          }
        }
      }

      // 4. Reply
      const replyStatus = StepStatus.start('response');
      yield begin(replyStatus);
      const window = priorTurns.slice(-REPLY_HISTORY_LIMIT).map(turn => this.toEntry(turn));
      const pivotReply = await generateReplyWith(this.gateway, window, pivotInput, usedAttributes);
      yield finish(replyStatus);

      // 5. Output translation
      let reply = pivotReply;
      if (this.translation) {
        const status = StepStatus.start('output_translation');
        yield begin(status);
        const context = this.turns
          .slice(-TRANSLATION_CONTEXT_LIMIT)
          .map(turn => ({ role: turn.role, content: turn.pivotContent ?? turn.content }));
        reply = await this.translation.toDisplay(pivotReply, context);
        yield finish(status);
      }

      // 6. Assistant turn, then the reply is ready to show
      stage = 'history';
      this.append('assistant', reply, pivotReply);
      yield begin(StepStatus.responseReady(reply, usedAttributes));

      // 7. Extraction
      const extractedAttributes: ExtractedAttribute[] = [];
      for (const definition of definitions) {
        const status = StepStatus.start('attribute_extraction', definition.name);
        yield begin(status);
        const extracted = await extractWith(
          this.gateway,
          definition.extractionPrompt,
          pivotInput,
          definition.name,
          this.vocabulary
        );
        if (extracted !== null) {
          this.store.insertValue(definition.id, extracted);
          extractedAttributes.push([definition.name, extracted]);
        }
        yield finish(status);
      }

      debug.turnCompleted(turnId, {
        usedAttributes: Object.keys(usedAttributes),
        extractedAttributes: extractedAttributes.map(([name]) => name),
        statusCount: statuses.length,
        durationMs: Date.now() - startedAt,
      });

      return {
        responseText: reply,
        usedAttributes,
        extractedAttributes,
        statuses,
      };
    } catch (error) {
      debug.turnFailed(turnId, stage, error);
      throw error;
    } finally {
      debug.clearContext();
    }
  }

  private notify(status: StepStatus): StepStatus {
    debug.turnStep(status.kind, status.state, status.attributeName);
    this.statusSink?.(status);
    return status;
  }

  private append(role: IChatTurn['role'], content: string, pivotContent: string): void {
    this.turns.push({
      role,
      content,
      ...(this.translation ? { pivotContent } : {}),
      timestamp: Date.now(),
    });
  }

  private toEntry(turn: IChatTurn): IHistoryEntry {
    return {
      role: turn.role,
      content: this.translation ? turn.pivotContent ?? turn.content : turn.content,
    };
  }
}
