/**
 * Typed emitters for every debug event the assistant produces.
 */

import { debugEmitter } from './emitter.js';
import type { DebugContext } from './types.js';

const MAX_TEXT_LENGTH = 4096;

function clip(text: string): string {
  return text.length > MAX_TEXT_LENGTH ? `${text.slice(0, MAX_TEXT_LENGTH)} [truncated]` : text;
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

export const debug = {
  setContext(ctx: DebugContext): void {
    debugEmitter.setContext(ctx);
  },

  getContext(): DebugContext {
    return debugEmitter.getContext();
  },

  clearContext(): void {
    debugEmitter.clearContext();
  },

  // turn-pipeline

  turnStarted(turnId: string, input: string, translated: boolean): void {
    debugEmitter.emitDebug('turn.started', 'turn-pipeline', { turnId, input: clip(input), translated });
  },

  /** Fired per status emission: once processing, once terminal */
  turnStep(kind: string, state: string, attributeName?: string): void {
    debugEmitter.emitDebug('turn.step', 'turn-pipeline', { kind, state, attributeName });
  },

  turnCompleted(
    turnId: string,
    summary: { usedAttributes: string[]; extractedAttributes: string[]; statusCount: number; durationMs: number }
  ): void {
    debugEmitter.emitDebug('turn.completed', 'turn-pipeline', { turnId, ...summary });
  },

  turnFailed(turnId: string, stage: string | undefined, error: unknown): void {
    debugEmitter.emitDebug('turn.failed', 'turn-pipeline', { turnId, stage, error: describeError(error) });
  },

  // llm-gateway

  llmRequest(requestId: string, model: string, taskKind: string, prompt: string, attributeName?: string): void {
    debugEmitter.emitDebug('llm.request', 'llm-gateway', {
      requestId,
      model,
      taskKind,
      attributeName,
      promptLength: prompt.length,
    });
  },

  llmResponse(requestId: string, model: string, text: string, durationMs: number): void {
    debugEmitter.emitDebug('llm.response', 'llm-gateway', { requestId, model, durationMs, text: clip(text) });
  },

  llmError(requestId: string, model: string, error: unknown): void {
    debugEmitter.emitDebug('llm.error', 'llm-gateway', { requestId, model, error: describeError(error) });
  },

  // attribute-repository

  storeValueInserted(attributeId: number, sequenceNo: number): void {
    debugEmitter.emitDebug('store.value_inserted', 'attribute-repository', { attributeId, sequenceNo });
  },

  systemError(source: string, error: unknown): void {
    debugEmitter.emitDebug('system.error', source, { error: describeError(error) });
  },
};
