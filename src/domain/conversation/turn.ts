/**
 * Turn Domain Types
 * Chat history entries, step progress records and the turn result
 */

import { InvalidStateTransitionError } from '../errors.js';

export type ChatRole = 'user' | 'assistant';

export interface IChatTurn {
  role: ChatRole;
  /** Content in the conversation's display language */
  content: string;
  /** Content in the pivot language; only set when translation is active */
  pivotContent?: string;
  timestamp: number;
}

/** Role/content pair handed to prompt templates */
export interface IHistoryEntry {
  role: ChatRole;
  content: string;
}

// ============================================================================
// Step Status
// ============================================================================

export type StepKind =
  | 'input_translation'
  | 'judgment'
  | 'response'
  | 'output_translation'
  | 'response_ready'
  | 'attribute_extraction';

export type StepState = 'processing' | 'completed' | 'failed';

export const STEP_TRANSITIONS: Record<StepState, StepState[]> = {
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransitionStep(from: StepState, to: StepState): boolean {
  return STEP_TRANSITIONS[from].includes(to);
}

export class StepStatus {
  private _state: StepState;

  private constructor(
    readonly kind: StepKind,
    readonly attributeName: string | undefined,
    state: StepState,
    readonly responseText?: string,
    readonly usedAttributes?: Readonly<Record<string, string>>
  ) {
    this._state = state;
  }

  static start(kind: Exclude<StepKind, 'response_ready'>, attributeName?: string): StepStatus {
    return new StepStatus(kind, attributeName, 'processing');
  }

  /**
   * The reply-ready notice is born terminal; it carries the reply so a caller
   * can show it before attribute extraction runs.
   */
  static responseReady(responseText: string, usedAttributes: Record<string, string>): StepStatus {
    return new StepStatus('response_ready', undefined, 'completed', responseText, { ...usedAttributes });
  }

  get state(): StepState {
    return this._state;
  }

  get isTerminal(): boolean {
    return this._state !== 'processing';
  }

  complete(): void {
    this.transition('completed');
  }

  fail(): void {
    this.transition('failed');
  }

  get displayText(): string {
    switch (this.kind) {
      case 'input_translation':
        return 'Translating your message';
      case 'judgment':
        return `Checking whether "${this.attributeName}" is needed for the reply`;
      case 'response':
        return 'Generating the reply';
      case 'output_translation':
        return 'Translating the reply';
      case 'response_ready':
        return 'Reply ready';
      case 'attribute_extraction':
        return `Extracting "${this.attributeName}" from your message`;
    }
  }

  private transition(to: StepState): void {
    if (!canTransitionStep(this._state, to)) {
      throw new InvalidStateTransitionError(this._state, to);
    }
    this._state = to;
  }
}

// ============================================================================
// Turn Result
// ============================================================================

export type ExtractedAttribute = [name: string, content: string];

export interface ITurnResult {
  responseText: string;
  usedAttributes: Record<string, string>;
  extractedAttributes: ExtractedAttribute[];
  statuses: StepStatus[];
}
