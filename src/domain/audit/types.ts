/**
 * LLM Interaction Audit Types
 *
 * Every prompt sent to the language model backend, together with the text
 * that came back, is recorded for later inspection.
 */

export type LLMTaskKind =
  | 'judgment'
  | 'extraction'
  | 'response'
  | 'translation_to_pivot'
  | 'translation_to_display'
  | 'general';

export const LLM_TASK_KINDS: readonly LLMTaskKind[] = [
  'judgment',
  'extraction',
  'response',
  'translation_to_pivot',
  'translation_to_display',
  'general',
];

export function isLLMTaskKind(value: unknown): value is LLMTaskKind {
  return LLM_TASK_KINDS.some(kind => kind === value);
}

export interface ILLMInteractionLog {
  id: number;
  timestamp: number;
  model: string;
  taskKind: LLMTaskKind;
  prompt: string;
  response: string;
  /** JSON-encoded backend payload, when the backend returned one */
  rawResponse?: string;
  attributeName?: string;
  sentAt?: number;
  receivedAt?: number;
}

export type LLMInteractionLogInput = Omit<ILLMInteractionLog, 'id' | 'timestamp'>;

export interface LLMInteractionLogRow {
  id: number;
  timestamp: number;
  model: string;
  task_kind: string;
  prompt: string;
  response: string;
  raw_response: string | null;
  attribute_name: string | null;
  sent_at: number | null;
  received_at: number | null;
}

export interface ILLMLogQuery {
  taskKind?: LLMTaskKind;
  limit?: number;
}

export interface ILLMLogRepository {
  insert(entry: LLMInteractionLogInput): ILLMInteractionLog;
  list(query?: ILLMLogQuery): ILLMInteractionLog[];
  clear(): number;
}
