/**
 * Debug event shapes.
 */

export type DebugEventType =
  | 'turn.started'
  | 'turn.step'
  | 'turn.completed'
  | 'turn.failed'
  | 'llm.request'
  | 'llm.response'
  | 'llm.error'
  | 'store.value_inserted'
  | 'system.error';

export interface DebugEvent {
  id: string;
  /** Epoch milliseconds */
  timestamp: number;
  type: DebugEventType;
  /** Emitting module, e.g. "turn-pipeline" */
  source: string;
  data: Record<string, unknown>;
  /** Set while a turn is being processed */
  turnId?: string;
}

export interface DebugContext {
  turnId?: string;
}

export type DebugListener = (event: DebugEvent) => void;
