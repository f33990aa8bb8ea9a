import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { DebugContext, DebugEvent, DebugEventType, DebugListener } from './types.js';

const DEBUG_EVENT = 'debug';

/**
 * Process-wide debug channel. Off until `enable()`; while off, `emitDebug`
 * builds nothing and returns false.
 */
class DebugEmitter {
  private readonly events = new EventEmitter();
  private enabled = false;
  private context: DebugContext = {};

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Merged into the current context; `turnId` is copied onto every event */
  setContext(ctx: DebugContext): void {
    this.context = { ...this.context, ...ctx };
  }

  getContext(): DebugContext {
    return { ...this.context };
  }

  clearContext(): void {
    this.context = {};
  }

  emitDebug(type: DebugEventType, source: string, data: Record<string, unknown>): boolean {
    if (!this.enabled) return false;

    const event: DebugEvent = { id: randomUUID(), timestamp: Date.now(), type, source, data };
    if (this.context.turnId !== undefined) {
      event.turnId = this.context.turnId;
    }
    return this.events.emit(DEBUG_EVENT, event);
  }

  /** Returns a function that removes the listener again */
  onDebug(listener: DebugListener): () => void {
    this.events.on(DEBUG_EVENT, listener);
    return () => this.offDebug(listener);
  }

  offDebug(listener: DebugListener): void {
    this.events.off(DEBUG_EVENT, listener);
  }
}

export const debugEmitter = new DebugEmitter();
