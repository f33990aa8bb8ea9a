/**
 * Debug instrumentation API.
 *
 * Modules emit debug events through the `debug` facade; nothing is emitted
 * until the emitter is enabled. The CLI subscribes and prints events when
 * debug logging is switched on.
 *
 * @example
 * ```typescript
 * import { debug, debugEmitter } from './debug/index.js';
 *
 * debugEmitter.enable();
 * debugEmitter.onDebug(event => console.log(event.type, event.data));
 *
 * debug.setContext({ turnId: 'turn-1' });
 * debug.turnStep('judgment', 'processing', 'User Profile');
 * debug.clearContext();
 * ```
 */

export { debugEmitter } from './emitter.js';
export { debug } from './debug.js';
export type { DebugContext, DebugEvent, DebugEventType, DebugListener } from './types.js';
