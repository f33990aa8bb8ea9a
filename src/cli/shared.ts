import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';

import { createAssistant } from '../app/bootstrap.js';
import type { Assistant, CreateAssistantOptions } from '../app/bootstrap.js';
import { isRecollectError } from '../domain/errors.js';
import { debugEmitter } from '../debug/index.js';
import type { DebugEvent } from '../debug/index.js';
import { loadRuntimeConfig } from '../infra/config/runtime-config.js';
import type { RecollectRuntimeConfig } from '../infra/config/runtime-config.js';
import { isDebugLoggingEnabled } from '../infra/config/debug-flags.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function formatError(error: unknown): string {
  if (isRecollectError(error)) {
    return `${error.name} [${error.code}]: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function formatDebugEvent(event: DebugEvent): string {
  const time = new Date(event.timestamp).toISOString().slice(11, 23);
  return `${time} ${event.type} (${event.source}) ${JSON.stringify(event.data)}`;
}

function attachDebugPrinter(config: RecollectRuntimeConfig): void {
  if (!isDebugLoggingEnabled(process.env, config) || debugEmitter.isEnabled()) {
    return;
  }
  debugEmitter.enable();
  debugEmitter.onDebug(event => {
    console.error(chalk.gray(`[debug] ${formatDebugEvent(event)}`));
  });
}

/**
 * Loads the runtime config, opens the assistant for the duration of `fn`
 * and reports any failure on stderr with a non-zero exit code.
 */
export async function withAssistant(
  fn: (assistant: Assistant, config: RecollectRuntimeConfig) => Promise<void> | void,
  options: CreateAssistantOptions = {}
): Promise<void> {
  let assistant: Assistant | undefined;
  try {
    const config = loadRuntimeConfig();
    attachDebugPrinter(config);
    assistant = createAssistant(config, options);
    await fn(assistant, config);
  } catch (error) {
    console.error(chalk.red(`✗ ${formatError(error)}`));
    process.exitCode = 1;
  } finally {
    assistant?.close();
  }
}
