import type { RecollectRuntimeConfig } from './runtime-config.js';

/**
 * RECOLLECT_DEBUG wins when set; otherwise the config decides.
 */
export function isDebugLoggingEnabled(
  env: NodeJS.ProcessEnv = process.env,
  config?: Pick<RecollectRuntimeConfig, 'debug'>
): boolean {
  if (env.RECOLLECT_DEBUG !== undefined) {
    return env.RECOLLECT_DEBUG === '1';
  }
  return config?.debug.loggingEnabled ?? false;
}
