import * as fs from 'fs';
import * as path from 'path';
import Ajv2020 from 'ajv/dist/2020.js';
import type { ErrorObject } from 'ajv/dist/2020.js';

import { ConfigError } from '../../domain/errors.js';
import { DEFAULT_DISPLAY_LANGUAGE, DEFAULT_PIVOT_LANGUAGE, isLanguageCode } from '../../domain/conversation/language.js';
import type { LanguageCode } from '../../domain/conversation/language.js';
import { getConfigDir } from './config-paths.js';

/** better-sqlite3 name for a private in-memory database */
export const MEMORY_DATABASE = ':memory:';

export const LLM_PROVIDERS = ['stub', 'ollama', 'openai'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

export interface RecollectRuntimeConfig {
  paths: {
    database: string;
  };
  llm: {
    provider: LLMProviderName;
    /** Empty means the provider's default endpoint */
    baseUrl: string;
    /** Empty means the provider's default model */
    model: string;
    apiKey?: string;
    timeoutMs: number;
  };
  translation: {
    enabled: boolean;
    pivotLanguage: LanguageCode;
    displayLanguage: LanguageCode;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

export function createDefaultRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RecollectRuntimeConfig {
  return {
    paths: {
      database: path.join(getConfigDir(env), 'recollect.db'),
    },
    llm: {
      provider: 'stub',
      baseUrl: '',
      model: '',
      timeoutMs: 60000,
    },
    translation: {
      enabled: false,
      pivotLanguage: DEFAULT_PIVOT_LANGUAGE,
      displayLanguage: DEFAULT_DISPLAY_LANGUAGE,
    },
    debug: {
      loggingEnabled: false,
    },
  };
}

export function getRuntimeConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'recollect.json');
}

const RUNTIME_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Recollect Runtime Configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    paths: {
      type: 'object',
      properties: {
        database: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    llm: {
      type: 'object',
      properties: {
        provider: { type: 'string', enum: [...LLM_PROVIDERS] },
        baseUrl: { type: 'string' },
        model: { type: 'string' },
        apiKey: { type: 'string' },
        timeoutMs: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
    translation: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        pivotLanguage: { type: 'string', enum: ['en', 'ja'] },
        displayLanguage: { type: 'string', enum: ['en', 'ja'] },
      },
      additionalProperties: false,
    },
    debug: {
      type: 'object',
      properties: {
        loggingEnabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

function formatErrorPath(error: ErrorObject): string {
  const instancePath = error.instancePath ?? '';
  const params: Record<string, unknown> = error.params;

  if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
    return `${instancePath}/${params.additionalProperty}`;
  }
  if (error.keyword === 'required' && typeof params.missingProperty === 'string') {
    return `${instancePath}/${params.missingProperty}`;
  }
  return instancePath || '/';
}

export function validateRuntimeConfigFile(config: unknown): void {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  const validate = ajv.compile(RUNTIME_CONFIG_SCHEMA);

  if (!validate(config)) {
    const errors = (validate.errors || []).map(err => ({
      path: formatErrorPath(err),
      message: err.message || 'Unknown validation error',
    }));
    throw new ConfigError(
      `Invalid runtime configuration: ${errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
      errors
    );
  }
}

// ============================================================================
// Coercion
// ============================================================================

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }

  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return fallback;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }

  return fallback;
}

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function toProvider(value: unknown, fallback: LLMProviderName): LLMProviderName {
  return LLM_PROVIDERS.find(provider => provider === value) ?? fallback;
}

function toLanguage(value: unknown, fallback: LanguageCode): LanguageCode {
  return isLanguageCode(value) ? value : fallback;
}

function resolveDatabasePath(value: string): string {
  return value === MEMORY_DATABASE ? value : path.resolve(value);
}

function section(value: unknown, key: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  const child: unknown = Object.getOwnPropertyDescriptor(value, key)?.value;
  if (typeof child !== 'object' || child === null || Array.isArray(child)) {
    return {};
  }
  return { ...child };
}

/**
 * Lays a partial config (from the file) over a complete one, coercing each
 * field and keeping the base value where the overlay is missing or unusable.
 */
function overlayConfig(base: RecollectRuntimeConfig, raw: unknown): RecollectRuntimeConfig {
  const paths = section(raw, 'paths');
  const llm = section(raw, 'llm');
  const translation = section(raw, 'translation');
  const debugSection = section(raw, 'debug');

  const apiKey = toStringValue(llm.apiKey, base.llm.apiKey ?? '');

  return {
    paths: {
      database: resolveDatabasePath(toStringValue(paths.database, base.paths.database)),
    },
    llm: {
      provider: toProvider(llm.provider, base.llm.provider),
      baseUrl: typeof llm.baseUrl === 'string' ? llm.baseUrl : base.llm.baseUrl,
      model: typeof llm.model === 'string' ? llm.model : base.llm.model,
      ...(apiKey ? { apiKey } : {}),
      timeoutMs: toPositiveInt(llm.timeoutMs, base.llm.timeoutMs),
    },
    translation: {
      enabled: toBoolean(translation.enabled, base.translation.enabled),
      pivotLanguage: toLanguage(translation.pivotLanguage, base.translation.pivotLanguage),
      displayLanguage: toLanguage(translation.displayLanguage, base.translation.displayLanguage),
    },
    debug: {
      loggingEnabled: toBoolean(debugSection.loggingEnabled, base.debug.loggingEnabled),
    },
  };
}

export function applyEnvironmentOverrides(
  config: RecollectRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): RecollectRuntimeConfig {
  return overlayConfig(config, {
    paths: { database: env.RECOLLECT_DB_PATH },
    llm: {
      provider: env.RECOLLECT_LLM_PROVIDER,
      baseUrl: env.RECOLLECT_LLM_BASE_URL,
      model: env.RECOLLECT_LLM_MODEL,
      apiKey: env.RECOLLECT_LLM_API_KEY,
      timeoutMs: env.RECOLLECT_LLM_TIMEOUT_MS,
    },
    translation: { enabled: env.RECOLLECT_TRANSLATION },
    debug: { loggingEnabled: env.RECOLLECT_DEBUG },
  });
}

function readConfigFile(configPath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Defaults, then recollect.json from the config directory, then RECOLLECT_*
 * environment variables.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RecollectRuntimeConfig {
  let config = overlayConfig(createDefaultRuntimeConfig(env), {});
  const configPath = getRuntimeConfigPath(env);

  if (fs.existsSync(configPath)) {
    const parsed = readConfigFile(configPath);
    validateRuntimeConfigFile(parsed);
    config = overlayConfig(config, parsed);
  }

  return applyEnvironmentOverrides(config, env);
}
