import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';

import { buildAnswerVocabulary } from '../domain/conversation/language.js';
import type { RecollectRuntimeConfig } from '../infra/config/runtime-config.js';
import { MEMORY_DATABASE } from '../infra/config/runtime-config.js';
import { SqliteAttributeRepository } from '../infra/persistence/attribute-repository.js';
import { LLMLogRepository } from '../infra/persistence/llm-log-repository.js';
import { LLMAuditLogger } from '../infra/audit/llm-audit-logger.js';
import { createGateway } from '../infra/llm/gateway-factory.js';
import type { ILLMGateway } from '../infra/llm/llm-gateway.js';
import { TranslationService } from './translation/translation-service.js';
import { TurnPipeline } from './conversation/turn-pipeline.js';
import type { StatusSink } from './conversation/turn-pipeline.js';

export interface Assistant {
  pipeline: TurnPipeline;
  attributes: SqliteAttributeRepository;
  llmLogs: LLMLogRepository;
  gateway: ILLMGateway;
  translation?: TranslationService;
  close(): void;
}

export interface CreateAssistantOptions {
  statusSink?: StatusSink;
  /** Replaces the gateway built from `config.llm`; the audit sink is not attached */
  gateway?: ILLMGateway;
}

/**
 * Opens the database and wires store, gateway, translation and pipeline.
 */
export function createAssistant(config: RecollectRuntimeConfig, options: CreateAssistantOptions = {}): Assistant {
  const dbPath = config.paths.database;
  if (dbPath !== MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');

    const attributes = new SqliteAttributeRepository(db);
    const llmLogs = new LLMLogRepository(db);
    attributes.initialize();
    llmLogs.initialize();

    const gateway = options.gateway ?? createGateway(config.llm, new LLMAuditLogger(llmLogs).asSink());

    const { enabled, pivotLanguage, displayLanguage } = config.translation;
    const translation = enabled
      ? new TranslationService(gateway, { pivot: pivotLanguage, display: displayLanguage })
      : undefined;

    const pipeline = new TurnPipeline({
      store: attributes,
      gateway,
      translation,
      statusSink: options.statusSink,
      vocabulary: buildAnswerVocabulary(pivotLanguage, displayLanguage),
    });

    return {
      pipeline,
      attributes,
      llmLogs,
      gateway,
      translation,
      close: () => db.close(),
    };
  } catch (error) {
    db.close();
    throw error;
  }
}
