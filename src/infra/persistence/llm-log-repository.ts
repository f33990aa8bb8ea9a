import type Database from 'better-sqlite3';

import { isLLMTaskKind } from '../../domain/audit/types.js';
import type {
  ILLMInteractionLog,
  ILLMLogQuery,
  ILLMLogRepository,
  LLMInteractionLogInput,
  LLMInteractionLogRow,
} from '../../domain/audit/types.js';
import { StoreError } from '../../domain/errors.js';

const DEFAULT_LIST_LIMIT = 100;

/**
 * SQLite implementation of the LLM interaction log
 */
export class LLMLogRepository implements ILLMLogRepository {
  constructor(
    private db: Database.Database,
    private now: () => number = Date.now
  ) {}

  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS llm_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        model TEXT NOT NULL,
        task_kind TEXT NOT NULL,
        prompt TEXT NOT NULL,
        response TEXT NOT NULL,
        raw_response TEXT,
        attribute_name TEXT,
        sent_at INTEGER,
        received_at INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_llm_logs_task_kind ON llm_logs(task_kind);
    `);
  }

  private parseRow(row: LLMInteractionLogRow): ILLMInteractionLog {
    return {
      id: row.id,
      timestamp: row.timestamp,
      model: row.model,
      taskKind: isLLMTaskKind(row.task_kind) ? row.task_kind : 'general',
      prompt: row.prompt,
      response: row.response,
      rawResponse: row.raw_response ?? undefined,
      attributeName: row.attribute_name ?? undefined,
      sentAt: row.sent_at ?? undefined,
      receivedAt: row.received_at ?? undefined,
    };
  }

  insert(entry: LLMInteractionLogInput): ILLMInteractionLog {
    const timestamp = this.now();

    try {
      const result = this.db
        .prepare(`
          INSERT INTO llm_logs (
            timestamp, model, task_kind, prompt, response,
            raw_response, attribute_name, sent_at, received_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          timestamp,
          entry.model,
          entry.taskKind,
          entry.prompt,
          entry.response,
          entry.rawResponse ?? null,
          entry.attributeName ?? null,
          entry.sentAt ?? null,
          entry.receivedAt ?? null
        );

      return { id: Number(result.lastInsertRowid), timestamp, ...entry };
    } catch (error) {
      throw new StoreError('insertLLMLog', error);
    }
  }

  /** Newest first */
  list(query: ILLMLogQuery = {}): ILLMInteractionLog[] {
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;

    try {
      const rows = query.taskKind
        ? this.db
            .prepare<[string, number], LLMInteractionLogRow>(
              'SELECT * FROM llm_logs WHERE task_kind = ? ORDER BY id DESC LIMIT ?'
            )
            .all(query.taskKind, limit)
        : this.db
            .prepare<[number], LLMInteractionLogRow>('SELECT * FROM llm_logs ORDER BY id DESC LIMIT ?')
            .all(limit);
      return rows.map(row => this.parseRow(row));
    } catch (error) {
      throw new StoreError('listLLMLogs', error);
    }
  }

  /** Returns the number of deleted entries */
  clear(): number {
    try {
      return this.db.prepare('DELETE FROM llm_logs').run().changes;
    } catch (error) {
      throw new StoreError('clearLLMLogs', error);
    }
  }
}
