import type Database from 'better-sqlite3';

import type {
  AttributeDefinitionInput,
  IAttributeDefinition,
  IAttributeRepository,
  IAttributeValue,
} from '../../domain/attribute/types.js';
import { assertValidDefinition, assertValidValueContent } from '../../domain/attribute/invariants.js';
import { DEFAULT_ATTRIBUTE_DEFINITIONS } from '../../domain/attribute/defaults.js';
import { StoreError } from '../../domain/errors.js';
import { debug } from '../../debug/index.js';

interface DefinitionRow {
  id: number;
  name: string;
  extraction_prompt: string;
  judgment_prompt: string;
}

interface ValueRow {
  sequence_no: number;
  attribute_id: number;
  content: string;
  created_at: number;
  updated_at: number;
}

/**
 * SQLite implementation of the attribute store.
 *
 * Validation runs before any statement; everything the driver throws is
 * wrapped in StoreError with the original error as `cause`.
 */
export class SqliteAttributeRepository implements IAttributeRepository {
  constructor(
    private db: Database.Database,
    private now: () => number = Date.now
  ) {}

  initialize(): void {
    this.guard('initialize', () => {
      this.db.pragma('foreign_keys = ON');
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS attribute_definitions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL,
          extraction_prompt TEXT NOT NULL,
          judgment_prompt TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS attribute_values (
          sequence_no INTEGER PRIMARY KEY AUTOINCREMENT,
          attribute_id INTEGER NOT NULL REFERENCES attribute_definitions(id) ON DELETE CASCADE,
          content TEXT NOT NULL,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_values_attribute ON attribute_values(attribute_id, sequence_no DESC);
      `);
    });
  }

  private parseDefinition(row: DefinitionRow): IAttributeDefinition {
    return {
      id: row.id,
      name: row.name,
      extractionPrompt: row.extraction_prompt,
      judgmentPrompt: row.judgment_prompt,
    };
  }

  private parseValue(row: ValueRow): IAttributeValue {
    return {
      sequenceNo: row.sequence_no,
      attributeId: row.attribute_id,
      content: row.content,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }

  // ========== Definitions ==========

  listDefinitions(): IAttributeDefinition[] {
    return this.guard('listDefinitions', () => {
      const rows = this.db
        .prepare<[], DefinitionRow>('SELECT * FROM attribute_definitions ORDER BY id ASC')
        .all();
      return rows.map(row => this.parseDefinition(row));
    });
  }

  getDefinition(id: number): IAttributeDefinition | null {
    return this.guard('getDefinition', () => {
      const row = this.db
        .prepare<[number], DefinitionRow>('SELECT * FROM attribute_definitions WHERE id = ?')
        .get(id);
      return row ? this.parseDefinition(row) : null;
    });
  }

  createDefinition(input: AttributeDefinitionInput): IAttributeDefinition {
    assertValidDefinition(input);

    return this.guard('createDefinition', () => {
      const result = this.db
        .prepare<[string, string, string]>(
          'INSERT INTO attribute_definitions (name, extraction_prompt, judgment_prompt) VALUES (?, ?, ?)'
        )
        .run(input.name, input.extractionPrompt, input.judgmentPrompt);

      return {
        id: Number(result.lastInsertRowid),
        name: input.name,
        extractionPrompt: input.extractionPrompt,
        judgmentPrompt: input.judgmentPrompt,
      };
    });
  }

  updateDefinition(definition: IAttributeDefinition): boolean {
    assertValidDefinition(definition);

    return this.guard('updateDefinition', () => {
      const result = this.db
        .prepare<[string, string, string, number]>(`
          UPDATE attribute_definitions
          SET name = ?, extraction_prompt = ?, judgment_prompt = ?
          WHERE id = ?
        `)
        .run(definition.name, definition.extractionPrompt, definition.judgmentPrompt, definition.id);
      return result.changes > 0;
    });
  }

  /** Removes the definition together with all of its values */
  deleteDefinition(id: number): boolean {
    return this.guard('deleteDefinition', () => {
      const remove = this.db.transaction((definitionId: number) => {
        this.db.prepare<[number]>('DELETE FROM attribute_values WHERE attribute_id = ?').run(definitionId);
        return this.db.prepare<[number]>('DELETE FROM attribute_definitions WHERE id = ?').run(definitionId);
      });
      return remove(id).changes > 0;
    });
  }

  // ========== Values ==========

  latestValue(definitionId: number): IAttributeValue | null {
    return this.guard('latestValue', () => {
      const row = this.db
        .prepare<[number], ValueRow>(`
          SELECT * FROM attribute_values
          WHERE attribute_id = ?
          ORDER BY sequence_no DESC
          LIMIT 1
        `)
        .get(definitionId);
      return row ? this.parseValue(row) : null;
    });
  }

  insertValue(definitionId: number, content: string): number {
    assertValidValueContent(content);

    const sequenceNo = this.guard('insertValue', () => {
      const timestamp = this.now();
      const result = this.db
        .prepare<[number, string, number, number]>(`
          INSERT INTO attribute_values (attribute_id, content, created_at, updated_at)
          VALUES (?, ?, ?, ?)
        `)
        .run(definitionId, content, timestamp, timestamp);
      return Number(result.lastInsertRowid);
    });

    debug.storeValueInserted(definitionId, sequenceNo);
    return sequenceNo;
  }

  /** Newest first; all definitions when `definitionId` is omitted */
  listValues(definitionId?: number): IAttributeValue[] {
    return this.guard('listValues', () => {
      const rows = definitionId === undefined
        ? this.db
            .prepare<[], ValueRow>('SELECT * FROM attribute_values ORDER BY sequence_no DESC')
            .all()
        : this.db
            .prepare<[number], ValueRow>(
              'SELECT * FROM attribute_values WHERE attribute_id = ? ORDER BY sequence_no DESC'
            )
            .all(definitionId);
      return rows.map(row => this.parseValue(row));
    });
  }

  getValue(sequenceNo: number): IAttributeValue | null {
    return this.guard('getValue', () => {
      const row = this.db
        .prepare<[number], ValueRow>('SELECT * FROM attribute_values WHERE sequence_no = ?')
        .get(sequenceNo);
      return row ? this.parseValue(row) : null;
    });
  }

  updateValue(sequenceNo: number, content: string): boolean {
    assertValidValueContent(content);

    return this.guard('updateValue', () => {
      const result = this.db
        .prepare<[string, number, number]>(
          'UPDATE attribute_values SET content = ?, updated_at = ? WHERE sequence_no = ?'
        )
        .run(content, this.now(), sequenceNo);
      return result.changes > 0;
    });
  }

  deleteValue(sequenceNo: number): boolean {
    return this.guard('deleteValue', () => {
      const result = this.db
        .prepare<[number]>('DELETE FROM attribute_values WHERE sequence_no = ?')
        .run(sequenceNo);
      return result.changes > 0;
    });
  }
}

/**
 * Inserts the stock definitions. Returns how many were inserted; definitions
 * whose name already exists are skipped.
 */
export function seedDefaultDefinitions(store: IAttributeRepository): number {
  const existing = new Set(store.listDefinitions().map(definition => definition.name));
  let inserted = 0;

  for (const definition of DEFAULT_ATTRIBUTE_DEFINITIONS) {
    if (existing.has(definition.name)) continue;
    store.createDefinition(definition);
    inserted++;
  }

  return inserted;
}
