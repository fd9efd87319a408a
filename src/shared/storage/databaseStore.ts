/**
 * Database Entity Store
 *
 * SQLite-based implementation of EntityStore.
 * Uses better-sqlite3 for synchronous, performant database operations.
 *
 * Schema:
 *   source_documents(kind, id, content, parent_id, created_at)
 *   processed_documents(kind, id, processing_status, processing_error,
 *                       extracted_keywords, structured_data, processed_at)
 *   Both keyed by (kind, id); a processed row belongs to the source row
 *   with the same key.
 */

import Database from 'better-sqlite3';
import { ErrorHandler } from '../errors/handler';
import { loggers } from '../logging/logger';
import {
  EntityKind,
  EntityStore,
  ProcessedDocument,
  ProcessingStatus,
  SourceDocument
} from '../../improvement/types';

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration options for DatabaseEntityStore
 */
export interface DatabaseEntityStoreOptions {
  /**
   * Path to the SQLite database file
   * Use ':memory:' for an in-memory database (useful for testing)
   */
  databasePath: string;

  /**
   * Whether to enable WAL mode for better concurrent performance
   * Default: true
   */
  walMode?: boolean;
}

interface SourceRow {
  kind: string;
  id: string;
  content: string;
  parent_id: string | null;
  created_at: string;
}

interface ProcessedRow {
  kind: string;
  id: string;
  processing_status: string;
  processing_error: string | null;
  extracted_keywords: string | null;
  structured_data: string | null;
  processed_at: string | null;
}

// ============================================================================
// Schema Migration
// ============================================================================

const SCHEMA_VERSION = 1;

const MIGRATIONS: Record<number, string[]> = {
  1: [
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    )`,
    `CREATE TABLE IF NOT EXISTS source_documents (
      kind TEXT NOT NULL CHECK (kind IN ('resume', 'job')),
      id TEXT NOT NULL,
      content TEXT NOT NULL,
      parent_id TEXT,
      created_at TEXT NOT NULL,
      PRIMARY KEY (kind, id)
    )`,
    `CREATE TABLE IF NOT EXISTS processed_documents (
      kind TEXT NOT NULL CHECK (kind IN ('resume', 'job')),
      id TEXT NOT NULL,
      processing_status TEXT NOT NULL
        CHECK (processing_status IN ('pending', 'processing', 'completed', 'failed')),
      processing_error TEXT,
      extracted_keywords TEXT,
      structured_data TEXT,
      processed_at TEXT,
      PRIMARY KEY (kind, id)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_source_parent ON source_documents(parent_id)`,
    `CREATE INDEX IF NOT EXISTS idx_processed_status ON processed_documents(processing_status)`,
  ],
};

const ENTITY_KINDS: readonly string[] = ['resume', 'job'];
const STATUSES: readonly string[] = Object.values(ProcessingStatus);

function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.includes(value);
}

function isProcessingStatus(value: string): value is ProcessingStatus {
  return STATUSES.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Database Entity Store Implementation
// ============================================================================

export class DatabaseEntityStore implements EntityStore {
  private db: Database.Database;
  private readonly log = loggers.db;

  // Prepared statements for performance
  private stmtGetSource!: Database.Statement;
  private stmtGetProcessed!: Database.Statement;
  private stmtSaveSource!: Database.Statement;
  private stmtSaveProcessed!: Database.Statement;

  constructor(options: DatabaseEntityStoreOptions) {
    try {
      this.db = new Database(options.databasePath);
      if (options.walMode !== false && options.databasePath !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }
      this.runMigrations();
      this.prepareStatements();
    } catch (error) {
      throw ErrorHandler.createStorageError(
        'Failed to open the document database',
        error instanceof Error ? error.message : String(error),
        { databasePath: options.databasePath },
        error
      );
    }
  }

  /**
   * Run database migrations
   */
  private runMigrations(): void {
    this.db.exec(MIGRATIONS[1][0]);
    const row = this.db
      .prepare('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
      .get() as { version: number } | undefined;
    const currentVersion = row?.version || 0;

    for (let v = currentVersion + 1; v <= SCHEMA_VERSION; v++) {
      const statements = MIGRATIONS[v];
      if (statements) {
        const transaction = this.db.transaction(() => {
          for (const sql of statements) {
            this.db.exec(sql);
          }
          this.db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(v);
        });
        transaction();
        this.log.info({ version: v }, 'Migrated document database schema');
      }
    }
  }

  private prepareStatements(): void {
    this.stmtGetSource = this.db.prepare(
      'SELECT kind, id, content, parent_id, created_at FROM source_documents WHERE kind = ? AND id = ?'
    );

    this.stmtGetProcessed = this.db.prepare(`
      SELECT kind, id, processing_status, processing_error, extracted_keywords, structured_data, processed_at
      FROM processed_documents WHERE kind = ? AND id = ?
    `);

    this.stmtSaveSource = this.db.prepare(`
      INSERT INTO source_documents (kind, id, content, parent_id, created_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(kind, id) DO UPDATE SET
        content = excluded.content,
        parent_id = excluded.parent_id
    `);

    this.stmtSaveProcessed = this.db.prepare(`
      INSERT INTO processed_documents
        (kind, id, processing_status, processing_error, extracted_keywords, structured_data, processed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(kind, id) DO UPDATE SET
        processing_status = excluded.processing_status,
        processing_error = excluded.processing_error,
        extracted_keywords = excluded.extracted_keywords,
        structured_data = excluded.structured_data,
        processed_at = excluded.processed_at
    `);
  }

  // ============================================================================
  // EntityStore Implementation
  // ============================================================================

  async getSource(kind: EntityKind, id: string): Promise<SourceDocument | null> {
    const row = this.query('getSource', kind, id, () =>
      this.stmtGetSource.get(kind, id) as SourceRow | undefined
    );
    return row ? this.toSource(row) : null;
  }

  async getProcessed(kind: EntityKind, id: string): Promise<ProcessedDocument | null> {
    const row = this.query('getProcessed', kind, id, () =>
      this.stmtGetProcessed.get(kind, id) as ProcessedRow | undefined
    );
    return row ? this.toProcessed(row) : null;
  }

  async saveSource(document: SourceDocument): Promise<void> {
    this.query('saveSource', document.kind, document.id, () =>
      this.stmtSaveSource.run(
        document.kind,
        document.id,
        document.content,
        document.parentId ?? null,
        document.createdAt.toISOString()
      )
    );
  }

  async saveProcessed(document: ProcessedDocument): Promise<void> {
    this.query('saveProcessed', document.kind, document.id, () =>
      this.stmtSaveProcessed.run(
        document.kind,
        document.id,
        document.processingStatus,
        document.processingError,
        document.extractedKeywords,
        document.structuredData === null ? null : JSON.stringify(document.structuredData),
        document.processedAt === null ? null : document.processedAt.toISOString()
      )
    );
  }

  close(): void {
    this.db.close();
  }

  // ============================================================================
  // Row mapping
  // ============================================================================

  private query<T>(operation: string, kind: EntityKind, id: string, fn: () => T): T {
    return ErrorHandler.handle(fn, error =>
      ErrorHandler.createStorageError(
        `Failed to access stored ${kind} data`,
        error instanceof Error ? error.message : String(error),
        { operation, kind, id },
        error
      )
    );
  }

  private toSource(row: SourceRow): SourceDocument {
    if (!isEntityKind(row.kind)) {
      throw ErrorHandler.createStorageError(
        'Stored document is corrupt',
        `Unknown entity kind "${row.kind}" for ${row.id}`
      );
    }
    return {
      id: row.id,
      kind: row.kind,
      content: row.content,
      parentId: row.parent_id,
      createdAt: new Date(row.created_at)
    };
  }

  private toProcessed(row: ProcessedRow): ProcessedDocument {
    if (!isEntityKind(row.kind) || !isProcessingStatus(row.processing_status)) {
      throw ErrorHandler.createStorageError(
        'Stored document is corrupt',
        `Unknown kind "${row.kind}" or status "${row.processing_status}" for ${row.id}`
      );
    }
    return {
      id: row.id,
      kind: row.kind,
      processingStatus: row.processing_status,
      processingError: row.processing_error,
      extractedKeywords: row.extracted_keywords,
      structuredData: this.parseStructuredData(row),
      processedAt: row.processed_at === null ? null : new Date(row.processed_at)
    };
  }

  private parseStructuredData(row: ProcessedRow): Record<string, unknown> | null {
    const text = row.structured_data;
    if (text === null) {
      return null;
    }
    return ErrorHandler.handle(
      () => {
        const parsed: unknown = JSON.parse(text);
        return isRecord(parsed) ? parsed : null;
      },
      error => ErrorHandler.createStorageError(
        'Stored document is corrupt',
        `Unreadable structured data for ${row.kind} ${row.id}: ${error instanceof Error ? error.message : String(error)}`,
        { operation: 'getProcessed', kind: row.kind, id: row.id },
        error
      )
    );
  }
}
