/**
 * SQLite-backed LogSink
 *
 * Appends change entries to a single audit table using better-sqlite3.
 * Rows are only ever inserted; the table is never read or updated here.
 *
 * Schema (created on open):
 *   entity_type, entity_id, revision_id, field_name, diff, changed, uid
 */

import { mkdirSync } from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import type { ChangeEntry } from '../types/audit.js';
import type { LogSink } from '../types/sources.js';
import { logger } from './logger.js';

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface SqliteLogSinkConfig {
  /** Database file, or ':memory:' */
  dbPath: string;

  /** Audit table name */
  tableName?: string;

  /** Enable WAL mode for concurrent readers */
  walMode?: boolean;
}

export const DEFAULT_AUDIT_TABLE = 'field_change_audit_log';

export class SqliteLogSink implements LogSink {
  private db: Database.Database;
  private insert: Database.Statement;
  private tableName: string;
  private log = logger.sink.child({ component: 'SqliteLogSink' });

  constructor(config: SqliteLogSinkConfig) {
    this.tableName = config.tableName ?? DEFAULT_AUDIT_TABLE;
    if (!TABLE_NAME_PATTERN.test(this.tableName)) {
      throw new Error(`Invalid audit table name: ${this.tableName}`);
    }

    if (config.dbPath !== ':memory:') {
      mkdirSync(path.dirname(config.dbPath), { recursive: true });
    }

    this.db = new Database(config.dbPath);
    if (config.walMode ?? true) {
      this.db.pragma('journal_mode = WAL');
    }
    this.createSchema();

    this.insert = this.db.prepare(
      `INSERT INTO ${this.tableName}
        (entity_type, entity_id, revision_id, field_name, diff, changed, uid)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );

    this.log.info('Audit log opened', { dbPath: config.dbPath, table: this.tableName });
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        entity_type TEXT NOT NULL,
        entity_id TEXT NOT NULL,
        revision_id TEXT NOT NULL,
        field_name TEXT NOT NULL,
        diff TEXT NOT NULL,
        changed INTEGER NOT NULL,
        uid TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ${this.tableName}_entity
        ON ${this.tableName} (entity_type, entity_id);
    `);
  }

  append(entry: ChangeEntry): boolean {
    const result = this.insert.run(
      entry.entityKind,
      String(entry.entityId),
      String(entry.revisionId),
      entry.fieldLabel,
      entry.diffText,
      entry.timestamp,
      String(entry.actorId)
    );
    return result.changes === 1;
  }

  close(): void {
    this.db.close();
  }
}
