/**
 * Tests for the SQLite log sink
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import Database from 'better-sqlite3';
import { SqliteLogSink } from '../../src/utils/sqlite-log-sink.js';
import { createChangeEntry } from '../../src/types/audit.js';

interface AuditRow {
  entity_type: string;
  entity_id: string;
  revision_id: string;
  field_name: string;
  diff: string;
  changed: number;
  uid: string;
}

const entry = createChangeEntry({
  entityKind: 'node',
  entityId: 42,
  revisionId: 420,
  fieldLabel: 'Body',
  diffText: 'Changed from: Hello\nTo: Hello World',
  timestamp: 1700000000,
  actorId: 7,
});

describe('SqliteLogSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'field-audit-sink-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should insert one row per entry', () => {
    const dbPath = join(dir, 'nested', 'audit.db');
    const sink = new SqliteLogSink({ dbPath });

    expect(sink.append(entry)).toBe(true);
    expect(sink.append({ ...entry, fieldLabel: 'Title' })).toBe(true);
    sink.close();

    const db = new Database(dbPath, { readonly: true });
    const rows = db
      .prepare<[], AuditRow>(
        'SELECT entity_type, entity_id, revision_id, field_name, diff, changed, uid FROM field_change_audit_log ORDER BY id'
      )
      .all();
    db.close();

    expect(rows).toEqual([
      {
        entity_type: 'node',
        entity_id: '42',
        revision_id: '420',
        field_name: 'Body',
        diff: 'Changed from: Hello\nTo: Hello World',
        changed: 1700000000,
        uid: '7',
      },
      {
        entity_type: 'node',
        entity_id: '42',
        revision_id: '420',
        field_name: 'Title',
        diff: 'Changed from: Hello\nTo: Hello World',
        changed: 1700000000,
        uid: '7',
      },
    ]);
  });

  it('should write to a custom table', () => {
    const dbPath = join(dir, 'custom.db');
    const sink = new SqliteLogSink({ dbPath, tableName: 'page_audit', walMode: false });
    sink.append(entry);
    sink.close();

    const db = new Database(dbPath, { readonly: true });
    const count = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM page_audit').get();
    db.close();

    expect(count?.n).toBe(1);
  });

  it('should reject table names that are not plain identifiers', () => {
    expect(() => new SqliteLogSink({ dbPath: ':memory:', tableName: 'audit; DROP TABLE x' }))
      .toThrow('Invalid audit table name');
  });

  it('should work in memory', () => {
    const sink = new SqliteLogSink({ dbPath: ':memory:', walMode: false });
    expect(sink.append(entry)).toBe(true);
    sink.close();
  });
});
