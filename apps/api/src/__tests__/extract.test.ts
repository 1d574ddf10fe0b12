import fs from 'fs';
import path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { extractBatch, extractEvidence, formatSummary } from '../extract';
import { dedupeRecords, recordKey } from '../extract/dedupe';
import { DatabaseOpenError, quoteIdent } from '../ingest/db';
import type { EvidenceRecord } from '../types/evidence';
import { MESSAGES_DDL, makeTempDir, memoryDb, writeDbFile } from './fixtures';

const MIXED_DDL = `
  ${MESSAGES_DDL}
  CREATE TABLE contacts (id INTEGER PRIMARY KEY, display_name TEXT, email TEXT, phone TEXT, device_uuid TEXT, updated_at TEXT);
  INSERT INTO contacts VALUES
    (1, 'Ana', 'ana@example.com', '(555) 123-4567', 'A0B1C2D3-E4F5-4A6B-8C7D-9E0F1A2B3C4D', '2024-05-06T07:08:09Z'),
    (2, 'Ben', NULL, '12345', NULL, NULL);
  CREATE TABLE visits (id INTEGER PRIMARY KEY, url TEXT, visit_time INTEGER);
  INSERT INTO visits VALUES (1, 'https://example.com/login?next=home', 1700000000123);
`;

describe('extractEvidence', () => {
  it('finds exactly the email, epoch and link in a message row', () => {
    const db = memoryDb(MESSAGES_DDL);
    const report = extractEvidence(db);

    expect(report.records).toEqual([
      {
        entityType: 'Identifier',
        subtype: 'Email',
        value: 'a@b.com',
        table: 'messages',
        rowId: '1',
        column: 'body'
      },
      {
        entityType: 'Temporal',
        subtype: 'UnixEpoch',
        value: '2023-11-14T22:13:20.000Z',
        raw: '1700000000',
        table: 'messages',
        rowId: '1',
        column: 'sent_at'
      },
      {
        entityType: 'Relational',
        subtype: 'sender_id->recipient_id',
        value: '10->20',
        table: 'messages',
        rowId: '1',
        column: 'sender_id,recipient_id'
      }
    ]);
    expect(report.counts).toEqual({ Identifier: 1, Temporal: 1, Relational: 1 });
    expect(report.tablesScanned).toBe(1);
    expect(report.skipped).toEqual([]);
    db.close();
  });

  it('only runs the requested entity classes', () => {
    const db = memoryDb(MESSAGES_DDL);
    const report = extractEvidence(db, { entities: ['Relational'] });
    expect(report.records.map(r => r.entityType)).toEqual(['Relational']);
    db.close();
  });

  it('returns an identical ordered record list on a second run', () => {
    const db = memoryDb(MIXED_DDL);
    const first = extractEvidence(db);
    const second = extractEvidence(db);
    expect(second.records).toEqual(first.records);
    expect(first.records.length).toBeGreaterThan(5);
    db.close();
  });

  it('never reports two records with the same key', () => {
    const db = memoryDb(`
      ${MIXED_DDL}
      INSERT INTO messages VALUES (2, 11, 21, 'a@b.com, again a@b.com', 1700000001);
    `);
    const { records } = extractEvidence(db);
    const keys = records.map(recordKey);
    expect(new Set(keys).size).toBe(keys.length);
    expect(records.filter(r => r.subtype === 'Email' && r.rowId === '2')).toHaveLength(1);
    db.close();
  });

  it('only reports values backed by the cell they point at', () => {
    const db = memoryDb(MIXED_DDL);
    const { records } = extractEvidence(db, { entities: ['Identifier', 'Temporal'] });

    const cellAt = (r: EvidenceRecord) => {
      const row = db
        .prepare<[string], { v: unknown }>(
          `SELECT ${quoteIdent(r.column)} AS v FROM ${quoteIdent(r.table)} WHERE CAST(id AS TEXT) = ?`
        )
        .get(r.rowId);
      return String(row?.v);
    };

    for (const r of records) {
      const cell = cellAt(r);
      if (r.subtype === 'Phone') {
        expect(r.value).toBe(`+${cell.replace(/\D/g, '')}`);
      } else if (r.subtype === 'UnixEpoch') {
        expect(r.raw).toBe(cell);
      } else {
        expect(cell.toLowerCase()).toContain(r.value.toLowerCase());
      }
    }
    db.close();
  });

  it('reports identifiers across tables in scan order', () => {
    const db = memoryDb(MIXED_DDL);
    const { records } = extractEvidence(db, { entities: ['Identifier'] });
    expect(records.map(r => [r.table, r.column, r.subtype, r.value])).toEqual([
      ['messages', 'body', 'Email', 'a@b.com'],
      ['contacts', 'email', 'Email', 'ana@example.com'],
      ['contacts', 'phone', 'Phone', '+5551234567'],
      ['contacts', 'device_uuid', 'UUID', 'a0b1c2d3-e4f5-4a6b-8c7d-9e0f1a2b3c4d'],
      ['contacts', 'updated_at', 'Phone', '+20240506070809'],
      ['visits', 'url', 'URL', 'https://example.com/login?next=home']
    ]);
    db.close();
  });
});

describe('scan limit', () => {
  const ddl = `
    CREATE TABLE people (id INTEGER PRIMARY KEY, email TEXT);
    INSERT INTO people (email) VALUES
      ('u1@example.com'), ('u2@example.com'), ('u3@example.com'), ('u4@example.com'), ('u5@example.com');
  `;

  it('considers exactly N values when the column holds more', () => {
    const db = memoryDb(ddl);
    const { records } = extractEvidence(db, { entities: ['Identifier'], limit: 3 });
    expect(records.map(r => r.rowId)).toEqual(['1', '2', '3']);
    db.close();
  });

  it('considers every value when the column holds no more than N', () => {
    const db = memoryDb(ddl);
    const { records } = extractEvidence(db, { entities: ['Identifier'], limit: 10 });
    expect(records).toHaveLength(5);
    db.close();
  });
});

describe('row identity edge cases', () => {
  it('uses the real rowid when a column is named rowid', () => {
    const db = memoryDb(`
      CREATE TABLE notes (rowid TEXT, body TEXT);
      INSERT INTO notes VALUES ('r-1', 'mail me: z@q.io');
    `);
    const { records } = extractEvidence(db, { entities: ['Identifier'] });
    expect(records.map(r => [r.rowId, r.value])).toEqual([['1', 'z@q.io']]);
    db.close();
  });

  it('skips a table whose rows cannot be identified', () => {
    const db = memoryDb(`
      CREATE TABLE weird (rowid TEXT, _rowid_ TEXT, oid TEXT, email TEXT);
      INSERT INTO weird VALUES ('a', 'b', 'c', 'x@y.com');
      ${MESSAGES_DDL}
    `);
    const report = extractEvidence(db);
    expect(report.skipped).toEqual([
      { scope: 'table', name: 'weird', reason: 'no primary key and every rowid alias is shadowed by a column' }
    ]);
    expect(report.records.every(r => r.table === 'messages')).toBe(true);
    expect(report.tablesScanned).toBe(1);
    db.close();
  });

  it('leaves out rows with a NULL key and reports them', () => {
    const db = memoryDb(`
      CREATE TABLE handles (handle TEXT PRIMARY KEY, email TEXT);
      INSERT INTO handles VALUES ('h1', 'one@example.com'), (NULL, 'two@example.com');
    `);
    const report = extractEvidence(db);
    expect(report.records.map(r => [r.rowId, r.value])).toEqual([['h1', 'one@example.com']]);
    expect(report.skipped).toEqual([
      { scope: 'rows', name: 'handles', reason: '1 row(s) with a NULL primary key handle not scanned' }
    ]);
    db.close();
  });
});

describe('database files', () => {
  let dir = '';

  beforeAll(() => {
    dir = makeTempDir();
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('opens a path read-only and closes it afterwards', () => {
    const file = writeDbFile(dir, 'chat.db', MESSAGES_DDL);
    const report = extractEvidence(file);
    expect(report.database).toBe(file);
    expect(report.counts).toEqual({ Identifier: 1, Temporal: 1, Relational: 1 });

    const check = new Database(file);
    expect(check.prepare('SELECT COUNT(*) AS n FROM messages').get()).toEqual({ n: 1 });
    check.close();
  });

  it('raises DatabaseOpenError for a missing file', () => {
    expect(() => extractEvidence(path.join(dir, 'missing.db'))).toThrow(DatabaseOpenError);
  });

  it('raises DatabaseOpenError for a file that is not a database', () => {
    const file = path.join(dir, 'garbage.db');
    fs.writeFileSync(file, 'x'.repeat(1024));
    expect(() => extractEvidence(file)).toThrow(DatabaseOpenError);
  });

  it('keeps going after a failed database in a batch', () => {
    const good = writeDbFile(dir, 'batch-good.db', MESSAGES_DDL);
    const missing = path.join(dir, 'batch-missing.db');
    const results = extractBatch([missing, good]);

    expect(results.map(r => [r.database, r.ok])).toEqual([
      [missing, false],
      [good, true]
    ]);
    const [failed, ok] = results;
    if (failed.ok || !ok.ok) throw new Error('unexpected batch outcome');
    expect(failed.error).toMatch(/^Could not open/);
    expect(ok.report.records).toHaveLength(3);
  });
});

describe('dedupeRecords', () => {
  const base: EvidenceRecord = {
    entityType: 'Identifier',
    subtype: 'IPv4',
    value: '10.0.0.1',
    table: 't',
    rowId: '1',
    column: 'c'
  };

  it('keeps the first of each key in order', () => {
    const other = { ...base, subtype: 'URL', value: 'http://10.0.0.1' };
    expect(dedupeRecords([base, other, { ...base }])).toEqual([base, other]);
  });

  it('treats records differing in any key field as distinct', () => {
    const records = [base, { ...base, rowId: '2' }, { ...base, column: 'd' }, { ...base, table: 'u' }];
    expect(dedupeRecords(records)).toHaveLength(4);
  });
});

describe('formatSummary', () => {
  it('lists counts and skipped items', () => {
    const summary = formatSummary({
      database: 'x.db',
      records: [],
      counts: { Identifier: 2, Temporal: 0, Relational: 1 },
      tablesScanned: 1,
      skipped: [{ scope: 'table', name: 'fts', reason: 'query failed: boom' }]
    });
    expect(summary).toBe('Identifier=2 Temporal=0 Relational=1; skipped: table fts (query failed: boom)');
  });
});
