import Database from 'better-sqlite3';
import type { ExtractorConfig } from '../config';
import type { ColumnInfo, SkippedItem } from '../types/evidence';
import { classifyColumn } from '../utils/profile';

export type IntrospectedTable = {
  name: string;
  columns: ColumnInfo[];
};

type TableInfoRow = {
  cid: number;
  name: string;
  type: string | null;
  notnull: number;
  dflt_value: unknown;
  pk: number;
};

export class DatabaseOpenError extends Error {
  constructor(
    readonly database: string,
    reason: string
  ) {
    super(`Could not open ${database}: ${reason}`);
    this.name = 'DatabaseOpenError';
  }
}

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

export const quoteLiteral = (value: string) => `'${value.replace(/'/g, "''")}'`;

export const openSQLite = (filePath: string): Database.Database => {
  try {
    return new Database(filePath, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new DatabaseOpenError(filePath, errorMessage(err));
  }
};

// An encrypted or corrupt file opens fine and only fails on the first read,
// so reading the catalog is where a bad database is detected.
export const listTables = (db: Database.Database, database: string): string[] => {
  try {
    return db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
      .all()
      .map(row => row.name);
  } catch (err) {
    throw new DatabaseOpenError(database, errorMessage(err));
  }
};

export const readColumns = (db: Database.Database, tableName: string, config: ExtractorConfig): ColumnInfo[] => {
  const rows = db.prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdent(tableName)})`).all();
  if (!rows.length) throw new Error('no column metadata returned');
  return rows.map(row => classifyColumn(row.name, row.type ?? '', row.pk, config));
};

export const introspectSQLite = (
  db: Database.Database,
  database: string,
  config: ExtractorConfig,
  skipped: SkippedItem[]
): IntrospectedTable[] => {
  const results: IntrospectedTable[] = [];

  for (const tableName of listTables(db, database)) {
    try {
      results.push({ name: tableName, columns: readColumns(db, tableName, config) });
    } catch (err) {
      const reason = `metadata unreadable: ${errorMessage(err)}`;
      console.warn(`[introspect] skipping ${tableName}: ${reason}`);
      skipped.push({ scope: 'table', name: tableName, reason });
    }
  }

  return results;
};
