import type Database from 'better-sqlite3';
import type { ExtractorConfig } from '../config';
import { quoteIdent } from '../ingest/db';
import type { Cell, CellValue, PrimaryKeySpec } from '../types/evidence';
import { identityExpression } from './identity';

export type StreamOptions = {
  limit?: number;
};

export type PairRow = {
  rowId: string;
  values: [CellValue, CellValue];
};

type CellRow = { __rid__: unknown; __val__: unknown };
type PairCellRow = { __rid__: unknown; __a__: unknown; __b__: unknown };

export const isCellValue = (value: unknown): value is CellValue =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint' || Buffer.isBuffer(value);

const limitClause = (limit?: number) => (limit === undefined ? '' : ` LIMIT ${Math.trunc(limit)}`);

const rowIdText = (rid: unknown) => (isCellValue(rid) && !Buffer.isBuffer(rid) ? String(rid) : null);

/**
 * Yields every non-null value of one column with the row's identity. Integers come back as
 * bigint so large keys survive intact. Rows whose identity evaluates to NULL are left out.
 */
export function* streamColumn(
  db: Database.Database,
  table: string,
  identity: PrimaryKeySpec,
  column: string,
  config: ExtractorConfig,
  options: StreamOptions = {}
): Generator<Cell> {
  const rid = identityExpression(identity, config);
  const col = quoteIdent(column);
  const stmt = db
    .prepare<[], CellRow>(
      `SELECT ${rid} AS __rid__, ${col} AS __val__ FROM ${quoteIdent(table)} ` +
        `WHERE ${col} IS NOT NULL AND (${rid}) IS NOT NULL${limitClause(options.limit)}`
    )
    .safeIntegers(true);

  for (const row of stmt.iterate()) {
    const rowId = rowIdText(row.__rid__);
    if (rowId === null || !isCellValue(row.__val__)) continue;
    yield { rowId, column, value: row.__val__ };
  }
}

export function* streamColumnPair(
  db: Database.Database,
  table: string,
  identity: PrimaryKeySpec,
  columns: [string, string],
  config: ExtractorConfig,
  options: StreamOptions = {}
): Generator<PairRow> {
  const rid = identityExpression(identity, config);
  const [a, b] = columns.map(quoteIdent);
  const stmt = db
    .prepare<[], PairCellRow>(
      `SELECT ${rid} AS __rid__, ${a} AS __a__, ${b} AS __b__ FROM ${quoteIdent(table)} ` +
        `WHERE ${a} IS NOT NULL AND ${b} IS NOT NULL AND (${rid}) IS NOT NULL${limitClause(options.limit)}`
    )
    .safeIntegers(true);

  for (const row of stmt.iterate()) {
    const rowId = rowIdText(row.__rid__);
    if (rowId === null || !isCellValue(row.__a__) || !isCellValue(row.__b__)) continue;
    yield { rowId, values: [row.__a__, row.__b__] };
  }
}

// SQLite accepts NULL in non-INTEGER primary keys; such rows have no usable identity.
export const countUnidentifiedRows = (
  db: Database.Database,
  table: string,
  identity: PrimaryKeySpec,
  config: ExtractorConfig
): number => {
  if (identity.kind === 'rowid') return 0;
  const rid = identityExpression(identity, config);
  const row = db
    .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${quoteIdent(table)} WHERE (${rid}) IS NULL`)
    .get();
  return row?.n ?? 0;
};

export const cellText = (value: CellValue): string | null => (Buffer.isBuffer(value) ? null : String(value));
