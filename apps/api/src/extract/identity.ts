import type { ExtractorConfig } from '../config';
import { quoteIdent, quoteLiteral } from '../ingest/db';
import type { ColumnInfo, PrimaryKeySpec } from '../types/evidence';

const ROWID_ALIASES = ['rowid', '_rowid_', 'oid'];

/**
 * Picks how rows of a table are identified. Returns null when the table has no declared
 * key and every implicit rowid alias is shadowed by a real column, since any other choice
 * would be a guess.
 */
export const resolveRowIdentity = (columns: ColumnInfo[]): PrimaryKeySpec | null => {
  const keyColumns = columns
    .filter(c => c.pkPosition > 0)
    .sort((a, b) => a.pkPosition - b.pkPosition)
    .map(c => c.name);

  if (keyColumns.length === 1) return { kind: 'single', column: keyColumns[0] };
  if (keyColumns.length > 1) return { kind: 'composite', columns: keyColumns };

  const taken = new Set(columns.map(c => c.name.toLowerCase()));
  const alias = ROWID_ALIASES.find(a => !taken.has(a));
  return alias ? { kind: 'rowid', alias } : null;
};

// BLOB key parts render as an X'..' hex literal, other values as stored.
const keyPart = (column: string, asText: boolean) => {
  const c = quoteIdent(column);
  const plain = asText ? `CAST(${c} AS TEXT)` : c;
  return `CASE typeof(${c}) WHEN 'blob' THEN 'X''' || hex(${c}) || '''' ELSE ${plain} END`;
};

// Composite identities are "a|b"; keys whose parts contain the separator can collide.
export const identityExpression = (spec: PrimaryKeySpec, config: ExtractorConfig): string => {
  switch (spec.kind) {
    case 'single':
      return keyPart(spec.column, false);
    case 'composite':
      return spec.columns
        .map(c => keyPart(c, true))
        .join(` || ${quoteLiteral(config.compositeKeySeparator)} || `);
    case 'rowid':
      return spec.alias;
  }
};

export const describeIdentity = (spec: PrimaryKeySpec) => {
  if (spec.kind === 'single') return `primary key ${spec.column}`;
  if (spec.kind === 'composite') return `composite key (${spec.columns.join(', ')})`;
  return `implicit ${spec.alias}`;
};
