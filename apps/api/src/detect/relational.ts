import type Database from 'better-sqlite3';
import type { ExtractorConfig } from '../config';
import { type StreamOptions, cellText, streamColumnPair } from '../extract/rows';
import type { ColumnInfo, EvidenceRecord, PrimaryKeySpec } from '../types/evidence';

export type LinkPair = {
  source: string;
  target: string;
  score: number;
};

// Earlier keywords rank higher; the first keyword found in the name decides.
export const keywordRank = (name: string, keywords: readonly string[]) => {
  const lower = name.toLowerCase();
  const index = keywords.findIndex(k => lower.includes(k));
  return index === -1 ? 0 : keywords.length - index;
};

/**
 * Scores every ordered pair of link-like columns and keeps the strongest ones.
 * Only naming is considered; declared foreign keys are never consulted.
 */
export const rankLinkPairs = (columns: ColumnInfo[], config: ExtractorConfig): LinkPair[] => {
  const linkColumns = columns.filter(c => c.hints.relation).map(c => c.name);
  if (linkColumns.length < 2) return [];

  const pairs: LinkPair[] = [];
  for (const source of linkColumns) {
    for (const target of linkColumns) {
      if (source === target) continue;
      const score =
        keywordRank(source, config.relation.sourceKeywords) + keywordRank(target, config.relation.targetKeywords);
      pairs.push({ source, target, score });
    }
  }

  return pairs
    .filter(p => p.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, config.relation.maxPairs);
};

export const detectRelations = (
  db: Database.Database,
  table: string,
  columns: ColumnInfo[],
  identity: PrimaryKeySpec,
  config: ExtractorConfig,
  options: StreamOptions = {}
): EvidenceRecord[] => {
  const records: EvidenceRecord[] = [];

  for (const pair of rankLinkPairs(columns, config)) {
    const rows = streamColumnPair(db, table, identity, [pair.source, pair.target], config, options);
    for (const row of rows) {
      const a = cellText(row.values[0]);
      const b = cellText(row.values[1]);
      if (a === null || b === null) continue;
      records.push({
        entityType: 'Relational',
        subtype: `${pair.source}->${pair.target}`,
        value: `${a}->${b}`,
        table,
        rowId: row.rowId,
        column: `${pair.source},${pair.target}`
      });
    }
  }

  return records;
};
