import path from 'path';
import type Database from 'better-sqlite3';
import { DEFAULT_CONFIG, type ExtractorConfig } from '../config';
import { type DetectorSet, type ValueDetector, buildDetectorSet, detect, detectRelations } from '../detect';
import { type IntrospectedTable, introspectSQLite, openSQLite } from '../ingest/db';
import {
  ENTITY_TYPES,
  type BatchResult,
  type EntityCounts,
  type EntityType,
  type EvidenceRecord,
  type ExtractionReport,
  type ExtractionRequest,
  type PrimaryKeySpec,
  type SkippedItem
} from '../types/evidence';
import { dedupeRecords } from './dedupe';
import { describeIdentity, resolveRowIdentity } from './identity';
import { type StreamOptions, countUnidentifiedRows, streamColumn } from './rows';

export const DEFAULT_REQUEST: ExtractionRequest = { entities: [...ENTITY_TYPES] };

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export const countByEntity = (records: EvidenceRecord[]): EntityCounts => {
  const counts: EntityCounts = { Identifier: 0, Temporal: 0, Relational: 0 };
  records.forEach(r => {
    counts[r.entityType] += 1;
  });
  return counts;
};

const scanColumns = (
  db: Database.Database,
  table: IntrospectedTable,
  identity: PrimaryKeySpec,
  detectors: readonly ValueDetector[],
  config: ExtractorConfig,
  options: StreamOptions
) =>
  table.columns.flatMap(column => {
    if (!detectors.some(d => d.appliesTo(column))) return [];
    const cells = streamColumn(db, table.name, identity, column.name, config, options);
    return detect(table.name, column, cells, detectors);
  });

const scanTable = (
  db: Database.Database,
  table: IntrospectedTable,
  identity: PrimaryKeySpec,
  wanted: Set<EntityType>,
  detectors: DetectorSet,
  config: ExtractorConfig,
  options: StreamOptions
): EvidenceRecord[] => {
  const records: EvidenceRecord[] = [];
  if (wanted.has('Identifier')) {
    records.push(...scanColumns(db, table, identity, detectors.identifier, config, options));
  }
  if (wanted.has('Temporal')) {
    records.push(...scanColumns(db, table, identity, detectors.temporal, config, options));
  }
  if (wanted.has('Relational')) {
    records.push(...detectRelations(db, table.name, table.columns, identity, config, options));
  }
  return records;
};

/**
 * Extracts provenance-tagged evidence from one SQLite database. A path is opened read-only and
 * closed afterwards; an open handle is used as-is and left open. Tables that cannot be read
 * are skipped and listed in the report; a database that cannot be opened throws
 * DatabaseOpenError.
 */
export const extractEvidence = (
  source: string | Database.Database,
  request: ExtractionRequest = DEFAULT_REQUEST,
  config: ExtractorConfig = DEFAULT_CONFIG
): ExtractionReport => {
  const ownsHandle = typeof source === 'string';
  const db = typeof source === 'string' ? openSQLite(source) : source;
  const database = typeof source === 'string' ? source : db.name;

  try {
    const wanted = new Set(request.entities);
    const detectors = buildDetectorSet(config);
    const options: StreamOptions = { limit: request.limit };
    const skipped: SkippedItem[] = [];
    const collected: EvidenceRecord[] = [];
    let tablesScanned = 0;

    for (const table of introspectSQLite(db, database, config, skipped)) {
      const identity = resolveRowIdentity(table.columns);
      if (!identity) {
        const reason = 'no primary key and every rowid alias is shadowed by a column';
        console.warn(`[extract] skipping ${table.name}: ${reason}`);
        skipped.push({ scope: 'table', name: table.name, reason });
        continue;
      }

      try {
        const unidentified = countUnidentifiedRows(db, table.name, identity, config);
        const records = scanTable(db, table, identity, wanted, detectors, config, options);
        if (unidentified > 0) {
          const reason = `${unidentified} row(s) with a NULL ${describeIdentity(identity)} not scanned`;
          console.warn(`[extract] ${table.name}: ${reason}`);
          skipped.push({ scope: 'rows', name: table.name, reason });
        }
        collected.push(...records);
        tablesScanned += 1;
      } catch (err) {
        const reason = `query failed: ${errorMessage(err)}`;
        console.warn(`[extract] skipping ${table.name}: ${reason}`);
        skipped.push({ scope: 'table', name: table.name, reason });
      }
    }

    const records = dedupeRecords(collected);
    return { database, records, counts: countByEntity(records), tablesScanned, skipped };
  } finally {
    if (ownsHandle) db.close();
  }
};

/**
 * Runs extraction over several databases in turn, each with its own handle. A failure on one
 * database is recorded and the next one is processed.
 */
export const extractBatch = (
  databases: string[],
  request: ExtractionRequest = DEFAULT_REQUEST,
  config: ExtractorConfig = DEFAULT_CONFIG
): BatchResult[] =>
  databases.map((database): BatchResult => {
    try {
      const report = extractEvidence(database, request, config);
      console.log(`[extract] ${path.basename(database)}: ${formatSummary(report)}`);
      return { database, ok: true, report };
    } catch (err) {
      const error = errorMessage(err);
      console.warn(`[extract] ${database} failed: ${error}`);
      return { database, ok: false, error };
    }
  });

export const formatSummary = (report: ExtractionReport) => {
  const counts = ENTITY_TYPES.map(t => `${t}=${report.counts[t]}`).join(' ');
  const skipped = report.skipped.map(s => `${s.scope} ${s.name} (${s.reason})`);
  return skipped.length ? `${counts}; skipped: ${skipped.join('; ')}` : counts;
};
