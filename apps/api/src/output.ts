import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import XLSX from 'xlsx';
import { ENTITY_TYPES, type EvidenceRecord, type ExtractionReport } from './types/evidence';

export type OutputFormat = 'json' | 'csv' | 'xlsx';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'xlsx'];

// Field names are part of the exchange format with scoring tools; keep them verbatim.
export type OutputRecord = {
  entity_type: string;
  subtype: string;
  value: string;
  raw?: string;
  table: string;
  rowid: string;
  column: string;
};

export const isOutputFormat = (value: string): value is OutputFormat => OUTPUT_FORMATS.some(f => f === value);

export const toOutputRecord = (r: EvidenceRecord): OutputRecord => ({
  entity_type: r.entityType,
  subtype: r.subtype,
  value: r.value,
  ...(r.raw !== undefined ? { raw: r.raw } : {}),
  table: r.table,
  rowid: r.rowId,
  column: r.column
});

export const outputColumns = (records: OutputRecord[]) =>
  Array.from(new Set(records.flatMap(r => Object.keys(r)))).sort();

export const renderJson = (records: EvidenceRecord[]) => JSON.stringify(records.map(toOutputRecord), null, 2);

export const renderCsv = (records: EvidenceRecord[]) => {
  if (!records.length) return '';
  const rows = records.map(toOutputRecord);
  return Papa.unparse(rows, { columns: outputColumns(rows), newline: '\n' });
};

export const buildEvidenceWorkbook = (report: ExtractionReport): Buffer => {
  const workbook = XLSX.utils.book_new();
  const rows = report.records.map(toOutputRecord);

  const evidence = rows.length
    ? XLSX.utils.json_to_sheet(rows, { header: outputColumns(rows) })
    : XLSX.utils.aoa_to_sheet([['No evidence found']]);
  XLSX.utils.book_append_sheet(workbook, evidence, 'evidence');

  const summary = XLSX.utils.aoa_to_sheet([
    ['database', report.database],
    ['tables_scanned', report.tablesScanned],
    ...ENTITY_TYPES.map(t => [t, report.counts[t]]),
    [],
    ['skipped_scope', 'skipped_name', 'reason'],
    ...report.skipped.map(s => [s.scope, s.name, s.reason])
  ]);
  XLSX.utils.book_append_sheet(workbook, summary, 'summary');

  return XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
};

export const formatForPath = (filePath: string): OutputFormat => {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return isOutputFormat(ext) ? ext : 'json';
};

export const outputFileName = (relativeDbPath: string, format: OutputFormat) =>
  `${relativeDbPath.split(/[\\/]+/).filter(Boolean).join('__')}.ground_truth.${format}`;

export const writeRecordsFile = async (report: ExtractionReport, outPath: string) => {
  const format = formatForPath(outPath);
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  if (format === 'xlsx') {
    await fs.writeFile(outPath, buildEvidenceWorkbook(report));
  } else {
    await fs.writeFile(outPath, format === 'csv' ? renderCsv(report.records) : renderJson(report.records), 'utf-8');
  }
  return format;
};
