import type { Cell, CellValue, ColumnInfo, EntityType, EvidenceRecord } from '../types/evidence';

export type DetectorKind = 'email' | 'phone' | 'uuid' | 'ipv4' | 'url' | 'epoch' | 'iso8601';

export type DetectorMatch = {
  value: string;
  raw?: string;
};

export type ValueDetector = {
  kind: DetectorKind;
  entityType: EntityType;
  subtype: string;
  appliesTo: (column: ColumnInfo) => boolean;
  match: (value: CellValue, column: ColumnInfo) => DetectorMatch[];
};

/**
 * Runs the detectors that apply to a column over its cells, one record per match.
 * Cells are consumed once; each cell is offered to every detector in order.
 */
export const detect = (
  table: string,
  column: ColumnInfo,
  cells: Iterable<Cell>,
  detectors: readonly ValueDetector[]
): EvidenceRecord[] => {
  const active = detectors.filter(d => d.appliesTo(column));
  if (!active.length) return [];

  const records: EvidenceRecord[] = [];
  for (const cell of cells) {
    for (const detector of active) {
      for (const m of detector.match(cell.value, column)) {
        records.push({
          entityType: detector.entityType,
          subtype: detector.subtype,
          value: m.value,
          ...(m.raw !== undefined ? { raw: m.raw } : {}),
          table,
          rowId: cell.rowId,
          column: column.name
        });
      }
    }
  }
  return records;
};

export const matchAll = (text: string, pattern: RegExp) => Array.from(text.matchAll(pattern), m => m[0]);
