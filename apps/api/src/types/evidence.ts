export type EntityType = 'Identifier' | 'Temporal' | 'Relational';

export const ENTITY_TYPES: readonly EntityType[] = ['Identifier', 'Temporal', 'Relational'];

export type TypeClass = 'Text' | 'Integer' | 'Real' | 'Other';

export type ColumnHints = {
  email: boolean;
  phone: boolean;
  uuid: boolean;
  time: boolean;
  relation: boolean;
};

export type ColumnInfo = {
  name: string;
  declaredType: string;
  typeClass: TypeClass;
  pkPosition: number; // 0 when not part of the primary key
  hints: ColumnHints;
};

export type PrimaryKeySpec =
  | { kind: 'single'; column: string }
  | { kind: 'composite'; columns: string[] }
  | { kind: 'rowid'; alias: string };

// What SQLite hands back for a non-null cell once integers are read as bigint.
export type CellValue = string | number | bigint | Buffer;

export type Cell = {
  rowId: string;
  column: string;
  value: CellValue;
};

export type EvidenceRecord = {
  entityType: EntityType;
  subtype: string;
  value: string;
  raw?: string;
  table: string;
  rowId: string;
  column: string;
};

export type ExtractionRequest = {
  entities: EntityType[];
  limit?: number;
};

export type SkippedItem = {
  scope: 'database' | 'table' | 'rows';
  name: string;
  reason: string;
};

export type EntityCounts = Record<EntityType, number>;

export type ExtractionReport = {
  database: string;
  records: EvidenceRecord[];
  counts: EntityCounts;
  tablesScanned: number;
  skipped: SkippedItem[];
};

export type BatchResult =
  | { database: string; ok: true; report: ExtractionReport }
  | { database: string; ok: false; error: string };
