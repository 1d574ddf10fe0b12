import type { EvidenceRecord } from '../types/evidence';

export const recordKey = (r: EvidenceRecord) =>
  JSON.stringify([r.entityType, r.subtype, r.value, r.table, r.rowId, r.column]);

// Keeps the first occurrence of each key, so output order follows scan order.
export const dedupeRecords = (records: EvidenceRecord[]): EvidenceRecord[] => {
  const seen = new Set<string>();
  const out: EvidenceRecord[] = [];

  for (const r of records) {
    const key = recordKey(r);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }

  return out;
};
