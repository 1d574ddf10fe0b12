import type { ExtractorConfig } from '../config';
import type { ColumnHints, ColumnInfo, TypeClass } from '../types/evidence';

export const normalizeTypeClass = (declaredType: string): TypeClass => {
  const t = declaredType.toUpperCase();
  if (t.includes('CHAR') || t.includes('TEXT') || t.includes('CLOB')) return 'Text';
  if (t.includes('INT')) return 'Integer';
  if (t.includes('REAL') || t.includes('FLOA') || t.includes('DOUB')) return 'Real';
  return 'Other';
};

const containsAny = (name: string, words: readonly string[]) => words.some(w => name.includes(w));

const tokens = (name: string) =>
  name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);

export const linkColumnPattern = (config: ExtractorConfig) => {
  const words = Array.from(new Set([...config.relation.sourceKeywords, ...config.relation.targetKeywords]));
  return new RegExp(`(?:^|_)(?:${words.join('|')}).*id$`, 'i');
};

export const columnHints = (name: string, config: ExtractorConfig): ColumnHints => {
  const lower = name.toLowerCase();
  return {
    email: containsAny(lower, config.hints.email),
    phone: containsAny(lower, config.hints.phone),
    uuid: containsAny(lower, config.hints.uuid),
    time:
      containsAny(lower, config.hints.time) ||
      tokens(name).some(token => config.hints.timeTokens.includes(token)),
    relation: linkColumnPattern(config).test(name)
  };
};

export const classifyColumn = (
  name: string,
  declaredType: string,
  pkPosition: number,
  config: ExtractorConfig
): ColumnInfo => ({
  name,
  declaredType,
  typeClass: normalizeTypeClass(declaredType),
  pkPosition,
  hints: columnHints(name, config)
});
