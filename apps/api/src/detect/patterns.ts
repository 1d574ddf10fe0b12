import type { ExtractorConfig } from '../config';
import { cellText } from '../extract/rows';
import type { CellValue, ColumnInfo } from '../types/evidence';
import { type DetectorMatch, type ValueDetector, matchAll } from './types';

const isText = (column: ColumnInfo) => column.typeClass === 'Text';

const textMatches = (value: CellValue, pattern: RegExp, normalize: (m: string) => string = m => m): DetectorMatch[] => {
  const text = cellText(value);
  if (text === null) return [];
  return matchAll(text, pattern).map(m => ({ value: normalize(m) }));
};

export const normalizePhone = (text: string, config: ExtractorConfig): string | null => {
  const digits = text.replace(/\D/g, '');
  if (digits.length < config.phoneDigits.min || digits.length > config.phoneDigits.max) return null;
  return `+${digits}`;
};

const count = (text: string, ch: string) => text.split(ch).length - 1;

// Strips trailing sentence punctuation; a closing paren stays when it balances one in the link.
export const trimUrl = (url: string): string => {
  const trimmed = url.replace(/[.,;:!?\]}]+$/, '');
  if (trimmed.endsWith(')') && count(trimmed, ')') > count(trimmed, '(')) return trimUrl(trimmed.slice(0, -1));
  return trimmed;
};

export const emailDetector = (config: ExtractorConfig): ValueDetector => ({
  kind: 'email',
  entityType: 'Identifier',
  subtype: 'Email',
  appliesTo: column => isText(column) || column.hints.email,
  match: value => textMatches(value, config.patterns.email)
});

/**
 * Broad net: any cell with a digit is probed, then filtered on digit count alone.
 * Long numeric ids and timestamps rendered as text can pass that filter.
 */
export const phoneDetector = (config: ExtractorConfig): ValueDetector => ({
  kind: 'phone',
  entityType: 'Identifier',
  subtype: 'Phone',
  appliesTo: column => isText(column) || column.hints.phone,
  match: (value, column) => {
    const text = cellText(value);
    if (text === null) return [];
    if (!column.hints.phone && !/\d/.test(text)) return [];
    const phone = normalizePhone(text, config);
    return phone ? [{ value: phone }] : [];
  }
});

export const uuidDetector = (config: ExtractorConfig): ValueDetector => ({
  kind: 'uuid',
  entityType: 'Identifier',
  subtype: 'UUID',
  appliesTo: column => isText(column) || column.hints.uuid,
  match: value => textMatches(value, config.patterns.uuid, m => m.toLowerCase())
});

export const ipv4Detector = (config: ExtractorConfig): ValueDetector => ({
  kind: 'ipv4',
  entityType: 'Identifier',
  subtype: 'IPv4',
  appliesTo: isText,
  match: value => textMatches(value, config.patterns.ipv4)
});

export const urlDetector = (config: ExtractorConfig): ValueDetector => ({
  kind: 'url',
  entityType: 'Identifier',
  subtype: 'URL',
  appliesTo: isText,
  match: value => textMatches(value, config.patterns.url, trimUrl)
});

export const identifierDetectors = (config: ExtractorConfig): ValueDetector[] => [
  emailDetector(config),
  phoneDetector(config),
  uuidDetector(config),
  ipv4Detector(config),
  urlDetector(config)
];
