import type { ExtractorConfig } from '../config';
import type { CellValue } from '../types/evidence';
import { type ValueDetector, matchAll } from './types';

const NUMERIC_TEXT = /^-?\d+(?:\.\d+)?$/;

const numericCandidate = (value: CellValue): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && NUMERIC_TEXT.test(value.trim())) return Number(value.trim());
  return null;
};

/**
 * Converts a numeric Unix timestamp to an ISO-8601 UTC instant. Magnitudes above the
 * millisecond threshold are read as milliseconds. Only instants strictly inside the
 * configured window (2000-01-01 to 2030-01-01) are accepted.
 */
export const epochToIso = (value: number, config: ExtractorConfig): string | null => {
  const { minSeconds, maxSeconds, millisecondThreshold } = config.epoch;
  const millis = Math.abs(value) > millisecondThreshold ? value : value * 1000;
  const seconds = millis / 1000;
  if (!(seconds > minSeconds && seconds < maxSeconds)) return null;
  return new Date(millis).toISOString();
};

export const epochDetector = (config: ExtractorConfig): ValueDetector => ({
  kind: 'epoch',
  entityType: 'Temporal',
  subtype: 'UnixEpoch',
  appliesTo: column => column.typeClass === 'Integer' || column.typeClass === 'Real' || column.hints.time,
  match: value => {
    const n = numericCandidate(value);
    if (n === null) return [];
    const iso = epochToIso(n, config);
    return iso ? [{ value: iso, raw: String(value) }] : [];
  }
});

export const iso8601Detector = (config: ExtractorConfig): ValueDetector => ({
  kind: 'iso8601',
  entityType: 'Temporal',
  subtype: 'ISO8601',
  appliesTo: column => column.typeClass === 'Text' || column.hints.time,
  // One record per cell, carrying the whole cell text.
  match: value => {
    if (typeof value !== 'string') return [];
    return matchAll(value, config.patterns.iso8601).length ? [{ value }] : [];
  }
});

export const temporalDetectors = (config: ExtractorConfig): ValueDetector[] => [
  epochDetector(config),
  iso8601Detector(config)
];
