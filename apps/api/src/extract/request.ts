import { ENTITY_TYPES, type EntityType, type ExtractionRequest } from '../types/evidence';

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

const isPresent = (value: unknown) => value !== null && value !== undefined && String(value).trim() !== '';

export const parseEntities = (raw: unknown): EntityType[] => {
  if (!isPresent(raw) || String(raw).trim().toLowerCase() === 'all') return [...ENTITY_TYPES];

  const wanted = String(raw)
    .split(',')
    .map(e => e.trim().toLowerCase())
    .filter(Boolean);

  const unknown = wanted.filter(w => !ENTITY_TYPES.some(t => t.toLowerCase() === w));
  if (unknown.length) {
    throw new InvalidRequestError(`Unknown entity class: ${unknown.join(', ')} (expected identifier, temporal, relational or all)`);
  }

  return ENTITY_TYPES.filter(t => wanted.includes(t.toLowerCase()));
};

export const parseLimit = (raw: unknown): number | undefined => {
  if (!isPresent(raw)) return undefined;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidRequestError(`limit must be a positive integer, got ${String(raw)}`);
  }
  return limit;
};

export const parseExtractionRequest = (entities: unknown, limit: unknown, fallbackLimit?: unknown): ExtractionRequest => ({
  entities: parseEntities(entities),
  limit: parseLimit(isPresent(limit) ? limit : fallbackLimit)
});
