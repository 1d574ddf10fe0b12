export type ExtractorConfig = Readonly<{
  patterns: Readonly<{
    email: RegExp;
    uuid: RegExp;
    ipv4: RegExp;
    url: RegExp;
    iso8601: RegExp;
  }>;
  hints: Readonly<{
    email: readonly string[];
    phone: readonly string[];
    uuid: readonly string[];
    time: readonly string[];
    timeTokens: readonly string[];
  }>;
  phoneDigits: Readonly<{ min: number; max: number }>;
  epoch: Readonly<{
    minSeconds: number;
    maxSeconds: number;
    millisecondThreshold: number;
  }>;
  relation: Readonly<{
    sourceKeywords: readonly string[];
    targetKeywords: readonly string[];
    maxPairs: number;
  }>;
  compositeKeySeparator: string;
}>;

export type ExtractorConfigOverrides = {
  maxRelationPairs?: number;
};

const OCTET = '(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';

// All pattern regexes carry the g flag and are only used through String#matchAll,
// which works on a copy, so sharing them across runs keeps no lastIndex state.
const PATTERNS = {
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  uuid: /\b[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}\b/g,
  ipv4: new RegExp(`(?<![\\d.])${OCTET}(?:\\.${OCTET}){3}(?!\\d|\\.\\d)`, 'g'),
  url: /\bhttps?:\/\/[^\s"'<>]+/gi,
  iso8601: /\b\d{4}-\d{2}-\d{2}(?:[ T]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})?)?(?![\d:])/g
};

const freezeAll = <T extends object>(value: T): Readonly<T> => {
  for (const inner of Object.values(value)) {
    if (inner && typeof inner === 'object' && !(inner instanceof RegExp)) freezeAll(inner);
  }
  return Object.freeze(value);
};

export const createExtractorConfig = (overrides: ExtractorConfigOverrides = {}): ExtractorConfig => {
  const maxPairs = overrides.maxRelationPairs ?? 2;
  if (!Number.isInteger(maxPairs) || maxPairs < 1) {
    throw new Error(`maxRelationPairs must be a positive integer, got ${maxPairs}`);
  }

  return freezeAll({
    patterns: { ...PATTERNS },
    hints: {
      email: ['email', 'e_mail', 'mail'],
      phone: ['phone', 'tel', 'mobile', 'msisdn'],
      uuid: ['uuid', 'guid'],
      time: ['time', 'date', 'timestamp', 'created', 'modified', 'updated', 'duration', 'added'],
      timeTokens: ['ts']
    },
    phoneDigits: { min: 10, max: 15 },
    epoch: {
      minSeconds: 946684800, // 2000-01-01T00:00:00Z
      maxSeconds: 1893456000, // 2030-01-01T00:00:00Z
      millisecondThreshold: 1e12
    },
    relation: {
      sourceKeywords: ['sender', 'from', 'src', 'author', 'owner', 'user'],
      targetKeywords: ['recipient', 'to', 'dst', 'peer', 'user'],
      maxPairs
    },
    compositeKeySeparator: '|'
  });
};

export const DEFAULT_CONFIG = createExtractorConfig();

export const configFromEnv = (env: NodeJS.ProcessEnv = process.env): ExtractorConfig => {
  const raw = env.MAX_RELATION_PAIRS;
  if (!raw) return DEFAULT_CONFIG;
  return createExtractorConfig({ maxRelationPairs: Number(raw) });
};
