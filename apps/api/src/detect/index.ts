import type { ExtractorConfig } from '../config';
import { identifierDetectors } from './patterns';
import { temporalDetectors } from './temporal';
import type { ValueDetector } from './types';

export type DetectorSet = {
  identifier: readonly ValueDetector[];
  temporal: readonly ValueDetector[];
};

export const buildDetectorSet = (config: ExtractorConfig): DetectorSet => ({
  identifier: identifierDetectors(config),
  temporal: temporalDetectors(config)
});

export { detect } from './types';
export { detectRelations, rankLinkPairs } from './relational';
export type { ValueDetector, DetectorKind, DetectorMatch } from './types';
