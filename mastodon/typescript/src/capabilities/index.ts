/**
 * Version-capability model.
 */

export {
  GENERATIONS,
  OLDEST_GENERATION,
  NEWEST_GENERATION,
  isGeneration,
  generationIndex,
  compareGenerations,
  generationsUpTo,
} from './generations.js';
export type { Generation, GenerationsFrom } from './generations.js';

export {
  CAPABILITY_MATRIX,
  buildCapabilityIndex,
  isCapabilityFlag,
  flagLifetime,
  isFlagActive,
  resolveActiveFlags,
} from './matrix.js';
export type {
  CapabilityMatrixDeclaration,
  CapabilityFlag,
  IntroducedAt,
  RetiredAt,
  IsActive,
  ActiveFlags,
  FlagLifetime,
} from './matrix.js';
