/**
 * SPN boxes - substitution and permutation primitives for SPN ciphers
 */

export {
  BoxFactoryService,
  PBox,
  SBox,
  SpnService,
  createSpnServices,
  type SpnServices,
  type SpnServicesOptions,
} from './services';
export {
  LOG_LEVEL_ENV_VAR,
  getLogLevel,
  isLogLevelEnabled,
  type LogLevel,
} from './services/environment';
export { BoxCodedError, isBoxCodedError, type BoxErrorCode } from './errors';
export type { Bit, BitTransform, BitVector, Permutation, SBoxOptions, SBoxTable } from './types';
export {
  bitLength,
  bitsToNum,
  ceilLog,
  formatBits,
  isPowerOfTwo,
  numToBits,
  parseBits,
} from './utils';
