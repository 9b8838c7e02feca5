/**
 * @file prf/index.ts
 * @brief LWR-PRF pipeline exports
 */

export { SecretMask } from './secret-mask';
export {
  parseSecretKeyJson,
  parseSecretKeyMem,
  serializeSecretKey,
  loadSecretMask,
  saveSecretMask,
  secretKeyFileExists,
} from './key-store';
export {
  coefficientStream,
  hashToVector,
  encodeU64LE,
  encodeNonce,
  normalizeIndex,
} from './coefficient-source';
export { KeyedReducer, innerProduct } from './keyed-reducer';
export type { ReducerPhase } from './keyed-reducer';
export { roundToPlaintext, roundingTrace } from './rounding';
export { LwrPrf } from './lwr-prf';
