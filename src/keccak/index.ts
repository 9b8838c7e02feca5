/**
 * @file keccak/index.ts
 * @brief Keccak-f1600 permutation and SHAKE256 sponge exports
 */

export {
  KECCAK_ROUNDS,
  STATE_LANES,
  LANE_MASK,
  ROUND_CONSTANTS,
  RHO_OFFSETS,
  PI_LANES,
} from './constants';

export { createState, rotl64, keccakRound, keccakF1600, permute } from './permutation';
export type { KeccakState } from './permutation';

export {
  RATE_LANES,
  RATE_BYTES,
  CAPACITY_LANES,
  SpongePhase,
  Shake256,
  shake256,
  isContiguousKeep,
  keepToByteCount,
  byteCountToKeep,
  bytesToLane,
  laneToBytes,
} from './sponge';
export type { SqueezedLane } from './sponge';
