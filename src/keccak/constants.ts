/**
 * @file keccak/constants.ts
 * @brief Fixed Keccak-f1600 tables
 */

/** Number of rounds in Keccak-f1600 */
export const KECCAK_ROUNDS = 24;

/** Lanes in the 1600-bit state (5 x 5 grid, lane = x + 5y) */
export const STATE_LANES = 25;

/** Mask for 64-bit lane arithmetic on bigints */
export const LANE_MASK = 0xffffffffffffffffn;

/**
 * Round constants, XORed into lane 0 by the iota step
 */
export const ROUND_CONSTANTS: readonly bigint[] = Object.freeze([
  0x0000000000000001n, 0x0000000000008082n, 0x800000000000808an,
  0x8000000080008000n, 0x000000000000808bn, 0x0000000080000001n,
  0x8000000080008081n, 0x8000000000008009n, 0x000000000000008an,
  0x0000000000000088n, 0x0000000080008009n, 0x000000008000000an,
  0x000000008000808bn, 0x800000000000008bn, 0x8000000000008089n,
  0x8000000000008003n, 0x8000000000008002n, 0x8000000000000080n,
  0x000000000000800an, 0x800000008000000an, 0x8000000080008081n,
  0x8000000000008080n, 0x0000000080000001n, 0x8000000080008008n,
]);

/**
 * Rho rotation offsets, in the order lanes are visited by PI_LANES.
 * Lane 0 is never rotated and so has no entry.
 */
export const RHO_OFFSETS: readonly bigint[] = Object.freeze([
  1n, 3n, 6n, 10n, 15n, 21n, 28n, 36n, 45n, 55n, 2n, 14n,
  27n, 41n, 56n, 8n, 25n, 43n, 62n, 18n, 39n, 61n, 20n, 44n,
]);

/**
 * Pi lane walk starting from lane 1: lane PI_LANES[i] receives the previous
 * lane of the walk rotated by RHO_OFFSETS[i].
 */
export const PI_LANES: readonly number[] = Object.freeze([
  10, 7, 11, 17, 18, 3, 5, 16, 8, 21, 24, 4,
  15, 23, 19, 13, 12, 2, 20, 14, 22, 9, 6, 1,
]);
