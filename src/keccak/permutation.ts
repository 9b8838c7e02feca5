/**
 * @file keccak/permutation.ts
 * @brief Keccak-f1600 permutation over a 25-lane state
 *
 * The state is a BigUint64Array of 25 lanes, lane index = x + 5y. The
 * permutation is pure and total; the in-place variant is what the sponge
 * uses, the copying variant is for callers that want to keep their input.
 */

import { LwrError, LwrErrorCode } from '../api/types';
import {
  KECCAK_ROUNDS,
  LANE_MASK,
  PI_LANES,
  RHO_OFFSETS,
  ROUND_CONSTANTS,
  STATE_LANES,
} from './constants';

/**
 * 1600-bit Keccak state
 */
export type KeccakState = BigUint64Array;

/**
 * Allocate a zeroed state
 */
export function createState(): KeccakState {
  return new BigUint64Array(STATE_LANES);
}

/**
 * Rotate a 64-bit lane toward the most significant bit
 */
export function rotl64(x: bigint, n: bigint): bigint {
  if (n === 0n) return x;
  return ((x << n) | (x >> (64n - n))) & LANE_MASK;
}

function assertState(state: KeccakState): void {
  if (!(state instanceof BigUint64Array) || state.length !== STATE_LANES) {
    throw new LwrError(
      `Keccak state must be ${STATE_LANES} 64-bit lanes`,
      LwrErrorCode.INVALID_STATE,
      { length: state.length }
    );
  }
}

/**
 * Apply a single round (theta, rho, pi, chi, iota) in place
 */
export function keccakRound(state: KeccakState, round: number): void {
  assertState(state);
  if (!Number.isInteger(round) || round < 0 || round >= KECCAK_ROUNDS) {
    throw new LwrError(
      `Round number must be in [0, ${KECCAK_ROUNDS})`,
      LwrErrorCode.INVALID_STATE,
      { round }
    );
  }
  applyRound(state, round);
}

function applyRound(state: KeccakState, round: number): void {
  // Theta
  const parity: bigint[] = new Array<bigint>(5);
  for (let x = 0; x < 5; x++) {
    parity[x] = state[x] ^ state[x + 5] ^ state[x + 10] ^ state[x + 15] ^ state[x + 20];
  }
  for (let x = 0; x < 5; x++) {
    const d = parity[(x + 4) % 5] ^ rotl64(parity[(x + 1) % 5], 1n);
    for (let y = 0; y < 25; y += 5) {
      state[x + y] ^= d;
    }
  }

  // Rho and pi
  let carried = state[1];
  for (let i = 0; i < 24; i++) {
    const target = PI_LANES[i];
    const displaced = state[target];
    state[target] = rotl64(carried, RHO_OFFSETS[i]);
    carried = displaced;
  }

  // Chi
  const row: bigint[] = new Array<bigint>(5);
  for (let y = 0; y < 25; y += 5) {
    for (let x = 0; x < 5; x++) {
      row[x] = state[x + y];
    }
    for (let x = 0; x < 5; x++) {
      state[x + y] = row[x] ^ (~row[(x + 1) % 5] & LANE_MASK & row[(x + 2) % 5]);
    }
  }

  // Iota
  state[0] ^= ROUND_CONSTANTS[round];
}

/**
 * Apply all 24 rounds in place
 */
export function keccakF1600(state: KeccakState): void {
  assertState(state);
  for (let round = 0; round < KECCAK_ROUNDS; round++) {
    applyRound(state, round);
  }
}

/**
 * Return the permutation of `state` without touching the input
 */
export function permute(state: KeccakState): KeccakState {
  assertState(state);
  const out = new BigUint64Array(state);
  keccakF1600(out);
  return out;
}
