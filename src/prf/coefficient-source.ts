/**
 * @file prf/coefficient-source.ts
 * @brief Hash-to-vector expansion: (nonce, index) -> coefficients in Z_2N
 *
 * SHAKE256 absorbs the nonce bytes followed by the index as 8 little-endian
 * bytes, then squeezes nLwr * 8 bytes. Output lane i, read as a
 * little-endian u64, reduced mod 2N is coefficient i; its mask address is i.
 * Lanes are pulled from the sponge one at a time as the consumer asks for
 * the next coefficient.
 */

import { LwrError, LwrErrorCode } from '../api/types';
import type { CoefficientItem, Nonce, PrfIndex } from '../api/types';
import { LANE_MASK } from '../keccak/constants';
import { Shake256 } from '../keccak/sponge';
import type { LwrParameterSet } from '../parameters/types';

const U64_BYTES = 8;

/**
 * Encode a 64-bit unsigned value as 8 little-endian bytes
 */
export function encodeU64LE(value: bigint): Uint8Array {
  const out = new Uint8Array(U64_BYTES);
  let v = value;
  for (let i = 0; i < U64_BYTES; i++) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

/**
 * Normalize a PRF index to a u64 bigint
 */
export function normalizeIndex(index: PrfIndex): bigint {
  if (typeof index === 'number' && !Number.isSafeInteger(index)) {
    throw new LwrError(`PRF index must be an integer, got ${index}`, LwrErrorCode.INVALID_INDEX, { index });
  }
  const value = BigInt(index);
  if (value < 0n || value > LANE_MASK) {
    throw new LwrError('PRF index must fit in 64 unsigned bits', LwrErrorCode.INVALID_INDEX, {
      index: value.toString(),
    });
  }
  return value;
}

/**
 * Bytes absorbed for a nonce
 */
export function encodeNonce(nonce: Nonce): Uint8Array {
  if (typeof nonce === 'bigint') {
    if (nonce < 0n || nonce > LANE_MASK) {
      throw new LwrError('Integer nonce must fit in 64 unsigned bits', LwrErrorCode.INVALID_NONCE, {
        nonce: nonce.toString(),
      });
    }
    return encodeU64LE(nonce);
  }
  return nonce;
}

/**
 * Stream the coefficient vector for (nonce, index). Deterministic: the same
 * inputs always produce the same sequence. Inputs are checked before the
 * first item is requested.
 */
export function coefficientStream(
  nonce: Nonce,
  index: PrfIndex,
  params: LwrParameterSet
): Generator<CoefficientItem, void, undefined> {
  const nonceBytes = encodeNonce(nonce);
  const indexBytes = encodeU64LE(normalizeIndex(index));

  const xof = new Shake256();
  xof.update(nonceBytes).update(indexBytes).finalize();
  xof.beginSqueeze(params.nLwr * U64_BYTES);
  return pullCoefficients(xof, params);
}

function* pullCoefficients(
  xof: Shake256,
  params: LwrParameterSet
): Generator<CoefficientItem, void, undefined> {
  const reduce = BigInt(params.modulusN * 2 - 1);
  for (let i = 0; i < params.nLwr; i++) {
    const { lane } = xof.squeezeLane();
    yield {
      coefficient: Number(lane & reduce),
      maskAddress: i,
      last: i === params.nLwr - 1,
    };
  }
}

/**
 * Collect the full coefficient vector
 */
export function hashToVector(nonce: Nonce, index: PrfIndex, params: LwrParameterSet): number[] {
  const out: number[] = [];
  for (const item of coefficientStream(nonce, index, params)) {
    out.push(item.coefficient);
  }
  return out;
}
