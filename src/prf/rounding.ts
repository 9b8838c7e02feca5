/**
 * @file prf/rounding.ts
 * @brief Modulus switch of the inner product from Z_2N down to Z_P
 *
 * PRF(x) = (-1)^msb(<a,s> mod 2N) * floor(P/N * (<a,s> mod N)) mod P
 *
 * With N and P powers of two, floor(P/N * r) is r shifted right by
 * log2 N - log2 P, i.e. the top log2 P bits of the N-width residue.
 */

import { LwrError, LwrErrorCode } from '../api/types';
import type { RoundingTrace } from '../api/types';
import { calculateDerivedParameters } from '../parameters';
import { assertValidParameterSet } from '../parameters/validator';
import type { LwrParameterSet } from '../parameters/types';

/**
 * Round an accumulated inner product, keeping every intermediate
 */
export function roundingTrace(sum: number, params: LwrParameterSet): RoundingTrace {
  assertValidParameterSet(params);
  if (!Number.isSafeInteger(sum) || sum < 0) {
    throw new LwrError(
      `Accumulated sum must be a non-negative safe integer, got ${sum}`,
      LwrErrorCode.INVALID_ACCUMULATOR,
      { sum }
    );
  }
  const { twoN, rescaleShift } = calculateDerivedParameters(params);
  const N = params.modulusN;
  const P = params.plaintextModulus;

  const mod2N = sum % twoN;
  const msb: 0 | 1 = mod2N >= N ? 1 : 0;
  const modN = mod2N % N;
  const rescaled = Math.floor(modN / 2 ** rescaleShift);
  // rescaled == 0 negates to 0, not P
  const output = msb === 1 ? (P - rescaled) % P : rescaled;

  return { sum, mod2N, modN, msb, rescaled, output };
}

/**
 * Map an accumulated inner product to a PRF output in [0, P)
 */
export function roundToPlaintext(sum: number, params: LwrParameterSet): number {
  return roundingTrace(sum, params).output;
}
