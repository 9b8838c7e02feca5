/**
 * @file cipher/combiner.ts
 * @brief One-time-pad combiner over Z_P
 *
 * The sum is formed one bit wider than log2 P, and P is subtracted when it
 * crosses the modulus. No `%` on the result path.
 */

import { LwrError, LwrErrorCode } from '../api/types';
import { isPowerOfTwo } from '../parameters/validator';

function assertModulus(p: number): void {
  if (!isPowerOfTwo(p) || p < 2) {
    throw new LwrError(`Plaintext modulus must be a power of two >= 2, got ${p}`, LwrErrorCode.INVALID_PARAMETERS, {
      plaintextModulus: p,
    });
  }
}

function assertSymbol(name: string, value: number, p: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= p) {
    throw new LwrError(`${name} must be an integer in [0, ${p}), got ${value}`, LwrErrorCode.SYMBOL_OUT_OF_RANGE, {
      [name]: value,
      plaintextModulus: p,
    });
  }
}

function reduceOnce(sum: number, p: number): number {
  return sum >= p ? sum - p : sum;
}

/**
 * ciphertext = (plaintext + prf) mod P
 */
export function encryptSymbol(plaintext: number, prf: number, p: number): number {
  assertModulus(p);
  assertSymbol('plaintext', plaintext, p);
  assertSymbol('prf', prf, p);
  return reduceOnce(plaintext + prf, p);
}

/**
 * plaintext = (ciphertext + P - prf) mod P
 */
export function decryptSymbol(ciphertext: number, prf: number, p: number): number {
  assertModulus(p);
  assertSymbol('ciphertext', ciphertext, p);
  assertSymbol('prf', prf, p);
  return reduceOnce(ciphertext + (p - prf), p);
}
