/**
 * @file prf/secret-mask.ts
 * @brief Secret bit-vector key of the LWR-PRF
 *
 * The mask is loaded once, never mutated, and shared by reference between
 * every evaluation; concurrent readers need no synchronization.
 */

import { randomBytes } from 'crypto';
import { LwrError, LwrErrorCode } from '../api/types';
import { shake256 } from '../keccak/sponge';
import { logger } from '../logger';

function assertLength(length: number): void {
  if (!Number.isSafeInteger(length) || length < 1) {
    throw new LwrError('Secret mask length must be a positive integer', LwrErrorCode.INVALID_PARAMETERS, {
      length,
    });
  }
}

function unpackBits(bytes: Uint8Array, length: number): Uint8Array {
  const bits = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bits[i] = (bytes[i >> 3] >> (i & 7)) & 1;
  }
  return bits;
}

/**
 * Immutable, positionally addressed secret bit array
 */
export class SecretMask {
  private readonly bits: Uint8Array;
  private readonly ones: number;

  private constructor(bits: Uint8Array) {
    this.bits = bits;
    let ones = 0;
    for (const b of bits) ones += b;
    this.ones = ones;
  }

  /**
   * Build a mask from loaded entries. Entries past the end of `bits`, or
   * that are anything other than 0 or 1, read as zero.
   */
  static fromBits(bits: ArrayLike<unknown>, length: number): SecretMask {
    assertLength(length);
    const out = new Uint8Array(length);
    let coerced = 0;
    for (let i = 0; i < length; i++) {
      const value = i < bits.length ? bits[i] : undefined;
      if (value === 1) {
        out[i] = 1;
      } else if (value !== 0) {
        coerced++;
      }
    }
    if (coerced > 0) {
      logger.warn('secret mask entries missing or non-binary, treated as zero', {
        length,
        provided: bits.length,
        coerced,
      });
    }
    return new SecretMask(out);
  }

  /**
   * Derive a mask deterministically from a seed: bit i is bit (i mod 8) of
   * byte floor(i / 8) of SHAKE256(seed).
   */
  static fromSeed(seed: Uint8Array, length: number): SecretMask {
    assertLength(length);
    return new SecretMask(unpackBits(shake256(seed, Math.ceil(length / 8)), length));
  }

  /**
   * Generate a uniformly random mask
   */
  static generate(length: number): SecretMask {
    assertLength(length);
    return new SecretMask(unpackBits(randomBytes(Math.ceil(length / 8)), length));
  }

  get length(): number {
    return this.bits.length;
  }

  /** Number of 1 bits */
  get weight(): number {
    return this.ones;
  }

  /**
   * Read the bit at `address`
   */
  bit(address: number): 0 | 1 {
    if (!Number.isInteger(address) || address < 0 || address >= this.bits.length) {
      throw new LwrError(
        `Mask address ${address} outside [0, ${this.bits.length})`,
        LwrErrorCode.MASK_ADDRESS_OUT_OF_RANGE,
        { address, length: this.bits.length }
      );
    }
    return this.bits[address] === 1 ? 1 : 0;
  }

  /** Copy of the mask as 0/1 numbers */
  toBits(): number[] {
    return Array.from(this.bits);
  }

  equals(other: SecretMask): boolean {
    if (other.length !== this.length) return false;
    for (let i = 0; i < this.bits.length; i++) {
      if (other.bits[i] !== this.bits[i]) return false;
    }
    return true;
  }
}
