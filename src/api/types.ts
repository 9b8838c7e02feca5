/**
 * @file api/types.ts
 * @brief Core TypeScript type definitions for the LWR-PRF stream cipher
 *
 * This module provides the shared value types (nonces, PRF outputs, symbols,
 * traces) and the typed error used by every layer of the cipher.
 */

// ============================================================================
// Value Types
// ============================================================================

/**
 * Public nonce. Raw bytes are absorbed as-is; a bigint is treated as a
 * 64-bit unsigned value and absorbed as 8 little-endian bytes.
 */
export type Nonce = Uint8Array | bigint;

/**
 * 64-bit unsigned counter selecting one PRF output for a given nonce
 */
export type PrfIndex = number | bigint;

/**
 * One element of the hash-derived coefficient vector
 */
export interface CoefficientItem {
  /** Coefficient in [0, 2N) */
  readonly coefficient: number;
  /** Secret-mask address in [0, nLwr) */
  readonly maskAddress: number;
  /** Set on the final coefficient of the sequence */
  readonly last: boolean;
}

/**
 * Intermediate values of the N -> P modulus switch
 */
export interface RoundingTrace {
  readonly sum: number;
  readonly mod2N: number;
  readonly modN: number;
  readonly msb: 0 | 1;
  readonly rescaled: number;
  readonly output: number;
}

/**
 * Full trace of one PRF evaluation
 */
export interface PrfTrace extends RoundingTrace {
  readonly index: bigint;
  /** Number of coefficients selected by a 1 bit of the secret mask */
  readonly selectedTerms: number;
}

/**
 * Counter-mode encryption result
 */
export interface EncryptedMessage {
  readonly nonce: Nonce;
  readonly ciphertext: number[];
}

/**
 * Progress callback for long-running batch operations
 */
export type ProgressCallback = (progress: {
  stage: string;
  current: number;
  total: number;
  elapsedMs: number;
}) => void;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Cipher error codes
 */
export enum LwrErrorCode {
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_STATE = 'INVALID_STATE',
  INVALID_BYTE_MASK = 'INVALID_BYTE_MASK',
  SPONGE_STATE = 'SPONGE_STATE',
  INVALID_INDEX = 'INVALID_INDEX',
  INVALID_NONCE = 'INVALID_NONCE',
  MASK_ADDRESS_OUT_OF_RANGE = 'MASK_ADDRESS_OUT_OF_RANGE',
  REDUCER_STATE = 'REDUCER_STATE',
  INVALID_ACCUMULATOR = 'INVALID_ACCUMULATOR',
  SYMBOL_OUT_OF_RANGE = 'SYMBOL_OUT_OF_RANGE',
  KEY_MISMATCH = 'KEY_MISMATCH',
  SERIALIZATION_ERROR = 'SERIALIZATION_ERROR',
  CONTEXT_DISPOSED = 'CONTEXT_DISPOSED',
}

/**
 * Cipher error class with typed error codes
 */
export class LwrError extends Error {
  constructor(
    message: string,
    public readonly code: LwrErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LwrError';
    Object.setPrototypeOf(this, LwrError.prototype);
  }
}
