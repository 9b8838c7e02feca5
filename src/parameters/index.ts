/**
 * @file parameters/index.ts
 * @brief LWR-PRF parameter set definitions and presets
 *
 * A parameter set fixes the secret dimension nLwr, the large LWR modulus N
 * and the plaintext modulus P. N and P must both be powers of two: the
 * N -> P modulus switch is a bit shift, not a rational rescale.
 */

import { LwrError, LwrErrorCode } from '../api/types';
import { assertValidParameterSet } from './validator';
import type { CustomParameters, LwrParameterSet, ParameterPreset } from './types';

/**
 * Values every stage of the pipeline derives from a parameter set
 */
export interface DerivedParameters {
  log2N: number;
  log2P: number;
  twoN: number;
  /** Coefficient width: log2 N bits plus one guard bit */
  coefficientBits: number;
  /** Right shift taking an N-width residue to its top log2 P bits */
  rescaleShift: number;
  /** Largest possible inner product: nLwr * (2N - 1) */
  maxAccumulator: number;
  /** Bits needed to hold maxAccumulator */
  accumulatorBits: number;
}

/**
 * Calculate derived parameters from base parameters
 */
export function calculateDerivedParameters(params: LwrParameterSet): DerivedParameters {
  const log2N = Math.round(Math.log2(params.modulusN));
  const log2P = Math.round(Math.log2(params.plaintextModulus));
  const twoN = params.modulusN * 2;
  const maxAccumulator = params.nLwr * (twoN - 1);
  return {
    log2N,
    log2P,
    twoN,
    coefficientBits: log2N + 1,
    rescaleShift: log2N - log2P,
    maxAccumulator,
    accumulatorBits: maxAccumulator === 0 ? 0 : Math.floor(Math.log2(maxAccumulator)) + 1,
  };
}

// ========== Preset Parameter Sets ==========

/**
 * LWR-445-2048-32: 5-bit plaintexts, ring dimension 2048, 445-bit secret
 */
export function LWR_445_2048_32(): LwrParameterSet {
  return {
    name: 'lwr-445-2048-32',
    nLwr: 445,
    modulusN: 2048,
    plaintextModulus: 32,
  };
}

/**
 * LWR-742-2048-32: same moduli with a 742-bit secret
 */
export function LWR_742_2048_32(): LwrParameterSet {
  return {
    name: 'lwr-742-2048-32',
    nLwr: 742,
    modulusN: 2048,
    plaintextModulus: 32,
  };
}

/**
 * LWR-16-256-16: toy dimensions for quick experiments. Not secure.
 */
export function LWR_16_256_16(): LwrParameterSet {
  return {
    name: 'lwr-16-256-16',
    nLwr: 16,
    modulusN: 256,
    plaintextModulus: 16,
  };
}

/** Preset used when nothing else is configured */
export const DEFAULT_PRESET: ParameterPreset = 'lwr-445-2048-32';

// ========== Factory Functions ==========

/**
 * Create a parameter set from a preset name
 */
export function createParameterSet(preset: ParameterPreset): LwrParameterSet {
  switch (preset) {
    case 'lwr-445-2048-32':
      return LWR_445_2048_32();
    case 'lwr-742-2048-32':
      return LWR_742_2048_32();
    case 'lwr-16-256-16':
      return LWR_16_256_16();
    default:
      throw new LwrError(
        `Unknown parameter preset: ${String(preset)}`,
        LwrErrorCode.INVALID_PARAMETERS
      );
  }
}

/**
 * Create a validated parameter set from custom parameters
 */
export function createCustomParameterSet(custom: CustomParameters): LwrParameterSet {
  const params: LwrParameterSet = {
    name: custom.name ?? `lwr-${custom.nLwr}-${custom.modulusN}-${custom.plaintextModulus}`,
    nLwr: custom.nLwr,
    modulusN: custom.modulusN,
    plaintextModulus: custom.plaintextModulus,
  };
  assertValidParameterSet(params);
  return params;
}

/**
 * Resolve a preset name or custom parameters to a validated parameter set
 */
export function resolveParameterSet(params: ParameterPreset | CustomParameters | LwrParameterSet): LwrParameterSet {
  if (typeof params === 'string') {
    return createParameterSet(params);
  }
  return createCustomParameterSet(params);
}

/**
 * Get list of available preset names
 */
export function getAvailablePresets(): ParameterPreset[] {
  return ['lwr-445-2048-32', 'lwr-742-2048-32', 'lwr-16-256-16'];
}

/**
 * Type guard for preset names
 */
export function isParameterPreset(value: string): value is ParameterPreset {
  return getAvailablePresets().some((preset) => preset === value);
}

/**
 * Get a human-readable description of a parameter set
 */
export function parameterSetToString(params: LwrParameterSet): string {
  const derived = calculateDerivedParameters(params);
  return `LwrParameterSet {
  name: ${params.name}
  nLwr: ${params.nLwr}
  modulusN: ${params.modulusN} (2^${derived.log2N})
  plaintextModulus: ${params.plaintextModulus} (2^${derived.log2P})
  coefficientBits: ${derived.coefficientBits}
  accumulatorBits: ${derived.accumulatorBits}
  rescaleShift: ${derived.rescaleShift}
}`;
}

export {
  ParameterViolation,
  isPowerOfTwo,
  validateParameterSet,
  assertValidParameterSet,
} from './validator';
export type { ParameterViolationInfo, ValidationResult } from './validator';
export type { CustomParameters, LwrParameterSet, ParameterPreset } from './types';
