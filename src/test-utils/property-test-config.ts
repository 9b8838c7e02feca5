/**
 * Property-based testing configuration and utilities
 *
 * Configuration and arbitraries shared by the fast-check suites. The PRF
 * runs Keccak on bigint lanes, so suites that evaluate it take the fast
 * configuration.
 */

import * as fc from 'fast-check';
import type { LwrParameterSet } from '../parameters/types';

/**
 * Run settings shared by every property, independent of its value types
 */
export type PropertyRunConfig = Pick<fc.Parameters<unknown>, 'numRuns' | 'verbose' | 'seed' | 'endOnFailure'>;

/**
 * Standard configuration for property-based tests
 */
export const PROPERTY_TEST_CONFIG: PropertyRunConfig = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for properties that evaluate the PRF or hash long inputs
 */
export const FAST_PROPERTY_TEST_CONFIG: PropertyRunConfig = {
  numRuns: 12,
  verbose: false,
  seed: Date.now(),
};

/**
 * Small parameter set used where full-size PRF evaluations would be slow
 */
export const SMALL_PARAMS: LwrParameterSet = {
  name: 'lwr-16-256-16',
  nLwr: 16,
  modulusN: 256,
  plaintextModulus: 16,
};

/**
 * Arbitrary byte string
 */
export function arbitraryBytes(maxLength: number = 300): fc.Arbitrary<Uint8Array> {
  return fc.uint8Array({ minLength: 0, maxLength });
}

/**
 * Arbitrary power of two in [2^minLog, 2^maxLog]
 */
export function arbitraryPowerOfTwo(minLog: number, maxLog: number): fc.Arbitrary<number> {
  return fc.integer({ min: minLog, max: maxLog }).map((e) => 2 ** e);
}

/**
 * Arbitrary symbol in [0, p)
 */
export function arbitrarySymbol(p: number): fc.Arbitrary<number> {
  return fc.integer({ min: 0, max: p - 1 });
}

/**
 * Arbitrary symbol vector in [0, p)
 */
export function arbitrarySymbolVector(p: number, maxLength: number = 8): fc.Arbitrary<number[]> {
  return fc.array(arbitrarySymbol(p), { minLength: 0, maxLength });
}

/**
 * Arbitrary binary secret vector of fixed length
 */
export function arbitraryBits(length: number): fc.Arbitrary<number[]> {
  return fc.array(fc.integer({ min: 0, max: 1 }), { minLength: length, maxLength: length });
}
