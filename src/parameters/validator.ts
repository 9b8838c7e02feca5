/**
 * @file parameters/validator.ts
 * @brief Structural validation for LWR-PRF parameter sets
 *
 * Every check here is a hard precondition of the pipeline: the rescale is a
 * bit shift (so N and P are powers of two), mask addresses come from the
 * coefficient index (so nLwr <= N), and the inner product is accumulated in
 * a double (so its worst case must stay a safe integer).
 */

import { LwrError, LwrErrorCode } from '../api/types';
import type { LwrParameterSet } from './types';

/**
 * Parameter violation types
 */
export enum ParameterViolation {
  MODULUS_NOT_POWER_OF_TWO = 'MODULUS_NOT_POWER_OF_TWO',
  PLAINTEXT_MODULUS_NOT_POWER_OF_TWO = 'PLAINTEXT_MODULUS_NOT_POWER_OF_TWO',
  PLAINTEXT_MODULUS_TOO_LARGE = 'PLAINTEXT_MODULUS_TOO_LARGE',
  DIMENSION_INVALID = 'DIMENSION_INVALID',
  DIMENSION_EXCEEDS_MODULUS = 'DIMENSION_EXCEEDS_MODULUS',
  ACCUMULATOR_OVERFLOW = 'ACCUMULATOR_OVERFLOW',
}

/**
 * Detailed violation information
 */
export interface ParameterViolationInfo {
  code: ParameterViolation;
  message: string;
  parameterName: keyof LwrParameterSet;
  actualValue: number;
  requiredValue?: number;
}

/**
 * Validation result for parameter sets
 */
export interface ValidationResult {
  isValid: boolean;
  violations: ParameterViolationInfo[];
}

/**
 * Check if a number is a power of 2
 */
export function isPowerOfTwo(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0 && 2 ** Math.round(Math.log2(n)) === n;
}

/**
 * Validate a parameter set without throwing
 */
export function validateParameterSet(params: LwrParameterSet): ValidationResult {
  const violations: ParameterViolationInfo[] = [];

  // 2N must also be a safe integer
  if (!isPowerOfTwo(params.modulusN) || params.modulusN < 2 || params.modulusN > 2 ** 51) {
    violations.push({
      code: ParameterViolation.MODULUS_NOT_POWER_OF_TWO,
      message: `modulusN must be a power of two in [2, 2^51], got ${params.modulusN}`,
      parameterName: 'modulusN',
      actualValue: params.modulusN,
    });
  }

  if (!isPowerOfTwo(params.plaintextModulus) || params.plaintextModulus < 2) {
    violations.push({
      code: ParameterViolation.PLAINTEXT_MODULUS_NOT_POWER_OF_TWO,
      message: `plaintextModulus must be a power of two >= 2, got ${params.plaintextModulus}`,
      parameterName: 'plaintextModulus',
      actualValue: params.plaintextModulus,
    });
  } else if (params.plaintextModulus > params.modulusN) {
    violations.push({
      code: ParameterViolation.PLAINTEXT_MODULUS_TOO_LARGE,
      message: `plaintextModulus ${params.plaintextModulus} exceeds modulusN ${params.modulusN}`,
      parameterName: 'plaintextModulus',
      actualValue: params.plaintextModulus,
      requiredValue: params.modulusN,
    });
  }

  if (!Number.isSafeInteger(params.nLwr) || params.nLwr < 1) {
    violations.push({
      code: ParameterViolation.DIMENSION_INVALID,
      message: `nLwr must be a positive integer, got ${params.nLwr}`,
      parameterName: 'nLwr',
      actualValue: params.nLwr,
    });
  } else if (params.nLwr > params.modulusN) {
    violations.push({
      code: ParameterViolation.DIMENSION_EXCEEDS_MODULUS,
      message: `nLwr ${params.nLwr} exceeds modulusN ${params.modulusN}`,
      parameterName: 'nLwr',
      actualValue: params.nLwr,
      requiredValue: params.modulusN,
    });
  }

  const maxAccumulator = params.nLwr * (2 * params.modulusN - 1);
  if (!Number.isSafeInteger(maxAccumulator)) {
    violations.push({
      code: ParameterViolation.ACCUMULATOR_OVERFLOW,
      message: `worst-case inner product ${maxAccumulator} is not exactly representable`,
      parameterName: 'nLwr',
      actualValue: params.nLwr,
    });
  }

  return { isValid: violations.length === 0, violations };
}

/**
 * Throw INVALID_PARAMETERS when a parameter set is not usable
 */
export function assertValidParameterSet(params: LwrParameterSet): void {
  const result = validateParameterSet(params);
  if (!result.isValid) {
    throw new LwrError(
      `Invalid parameter set ${params.name}: ${result.violations.map((v) => v.message).join('; ')}`,
      LwrErrorCode.INVALID_PARAMETERS,
      { violations: result.violations.map((v) => v.code) }
    );
  }
}
