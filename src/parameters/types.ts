/**
 * @file parameters/types.ts
 * @brief Parameter set shapes shared by the factory and the validator
 */

/**
 * Parameter preset names
 */
export type ParameterPreset = 'lwr-445-2048-32' | 'lwr-742-2048-32' | 'lwr-16-256-16';

/**
 * Complete parameter set
 */
export interface LwrParameterSet {
  name: string;
  /** Secret mask length (LWR dimension) */
  nLwr: number;
  /** Large LWR modulus N */
  modulusN: number;
  /** Plaintext modulus P */
  plaintextModulus: number;
}

/**
 * Custom parameter configuration
 */
export interface CustomParameters {
  nLwr: number;
  modulusN: number;
  plaintextModulus: number;
  name?: string;
}
