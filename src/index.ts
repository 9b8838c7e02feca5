/**
 * node-lwr-transcipher
 *
 * Symmetric stream cipher keyed by a Learning-With-Rounding PRF. The
 * keystream is derived from SHAKE256(nonce || index), reduced by an inner
 * product with a secret bit vector and switched from modulus N down to the
 * plaintext modulus P; symbols are then added to (or subtracted from) it
 * mod P.
 *
 * @module node-lwr-transcipher
 */

export const version = '0.1.0';

// Core API
export * from './api';

// Primitives
export * from './keccak';
export * from './prf';
export * from './cipher';

// Parameters
export * from './parameters';

// Streaming
export * from './streaming';

// Ambient
export { hexToBytes, bytesToHex } from './encoding';
export { loadConfig } from './config';
export type { Config } from './config';
export { logger, setLogLevel, getLogLevel, setLogSink, isLogLevel } from './logger';
export type { LogLevel, LogSink } from './logger';
