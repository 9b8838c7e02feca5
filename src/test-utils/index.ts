/**
 * Test utilities for node-lwr-transcipher
 *
 * Property-based testing configuration and arbitraries.
 */

export * from './property-test-config';
