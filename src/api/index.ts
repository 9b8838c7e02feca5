/**
 * @file api/index.ts
 * @brief Main API exports
 *
 * This module re-exports the shared types and the high-level context.
 */

// Core types
export * from './types';

// High-level convenience API
export { LwrContext, createDefaultContext } from './lwr-context';
export type { LwrContextOptions } from './lwr-context';
