/**
 * Shared core utilities for VaultWeave
 * Re-exports types, errors, PRNG and the server log
 */

export * from './types.js';
export * from './errors.js';
export * from './random.js';
export * from './serverLog.js';
