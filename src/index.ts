/**
 * Order Ledger Reconciler
 *
 * Takes extracted purchase and sale orders, holds them to a completeness contract,
 * resolves their items to stock identities, apportions tax and shipping into unit
 * costs, and posts stock adjustments; incomplete orders go through a review loop.
 */

export * from './models/index.js';
export * from './models/schema.js';
export * from './errors.js';
export { loadConfig } from './config.js';
export { logger, createChildLogger } from './utils/logger.js';
export * from './services/index.js';
export * from './repository/index.js';
