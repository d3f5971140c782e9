/**
 * @fileoverview Barrel export for shared utilities.
 * @module src/utils/index
 */
export * from './internal/errorHandler.js';
export * from './internal/logger.js';
export * from './internal/requestContext.js';
export * from './network/fetchWithTimeout.js';
export * from './network/requestThrottle.js';
