/**
 * @fileoverview Barrel export for the STRING database domain.
 * @module src/services/string-db/index
 */

// Core
export { StringApiClient, mimeTypeFor } from './core/StringApiClient.js';
export {
  IDENTIFIER_SEPARATOR,
  StringDbService,
} from './core/StringDbService.js';
export { hasPngSignature, PNG_SIGNATURE } from './core/response-parsers.js';

// Configuration
export { createStringConfig } from './config.js';

// Types
export * from './types.js';
