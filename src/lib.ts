/**
 * Branchwise Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Search tree
export * from './tree/index.js';

// Orchestrator
export * from './orchestrator/index.js';

// Search service (main entry point)
export {
  SearchService,
  createSearchService,
  toSearchStatus,
  validateSubmission,
  type SearchHandle,
  type SearchServiceOptions,
} from './control-plane/index.js';

// Agent collaborators
export * as agent from './agent/index.js';

// HTTP server
export { createApp, startServer, stopServer, type AppConfig } from './server/index.js';

// Configuration
export { getConfig, loadConfig, resetConfig, type BranchwiseConfig } from './config/index.js';

// Storage locations
export { getBranchwiseRoot, setBranchwiseRoot } from './artifacts/paths.js';

// Utilities
export { createLogger, logger, toError, errorMessage } from './utils/index.js';
