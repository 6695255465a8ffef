/**
 * Release Gate Audit Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type AuditConfig } from './config/index.js';

// Audit engine
export * from './audit/index.js';
export * from './classifier/index.js';
export * from './resolver/index.js';
export * from './reference/index.js';
export * from './inspector/index.js';
export * from './report/index.js';
export * from './secrets/index.js';

// Remote APIs
export * as github from './github/index.js';
export * as azureDevOps from './azure-devops/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
