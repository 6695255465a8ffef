export * from './token-selector.js';
export * from './audit-orchestrator.js';
