// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  cyan,
  formatVerdict,
  formatDuration,
  truncate,
  padRight,
  padLeft,
  formatTable,
  formatSummaryTable,
  formatResolution,
  formatSuccess,
  formatError,
  formatWarning,
  formatJson,
  formatValidationErrors,
  print,
  printError,
  type TableColumn,
} from './formatter.js';

// Engine wiring
export {
  createSecretProvider,
  createGitHubClient,
  authenticate,
  selectOrganizations,
  createResolver,
  createAuditOrchestrator,
  type OrchestratorDependencies,
} from './runtime.js';

// CLI
export { createProgram, runCli } from './cli.js';
export { createAuditCommand } from './commands/audit.js';
export { createOrgsCommand } from './commands/orgs.js';
export { createResolveCommand } from './commands/resolve.js';
