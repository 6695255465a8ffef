/**
 * GitHub Integration Module
 *
 * Exports for the GitHub client and branch protection extraction.
 */

// Client
export {
  GitHubClient,
  REPOSITORY_PAGE_SIZE,
  type SourceControlApi,
  type GitHubClientOptions,
} from './github-client.js';

// Protection Extractor
export {
  ProtectionExtractor,
  rulesetTargetsBranch,
  orderedContexts,
  type ProtectionApi,
} from './protection-extractor.js';

// Response shapes
export type {
  BranchProtectionRecord,
  RulesetSummary,
  RulesetDetail,
  RepositoryWebhook,
  RepositoryFile,
} from './schemas.js';
