/**
 * Builds the audit engine from configuration and credentials.
 */

import type { AuditConfig } from '../config/index.js';
import { ConfigurationError } from '../types/index.js';
import { GitHubClient, ProtectionExtractor, type SourceControlApi } from '../github/index.js';
import { AzureDevOpsClient, type PipelineDefinitionApi } from '../azure-devops/index.js';
import { PipelineResolver } from '../resolver/index.js';
import { SecurityGateInspector, createYamlDetector } from '../inspector/index.js';
import { loadOwners, type ReferenceDataStore } from '../reference/index.js';
import { AuditOrchestrator, EnvironmentTokenSelector } from '../audit/index.js';
import {
  EnvSecretProvider,
  KeyVaultSecretProvider,
  type AuditCredentials,
  type SecretProvider,
} from '../secrets/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('runtime');

/**
 * Key Vault when a vault URL is configured, otherwise the process
 * environment.
 */
export function createSecretProvider(config: AuditConfig): SecretProvider {
  if (config.keyVaultUrl) {
    log.info({ vaultUrl: config.keyVaultUrl }, 'Reading secrets from Key Vault');
    return new KeyVaultSecretProvider({ vaultUrl: config.keyVaultUrl });
  }
  return new EnvSecretProvider();
}

export function createGitHubClient(config: AuditConfig, credentials: AuditCredentials): GitHubClient {
  return new GitHubClient({
    token: credentials.githubToken,
    baseUrl: config.githubApiUrl,
    timeoutMs: config.httpTimeoutMs,
  });
}

/**
 * Confirm the GitHub token works before any processing starts.
 */
export async function authenticate(github: Pick<SourceControlApi, 'getAuthenticatedUser'>): Promise<string> {
  try {
    const login = await github.getAuthenticatedUser();
    log.info({ login }, 'Authenticated with GitHub');
    return login;
  } catch (error) {
    throw new ConfigurationError(
      `GitHub authentication failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Organizations to audit: the requested ones, or every organization
 * the token can see.
 */
export async function selectOrganizations(
  github: Pick<SourceControlApi, 'listOrganizations'>,
  requested: readonly string[]
): Promise<string[]> {
  if (requested.length > 0) {
    return [...new Set(requested)];
  }

  const organizations = await github.listOrganizations();
  if (organizations.length === 0) {
    throw new ConfigurationError('No organizations are accessible with the GitHub token');
  }
  return organizations;
}

export function createResolver(config: AuditConfig, store: ReferenceDataStore): PipelineResolver {
  const strategic =
    config.strategicOrganization && config.strategicProject
      ? { organization: config.strategicOrganization, project: config.strategicProject }
      : null;
  return new PipelineResolver(store, { strategic });
}

export interface OrchestratorDependencies {
  config: AuditConfig;
  credentials: AuditCredentials;
  store: ReferenceDataStore;
  github: SourceControlApi;
  definitions?: PipelineDefinitionApi;
}

export function createAuditOrchestrator(deps: OrchestratorDependencies): AuditOrchestrator {
  const { config, credentials, store, github } = deps;

  const definitions =
    deps.definitions ??
    new AzureDevOpsClient({ baseUrl: config.azureDevOpsBaseUrl, timeoutMs: config.httpTimeoutMs });

  const inspector = new SecurityGateInspector({
    definitions,
    github,
    yamlDetector: createYamlDetector(config.yamlDetector, config.staticAnalysisTool),
    tool: { name: config.staticAnalysisTool, taskId: config.staticAnalysisTaskId },
  });

  return new AuditOrchestrator({
    github,
    extractor: new ProtectionExtractor(github),
    resolver: createResolver(config, store),
    inspector,
    store,
    tokens: new EnvironmentTokenSelector(config, credentials),
    loadOwners: (organization) => loadOwners(store, config, organization),
    concurrency: config.concurrency,
  });
}
