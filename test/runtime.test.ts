/**
 * Engine Wiring Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  authenticate,
  createAuditOrchestrator,
  createResolver,
  createSecretProvider,
  selectOrganizations,
} from '../src/control-plane/runtime.js';
import { EnvSecretProvider, KeyVaultSecretProvider } from '../src/secrets/index.js';
import { loadConfig } from '../src/config/index.js';
import { ReferenceDataStore } from '../src/reference/index.js';
import { buildDefinitionSchema, type PipelineDefinitionApi } from '../src/azure-devops/index.js';
import type { SourceControlApi } from '../src/github/index.js';
import {
  ComplianceReason,
  ConfigurationError,
  Environment,
  ResolutionSource,
  StaticAnalysis,
} from '../src/types/index.js';

vi.mock('@azure/identity', () => ({ DefaultAzureCredential: vi.fn() }));
vi.mock('@azure/keyvault-secrets', () => ({
  SecretClient: vi.fn().mockImplementation(function () {
    return { getSecret: vi.fn() };
  }),
}));

function createGitHub(overrides: Partial<SourceControlApi> = {}): SourceControlApi {
  return {
    getAuthenticatedUser: vi.fn().mockResolvedValue('auditor'),
    listOrganizations: vi.fn().mockResolvedValue(['acme']),
    listRepositoriesPage: vi.fn().mockImplementation(async (_org: string, page: number) =>
      page === 1 ? ['payments'] : []
    ),
    getBranchProtection: vi.fn().mockResolvedValue({ requiredContexts: ['payments-ci'] }),
    listRulesets: vi.fn().mockResolvedValue([]),
    getRuleset: vi.fn().mockRejectedValue(new Error('unexpected ruleset lookup')),
    listWebhooks: vi.fn().mockResolvedValue([]),
    getFileContent: vi.fn().mockResolvedValue({
      path: 'azure-pipelines.yml',
      encoding: 'base64',
      content: Buffer.from('steps:\n  - task: Checkmarx@1\n    enabled: false\n').toString('base64'),
    }),
    ...overrides,
  };
}

describe('createSecretProvider', () => {
  it('should read the environment by default', () => {
    expect(createSecretProvider(loadConfig({}))).toBeInstanceOf(EnvSecretProvider);
  });

  it('should use Key Vault when a vault URL is configured', () => {
    const config = loadConfig({ GATE_AUDIT_KEY_VAULT_URL: 'https://test-vault.vault.azure.net/' });

    expect(createSecretProvider(config)).toBeInstanceOf(KeyVaultSecretProvider);
  });
});

describe('authenticate', () => {
  it('should return the login', async () => {
    await expect(authenticate(createGitHub())).resolves.toBe('auditor');
  });

  it('should turn a rejected token into a configuration error', async () => {
    const github = createGitHub({ getAuthenticatedUser: vi.fn().mockRejectedValue(new Error('Bad credentials')) });

    const error = await authenticate(github).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: 'GitHub authentication failed: Bad credentials' });
  });
});

describe('selectOrganizations', () => {
  it('should keep requested organizations without listing', async () => {
    const github = createGitHub();

    await expect(selectOrganizations(github, ['acme', 'globex', 'acme'])).resolves.toEqual(['acme', 'globex']);
    expect(github.listOrganizations).not.toHaveBeenCalled();
  });

  it('should list every accessible organization otherwise', async () => {
    await expect(selectOrganizations(createGitHub(), [])).resolves.toEqual(['acme']);
  });

  it('should fail when no organization is accessible', async () => {
    const github = createGitHub({ listOrganizations: vi.fn().mockResolvedValue([]) });

    await expect(selectOrganizations(github, [])).rejects.toThrow(ConfigurationError);
  });
});

describe('createResolver', () => {
  it('should enable the strategic lookups when configured', () => {
    const config = loadConfig({
      GATE_AUDIT_STRATEGIC_ORG: 'strategic-org',
      GATE_AUDIT_STRATEGIC_PROJECT: 'Initiative',
    });
    const store = new ReferenceDataStore({
      primary: [],
      secondary: [{ sourceOrg: 'ado-he', project: 'Initiative', numericId: 30, displayName: 'deploy' }],
      ignore: [],
    });

    const resolution = createResolver(config, store).resolve('strategic-org', 'deploy', 'main');

    expect(resolution.found && resolution.source).toBe(ResolutionSource.SECONDARY_STRATEGIC);
  });
});

describe('createAuditOrchestrator', () => {
  it('should audit a YAML pipeline end to end', async () => {
    const config = loadConfig({ GATE_AUDIT_PRIMARY_CI_ORG: 'ado-dev' });
    const store = new ReferenceDataStore({
      primary: [{ sourceOrg: 'ado-dev', project: 'Payments', numericId: 42, displayName: 'payments-ci' }],
      secondary: [],
      ignore: [],
    });
    const definitions: PipelineDefinitionApi = {
      getDefinition: vi.fn().mockResolvedValue(
        buildDefinitionSchema.parse({
          id: 42,
          triggers: [{ triggerType: 'pullRequest' }],
          process: { type: 2, yamlFilename: 'azure-pipelines.yml' },
          repository: { defaultBranch: 'refs/heads/main', properties: { fullName: 'acme/payments' } },
        })
      ),
    };
    const github = createGitHub();

    const orchestrator = createAuditOrchestrator({
      config: { ...config, dataDir: '/nonexistent-gate-audit-data' },
      credentials: {
        githubToken: 'test-token',
        ciTokens: { [Environment.PRIMARY]: 'test-primary', [Environment.SECONDARY]: null },
      },
      store,
      github,
      definitions,
    });
    const [audit] = await orchestrator.run(['acme']);

    expect(audit?.auditRows.map((row) => row.branch)).toEqual(['main', 'staging', 'release']);
    const main = audit?.auditRows[0];
    expect(main?.gates[0]).toMatchObject({
      context: 'payments-ci',
      staticAnalysis: StaticAnalysis.DISABLED,
      staticAnalysisDetail: 'YAML - some Checkmarx tasks disabled',
    });
    expect(main?.verdict.reason).toBe(ComplianceReason.STATIC_ANALYSIS_DISABLED);
    expect(definitions.getDefinition).toHaveBeenCalledWith(
      { sourceOrg: 'ado-dev', project: 'Payments', numericId: 42 },
      'test-primary'
    );
    expect(github.getFileContent).toHaveBeenCalledWith('acme', 'payments', 'azure-pipelines.yml', 'main');
    expect(audit?.remediationRows).toHaveLength(3);
  });
});
