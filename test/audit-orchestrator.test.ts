/**
 * Audit Orchestrator Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { AuditOrchestrator, EnvironmentTokenSelector, type AuditOrchestratorDeps } from '../src/audit/index.js';
import { ReferenceDataStore, DEFAULT_OWNER_EMAIL } from '../src/reference/index.js';
import { PipelineResolver } from '../src/resolver/index.js';
import {
  ComplianceReason,
  DetailCode,
  Environment,
  PrValidation,
  ProtectionSource,
  StaticAnalysis,
  type BranchProtectionFacts,
  type GateInspection,
} from '../src/types/index.js';

function protectedBy(contexts: string[]): BranchProtectionFacts {
  return {
    requiresStatusChecks: contexts.length > 0,
    contexts,
    source: contexts.length > 0 ? ProtectionSource.BRANCH_PROTECTION : ProtectionSource.NONE,
    probeErrors: [],
  };
}

const enabledGate: GateInspection = {
  prValidation: PrValidation.ENABLED,
  staticAnalysis: StaticAnalysis.ENABLED,
  staticAnalysisDetail: DetailCode.NONE,
};

function createStore(): ReferenceDataStore {
  return new ReferenceDataStore({
    primary: [{ sourceOrg: 'ado-dev', project: 'Payments', numericId: 10, displayName: 'buildA' }],
    secondary: [],
    ignore: [{ organization: 'acme', repository: 'legacy' }],
  });
}

function createOrchestrator(overrides: Partial<AuditOrchestratorDeps> = {}) {
  const store = overrides.store ?? createStore();
  const deps: AuditOrchestratorDeps = {
    github: {
      listRepositoriesPage: vi.fn().mockImplementation(async (_org: string, page: number) =>
        page === 1 ? ['widgets'] : []
      ),
    },
    extractor: { extract: vi.fn().mockResolvedValue(protectedBy(['buildA'])) },
    resolver: new PipelineResolver(store),
    inspector: {
      inspect: vi.fn().mockResolvedValue(enabledGate),
      inspectStandalone: vi.fn().mockResolvedValue(PrValidation.ENABLED),
    },
    store,
    tokens: new EnvironmentTokenSelector(
      {
        primary: { label: 'DEV', ciOrganization: 'ado-dev', pipelinesCsv: 'p.csv', tokenSecret: 'P' },
        secondary: { label: 'HE', ciOrganization: 'ado-he', pipelinesCsv: 's.csv', tokenSecret: 'S' },
      },
      { ciTokens: { [Environment.PRIMARY]: 'test-primary', [Environment.SECONDARY]: null } }
    ),
    loadOwners: vi.fn().mockImplementation(async (organization: string) => {
      store.loadOwners(organization, [{ repository: 'widgets', email: 'team@example.com' }]);
    }),
    concurrency: 2,
    branches: ['main'],
    ...overrides,
  };
  return { orchestrator: new AuditOrchestrator(deps), deps };
}

describe('AuditOrchestrator', () => {
  it('should mark a resolved, fully gated branch compliant', async () => {
    const { orchestrator, deps } = createOrchestrator();

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.auditRows).toHaveLength(1);
    expect(audit.auditRows[0]).toMatchObject({
      organization: 'acme',
      repository: 'widgets',
      branch: 'main',
      gates: [{ context: 'buildA', ...enabledGate }],
      verdict: { compliant: true, reason: ComplianceReason.COMPLIANT, inconclusive: false },
      ignored: false,
    });
    expect(audit.remediationRows).toEqual([]);
    expect(deps.inspector.inspect).toHaveBeenCalledWith(
      { sourceOrg: 'ado-dev', project: 'Payments', numericId: 10 },
      'test-primary'
    );
  });

  it('should only audit target branches, in any case', async () => {
    const { orchestrator, deps } = createOrchestrator({ branches: ['Main', 'develop', 'STAGING'] });

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.auditRows.map((row) => row.branch)).toEqual(['Main', 'STAGING']);
    expect(deps.extractor.extract).toHaveBeenCalledTimes(2);
  });

  it('should route unprotected branches to the owner', async () => {
    const { orchestrator } = createOrchestrator({
      extractor: { extract: vi.fn().mockResolvedValue(protectedBy([])) },
      branches: ['release'],
    });

    const [audit] = await orchestrator.run(['acme']);

    expect(audit?.auditRows[0]?.verdict.reason).toBe(ComplianceReason.NO_STATUS_CHECKS);
    expect(audit?.remediationRows).toHaveLength(1);
    expect(audit?.remediationRows[0]).toMatchObject({
      repository: 'widgets',
      branch: 'release',
      ownerEmail: 'team@example.com',
    });
  });

  it('should use the webhook check for standalone contexts', async () => {
    const { orchestrator, deps } = createOrchestrator({
      extractor: { extract: vi.fn().mockResolvedValue(protectedBy(['pull-request-validation-foo/ADO'])) },
    });

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.auditRows[0]?.gates).toEqual([
      {
        context: 'pull-request-validation-foo/ADO',
        prValidation: PrValidation.ENABLED,
        staticAnalysis: StaticAnalysis.NOT_APPLICABLE,
        staticAnalysisDetail: DetailCode.STANDALONE_REPO,
      },
    ]);
    expect(audit.auditRows[0]?.verdict.compliant).toBe(true);
    expect(deps.inspector.inspectStandalone).toHaveBeenCalledWith('acme', 'widgets');
    expect(deps.inspector.inspect).not.toHaveBeenCalled();
  });

  it('should report unresolved contexts as not found', async () => {
    const { orchestrator } = createOrchestrator({
      extractor: { extract: vi.fn().mockResolvedValue(protectedBy(['unknown-ci'])) },
    });

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.auditRows[0]?.gates[0]).toEqual({
      context: 'unknown-ci',
      prValidation: PrValidation.NOT_FOUND,
      staticAnalysis: StaticAnalysis.NOT_APPLICABLE,
      staticAnalysisDetail: DetailCode.PIPELINE_NOT_FOUND,
    });
    expect(audit.auditRows[0]?.verdict.reason).toBe(ComplianceReason.PR_VALIDATION_DISABLED);
  });

  it('should keep ignored repositories out of remediation', async () => {
    const { orchestrator } = createOrchestrator({
      github: {
        listRepositoriesPage: vi.fn().mockImplementation(async (_org: string, page: number) =>
          page === 1 ? ['legacy', 'widgets'] : []
        ),
      },
      extractor: { extract: vi.fn().mockResolvedValue(protectedBy([])) },
    });

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.auditRows.map((row) => [row.repository, row.ignored])).toEqual([
      ['legacy', true],
      ['widgets', false],
    ]);
    expect(audit.remediationRows.map((row) => row.repository)).toEqual(['widgets']);
  });

  it('should use the default owner for unknown repositories', async () => {
    const { orchestrator } = createOrchestrator({
      github: {
        listRepositoriesPage: vi.fn().mockImplementation(async (_org: string, page: number) =>
          page === 1 ? ['gadgets'] : []
        ),
      },
      extractor: { extract: vi.fn().mockResolvedValue(protectedBy([])) },
    });

    const [audit] = await orchestrator.run(['acme']);

    expect(audit?.remediationRows[0]?.ownerEmail).toBe(DEFAULT_OWNER_EMAIL);
  });

  it('should record a failing unit as an inconclusive row and continue', async () => {
    const extract = vi
      .fn()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValue(protectedBy(['buildA']));
    const { orchestrator } = createOrchestrator({
      github: {
        listRepositoriesPage: vi.fn().mockImplementation(async (_org: string, page: number) =>
          page === 1 ? ['broken', 'widgets'] : []
        ),
      },
      extractor: { extract },
      concurrency: 1,
    });

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.auditRows[0]).toMatchObject({
      repository: 'broken',
      facts: { requiresStatusChecks: false, contexts: [], probeErrors: [DetailCode.UNIT_ERROR] },
      verdict: { compliant: false, reason: ComplianceReason.NO_STATUS_CHECKS, inconclusive: true },
    });
    expect(audit.auditRows[1]?.verdict.compliant).toBe(true);
  });

  it('should audit every page and every branch in order', async () => {
    const listRepositoriesPage = vi
      .fn()
      .mockResolvedValueOnce(['a', 'b'])
      .mockResolvedValueOnce(['c'])
      .mockResolvedValueOnce([]);
    const { orchestrator } = createOrchestrator({
      github: { listRepositoriesPage },
      branches: ['main', 'staging', 'release'],
      concurrency: 4,
      pageSize: 2,
    });

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.repositoryCount).toBe(3);
    expect(audit.auditRows.map((row) => `${row.repository}@${row.branch}`)).toEqual([
      'a@main',
      'a@staging',
      'a@release',
      'b@main',
      'b@staging',
      'b@release',
      'c@main',
      'c@staging',
      'c@release',
    ]);
    expect(listRepositoriesPage).toHaveBeenCalledWith('acme', 3, 2);
  });

  it('should stop listing on an API error and keep earlier pages', async () => {
    const listRepositoriesPage = vi
      .fn()
      .mockResolvedValueOnce(['widgets'])
      .mockRejectedValueOnce(new Error('rate limited'));
    const { orchestrator } = createOrchestrator({ github: { listRepositoriesPage } });

    const audit = await orchestrator.auditOrganization('acme');

    expect(audit.auditRows).toHaveLength(1);
    expect(audit.listingError).toBe('rate limited');
  });

  it('should load owners and report each organization in order', async () => {
    const seen: string[] = [];
    const { orchestrator, deps } = createOrchestrator();

    const audits = await orchestrator.run(['acme', 'globex'], {
      onOrganization: (audit) => {
        seen.push(audit.organization);
      },
    });

    expect(seen).toEqual(['acme', 'globex']);
    expect(audits.map((audit) => audit.organization)).toEqual(['acme', 'globex']);
    expect(deps.loadOwners).toHaveBeenNthCalledWith(1, 'acme');
    expect(deps.loadOwners).toHaveBeenNthCalledWith(2, 'globex');
  });

  it('should stop when the run is aborted', async () => {
    const { orchestrator, deps } = createOrchestrator();
    const controller = new AbortController();
    controller.abort(new Error('run timeout'));

    await expect(orchestrator.run(['acme'], { signal: controller.signal })).rejects.toThrow('run timeout');
    expect(deps.loadOwners).not.toHaveBeenCalled();
  });
});

describe('EnvironmentTokenSelector', () => {
  const selector = new EnvironmentTokenSelector(
    {
      primary: { label: 'DEV', ciOrganization: 'ado-dev', pipelinesCsv: 'p.csv', tokenSecret: 'P' },
      secondary: { label: 'HE', ciOrganization: null, pipelinesCsv: 's.csv', tokenSecret: 'S' },
    },
    { ciTokens: { [Environment.PRIMARY]: 'test-primary', [Environment.SECONDARY]: 'test-secondary' } }
  );

  it('should pick the token of the organization that owns the pipeline', () => {
    const identity = { sourceOrg: 'ADO-DEV', project: 'Payments', numericId: 1 };
    expect(selector.tokenFor(identity, Environment.SECONDARY)).toBe('test-primary');
  });

  it('should fall back to the resolving environment', () => {
    const identity = { sourceOrg: 'ado-other', project: 'Payments', numericId: 1 };
    expect(selector.tokenFor(identity, Environment.SECONDARY)).toBe('test-secondary');
  });
});
