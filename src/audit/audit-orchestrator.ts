/**
 * Audit Orchestrator
 *
 * Organizations run one after another; the repository × branch units
 * of an organization run through a bounded worker pool. The owner
 * table of an organization is loaded before any of its units start.
 */

import pMap from 'p-map';
import { createLogger } from '../utils/logger.js';
import {
  DetailCode,
  PrValidation,
  ProtectionSource,
  StaticAnalysis,
  TARGET_BRANCHES,
  isTargetBranch,
  type AuditRow,
  type BranchProtectionFacts,
  type GateStatus,
  type OrganizationAudit,
  type RemediationRow,
} from '../types/index.js';
import { classify, describeReason } from '../classifier/index.js';
import { isStandaloneContext, type PipelineResolver } from '../resolver/index.js';
import { REPOSITORY_PAGE_SIZE, type ProtectionExtractor, type SourceControlApi } from '../github/index.js';
import type { SecurityGateInspector } from '../inspector/index.js';
import type { ReferenceDataStore } from '../reference/index.js';
import type { TokenSelector } from './token-selector.js';

const log = createLogger('audit:orchestrator');

export interface AuditOrchestratorDeps {
  github: Pick<SourceControlApi, 'listRepositoriesPage'>;
  extractor: Pick<ProtectionExtractor, 'extract'>;
  resolver: Pick<PipelineResolver, 'resolve'>;
  inspector: Pick<SecurityGateInspector, 'inspect' | 'inspectStandalone'>;
  store: ReferenceDataStore;
  tokens: TokenSelector;
  /** Loads the owner table of an organization into the store */
  loadOwners(organization: string): Promise<unknown>;
  concurrency: number;
  /** Branches to audit; names outside main|staging|release (any case) are dropped */
  branches?: readonly string[];
  pageSize?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Called once per organization, in order, after its units finish */
  onOrganization?(audit: OrganizationAudit): Promise<void> | void;
}

interface Unit {
  repository: string;
  branch: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class AuditOrchestrator {
  private readonly branches: readonly string[];
  private readonly pageSize: number;

  constructor(private readonly deps: AuditOrchestratorDeps) {
    this.branches = (deps.branches ?? TARGET_BRANCHES).filter(isTargetBranch);
    this.pageSize = deps.pageSize ?? REPOSITORY_PAGE_SIZE;
  }

  async run(organizations: readonly string[], options: RunOptions = {}): Promise<OrganizationAudit[]> {
    const audits: OrganizationAudit[] = [];

    for (const organization of organizations) {
      options.signal?.throwIfAborted();
      await this.deps.loadOwners(organization);

      const audit = await this.auditOrganization(organization, options.signal);
      await options.onOrganization?.(audit);
      audits.push(audit);
    }

    return audits;
  }

  /**
   * Audit every target branch of every repository of `organization`.
   * Rows come out in listing order, then branch order.
   */
  async auditOrganization(organization: string, signal?: AbortSignal): Promise<OrganizationAudit> {
    log.info({ organization }, 'Processing organization');

    const auditRows: AuditRow[] = [];
    let repositoryCount = 0;
    let listingError: string | null = null;

    for (let page = 1; ; page++) {
      signal?.throwIfAborted();

      let repositories: string[];
      try {
        repositories = await this.deps.github.listRepositoriesPage(organization, page, this.pageSize);
      } catch (error) {
        listingError = errorMessage(error);
        log.error({ organization, page, error: listingError }, 'Repository listing failed');
        break;
      }

      if (repositories.length === 0) {
        break;
      }
      repositoryCount += repositories.length;

      const units: Unit[] = repositories.flatMap((repository) =>
        this.branches.map((branch) => ({ repository, branch }))
      );

      const rows = await pMap(units, (unit) => this.auditUnit(organization, unit), {
        concurrency: this.deps.concurrency,
        signal,
      });
      auditRows.push(...rows);
    }

    const remediationRows: RemediationRow[] = auditRows
      .filter((row) => !row.verdict.compliant && !row.ignored)
      .map((row) => ({
        ...row,
        ownerEmail: this.deps.store.ownerEmail(row.organization, row.repository),
      }));

    log.info(
      {
        organization,
        repositories: repositoryCount,
        branches: auditRows.length,
        nonCompliant: remediationRows.length,
      },
      'Completed organization'
    );

    return { organization, auditRows, remediationRows, repositoryCount, listingError };
  }

  /**
   * Audit one repository branch.
   */
  async auditBranch(organization: string, repository: string, branch: string): Promise<AuditRow> {
    const facts = await this.deps.extractor.extract(organization, repository, branch);

    const gates: GateStatus[] = [];
    for (const context of facts.contexts) {
      gates.push(await this.evaluateContext(organization, repository, branch, context));
    }

    const verdict = classify(facts, gates);
    const ignored = this.deps.store.isIgnored(organization, repository);

    if (ignored) {
      log.debug({ organization, repository, branch }, 'Repository ignored');
    } else if (!verdict.compliant) {
      log.info(
        { organization, repository, branch, reason: verdict.reason },
        `Non-compliant: ${describeReason(verdict.reason)}`
      );
    }

    return { organization, repository, branch, facts, gates, verdict, ignored };
  }

  /**
   * Gate state of one context: the webhook check for standalone
   * repositories, otherwise resolve and inspect the pipeline.
   */
  async evaluateContext(
    organization: string,
    repository: string,
    branch: string,
    context: string
  ): Promise<GateStatus> {
    if (isStandaloneContext(context)) {
      const prValidation = await this.deps.inspector.inspectStandalone(organization, repository);
      return {
        context,
        prValidation,
        staticAnalysis: StaticAnalysis.NOT_APPLICABLE,
        staticAnalysisDetail: DetailCode.STANDALONE_REPO,
      };
    }

    const resolution = this.deps.resolver.resolve(organization, context, branch);
    if (!resolution.found) {
      log.debug({ organization, repository, branch, context }, 'Pipeline not found in lookup tables');
      return {
        context,
        prValidation: PrValidation.NOT_FOUND,
        staticAnalysis: StaticAnalysis.NOT_APPLICABLE,
        staticAnalysisDetail: DetailCode.PIPELINE_NOT_FOUND,
      };
    }

    log.debug({ organization, repository, context, source: resolution.source }, 'Pipeline resolved');
    const token = this.deps.tokens.tokenFor(resolution.identity, resolution.environment);
    const inspection = await this.deps.inspector.inspect(resolution.identity, token);
    return { context, ...inspection };
  }

  private async auditUnit(organization: string, unit: Unit): Promise<AuditRow> {
    try {
      return await this.auditBranch(organization, unit.repository, unit.branch);
    } catch (error) {
      log.error(
        { organization, ...unit, error: errorMessage(error) },
        'Branch audit failed'
      );
      return this.failedRow(organization, unit);
    }
  }

  private failedRow(organization: string, unit: Unit): AuditRow {
    const facts: BranchProtectionFacts = {
      requiresStatusChecks: false,
      contexts: [],
      source: ProtectionSource.NONE,
      probeErrors: [DetailCode.UNIT_ERROR],
    };
    return {
      organization,
      repository: unit.repository,
      branch: unit.branch,
      facts,
      gates: [],
      verdict: classify(facts, []),
      ignored: this.deps.store.isIgnored(organization, unit.repository),
    };
  }
}
