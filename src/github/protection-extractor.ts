/**
 * Protection Extractor
 *
 * Determines which status-check contexts a branch requires. Branch
 * protection is authoritative when it lists contexts; rulesets are
 * consulted only otherwise.
 */

import { createLogger } from '../utils/logger.js';
import {
  ProtectionSource,
  type BranchProtectionFacts,
} from '../types/index.js';
import type { SourceControlApi } from './github-client.js';
import type { RulesetDetail } from './schemas.js';

const log = createLogger('github:protection');

export type ProtectionApi = Pick<SourceControlApi, 'getBranchProtection' | 'listRulesets' | 'getRuleset'>;

/** Ruleset include patterns that cover every branch */
const ALL_BRANCH_PATTERNS = new Set(['*', '~ALL', 'refs/heads/*']);

/**
 * Whether a ruleset's ref_name include list covers `branch`.
 */
export function rulesetTargetsBranch(includeRefs: readonly string[], branch: string): boolean {
  const fullRef = `refs/heads/${branch}`;
  return includeRefs.some(
    (pattern) => pattern === fullRef || pattern === branch || ALL_BRANCH_PATTERNS.has(pattern)
  );
}

/**
 * Drop empty entries and duplicates, keeping first occurrences.
 */
export function orderedContexts(contexts: readonly string[]): string[] {
  return [...new Set(contexts.filter((context) => context.trim() !== ''))];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ProtectionExtractor {
  constructor(private readonly api: ProtectionApi) {}

  async extract(organization: string, repository: string, branch: string): Promise<BranchProtectionFacts> {
    const probeErrors: string[] = [];
    const scope = { organization, repository, branch };

    try {
      const record = await this.api.getBranchProtection(organization, repository, branch);
      if (record === null) {
        log.debug(scope, 'No branch protection found');
      } else {
        const contexts = orderedContexts(record.requiredContexts);
        if (contexts.length > 0) {
          log.debug({ ...scope, contexts }, 'Branch protection found with contexts');
          return {
            requiresStatusChecks: true,
            contexts,
            source: ProtectionSource.BRANCH_PROTECTION,
            probeErrors,
          };
        }
        log.debug(scope, 'Branch protection exists but lists no status check contexts');
      }
    } catch (error) {
      probeErrors.push('branch-protection');
      log.warn({ ...scope, error: describeError(error) }, 'Branch protection lookup failed');
    }

    const contexts = await this.fromRulesets(organization, repository, branch, probeErrors);
    if (contexts.length > 0) {
      return {
        requiresStatusChecks: true,
        contexts,
        source: ProtectionSource.RULESET,
        probeErrors,
      };
    }

    log.debug(scope, 'No status checks configured');
    return {
      requiresStatusChecks: false,
      contexts: [],
      source: ProtectionSource.NONE,
      probeErrors,
    };
  }

  /**
   * Contexts of the first branch ruleset that covers `branch` and
   * requires at least one check.
   */
  private async fromRulesets(
    organization: string,
    repository: string,
    branch: string,
    probeErrors: string[]
  ): Promise<string[]> {
    const scope = { organization, repository, branch };

    let rulesetIds: number[];
    try {
      const rulesets = await this.api.listRulesets(organization, repository);
      rulesetIds = rulesets.filter((ruleset) => ruleset.target === 'branch').map((ruleset) => ruleset.id);
    } catch (error) {
      probeErrors.push('rulesets');
      log.warn({ ...scope, error: describeError(error) }, 'Ruleset listing failed');
      return [];
    }

    for (const rulesetId of rulesetIds) {
      let detail: RulesetDetail;
      try {
        detail = await this.api.getRuleset(organization, repository, rulesetId);
      } catch (error) {
        probeErrors.push(`ruleset:${rulesetId}`);
        log.warn({ ...scope, rulesetId, error: describeError(error) }, 'Ruleset lookup failed');
        continue;
      }

      if (!rulesetTargetsBranch(detail.includeRefs, branch)) {
        log.debug({ ...scope, rulesetId }, 'Ruleset does not apply to branch');
        continue;
      }

      const contexts = orderedContexts(detail.requiredContexts);
      if (contexts.length > 0) {
        log.debug({ ...scope, rulesetId, contexts }, 'Ruleset protection found with contexts');
        return contexts;
      }
      log.debug({ ...scope, rulesetId }, 'Ruleset applies but requires no status checks');
    }

    return [];
  }
}
