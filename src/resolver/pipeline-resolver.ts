/**
 * Pipeline Identity Resolver
 *
 * Maps a raw status-check context onto a pipeline identity by walking
 * an ordered list of lookup strategies. The first strategy whose
 * lookup hits wins.
 */

import {
  Environment,
  ResolutionSource,
  type PipelineIdentity,
  type Resolution,
} from '../types/index.js';
import type { PipelineTable, ReferenceDataStore } from '../reference/index.js';

/** Contexts validated by a GitHub webhook instead of a CI pipeline */
export const STANDALONE_CONTEXT_PATTERN = /^pull-request-validation-.*\/ADO$/;

export interface ResolveRequest {
  organization: string;
  /** Normalized context */
  context: string;
  branch: string;
}

/**
 * One step of the resolution chain.
 */
export interface ResolutionStrategy {
  source: ResolutionSource;
  environment: Environment;
  applies(request: ResolveRequest): boolean;
  lookup(table: PipelineTable, request: ResolveRequest): PipelineIdentity | undefined;
}

export interface StrategicOverride {
  organization: string;
  project: string;
}

export interface PipelineResolverOptions {
  strategic?: StrategicOverride | null;
}

/**
 * Trim whitespace and strip one pair of surrounding double quotes.
 */
export function normalizeContext(raw: string): string {
  let value = raw.trim();
  if (value.startsWith('"')) {
    value = value.slice(1);
  }
  if (value.endsWith('"')) {
    value = value.slice(0, -1);
  }
  return value.trim();
}

export function isStandaloneContext(context: string): boolean {
  return STANDALONE_CONTEXT_PATTERN.test(normalizeContext(context));
}

/**
 * Branch `main` prefers the primary environment; every other branch
 * prefers the secondary one.
 */
export function preferredEnvironment(branch: string): Environment {
  return branch.toLowerCase() === 'main' ? Environment.PRIMARY : Environment.SECONDARY;
}

function sourceFor(environment: Environment): ResolutionSource {
  return environment === Environment.PRIMARY ? ResolutionSource.PRIMARY : ResolutionSource.SECONDARY;
}

const byName = (table: PipelineTable, request: ResolveRequest): PipelineIdentity | undefined =>
  table.findByName(request.context);

/**
 * Build the ordered strategy list.
 */
export function buildStrategies(strategic: StrategicOverride | null): ResolutionStrategy[] {
  const strategies: ResolutionStrategy[] = [];

  if (strategic) {
    const isStrategic = (request: ResolveRequest): boolean =>
      request.organization === strategic.organization;
    const byStrategicProject = (
      table: PipelineTable,
      request: ResolveRequest
    ): PipelineIdentity | undefined => table.findByProject(strategic.project, request.context);

    strategies.push(
      {
        source: ResolutionSource.PRIMARY_STRATEGIC,
        environment: Environment.PRIMARY,
        applies: isStrategic,
        lookup: byStrategicProject,
      },
      {
        source: ResolutionSource.SECONDARY_STRATEGIC,
        environment: Environment.SECONDARY,
        applies: isStrategic,
        lookup: byStrategicProject,
      }
    );
  }

  // Preferred environment first, then the other one
  for (const rank of ['preferred', 'fallback'] as const) {
    for (const environment of [Environment.PRIMARY, Environment.SECONDARY]) {
      strategies.push({
        source: sourceFor(environment),
        environment,
        applies: (request) =>
          (preferredEnvironment(request.branch) === environment) === (rank === 'preferred'),
        lookup: byName,
      });
    }
  }

  return strategies;
}

export class PipelineResolver {
  private readonly strategies: readonly ResolutionStrategy[];

  constructor(
    private readonly store: ReferenceDataStore,
    options: PipelineResolverOptions = {}
  ) {
    this.strategies = buildStrategies(options.strategic ?? null);
  }

  resolve(organization: string, rawContext: string, branch: string): Resolution {
    const request: ResolveRequest = {
      organization,
      context: normalizeContext(rawContext),
      branch,
    };

    if (request.context === '') {
      return { found: false };
    }

    for (const strategy of this.strategies) {
      if (!strategy.applies(request)) {
        continue;
      }
      const identity = strategy.lookup(this.store.pipelines(strategy.environment), request);
      if (identity) {
        return {
          found: true,
          identity,
          source: strategy.source,
          environment: strategy.environment,
        };
      }
    }

    return { found: false };
  }
}
