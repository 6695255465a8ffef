import { Environment, type PipelineIdentity } from '../types/index.js';
import type { AuditConfig } from '../config/index.js';
import type { AuditCredentials } from '../secrets/index.js';

export interface TokenSelector {
  tokenFor(identity: PipelineIdentity, environment: Environment): string | null;
}

/**
 * Picks the CI token of the environment whose organization owns the
 * pipeline, falling back to the environment that resolved it.
 */
export class EnvironmentTokenSelector implements TokenSelector {
  private readonly organizations: ReadonlyArray<[string, Environment]>;

  constructor(
    config: Pick<AuditConfig, 'primary' | 'secondary'>,
    private readonly credentials: Pick<AuditCredentials, 'ciTokens'>
  ) {
    const organizations: Array<[string, Environment]> = [];
    if (config.primary.ciOrganization) {
      organizations.push([config.primary.ciOrganization.toLowerCase(), Environment.PRIMARY]);
    }
    if (config.secondary.ciOrganization) {
      organizations.push([config.secondary.ciOrganization.toLowerCase(), Environment.SECONDARY]);
    }
    this.organizations = organizations;
  }

  tokenFor(identity: PipelineIdentity, environment: Environment): string | null {
    const sourceOrg = identity.sourceOrg.toLowerCase();
    const owner = this.organizations.find(([organization]) => organization === sourceOrg);
    return this.credentials.ciTokens[owner ? owner[1] : environment];
  }
}
