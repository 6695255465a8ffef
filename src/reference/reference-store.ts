/**
 * Reference Data Store
 *
 * In-memory pipeline tables, owner table and ignore set. Pipeline
 * tables and the ignore set are fixed at construction; the owner
 * table is swapped per organization.
 */

import {
  Environment,
  type PipelineIdentity,
  type PipelineRecord,
} from '../types/index.js';

export const DEFAULT_OWNER_EMAIL = 'no-owner@unknown.com';

export interface IgnoreEntry {
  organization: string;
  repository: string;
}

export interface OwnerEntry {
  repository: string;
  email: string;
}

function pairKey(first: string, second: string): string {
  return `${first}|${second}`;
}

/**
 * Pipelines of one environment, indexed by display name and by
 * (project, display name). Later rows win on duplicate keys.
 */
export class PipelineTable {
  private readonly byName = new Map<string, PipelineIdentity>();
  private readonly byProject = new Map<string, PipelineIdentity>();

  constructor(records: readonly PipelineRecord[]) {
    for (const record of records) {
      const identity: PipelineIdentity = Object.freeze({
        sourceOrg: record.sourceOrg,
        project: record.project,
        numericId: record.numericId,
      });
      this.byName.set(record.displayName, identity);
      this.byProject.set(pairKey(record.project, record.displayName), identity);
    }
  }

  findByName(displayName: string): PipelineIdentity | undefined {
    return this.byName.get(displayName);
  }

  findByProject(project: string, displayName: string): PipelineIdentity | undefined {
    return this.byProject.get(pairKey(project, displayName));
  }

  get size(): number {
    return this.byName.size;
  }
}

export interface ReferenceDataInput {
  primary: readonly PipelineRecord[];
  secondary: readonly PipelineRecord[];
  ignore: readonly IgnoreEntry[];
}

export class ReferenceDataStore {
  private readonly tables: Readonly<Record<Environment, PipelineTable>>;
  private readonly ignored: ReadonlySet<string>;
  private owners = new Map<string, string>();
  private ownersOrganization: string | null = null;

  constructor(input: ReferenceDataInput) {
    this.tables = {
      [Environment.PRIMARY]: new PipelineTable(input.primary),
      [Environment.SECONDARY]: new PipelineTable(input.secondary),
    };
    this.ignored = new Set(
      input.ignore.map((entry) => pairKey(entry.organization, entry.repository))
    );
  }

  pipelines(environment: Environment): PipelineTable {
    return this.tables[environment];
  }

  isIgnored(organization: string, repository: string): boolean {
    return this.ignored.has(pairKey(organization, repository));
  }

  get ignoredCount(): number {
    return this.ignored.size;
  }

  /**
   * Replace the owner table with the entries of `organization`.
   * Entries of the previously loaded organization are dropped.
   */
  loadOwners(organization: string, entries: readonly OwnerEntry[]): void {
    const owners = new Map<string, string>();
    for (const entry of entries) {
      owners.set(entry.repository, entry.email);
    }
    this.owners = owners;
    this.ownersOrganization = organization;
  }

  ownerEmail(organization: string, repository: string): string {
    if (organization !== this.ownersOrganization) {
      return DEFAULT_OWNER_EMAIL;
    }
    return this.owners.get(repository) ?? DEFAULT_OWNER_EMAIL;
  }
}
