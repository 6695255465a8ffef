// Environments
export const Environment = {
  PRIMARY: 'primary',
  SECONDARY: 'secondary',
} as const;

export type Environment = (typeof Environment)[keyof typeof Environment];

/**
 * Concrete build-pipeline identity in a CI organization.
 * Only ever produced from reference data.
 */
export interface PipelineIdentity {
  readonly sourceOrg: string;
  readonly project: string;
  readonly numericId: number;
}

// Which lookup satisfied a resolution
export const ResolutionSource = {
  PRIMARY_STRATEGIC: 'primary-strategic',
  SECONDARY_STRATEGIC: 'secondary-strategic',
  PRIMARY: 'primary',
  SECONDARY: 'secondary',
} as const;

export type ResolutionSource = (typeof ResolutionSource)[keyof typeof ResolutionSource];

export interface ResolutionFound {
  found: true;
  identity: PipelineIdentity;
  source: ResolutionSource;
  environment: Environment;
}

export interface ResolutionNotFound {
  found: false;
}

export type Resolution = ResolutionFound | ResolutionNotFound;

/**
 * Raw row from a pipeline reference table.
 */
export interface PipelineRecord {
  sourceOrg: string;
  project: string;
  numericId: number;
  displayName: string;
}
