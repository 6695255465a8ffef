// PR validation state of a context
export const PrValidation = {
  ENABLED: 'enabled',
  DISABLED: 'disabled',
  NOT_FOUND: 'not-found',
  NO_TOKEN: 'no-token',
  ERROR: 'error',
} as const;

export type PrValidation = (typeof PrValidation)[keyof typeof PrValidation];

// Static-analysis state of a context
export const StaticAnalysis = {
  ENABLED: 'enabled',
  DISABLED: 'disabled',
  NOT_APPLICABLE: 'not-applicable',
  ERROR: 'error',
} as const;

export type StaticAnalysis = (typeof StaticAnalysis)[keyof typeof StaticAnalysis];

/**
 * Detail codes written next to the static-analysis state.
 * Disabled task names are written verbatim instead of a code.
 */
export const DetailCode = {
  NONE: '',
  NO_TOOL: 'no_checkmarx',
  STANDALONE_REPO: 'standalone_repo',
  PIPELINE_NOT_FOUND: 'pipeline_not_found',
  NO_TOKEN: 'no_token',
  API_ERROR: 'api_error',
  UNKNOWN_PIPELINE_TYPE: 'unknown_pipeline_type',
  YAML_ERROR: 'yaml_error',
  YAML_FETCH_ERROR: 'yaml_fetch_error',
  YAML_DECODE_ERROR: 'yaml_decode_error',
  NO_CONTEXTS: 'no_contexts',
  PROTECTION_API_ERROR: 'protection_api_error',
  UNIT_ERROR: 'unit_error',
} as const;

export type DetailCode = (typeof DetailCode)[keyof typeof DetailCode];

/**
 * Result of inspecting one resolved pipeline.
 */
export interface GateInspection {
  prValidation: PrValidation;
  staticAnalysis: StaticAnalysis;
  staticAnalysisDetail: string;
}

/**
 * Gate state of one required status-check context.
 */
export interface GateStatus extends GateInspection {
  context: string;
}
