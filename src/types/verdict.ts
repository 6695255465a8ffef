export const ComplianceReason = {
  NO_STATUS_CHECKS: 'NoStatusChecks',
  NO_CONTEXTS_CONFIGURED: 'NoContextsConfigured',
  PR_VALIDATION_DISABLED: 'PRValidationDisabled',
  STATIC_ANALYSIS_DISABLED: 'StaticAnalysisDisabled',
  COMPLIANT: 'Compliant',
} as const;

export type ComplianceReason = (typeof ComplianceReason)[keyof typeof ComplianceReason];

export interface ComplianceVerdict {
  compliant: boolean;
  reason: ComplianceReason;
  /** Some fact was degraded by missing access rather than verified */
  inconclusive: boolean;
}
