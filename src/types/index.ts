// Pipeline Types
export {
  Environment,
  ResolutionSource,
  type PipelineIdentity,
  type PipelineRecord,
  type Resolution,
  type ResolutionFound,
  type ResolutionNotFound,
} from './pipeline.js';

// Protection Types
export {
  TARGET_BRANCHES,
  isTargetBranch,
  ProtectionSource,
  type TargetBranch,
  type BranchProtectionFacts,
} from './protection.js';

// Gate Types
export {
  PrValidation,
  StaticAnalysis,
  DetailCode,
  type GateInspection,
  type GateStatus,
} from './gate.js';

// Verdict Types
export { ComplianceReason, type ComplianceVerdict } from './verdict.js';

// Report Types
export type { AuditRow, RemediationRow, OrganizationAudit } from './report.js';

// Errors
export {
  ConfigurationError,
  GitHubAuditError,
  GitHubAuditErrorCode,
  AzureDevOpsError,
  AzureDevOpsErrorCode,
} from './errors.js';
