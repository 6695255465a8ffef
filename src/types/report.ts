import type { BranchProtectionFacts } from './protection.js';
import type { GateStatus } from './gate.js';
import type { ComplianceVerdict } from './verdict.js';

/**
 * Full audit record of one repository branch.
 */
export interface AuditRow {
  organization: string;
  repository: string;
  branch: string;
  facts: BranchProtectionFacts;
  gates: GateStatus[];
  verdict: ComplianceVerdict;
  ignored: boolean;
}

/**
 * Non-compliant branch routed to its owner.
 */
export interface RemediationRow extends AuditRow {
  ownerEmail: string;
}

/**
 * Everything the audit produced for one organization.
 */
export interface OrganizationAudit {
  organization: string;
  auditRows: AuditRow[];
  remediationRows: RemediationRow[];
  repositoryCount: number;
  /** Set when repository listing stopped on an API error */
  listingError: string | null;
}
