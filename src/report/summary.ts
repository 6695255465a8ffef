import type { OrganizationAudit } from '../types/index.js';
import type { ReportFiles } from './csv-report-sink.js';

/**
 * Per-organization counts shown at the end of a run.
 */
export interface OrganizationSummary {
  organization: string;
  repositories: number;
  branches: number;
  compliant: number;
  nonCompliant: number;
  inconclusive: number;
  ignored: number;
  remediation: number;
  listingError: string | null;
  auditFile: string | null;
  remediationFile: string | null;
}

export function summarizeAudit(
  audit: OrganizationAudit,
  files: ReportFiles | null = null
): OrganizationSummary {
  const rows = audit.auditRows;
  return {
    organization: audit.organization,
    repositories: audit.repositoryCount,
    branches: rows.length,
    compliant: rows.filter((row) => row.verdict.compliant).length,
    nonCompliant: rows.filter((row) => !row.verdict.compliant).length,
    inconclusive: rows.filter((row) => row.verdict.inconclusive).length,
    ignored: rows.filter((row) => row.ignored).length,
    remediation: audit.remediationRows.length,
    listingError: audit.listingError,
    auditFile: files?.auditFile ?? null,
    remediationFile: files?.remediationFile ?? null,
  };
}
