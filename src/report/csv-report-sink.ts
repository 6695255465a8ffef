/**
 * CSV report sink
 *
 * One audit file per organization and, when it has any, one
 * remediation file of the non-compliant, non-ignored branches.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger } from '../utils/logger.js';
import { formatCsvRow } from '../utils/csv.js';
import { describeReason } from '../classifier/index.js';
import { DetailCode, type AuditRow, type OrganizationAudit } from '../types/index.js';

const log = createLogger('report');

export const AUDIT_HEADER = [
  'GitHub_Org',
  'Repository',
  'Branch',
  'Status_Checks_Required',
  'Contexts',
  'PR_Validation_Status',
  'Checkmarx_Status',
  'Checkmarx_Details',
  'Protection_Source',
  'Compliance',
  'Reason',
] as const;

export const REMEDIATION_HEADER = [
  'org',
  'repo_name',
  'branch',
  'status_check',
  'context',
  'pr_validation',
  'checkmarx_status',
  'checkmarx_details',
  'reason',
  'owner_email',
] as const;

/** Fill value for the gate columns of a branch without contexts */
const NO_VALUE = 'no';
const MULTI_VALUE_SEPARATOR = ';';

export interface ReportFiles {
  auditFile: string;
  remediationFile: string | null;
}

export interface ReportSink {
  write(audit: OrganizationAudit): Promise<ReportFiles>;
}

interface GateColumns {
  statusCheck: string;
  contexts: string;
  prValidation: string;
  staticAnalysis: string;
  details: string;
}

function emptyDetail(row: AuditRow): string {
  const { probeErrors } = row.facts;
  if (probeErrors.includes(DetailCode.UNIT_ERROR)) {
    return DetailCode.UNIT_ERROR;
  }
  return probeErrors.length > 0 ? DetailCode.PROTECTION_API_ERROR : DetailCode.NO_CONTEXTS;
}

/**
 * Status-check and per-context gate columns of a row.
 */
export function gateColumns(row: AuditRow): GateColumns {
  if (row.gates.length === 0) {
    return {
      statusCheck: row.facts.requiresStatusChecks ? 'yes' : 'no',
      contexts: NO_VALUE,
      prValidation: NO_VALUE,
      staticAnalysis: NO_VALUE,
      details: emptyDetail(row),
    };
  }

  const joinValues = (values: string[]): string => values.join(MULTI_VALUE_SEPARATOR);
  return {
    statusCheck: 'yes',
    contexts: joinValues(row.gates.map((gate) => gate.context)),
    prValidation: joinValues(row.gates.map((gate) => gate.prValidation)),
    staticAnalysis: joinValues(row.gates.map((gate) => gate.staticAnalysis)),
    details: joinValues(row.gates.map((gate) => gate.staticAnalysisDetail)),
  };
}

export function complianceLabel(row: AuditRow): string {
  const label = row.verdict.compliant ? 'compliant' : 'non-compliant';
  return row.verdict.inconclusive ? `${label} (inconclusive)` : label;
}

export function formatAuditReport(audit: OrganizationAudit): string {
  const lines = [formatCsvRow(AUDIT_HEADER)];
  for (const row of audit.auditRows) {
    const columns = gateColumns(row);
    lines.push(
      formatCsvRow([
        row.organization,
        row.repository,
        row.branch,
        columns.statusCheck,
        columns.contexts,
        columns.prValidation,
        columns.staticAnalysis,
        columns.details,
        row.facts.source,
        complianceLabel(row),
        describeReason(row.verdict.reason),
      ])
    );
  }
  return `${lines.join('\n')}\n`;
}

export function formatRemediationReport(audit: OrganizationAudit): string {
  const lines = [formatCsvRow(REMEDIATION_HEADER)];
  for (const row of audit.remediationRows) {
    const columns = gateColumns(row);
    lines.push(
      formatCsvRow([
        row.organization,
        row.repository,
        row.branch,
        columns.statusCheck,
        columns.contexts,
        columns.prValidation,
        columns.staticAnalysis,
        columns.details,
        describeReason(row.verdict.reason),
        row.ownerEmail,
      ])
    );
  }
  return `${lines.join('\n')}\n`;
}

export function auditFileName(organization: string): string {
  return `output_${organization}.csv`;
}

export function remediationFileName(organization: string): string {
  return `non-compliant_${organization}.csv`;
}

export class CsvReportSink implements ReportSink {
  constructor(private readonly outputDir: string) {}

  async write(audit: OrganizationAudit): Promise<ReportFiles> {
    await mkdir(this.outputDir, { recursive: true });

    const auditFile = join(this.outputDir, auditFileName(audit.organization));
    await writeFile(auditFile, formatAuditReport(audit), 'utf-8');

    let remediationFile: string | null = null;
    if (audit.remediationRows.length > 0) {
      remediationFile = join(this.outputDir, remediationFileName(audit.organization));
      await writeFile(remediationFile, formatRemediationReport(audit), 'utf-8');
    }

    log.info(
      { organization: audit.organization, auditFile, remediationFile },
      'Reports written'
    );
    return { auditFile, remediationFile };
  }
}
