import {
  ComplianceReason,
  type ComplianceVerdict,
  type Resolution,
} from '../types/index.js';
import { describeReason } from '../classifier/index.js';
import type { OrganizationSummary } from '../report/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a verdict with appropriate color.
 */
export function formatVerdict(verdict: ComplianceVerdict): string {
  const label =
    verdict.reason === ComplianceReason.COMPLIANT ? green('COMPLIANT') : red('NON-COMPLIANT');
  const suffix = verdict.inconclusive ? ` ${yellow('(inconclusive)')}` : '';
  return `${label} ${dim(describeReason(verdict.reason))}${suffix}`;
}

/**
 * Format duration in seconds to human-readable string.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Pad a string to a specific width.
 */
export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Table column definition.
 */
export interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  // Header row
  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  // Separator
  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  // Data rows
  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format the per-organization results of a run as a table.
 */
export function formatSummaryTable(summaries: OrganizationSummary[]): string {
  if (summaries.length === 0) {
    return dim('No organizations audited.');
  }

  const count = (value: number): string => String(value);
  const columns: TableColumn<OrganizationSummary>[] = [
    { header: 'ORGANIZATION', width: 24, value: s => s.organization },
    { header: 'REPOS', width: 6, align: 'right', value: s => count(s.repositories) },
    { header: 'BRANCHES', width: 8, align: 'right', value: s => count(s.branches) },
    { header: 'COMPLIANT', width: 9, align: 'right', value: s => count(s.compliant) },
    { header: 'NON-COMPL', width: 9, align: 'right', value: s => count(s.nonCompliant) },
    { header: 'INCONCL', width: 7, align: 'right', value: s => count(s.inconclusive) },
    { header: 'IGNORED', width: 7, align: 'right', value: s => count(s.ignored) },
    { header: 'LISTING', width: 7, value: s => (s.listingError === null ? 'ok' : 'failed') },
  ];

  return formatTable(summaries, columns);
}

/**
 * Format a pipeline resolution for display.
 */
export function formatResolution(context: string, branch: string, resolution: Resolution): string {
  const lines: string[] = [];

  lines.push(`${bold('Context:')}      ${context}`);
  lines.push(`${bold('Branch:')}       ${branch}`);

  if (!resolution.found) {
    lines.push(`${bold('Pipeline:')}     ${yellow('not found')}`);
    return lines.join('\n');
  }

  const { identity } = resolution;
  lines.push(`${bold('Pipeline:')}     ${cyan(`${identity.sourceOrg}/${identity.project}#${identity.numericId}`)}`);
  lines.push(`${bold('Source:')}       ${resolution.source}`);
  lines.push(`${bold('Environment:')}  ${resolution.environment}`);

  return lines.join('\n');
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
