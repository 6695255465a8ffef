import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { loadCredentials } from '../../secrets/index.js';
import { loadReferenceData } from '../../reference/index.js';
import { CsvReportSink, summarizeAudit, type OrganizationSummary } from '../../report/index.js';
import {
  authenticate,
  createAuditOrchestrator,
  createGitHubClient,
  createSecretProvider,
  selectOrganizations,
} from '../runtime.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatSuccess,
  formatSummaryTable,
  formatValidationErrors,
  formatWarning,
  formatDuration,
  bold,
  cyan,
  dim,
} from '../formatter.js';

/**
 * Schema for audit command options
 */
const auditOptionsSchema = z
  .object({
    org: z.array(z.string().trim().min(1)).default([]),
    all: z.boolean().default(false),
    outputDir: z.string().min(1).optional(),
    concurrency: z.coerce.number().int().min(1).max(64).optional(),
    json: z.boolean().default(false),
  })
  .refine((options) => options.org.length > 0 || options.all, {
    message: 'Specify --org <name...> or --all',
    path: ['org'],
  })
  .refine((options) => !(options.org.length > 0 && options.all), {
    message: '--org and --all cannot be combined',
    path: ['all'],
  });

type AuditOptions = z.infer<typeof auditOptionsSchema>;

/**
 * Create the audit command.
 */
export function createAuditCommand(): Command {
  const command = new Command('audit')
    .description('Audit the release gates of every repository in one or more organizations')
    .option('-o, --org <name...>', 'Organization(s) to audit')
    .option('-a, --all', 'Audit every organization the token can access', false)
    .option('--output-dir <dir>', 'Directory for the CSV reports')
    .option('-c, --concurrency <n>', 'Branches audited in parallel (1-64)')
    .option('--json', 'Output the run summary as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeAudit(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the audit command.
 */
async function executeAudit(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = auditOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options: AuditOptions = optionsResult.data;
  const baseConfig = getConfig();
  const config = {
    ...baseConfig,
    outputDir: options.outputDir ?? baseConfig.outputDir,
    concurrency: options.concurrency ?? baseConfig.concurrency,
  };

  const credentials = await loadCredentials(createSecretProvider(config), config);
  const github = createGitHubClient(config, credentials);
  const login = await authenticate(github);
  const organizations = await selectOrganizations(github, options.org);
  const store = await loadReferenceData(config);
  const orchestrator = createAuditOrchestrator({ config, credentials, store, github });
  const sink = new CsvReportSink(config.outputDir);

  if (!options.json) {
    print(`${bold('Authenticated as:')} ${cyan(login)}`);
    print(`${bold('Organizations:')}    ${organizations.join(', ')}`);
    print(`${bold('Reports:')}          ${config.outputDir}`);
    print('');
  }

  const startedAt = Date.now();
  const signal = AbortSignal.timeout(config.runTimeoutMs);
  const summaries: OrganizationSummary[] = [];

  try {
    await orchestrator.run(organizations, {
      signal,
      onOrganization: async (audit) => {
        const files = await sink.write(audit);
        const summary = summarizeAudit(audit, files);
        summaries.push(summary);

        if (options.json) {
          return;
        }
        if (summary.listingError !== null) {
          print(formatWarning(`${audit.organization}: repository listing stopped (${summary.listingError})`));
        }
        print(
          formatSuccess(
            `${audit.organization}: ${summary.branches} branches, ${summary.nonCompliant} non-compliant ${dim(`→ ${files.auditFile}`)}`
          )
        );
      },
    });
  } catch (error) {
    if (signal.aborted) {
      throw new Error(`Audit run exceeded ${formatDuration(Math.round(config.runTimeoutMs / 1000))}`);
    }
    throw error;
  }

  if (options.json) {
    print(formatJson(summaries));
    return;
  }

  print('');
  print(formatSummaryTable(summaries));
  print('');
  print(dim(`Completed in ${formatDuration(Math.round((Date.now() - startedAt) / 1000))}`));
}
