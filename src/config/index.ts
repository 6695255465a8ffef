/**
 * Audit Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from '../types/errors.js';

const log = createLogger('config');

/** Task GUID of the Checkmarx CxSAST build task */
export const DEFAULT_STATIC_ANALYSIS_TASK_ID = 'dd862edc-5d88-4d2c-b83b-fff2a695e5c0';

const optionalName = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

/**
 * CI environment schema (one per pipeline table)
 */
const environmentConfigSchema = z.object({
  /** Label used in logs and lookup sources */
  label: z.string().min(1),
  /** CI organization whose pipelines use this environment's token */
  ciOrganization: optionalName,
  /** CSV file with the environment's pipeline table */
  pipelinesCsv: z.string().min(1),
  /** Secret holding the environment's CI token */
  tokenSecret: z.string().min(1),
});

export type EnvironmentConfig = z.infer<typeof environmentConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Concurrency and timeouts
  concurrency: z.coerce.number().int().min(1).max(64).default(8),
  httpTimeoutMs: z.coerce.number().int().min(1000).max(600000).default(30000),
  runTimeoutMs: z.coerce.number().int().min(60000).max(86400000).default(3600000),

  // Paths
  dataDir: z.string().default('.'),
  ignoreCsv: z.string().default('ignore.csv'),
  ownersDir: z.string().default('owners_list'),
  outputDir: z.string().default('reports'),

  // Environments
  primary: environmentConfigSchema,
  secondary: environmentConfigSchema,

  // Strategic-initiative override
  strategicOrganization: optionalName,
  strategicProject: optionalName,

  // Static analysis
  staticAnalysisTool: z.string().min(1).default('checkmarx'),
  staticAnalysisTaskId: z.string().min(1).default(DEFAULT_STATIC_ANALYSIS_TASK_ID),
  yamlDetector: z.enum(['heuristic', 'structured']).default('heuristic'),

  // Secrets
  keyVaultUrl: z.string().url().optional(),

  // Remote APIs
  githubTokenSecret: z.string().min(1).default('GITHUB_TOKEN'),
  githubApiUrl: z.string().url().optional(),
  azureDevOpsBaseUrl: z.string().url().default('https://dev.azure.com'),
});

export type AuditConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AuditConfig {
  const raw = {
    concurrency: env.GATE_AUDIT_CONCURRENCY,
    httpTimeoutMs: env.GATE_AUDIT_HTTP_TIMEOUT_MS,
    runTimeoutMs: env.GATE_AUDIT_RUN_TIMEOUT_MS,
    dataDir: env.GATE_AUDIT_DATA_DIR,
    ignoreCsv: env.GATE_AUDIT_IGNORE_CSV,
    ownersDir: env.GATE_AUDIT_OWNERS_DIR,
    outputDir: env.GATE_AUDIT_OUTPUT_DIR,
    primary: {
      label: env.GATE_AUDIT_PRIMARY_LABEL ?? 'DEV',
      ciOrganization: env.GATE_AUDIT_PRIMARY_CI_ORG,
      pipelinesCsv: env.GATE_AUDIT_PRIMARY_PIPELINES_CSV ?? 'primary-pipelines.csv',
      tokenSecret: env.GATE_AUDIT_PRIMARY_TOKEN_SECRET ?? 'AZDO_PAT_PRIMARY',
    },
    secondary: {
      label: env.GATE_AUDIT_SECONDARY_LABEL ?? 'HE',
      ciOrganization: env.GATE_AUDIT_SECONDARY_CI_ORG,
      pipelinesCsv: env.GATE_AUDIT_SECONDARY_PIPELINES_CSV ?? 'secondary-pipelines.csv',
      tokenSecret: env.GATE_AUDIT_SECONDARY_TOKEN_SECRET ?? 'AZDO_PAT_SECONDARY',
    },
    strategicOrganization: env.GATE_AUDIT_STRATEGIC_ORG,
    strategicProject: env.GATE_AUDIT_STRATEGIC_PROJECT,
    staticAnalysisTool: env.GATE_AUDIT_STATIC_ANALYSIS_TOOL,
    staticAnalysisTaskId: env.GATE_AUDIT_STATIC_ANALYSIS_TASK_ID,
    yamlDetector: env.GATE_AUDIT_YAML_DETECTOR,
    keyVaultUrl: env.GATE_AUDIT_KEY_VAULT_URL || undefined,
    githubTokenSecret: env.GATE_AUDIT_GITHUB_TOKEN_SECRET,
    githubApiUrl: env.GITHUB_API_URL,
    azureDevOpsBaseUrl: env.GATE_AUDIT_AZDO_BASE_URL,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new ConfigurationError(`Configuration validation failed: ${result.error.message}`);
  }

  if ((result.data.strategicOrganization === null) !== (result.data.strategicProject === null)) {
    throw new ConfigurationError(
      'GATE_AUDIT_STRATEGIC_ORG and GATE_AUDIT_STRATEGIC_PROJECT must be set together'
    );
  }

  log.debug(
    {
      concurrency: result.data.concurrency,
      httpTimeoutMs: result.data.httpTimeoutMs,
      dataDir: result.data.dataDir,
      yamlDetector: result.data.yamlDetector,
      secrets: result.data.keyVaultUrl ? 'key-vault' : 'environment',
      strategicOrganization: result.data.strategicOrganization,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: AuditConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): AuditConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
