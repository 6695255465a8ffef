/**
 * Tabular reference loader
 *
 * Reads the pipeline, ignore and owner CSV files. Malformed rows are
 * skipped and counted; a missing file yields an empty table.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../utils/logger.js';
import { parseCsvLine, splitCsvLines } from '../utils/csv.js';
import type { PipelineRecord } from '../types/index.js';
import {
  ReferenceDataStore,
  type IgnoreEntry,
  type OwnerEntry,
} from './reference-store.js';
import type { AuditConfig } from '../config/index.js';

const log = createLogger('reference:csv-loader');

export interface LoadResult<T> {
  rows: T[];
  skipped: number;
}

const IGNORE_HEADER = /^\s*"?org"?\s*,\s*"?repo/i;

function isBlank(fields: string[]): boolean {
  return fields.every((field) => field === '');
}

/**
 * Read a file, treating a missing file as absent content.
 */
async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.warn({ filePath }, 'Reference file not found');
      return null;
    }
    throw error;
  }
}

/**
 * Parse pipeline rows `org,project,id,name`. The first line is a header.
 */
export function parsePipelineCsv(content: string): LoadResult<PipelineRecord> {
  const rows: PipelineRecord[] = [];
  let skipped = 0;

  for (const line of splitCsvLines(content).slice(1)) {
    const fields = parseCsvLine(line);
    if (isBlank(fields)) {
      continue;
    }

    const [sourceOrg = '', project = '', id = '', displayName = ''] = fields;
    if (!sourceOrg || !project || !displayName || !/^\d+$/.test(id)) {
      skipped++;
      continue;
    }

    rows.push({ sourceOrg, project, numericId: Number.parseInt(id, 10), displayName });
  }

  return { rows, skipped };
}

/**
 * Parse ignore rows `org,repo`. The header line is optional.
 */
export function parseIgnoreCsv(content: string): LoadResult<IgnoreEntry> {
  const lines = splitCsvLines(content);
  const first = lines[0];
  const body = first !== undefined && IGNORE_HEADER.test(first) ? lines.slice(1) : lines;

  const rows: IgnoreEntry[] = [];
  let skipped = 0;

  for (const line of body) {
    const fields = parseCsvLine(line);
    if (isBlank(fields)) {
      continue;
    }

    const [organization = '', repository = ''] = fields;
    if (!organization || !repository) {
      skipped++;
      continue;
    }

    rows.push({ organization, repository });
  }

  return { rows, skipped };
}

/**
 * Parse owner rows `repo,email`. The first line is a header.
 */
export function parseOwnersCsv(content: string): LoadResult<OwnerEntry> {
  const rows: OwnerEntry[] = [];
  let skipped = 0;

  for (const line of splitCsvLines(content).slice(1)) {
    const fields = parseCsvLine(line);
    if (isBlank(fields)) {
      continue;
    }

    const [repository = '', email = ''] = fields;
    if (!repository || !email) {
      skipped++;
      continue;
    }

    rows.push({ repository, email });
  }

  return { rows, skipped };
}

async function loadTable<T>(
  filePath: string,
  parse: (content: string) => LoadResult<T>,
  kind: string
): Promise<LoadResult<T>> {
  const content = await readOptional(filePath);
  if (content === null) {
    return { rows: [], skipped: 0 };
  }

  const result = parse(content);
  log.info({ filePath, loaded: result.rows.length, skipped: result.skipped }, `Loaded ${kind}`);
  if (result.skipped > 0) {
    log.warn({ filePath, skipped: result.skipped }, `Skipped malformed ${kind} rows`);
  }
  return result;
}

export function ownersFilePath(config: AuditConfig, organization: string): string {
  return path.resolve(config.dataDir, config.ownersDir, `git_owners_${organization}.csv`);
}

/**
 * Build the store from the pipeline tables and the ignore list.
 */
export async function loadReferenceData(config: AuditConfig): Promise<ReferenceDataStore> {
  const resolveData = (file: string): string => path.resolve(config.dataDir, file);

  const [primary, secondary, ignore] = await Promise.all([
    loadTable(resolveData(config.primary.pipelinesCsv), parsePipelineCsv, `${config.primary.label} pipelines`),
    loadTable(resolveData(config.secondary.pipelinesCsv), parsePipelineCsv, `${config.secondary.label} pipelines`),
    loadTable(resolveData(config.ignoreCsv), parseIgnoreCsv, 'ignore entries'),
  ]);

  const store = new ReferenceDataStore({
    primary: primary.rows,
    secondary: secondary.rows,
    ignore: ignore.rows,
  });

  log.info(
    {
      primaryPipelines: primary.rows.length,
      secondaryPipelines: secondary.rows.length,
      ignoredRepositories: store.ignoredCount,
    },
    'Reference data loaded'
  );

  return store;
}

/**
 * Load the owner table of `organization` into the store.
 */
export async function loadOwners(
  store: ReferenceDataStore,
  config: AuditConfig,
  organization: string
): Promise<number> {
  const result = await loadTable(
    ownersFilePath(config, organization),
    parseOwnersCsv,
    'owner mappings'
  );
  store.loadOwners(organization, result.rows);
  return result.rows.length;
}
