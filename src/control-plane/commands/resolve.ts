import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { loadReferenceData } from '../../reference/index.js';
import { createResolver } from '../runtime.js';
import { print, printError, formatError, formatJson, formatResolution } from '../formatter.js';

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  const command = new Command('resolve')
    .description('Show which pipeline a status-check context resolves to')
    .argument('<org>', 'GitHub organization')
    .argument('<context>', 'Status-check context')
    .argument('[branch]', 'Target branch', 'main')
    .option('--json', 'Output as JSON', false)
    .action(async (org: string, context: string, branch: string, options: { json?: boolean }) => {
      try {
        await executeResolve(org, context, branch, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeResolve(
  org: string,
  context: string,
  branch: string,
  options: { json?: boolean }
): Promise<void> {
  const config = getConfig();
  const store = await loadReferenceData(config);
  const resolution = createResolver(config, store).resolve(org, context, branch);

  if (options.json) {
    print(formatJson({ organization: org, context, branch, resolution }));
    return;
  }

  print(formatResolution(context, branch, resolution));
  if (!resolution.found) {
    process.exitCode = 2;
  }
}
