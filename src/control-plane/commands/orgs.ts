import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { loadCredentials } from '../../secrets/index.js';
import { authenticate, createGitHubClient, createSecretProvider } from '../runtime.js';
import { print, printError, formatError, formatJson, bold, cyan, dim } from '../formatter.js';

/**
 * Create the orgs command.
 */
export function createOrgsCommand(): Command {
  const command = new Command('orgs')
    .description('List the organizations the GitHub token can access')
    .option('--json', 'Output as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        await executeOrgs(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeOrgs(options: { json?: boolean }): Promise<void> {
  const config = getConfig();
  const credentials = await loadCredentials(createSecretProvider(config), config);
  const github = createGitHubClient(config, credentials);
  const login = await authenticate(github);
  const organizations = await github.listOrganizations();

  if (options.json) {
    print(formatJson({ login, organizations }));
    return;
  }

  print(`${bold('Authenticated as:')} ${cyan(login)}`);
  print('');
  if (organizations.length === 0) {
    print(dim('No organizations found.'));
    return;
  }
  for (const organization of organizations) {
    print(`  ${organization}`);
  }
}
