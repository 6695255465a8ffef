import { Command } from 'commander';
import { createAuditCommand } from './commands/audit.js';
import { createOrgsCommand } from './commands/orgs.js';
import { createResolveCommand } from './commands/resolve.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '1.0.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('gate-audit')
    .description(
      'Audit branch protection, PR validation and static analysis gates across GitHub organizations'
    )
    .version(VERSION, '-v, --version', 'Output the current version');

  // Add commands
  program.addCommand(createAuditCommand());
  program.addCommand(createOrgsCommand());
  program.addCommand(createResolveCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}
