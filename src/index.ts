import { Command } from 'commander';
import { syncCommand } from './commands/sync.js';
import { statusCommand } from './commands/status.js';
import { renderCommand } from './commands/render.js';
import { getErrorMessage } from './errors.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('jvsync')
  .description('Mirror Jira issues into an Obsidian vault as Markdown notes and a Kanban board')
  .version('0.1.0');

// Default action: sync with the configured query
program.action(async () => {
  await run(() => syncCommand({}));
});

program
  .command('sync')
  .description('Fetch issues from Jira and update the ticket notes and the board')
  .option('--jql <jql>', 'Override JIRA_JQL for this run')
  .option('--dry-run', 'Show what would be written without touching the vault')
  .option('--quiet', 'Only print warnings and errors')
  .option('--verbose', 'Print debug output')
  .option('--env-file <path>', 'Load environment variables from this file instead of ./.env')
  .action(async (opts) => {
    await run(() => syncCommand({
      jql: opts.jql,
      dryRun: opts.dryRun,
      quiet: opts.quiet,
      verbose: opts.verbose,
      envFile: opts.envFile,
    }));
  });

program
  .command('status')
  .description('Show the vault paths and how many ticket notes exist')
  .option('--env-file <path>', 'Load environment variables from this file instead of ./.env')
  .action(async (opts) => {
    await run(() => statusCommand({ envFile: opts.envFile }));
  });

program
  .command('render')
  .description('Render an ADF document (or a Jira issue JSON) from a file to Markdown')
  .argument('<file>', 'JSON file to render')
  .action(async (file: string) => {
    await run(() => renderCommand(file));
  });

async function run(command: () => Promise<void>): Promise<void> {
  try {
    await command();
  } catch (err) {
    logger.error(getErrorMessage(err));
    process.exitCode = 1;
  }
}

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}
