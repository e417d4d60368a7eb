import { loadConfig, loadEnvFile } from '../config.js';
import { syncIssues } from '../core/sync-engine.js';
import { logger, setVerbose } from '../utils/logger.js';
import type { SyncResult } from '../types/sync.js';

export interface SyncCommandOptions {
  jql?: string;
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  envFile?: string;
}

export async function syncCommand(options: SyncCommandOptions): Promise<void> {
  setVerbose(options.verbose ?? false);
  loadEnvFile(options.envFile);
  const config = loadConfig();

  if (!options.quiet) {
    logger.info(`Starting sync for Jira host: ${config.jiraHost}`);
    if (options.dryRun) {
      logger.info('Dry run mode - no files will be written.');
    }
  }

  const result = await syncIssues(config, {
    jql: options.jql,
    dryRun: options.dryRun,
    quiet: options.quiet,
  });

  if (!options.quiet) {
    printSyncResult(result);
  }
  if (result.errors.length > 0) {
    process.exitCode = 1;
  }
}

export function printSyncResult(result: SyncResult): void {
  logger.info('--- Sync Results ---');
  logger.info(`Created:   ${result.created}`);
  logger.info(`Updated:   ${result.updated}`);
  logger.info(`Unchanged: ${result.unchanged}`);
  if (result.recovered > 0) {
    logger.info(`Recovered: ${result.recovered} (notes marker re-inserted)`);
  }
  logger.info(`Board:     ${result.board}`);

  if (result.errors.length > 0) {
    logger.warn(`Errors:    ${result.errors.length}`);
    for (const err of result.errors) {
      logger.error(`  ${err.key}: ${err.error}`);
    }
  }
}
