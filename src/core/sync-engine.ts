import type { Issue, SyncConfig, SyncResult } from '../types/sync.js';
import { getErrorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { withLock, type LockOptions } from '../utils/lock.js';
import { getBoardFilePath, getLockFilePath } from '../utils/paths.js';
import { generateBoard } from './board.js';
import { FsFileStore, type FileStore } from './file-store.js';
import { getIssueFilePath, renderIssueFile } from './issue-writer.js';
import { JiraClient, type IssueSource } from './jira-client.js';

export interface SyncOptions {
  dryRun?: boolean;
  quiet?: boolean;
  // Overrides the configured JQL for this run
  jql?: string;
}

export interface SyncDeps {
  source?: IssueSource;
  store?: FileStore;
  now?: () => Date;
  lock?: LockOptions;
}

/**
 * Core sync algorithm: fetches the issues matching the query, rewrites the
 * machine-owned region of one file per issue, then regenerates the board.
 *
 * Issues are processed one at a time under a vault-wide lock. A failure on one
 * file is recorded and the run moves on; a failed fetch aborts before any write.
 */
export async function syncIssues(
  config: SyncConfig,
  options: SyncOptions = {},
  deps: SyncDeps = {},
): Promise<SyncResult> {
  const source = deps.source ?? JiraClient.fromConfig(config);
  const store = deps.store ?? new FsFileStore();
  const now = deps.now ?? (() => new Date());

  return withLock(getLockFilePath(config), async () => {
    const result: SyncResult = {
      created: 0,
      updated: 0,
      unchanged: 0,
      recovered: 0,
      board: 'skipped',
      errors: [],
    };

    const jql = options.jql ?? config.jql;
    logger.debug(`JQL: ${jql}`);
    const issues = await source.fetchIssues(jql);
    if (!options.quiet) logger.info(`Found ${issues.length} issue(s).`);

    if (issues.length === 0) {
      logger.warn('No issues matched the query. Nothing was written.');
      return result;
    }

    const syncedAt = now().toISOString();
    for (const issue of issues) {
      await syncIssueFile(config, issue, syncedAt, store, options, result);
    }

    await syncBoard(config, issues, store, options, result);
    return result;
  }, deps.lock);
}

async function syncIssueFile(
  config: SyncConfig,
  issue: Issue,
  syncedAt: string,
  store: FileStore,
  options: SyncOptions,
  result: SyncResult,
): Promise<void> {
  const path = getIssueFilePath(config, issue.key);
  try {
    const existing = await store.read(path);
    const file = renderIssueFile(issue, existing, syncedAt);

    if (file.outcome === 'unchanged') {
      result.unchanged++;
      logger.debug(`Unchanged: ${issue.key}`);
      return;
    }

    if (file.mode === 'marker-missing') {
      result.recovered++;
      logger.warn(`${issue.key}: notes marker not found, keeping the whole existing file below a new marker`);
    }

    if (options.dryRun) {
      if (!options.quiet) logger.info(`[dry-run] Would ${file.outcome === 'created' ? 'create' : 'update'}: ${path}`);
    } else {
      await store.write(path, file.content);
      if (!options.quiet) logger.success(`${file.outcome === 'created' ? 'Created' : 'Updated'}: ${issue.key}`);
    }

    if (file.outcome === 'created') {
      result.created++;
    } else {
      result.updated++;
    }
  } catch (err) {
    const message = getErrorMessage(err);
    result.errors.push({ key: issue.key, error: message });
    logger.error(`Failed to sync ${issue.key}: ${message}`);
  }
}

async function syncBoard(
  config: SyncConfig,
  issues: Issue[],
  store: FileStore,
  options: SyncOptions,
  result: SyncResult,
): Promise<void> {
  const path = getBoardFilePath(config);
  try {
    const board = generateBoard(issues);
    const existing = await store.read(path);
    if (existing === board) {
      result.board = 'unchanged';
      return;
    }

    if (options.dryRun) {
      if (!options.quiet) logger.info(`[dry-run] Would write board: ${path}`);
      result.board = 'skipped';
      return;
    }

    await store.write(path, board);
    result.board = 'written';
    if (!options.quiet) logger.success(`Board written: ${config.boardFile}`);
  } catch (err) {
    const message = getErrorMessage(err);
    result.board = 'failed';
    result.errors.push({ key: config.boardFile, error: message });
    logger.error(`Failed to write board: ${message}`);
  }
}
