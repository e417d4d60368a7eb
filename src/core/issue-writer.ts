import { join } from 'node:path';
import { NO_DESCRIPTION } from '../constants.js';
import type { FileOutcome, Issue, MergeMode, VaultConfig } from '../types/sync.js';
import { buildFrontmatter, readSyncedAt } from './frontmatter.js';
import { renderDocument } from './markdown-renderer.js';
import { planMerge } from './safe-merge.js';

export interface IssueFileResult {
  content: string;
  outcome: FileOutcome;
  mode: MergeMode;
}

/**
 * Machine-owned region of an issue file: frontmatter, title and description.
 */
export function buildMachineContent(issue: Issue, syncedAt: string): string {
  const description = renderDocument(issue.description ?? []) || `${NO_DESCRIPTION}\n`;
  const title = `# ${issue.key} ${issue.summary.replace(/\s+/g, ' ').trim()}`.trimEnd();

  return [
    buildFrontmatter(issue, syncedAt),
    `${title}\n`,
    '## Description\n',
    description,
    '',
  ].join('\n');
}

/**
 * Compute the new content of an issue file.
 *
 * When re-rendering with the file's previous `synced_at` reproduces it
 * exactly, nothing changed remotely and the existing content is returned
 * untouched; otherwise `syncedAt` is stamped into the new frontmatter.
 */
export function renderIssueFile(issue: Issue, existing: string | null, syncedAt: string): IssueFileResult {
  if (existing !== null) {
    const previous = readSyncedAt(existing);
    if (previous !== undefined) {
      const replay = planMerge(existing, buildMachineContent(issue, previous));
      if (replay.content === existing) {
        return { content: existing, outcome: 'unchanged', mode: replay.mode };
      }
    }
  }

  const plan = planMerge(existing, buildMachineContent(issue, syncedAt));
  return {
    content: plan.content,
    outcome: existing === null ? 'created' : 'updated',
    mode: plan.mode,
  };
}

export function issueFileName(key: string): string {
  const safe = key.replace(/[\\/:*?"<>|\u0000-\u001f]/g, '-');
  return `${safe}.md`;
}

export function getIssueFilePath(config: VaultConfig, key: string): string {
  return join(config.vaultPath, config.ticketsFolder, issueFileName(key));
}
