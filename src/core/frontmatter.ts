import { USER_NOTES_MARKER } from '../constants.js';
import type { Issue } from '../types/sync.js';

const FRONTMATTER_DELIMITER = '---';

/**
 * Build the YAML frontmatter block for an issue file.
 *
 * Keys are always present and always in the same order; absent values are
 * written as empty strings so the block has the same shape on every run.
 */
export function buildFrontmatter(issue: Issue, syncedAt: string): string {
  const entries: Array<[string, string | undefined]> = [
    ['jira_key', issue.key],
    ['summary', issue.summary],
    ['type', issue.issueType],
    ['status', issue.status],
    ['priority', issue.priority],
    ['link', issue.link],
    ['created', issue.created],
    ['updated', issue.updated],
    ['synced_at', syncedAt],
  ];

  const lines = [FRONTMATTER_DELIMITER];
  for (const [key, value] of entries) {
    lines.push(`${key}: ${yamlString(value ?? '')}`);
  }
  lines.push(FRONTMATTER_DELIMITER);

  return lines.join('\n') + '\n';
}

/**
 * Read the `synced_at` value back from a file written by `buildFrontmatter`.
 */
export function readSyncedAt(content: string): string | undefined {
  const block = frontmatterBlock(content);
  if (block === undefined) return undefined;
  const match = /^synced_at: "([^"\\]*)"$/m.exec(block);
  return match?.[1];
}

function frontmatterBlock(content: string): string | undefined {
  const opening = `${FRONTMATTER_DELIMITER}\n`;
  if (!content.startsWith(opening)) return undefined;
  const end = content.indexOf(`\n${FRONTMATTER_DELIMITER}\n`, opening.length - 1);
  return end === -1 ? undefined : content.slice(opening.length, end);
}

// The marker is written with `\u005F` escapes: YAML reads the same text back,
// but the file no longer contains the marker inside the frontmatter
const ESCAPED_MARKER = USER_NOTES_MARKER.replace(/_/g, '\\u005F');

// JSON string syntax is a valid YAML double-quoted scalar
function yamlString(value: string): string {
  return JSON.stringify(value).split(USER_NOTES_MARKER).join(ESCAPED_MARKER);
}
