import type { Issue } from '../types/sync.js';

const BOARD_HEADER = '---\nkanban-plugin: basic\n---\n';

/**
 * Group issues by their exact status string. Groups keep the order in which
 * each status is first seen, issues keep their input order.
 */
export function groupByStatus(issues: Issue[]): Map<string, Issue[]> {
  const groups = new Map<string, Issue[]>();
  for (const issue of issues) {
    const group = groups.get(issue.status);
    if (group) {
      group.push(issue);
    } else {
      groups.set(issue.status, [issue]);
    }
  }
  return groups;
}

/**
 * Render the board file: one `## status` column per group with a checkbox
 * line per issue, readable by the Obsidian Kanban plugin.
 */
export function generateBoard(issues: Issue[]): string {
  const sections = [BOARD_HEADER];
  for (const [status, group] of groupByStatus(issues)) {
    const lines = group.map(boardLine);
    sections.push(`${columnHeading(status)}\n\n${lines.join('\n')}\n`);
  }
  return sections.join('\n') + '\n';
}

// Status text is kept as is, except that line breaks become spaces
function columnHeading(status: string): string {
  return status === '' ? '##' : `## ${status.replace(/\r\n|\r|\n/g, ' ')}`;
}

function boardLine(issue: Issue): string {
  const summary = issue.summary.replace(/\s+/g, ' ').trim();
  return `- [ ] [${issue.key}](${issue.link}) ${summary}`.trimEnd();
}
