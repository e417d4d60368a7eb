import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import type { Issue } from '../src/types/sync.js';
import { buildFrontmatter } from '../src/core/frontmatter.js';
import {
  buildMachineContent,
  getIssueFilePath,
  issueFileName,
  renderIssueFile,
} from '../src/core/issue-writer.js';

const MARKER = '%% USER_NOTES_START %%';
const SYNCED_AT = '2026-01-01T00:00:00.000Z';
const LATER = '2026-01-02T08:00:00.000Z';

function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    key: 'PROJ-1',
    summary: 'Fix login',
    status: 'In Progress',
    priority: 'High',
    issueType: 'Bug',
    link: 'https://jira.example.test/browse/PROJ-1',
    description: [{ type: 'paragraph', content: [{ type: 'text', text: 'Steps to reproduce', marks: [] }] }],
    ...overrides,
  };
}

describe('buildMachineContent', () => {
  it('should lay out frontmatter, title and description', () => {
    const issue = makeIssue();
    expect(buildMachineContent(issue, SYNCED_AT)).toBe(
      `${buildFrontmatter(issue, SYNCED_AT)}\n# PROJ-1 Fix login\n\n## Description\n\nSteps to reproduce\n\n`,
    );
  });

  it('should use a placeholder when there is no description', () => {
    const issue = makeIssue({ description: undefined });
    expect(buildMachineContent(issue, SYNCED_AT).endsWith('## Description\n\n_No description provided._\n\n')).toBe(true);
  });

  it('should collapse whitespace in the title', () => {
    const issue = makeIssue({ summary: '  Fix\nlogin   page ' });
    expect(buildMachineContent(issue, SYNCED_AT)).toContain('\n# PROJ-1 Fix login page\n');
  });
});

describe('renderIssueFile', () => {
  it('should create a new file ending in the marker', () => {
    const issue = makeIssue();
    const result = renderIssueFile(issue, null, SYNCED_AT);

    expect(result.outcome).toBe('created');
    expect(result.mode).toBe('created');
    expect(result.content).toBe(
      `${buildFrontmatter(issue, SYNCED_AT)}\n# PROJ-1 Fix login\n\n## Description\n\nSteps to reproduce\n\n${MARKER}\n`,
    );
  });

  it('should leave an unchanged issue byte-identical', () => {
    const issue = makeIssue();
    const first = renderIssueFile(issue, null, SYNCED_AT);
    const second = renderIssueFile(issue, first.content, LATER);

    expect(second.outcome).toBe('unchanged');
    expect(second.content).toBe(first.content);
  });

  it('should stay unchanged when the operator added notes', () => {
    const issue = makeIssue();
    const existing = `${renderIssueFile(issue, null, SYNCED_AT).content}- [ ] call Sam\n`;
    const result = renderIssueFile(issue, existing, LATER);

    expect(result.outcome).toBe('unchanged');
    expect(result.content).toBe(existing);
  });

  it('should update the machine region and keep the notes when the issue changes', () => {
    const existing = `${renderIssueFile(makeIssue(), null, SYNCED_AT).content}- [ ] call Sam\n`;
    const result = renderIssueFile(makeIssue({ status: 'Done' }), existing, LATER);

    expect(result.outcome).toBe('updated');
    expect(result.mode).toBe('merged');
    expect(result.content).toContain('status: "Done"\n');
    expect(result.content).toContain(`synced_at: "${LATER}"\n`);
    expect(result.content.endsWith(`${MARKER}\n- [ ] call Sam\n`)).toBe(true);
  });

  it('should keep a foreign file below a new marker', () => {
    const result = renderIssueFile(makeIssue(), 'my own notes\n', LATER);

    expect(result.outcome).toBe('updated');
    expect(result.mode).toBe('marker-missing');
    expect(result.content.endsWith(`${MARKER}\nmy own notes\n`)).toBe(true);
  });
});

describe('notes marker in issue text', () => {
  it('should leave the real marker as the only one in the file', () => {
    const result = renderIssueFile(makeIssue({ summary: `Note ${MARKER} here` }), null, SYNCED_AT);

    expect(result.content).toContain('summary: "Note %% USER\\u005FNOTES\\u005FSTART %% here"\n');
    expect(result.content).toContain('\n# PROJ-1 Note %% USER\\_NOTES\\_START %% here\n');
    expect(result.content.indexOf(MARKER)).toBe(result.content.lastIndexOf(MARKER));
    expect(result.content.endsWith(`${MARKER}\n`)).toBe(true);
  });

  it('should stay unchanged on the next run', () => {
    const issue = makeIssue({ summary: `Note ${MARKER} here` });
    const first = renderIssueFile(issue, null, SYNCED_AT);

    expect(renderIssueFile(issue, first.content, LATER).outcome).toBe('unchanged');
  });
});

describe('issue file paths', () => {
  it('should replace characters that are not allowed in file names', () => {
    expect(issueFileName('PROJ-1')).toBe('PROJ-1.md');
    expect(issueFileName('A/B:1')).toBe('A-B-1.md');
  });

  it('should place the file in the tickets folder', () => {
    const config = { vaultPath: '/vault', ticketsFolder: 'Jira Tickets', boardFile: 'Board.md' };
    expect(getIssueFilePath(config, 'PROJ-1')).toBe(join('/vault', 'Jira Tickets', 'PROJ-1.md'));
  });
});
