import { describe, it, expect } from 'vitest';
import { hasMarker, mergeFileContent, operatorSection, planMerge } from '../src/core/safe-merge.js';

const MARKER = '%% USER_NOTES_START %%';

describe('planMerge', () => {
  it('should append the marker on first write', () => {
    expect(planMerge(null, 'FRONTMATTER\nBODY\n')).toEqual({
      content: 'FRONTMATTER\nBODY\n%% USER_NOTES_START %%\n',
      mode: 'created',
    });
  });

  it('should end machine content with a newline before the marker', () => {
    expect(mergeFileContent(null, 'BODY')).toBe('BODY\n%% USER_NOTES_START %%\n');
  });

  it('should keep everything from the marker onward verbatim', () => {
    const existing = `old machine\n${MARKER}\n- [ ] my note\n`;
    const plan = planMerge(existing, 'new\n');

    expect(plan).toEqual({ content: `new\n${MARKER}\n- [ ] my note\n`, mode: 'merged' });
  });

  it('should split at the first marker only', () => {
    const existing = `a\n${MARKER}\nnotes\n${MARKER}\nmore`;
    expect(mergeFileContent(existing, 'X\n')).toBe(`X\n${MARKER}\nnotes\n${MARKER}\nmore`);
  });

  it('should keep a file without a marker whole below a new marker', () => {
    expect(planMerge('hand written\n', 'new\n')).toEqual({
      content: `new\n${MARKER}\nhand written\n`,
      mode: 'marker-missing',
    });
  });

  it('should treat an existing empty file as one without a marker', () => {
    expect(planMerge('', 'X\n')).toEqual({ content: `X\n${MARKER}\n`, mode: 'marker-missing' });
  });

  it('should preserve the operator section for any machine content', () => {
    const existing = [
      `${MARKER}\n`,
      `stale\n${MARKER}`,
      `---\nkey: "A-1"\n---\n${MARKER}\n\n## Notes\n\n  indented\r\nwindows line\n`,
    ];
    const machines = ['', 'x', '# Title\n\nbody\n\n'];

    for (const content of existing) {
      const section = content.slice(content.indexOf(MARKER));
      for (const machine of machines) {
        expect(mergeFileContent(content, machine).endsWith(section)).toBe(true);
      }
    }
  });

  it('should escape a marker inside machine content', () => {
    const merged = mergeFileContent(null, `text ${MARKER} here\n`);

    expect(merged).toBe(`text %% USER\\_NOTES\\_START %% here\n${MARKER}\n`);
    expect(mergeFileContent(merged, `text ${MARKER} here\n`)).toBe(merged);
  });
});

describe('operatorSection', () => {
  it('should return the section from the marker on', () => {
    expect(operatorSection(`head\n${MARKER}\nnotes\n`)).toBe(`${MARKER}\nnotes\n`);
  });

  it('should return null without a marker', () => {
    expect(operatorSection('head\n')).toBeNull();
    expect(hasMarker('head\n')).toBe(false);
    expect(hasMarker(`head\n${MARKER}\n`)).toBe(true);
  });
});
