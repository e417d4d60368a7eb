import { USER_NOTES_MARKER } from '../constants.js';
import type { MergeMode } from '../types/sync.js';

export interface MergePlan {
  content: string;
  mode: MergeMode;
}

// Same text once rendered as Markdown, but no longer matches the marker.
// Inside a fenced code block the backslashes stay visible.
const ESCAPED_MARKER = USER_NOTES_MARKER.replace(/_/g, '\\_');

/**
 * Combine freshly generated machine content with an existing file.
 *
 * Everything from the first marker onward in `existing` is the operator's and
 * is carried over verbatim. A file without a marker is kept whole beneath a
 * new marker, so nothing is lost on first contact with a foreign file.
 */
export function planMerge(existing: string | null, machine: string): MergePlan {
  const head = normalizeMachineContent(machine);

  if (existing === null) {
    return { content: `${head}${USER_NOTES_MARKER}\n`, mode: 'created' };
  }

  const section = operatorSection(existing);
  if (section === null) {
    return { content: `${head}${USER_NOTES_MARKER}\n${existing}`, mode: 'marker-missing' };
  }

  return { content: head + section, mode: 'merged' };
}

export function mergeFileContent(existing: string | null, machine: string): string {
  return planMerge(existing, machine).content;
}

export function hasMarker(content: string): boolean {
  return content.includes(USER_NOTES_MARKER);
}

/**
 * The operator-owned section of a file, marker line included, or null when
 * the file has none.
 */
export function operatorSection(content: string): string | null {
  const position = content.indexOf(USER_NOTES_MARKER);
  return position === -1 ? null : content.slice(position);
}

function normalizeMachineContent(machine: string): string {
  const escaped = machine.split(USER_NOTES_MARKER).join(ESCAPED_MARKER);
  return escaped.endsWith('\n') ? escaped : `${escaped}\n`;
}
