import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { NO_DESCRIPTION } from '../constants.js';
import { parseAdf } from '../core/adf-parser.js';
import { renderDocument } from '../core/markdown-renderer.js';

const issuePayloadSchema = z.object({
  fields: z.object({ description: z.unknown() }),
});

/**
 * Accepts either a bare ADF document or a Jira issue payload and returns the
 * value holding the description.
 */
export function extractDescription(json: unknown): unknown {
  const issue = issuePayloadSchema.safeParse(json);
  return issue.success ? issue.data.fields.description : json;
}

export async function renderCommand(file: string): Promise<void> {
  const json: unknown = JSON.parse(await readFile(file, 'utf-8'));
  const markdown = renderDocument(parseAdf(extractDescription(json)));
  process.stdout.write(markdown || `${NO_DESCRIPTION}\n`);
}
