import { z } from 'zod';
import type { DocNode, Document, Mark } from '../types/document.js';

const adfMarkSchema = z.object({
  type: z.string(),
  attrs: z.record(z.unknown()).optional(),
});

const adfNodeSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  content: z.array(z.unknown()).optional(),
  attrs: z.record(z.unknown()).optional(),
  marks: z.array(z.unknown()).optional(),
});

type AdfNode = z.infer<typeof adfNodeSchema>;

/**
 * Convert a raw Atlassian Document Format value into a `Document`.
 *
 * Never throws: values that fail validation and node kinds this module does
 * not know become `unknown` nodes, so one odd field cannot abort a sync.
 */
export function parseAdf(raw: unknown): Document {
  if (raw === null || raw === undefined) return [];
  if (Array.isArray(raw)) return parseChildren(raw, new WeakSet());
  if (typeof raw !== 'object') return [{ type: 'unknown', kind: 'invalid', raw }];

  const parsed = adfNodeSchema.safeParse(raw);
  if (!parsed.success) {
    return [{ type: 'unknown', kind: 'invalid', raw }];
  }
  if (parsed.data.type === 'doc') {
    return parseChildren(parsed.data.content ?? [], new WeakSet([raw]));
  }
  return [parseNode(raw, new WeakSet())];
}

function parseChildren(values: unknown[], ancestors: WeakSet<object>): DocNode[] {
  return values.map(value => parseNode(value, ancestors));
}

function parseNode(value: unknown, ancestors: WeakSet<object>): DocNode {
  if (typeof value !== 'object' || value === null) {
    return { type: 'unknown', kind: 'invalid', raw: value };
  }
  if (ancestors.has(value)) {
    return { type: 'unknown', kind: 'cycle', raw: undefined };
  }

  const parsed = adfNodeSchema.safeParse(value);
  if (!parsed.success) {
    return { type: 'unknown', kind: 'invalid', raw: value };
  }

  ancestors.add(value);
  try {
    return toDocNode(parsed.data, value, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

function toDocNode(node: AdfNode, raw: object, ancestors: WeakSet<object>): DocNode {
  const content = () => parseChildren(node.content ?? [], ancestors);
  const attrs = node.attrs ?? {};

  switch (node.type) {
    case 'paragraph':
      return { type: 'paragraph', content: content() };
    case 'heading':
      return { type: 'heading', level: headingLevel(attrs.level), content: content() };
    case 'bulletList':
      return { type: 'bulletList', content: content() };
    case 'orderedList':
      return { type: 'orderedList', content: content() };
    case 'listItem':
      return { type: 'listItem', content: content() };
    case 'codeBlock': {
      const language = nonEmptyString(attrs.language);
      return language
        ? { type: 'codeBlock', language, content: content() }
        : { type: 'codeBlock', content: content() };
    }
    case 'blockquote':
    case 'panel':
      return { type: 'blockquote', content: content() };
    case 'rule':
      return { type: 'rule' };
    case 'hardBreak':
      return { type: 'hardBreak' };
    case 'text':
      if (node.text === undefined) {
        return { type: 'unknown', kind: 'text', raw };
      }
      return { type: 'text', text: node.text, marks: parseMarks(node.marks ?? []) };
    case 'mention':
      return {
        type: 'mention',
        label: nonEmptyString(attrs.text) ?? nonEmptyString(attrs.id) ?? '',
      };
    case 'emoji':
      return {
        type: 'emoji',
        text: nonEmptyString(attrs.text) ?? nonEmptyString(attrs.shortName) ?? '',
      };
    case 'inlineCard': {
      const url = nonEmptyString(attrs.url);
      return url ? { type: 'inlineCard', url } : { type: 'unknown', kind: 'inlineCard', raw };
    }
    default:
      return { type: 'unknown', kind: node.type, raw };
  }
}

function parseMarks(values: unknown[]): Mark[] {
  const marks: Mark[] = [];
  for (const value of values) {
    const parsed = adfMarkSchema.safeParse(value);
    if (!parsed.success) continue;

    switch (parsed.data.type) {
      case 'strong':
        marks.push({ type: 'bold' });
        break;
      case 'em':
        marks.push({ type: 'italic' });
        break;
      case 'code':
        marks.push({ type: 'code' });
        break;
      case 'strike':
        marks.push({ type: 'strike' });
        break;
      case 'link': {
        const href = nonEmptyString(parsed.data.attrs?.href);
        if (href) marks.push({ type: 'link', href });
        break;
      }
      // underline, textColor, subsup, ... have no Markdown form
    }
  }
  return marks;
}

function headingLevel(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 1;
  return Math.min(6, Math.max(1, Math.trunc(value)));
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
