import type { DocNode, Document, Mark, MarkType } from '../types/document.js';

type ListNode = Extract<DocNode, { type: 'bulletList' | 'orderedList' }>;

// Nodes currently being rendered, used to stop on self-referencing trees
type RenderPath = Set<DocNode>;

const INDENT = '  ';
const HARD_BREAK = '\\\n';

/**
 * Render a document tree to Markdown.
 *
 * Blocks are separated by one blank line and the output ends with a newline;
 * an empty document renders to an empty string. Never throws.
 */
export function renderDocument(document: Document): string {
  const body = renderBlocks(document, new Set());
  return body ? `${body}\n` : '';
}

function renderBlocks(nodes: DocNode[], path: RenderPath): string {
  const blocks: string[] = [];
  let inline: DocNode[] = [];

  const flush = () => {
    if (inline.length === 0) return;
    const text = renderInline(inline, path);
    if (text) blocks.push(text);
    inline = [];
  };

  for (const node of nodes) {
    if (isInline(node)) {
      inline.push(node);
      continue;
    }
    flush();
    const block = renderBlock(node, path);
    if (block) blocks.push(block);
  }
  flush();

  return blocks.join('\n\n');
}

function renderBlock(node: DocNode, path: RenderPath): string {
  return guarded(node, path, () => {
    switch (node.type) {
      case 'paragraph':
        return renderInline(node.content, path);
      case 'heading': {
        const text = renderInline(node.content, path).replace(/\\?\n/g, ' ').trim();
        const level = Number.isFinite(node.level) ? Math.min(6, Math.max(1, Math.trunc(node.level))) : 1;
        const hashes = '#'.repeat(level);
        return text ? `${hashes} ${text}` : hashes;
      }
      case 'bulletList':
      case 'orderedList':
        return renderList(node, 0, path).join('\n');
      case 'listItem':
        return renderListItem(node, '- ', 0, path).join('\n');
      case 'codeBlock':
        return renderCodeBlock(node.content, node.language);
      case 'blockquote':
        return quote(renderBlocks(node.content, path));
      case 'rule':
        return '---';
      case 'unknown':
        return renderUnknown(node.kind);
      case 'text':
      case 'hardBreak':
      case 'mention':
      case 'emoji':
      case 'inlineCard':
        return renderInline([node], path);
      default:
        return renderUnknown('node');
    }
  }, renderUnknown('cycle'));
}

/**
 * Inline run of a paragraph, heading or list line. Fence escaping applies to
 * the joined text, since adjacent nodes can together start a line with a fence.
 */
function renderInline(nodes: DocNode[], path: RenderPath): string {
  return escapeFences(joinInline(nodes, path));
}

function joinInline(nodes: DocNode[], path: RenderPath): string {
  return nodes.map(node => renderInlineNode(node, path)).join('');
}

function renderInlineNode(node: DocNode, path: RenderPath): string {
  return guarded(node, path, () => {
    switch (node.type) {
      case 'text':
        return applyMarks(node.text, node.marks);
      case 'hardBreak':
        return HARD_BREAK;
      case 'mention':
        return node.label ? `**${node.label}**` : '';
      case 'emoji':
        return node.text;
      case 'inlineCard':
        return `<${node.url}>`;
      case 'unknown':
        return renderUnknown(node.kind);
      case 'codeBlock': {
        const code = codeText(node.content);
        return code ? wrapCode(code) : '';
      }
      case 'rule':
        return '';
      case 'paragraph':
      case 'heading':
      case 'bulletList':
      case 'orderedList':
      case 'listItem':
      case 'blockquote':
        return joinInline(node.content, path);
      default:
        return renderUnknown('node');
    }
  }, renderUnknown('cycle'));
}

function renderList(list: ListNode, depth: number, path: RenderPath): string[] {
  const lines: string[] = [];
  list.content.forEach((child, index) => {
    const marker = list.type === 'orderedList' ? `${index + 1}. ` : '- ';
    if (child.type === 'listItem') {
      const cycle = [INDENT.repeat(depth) + marker + renderUnknown('cycle')];
      lines.push(...guarded(child, path, () => renderListItem(child, marker, depth, path), cycle));
    } else {
      lines.push(...renderListItem({ type: 'listItem', content: [child] }, marker, depth, path));
    }
  });
  return lines;
}

/**
 * One list line for the item's leading text; further text, nested blocks and
 * nested lists follow on lines indented past the item.
 */
function renderListItem(
  item: Extract<DocNode, { type: 'listItem' }>,
  marker: string,
  depth: number,
  path: RenderPath,
): string[] {
  const indent = INDENT.repeat(depth);
  const continuation = indent + INDENT;
  const lines: string[] = [];
  let headWritten = false;
  let inline: DocNode[] = [];

  const writeHead = () => {
    if (!headWritten) {
      lines.push(indent + marker.trimEnd());
      headWritten = true;
    }
  };

  const writeText = (text: string) => {
    if (!text) return;
    for (const line of text.split('\n')) {
      if (!headWritten) {
        lines.push(indent + marker + line);
        headWritten = true;
      } else {
        lines.push(line ? continuation + line : '');
      }
    }
  };

  const flush = () => {
    if (inline.length === 0) return;
    writeText(renderInline(inline, path));
    inline = [];
  };

  for (const child of item.content) {
    if (isInline(child)) {
      inline.push(child);
      continue;
    }
    flush();
    if (child.type === 'bulletList' || child.type === 'orderedList') {
      writeHead();
      const cycle = [INDENT.repeat(depth + 1) + renderUnknown('cycle')];
      lines.push(...guarded(child, path, () => renderList(child, depth + 1, path), cycle));
    } else {
      writeText(renderBlock(child, path));
    }
  }
  flush();
  writeHead();

  return lines;
}

function renderCodeBlock(content: DocNode[], language?: string): string {
  const code = codeText(content);
  const fence = '`'.repeat(Math.max(3, longestRun(code, '`') + 1));
  const body = code === '' || code.endsWith('\n') ? code : `${code}\n`;
  return `${fence}${language ?? ''}\n${body}${fence}`;
}

function codeText(content: DocNode[]): string {
  return content
    .map(node => {
      if (node.type === 'text') return node.text;
      if (node.type === 'hardBreak') return '\n';
      return '';
    })
    .join('');
}

function quote(text: string): string {
  if (!text) return '>';
  return text
    .split('\n')
    .map(line => (line ? `> ${line}` : '>'))
    .join('\n');
}

function renderUnknown(kind: string): string {
  const label = kind.replace(/[^\w.-]/g, '') || 'node';
  return `<!-- unsupported: ${label} -->`;
}

/**
 * Wrap text in its mark delimiters. The nesting order is fixed regardless of
 * the order marks arrive in: link outermost, then bold, italic, strike, and
 * code innermost. Surrounding whitespace stays outside the delimiters.
 */
export function applyMarks(text: string, marks: Mark[]): string {
  const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(text);
  const lead = match?.[1] ?? '';
  const core = match?.[2] ?? text;
  const trail = match?.[3] ?? '';
  if (!core) return text;

  const has = (type: MarkType) => marks.some(mark => mark.type === type);
  const link = marks.find((mark): mark is Extract<Mark, { type: 'link' }> => mark.type === 'link');

  let out = has('code') ? wrapCode(core) : core;
  if (has('strike')) out = `~~${out}~~`;
  if (has('italic')) out = `_${out}_`;
  if (has('bold')) out = `**${out}**`;
  if (link) out = `[${out}](${link.href})`;

  return lead + out + trail;
}

function wrapCode(code: string): string {
  const run = longestRun(code, '`');
  if (run === 0) return `\`${code}\``;
  const fence = '`'.repeat(run + 1);
  return `${fence} ${code} ${fence}`;
}

// A line starting with ``` (no backtick after it) or ~~~ would open a code fence
function escapeFences(text: string): string {
  return text
    .replace(/(^|\n)([ \t]*)(`{3,})(?=[^`\n]*(?:\n|$))/g, '$1$2\\$3')
    .replace(/(^|\n)([ \t]*)(~{3,})/g, '$1$2\\$3');
}

function longestRun(text: string, char: string): number {
  let longest = 0;
  let current = 0;
  for (const c of text) {
    current = c === char ? current + 1 : 0;
    longest = Math.max(longest, current);
  }
  return longest;
}

function isInline(node: DocNode): boolean {
  switch (node.type) {
    case 'text':
    case 'hardBreak':
    case 'mention':
    case 'emoji':
    case 'inlineCard':
      return true;
    default:
      return false;
  }
}

function guarded<T>(node: DocNode, path: RenderPath, render: () => T, onCycle: T): T {
  if (path.has(node)) return onCycle;
  path.add(node);
  try {
    return render();
  } finally {
    path.delete(node);
  }
}
