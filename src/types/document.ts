export type Mark =
  | { type: 'bold' }
  | { type: 'italic' }
  | { type: 'code' }
  | { type: 'strike' }
  | { type: 'link'; href: string };

export type MarkType = Mark['type'];

/**
 * Rich-text node. `unknown` is the catch-all for node kinds the parser does
 * not recognise and for malformed values; it renders as a comment.
 */
export type DocNode =
  | { type: 'paragraph'; content: DocNode[] }
  | { type: 'heading'; level: number; content: DocNode[] }
  | { type: 'bulletList'; content: DocNode[] }
  | { type: 'orderedList'; content: DocNode[] }
  | { type: 'listItem'; content: DocNode[] }
  | { type: 'codeBlock'; language?: string; content: DocNode[] }
  | { type: 'blockquote'; content: DocNode[] }
  | { type: 'rule' }
  | { type: 'hardBreak' }
  | { type: 'text'; text: string; marks: Mark[] }
  | { type: 'mention'; label: string }
  | { type: 'emoji'; text: string }
  | { type: 'inlineCard'; url: string }
  | { type: 'unknown'; kind: string; raw: unknown };

export type Document = DocNode[];
