// AST Factory - Factory functions for creating markdown test nodes

import type {
  BlockCodeNode,
  CodespanNode,
  EmphasisNode,
  HeadingNode,
  InlineNode,
  LinebreakNode,
  LinkNode,
  ListItemNode,
  ListNode,
  MarkdownNode,
  ParagraphNode,
  StrongNode,
  TextNode,
  ThematicBreakNode,
  UnknownNode
} from '../../src/types/markdown.types';
import type { DocumentParagraph } from '../../src/types/document.types';

export function text(raw: string): TextNode {
  return { kind: 'text', raw };
}

export function strong(...children: InlineNode[]): StrongNode {
  return { kind: 'strong', children };
}

export function emphasis(...children: InlineNode[]): EmphasisNode {
  return { kind: 'emphasis', children };
}

export function codespan(raw: string): CodespanNode {
  return { kind: 'codespan', raw };
}

export function link(url: string, ...children: InlineNode[]): LinkNode {
  return { kind: 'link', url, children };
}

export function linebreak(): LinebreakNode {
  return { kind: 'linebreak' };
}

export function unknown(type: string, options: { raw?: string; children?: MarkdownNode[] } = {}): UnknownNode {
  return { kind: 'unknown', type, ...options };
}

/**
 * Create a heading; plain strings become text nodes
 */
export function heading(level: HeadingNode['level'], ...children: (InlineNode | string)[]): HeadingNode {
  return { kind: 'heading', level, children: children.map(toInline) };
}

export function paragraph(...children: (InlineNode | string)[]): ParagraphNode {
  return { kind: 'paragraph', children: children.map(toInline) };
}

export function codeBlock(raw: string): BlockCodeNode {
  return { kind: 'block_code', raw };
}

export function thematicBreak(): ThematicBreakNode {
  return { kind: 'thematic_break' };
}

/**
 * Create a list item. Strings become single-text paragraphs, so
 * item('a', list(...)) mirrors "- a" followed by a nested list.
 */
export function item(...children: (MarkdownNode | string)[]): ListItemNode {
  return {
    kind: 'list_item',
    children: children.map((child) => (typeof child === 'string' ? paragraph(child) : child))
  };
}

export function bulletList(...children: ListItemNode[]): ListNode {
  return { kind: 'list', ordered: false, children };
}

export function orderedList(...children: ListItemNode[]): ListNode {
  return { kind: 'list', ordered: true, children };
}

function toInline(child: InlineNode | string): InlineNode {
  return typeof child === 'string' ? text(child) : child;
}

/**
 * Concatenated run text of a paragraph
 */
export function paragraphText(paragraph: DocumentParagraph): string {
  return paragraph.runs.map((run) => run.text).join('');
}
