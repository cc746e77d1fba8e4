// Markdown AST type definitions consumed by the BHK converter

export interface HeadingNode {
  kind: 'heading';
  level: 1 | 2 | 3 | 4 | 5 | 6;
  children: InlineNode[];
}

export interface ParagraphNode {
  kind: 'paragraph';
  children: InlineNode[];
}

export interface ListNode {
  kind: 'list';
  ordered: boolean;
  children: ListItemNode[];
}

export interface ListItemNode {
  kind: 'list_item';
  children: MarkdownNode[];
}

export interface ThematicBreakNode {
  kind: 'thematic_break';
}

export interface BlockCodeNode {
  kind: 'block_code';
  raw: string;
}

export interface TextNode {
  kind: 'text';
  raw: string;
}

export interface StrongNode {
  kind: 'strong';
  children: InlineNode[];
}

export interface EmphasisNode {
  kind: 'emphasis';
  children: InlineNode[];
}

export interface CodespanNode {
  kind: 'codespan';
  raw: string;
}

export interface LinkNode {
  kind: 'link';
  url: string;
  children: InlineNode[];
}

export interface LinebreakNode {
  kind: 'linebreak';
}

/**
 * Anything the parser produced that the converter has no dedicated handling for
 * (block quotes, html, images, strikethrough, tables). `type` is the parser's own name.
 */
export interface UnknownNode {
  kind: 'unknown';
  type: string;
  raw?: string;
  children?: MarkdownNode[];
}

export type BlockNode =
  | HeadingNode
  | ParagraphNode
  | ListNode
  | ThematicBreakNode
  | BlockCodeNode
  | UnknownNode;

export type InlineNode =
  | TextNode
  | StrongNode
  | EmphasisNode
  | CodespanNode
  | LinkNode
  | LinebreakNode
  | UnknownNode;

export type MarkdownNode = BlockNode | InlineNode | ListItemNode;

export type MarkdownNodeKind = MarkdownNode['kind'];
