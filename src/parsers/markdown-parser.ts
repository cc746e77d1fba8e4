// Markdown Parser - adapts the marked token stream to the converter's closed AST

import { decode } from 'he';
import type { MarkedToken, Token, Tokens } from 'marked';
import { ParseError, describeError } from '../errors';
import { getLogger } from '../logging/logger';
import type {
  BlockNode,
  HeadingNode,
  InlineNode,
  ListItemNode,
  ListNode,
  MarkdownNode
} from '../types/markdown.types';

const logger = getLogger('markdown-parser');

export type ParseResult =
  | { ok: true; nodes: BlockNode[] }
  | { ok: false; error: ParseError };

export interface MarkdownParser {
  parse(text: string): ParseResult;
}

type Lexer = (src: string) => Token[];

const MARKED_TOKEN_TYPES: ReadonlySet<string> = new Set<MarkedToken['type']>([
  'blockquote', 'br', 'code', 'codespan', 'def', 'del', 'em', 'escape', 'heading', 'hr',
  'html', 'image', 'link', 'list', 'list_item', 'paragraph', 'space', 'strong', 'table',
  'text'
]);

function isMarkedToken(token: Token): token is MarkedToken {
  return MARKED_TOKEN_TYPES.has(token.type);
}

function toHeadingLevel(depth: number): HeadingNode['level'] {
  switch (depth) {
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    default: return 6;
  }
}

/**
 * Recover code span content from its source: drop the backtick fences,
 * fold line endings into spaces and strip one padding space from each side
 * when both are present and the content is not all spaces.
 */
export function codespanContent(raw: string): string {
  const match = /^(`+)([\s\S]*?)\1$/.exec(raw);
  if (!match) {
    return raw;
  }

  let content = match[2].replace(/\r?\n/g, ' ');
  if (content.length >= 2 && content.startsWith(' ') && content.endsWith(' ') && /[^ ]/.test(content)) {
    content = content.slice(1, -1);
  }
  return content;
}

/**
 * Wraps a lexer function (marked.lexer in production) and converts its tokens
 * into MarkdownNode values. Lexer exceptions are reported through ParseResult.
 */
export class MarkedMarkdownParser implements MarkdownParser {
  constructor(private readonly lexer: Lexer) {}

  parse(text: string): ParseResult {
    try {
      const tokens = this.lexer(text);
      return { ok: true, nodes: this.convertBlocks(tokens) };
    } catch (error) {
      return {
        ok: false,
        error: new ParseError(`Markdown parsing failed: ${describeError(error)}`, error)
      };
    }
  }

  private convertBlocks(tokens: Token[]): BlockNode[] {
    const nodes: BlockNode[] = [];
    for (const token of tokens) {
      const node = this.convertBlock(token);
      if (node) {
        nodes.push(node);
      }
    }
    return nodes;
  }

  private convertBlock(token: Token): BlockNode | null {
    if (!isMarkedToken(token)) {
      return { kind: 'unknown', type: token.type, raw: token.raw };
    }

    switch (token.type) {
      case 'space':
      case 'def':
        return null;
      case 'heading':
        return {
          kind: 'heading',
          level: toHeadingLevel(token.depth),
          children: this.convertInlines(token.tokens)
        };
      case 'paragraph':
        return { kind: 'paragraph', children: this.convertInlines(token.tokens) };
      case 'text':
        // Block-level text only occurs inside list items; it carries the item's inline content
        return {
          kind: 'paragraph',
          children: 'tokens' in token && token.tokens
            ? this.convertInlines(token.tokens)
            : [{ kind: 'text', raw: decode(token.raw) }]
        };
      case 'hr':
        return { kind: 'thematic_break' };
      case 'code':
        return { kind: 'block_code', raw: token.text };
      case 'list':
        return this.convertList(token);
      case 'blockquote':
        return {
          kind: 'unknown',
          type: token.type,
          raw: token.raw,
          children: this.convertBlocks(token.tokens)
        };
      default:
        return { kind: 'unknown', type: token.type, raw: token.raw };
    }
  }

  private convertList(token: Tokens.List): ListNode {
    return {
      kind: 'list',
      ordered: token.ordered,
      children: token.items.map((item) => this.convertListItem(item))
    };
  }

  private convertListItem(item: Tokens.ListItem): ListItemNode {
    const children: MarkdownNode[] = [];
    for (const token of item.tokens) {
      const node = this.convertBlock(token);
      if (node) {
        children.push(node);
      }
    }
    return { kind: 'list_item', children };
  }

  private convertInlines(tokens: Token[]): InlineNode[] {
    return tokens.map((token) => this.convertInline(token));
  }

  private convertInline(token: Token): InlineNode {
    if (!isMarkedToken(token)) {
      return { kind: 'unknown', type: token.type, raw: token.raw };
    }

    switch (token.type) {
      case 'text':
        // Inline text tokens nest further tokens only inside tight list items
        if ('tokens' in token && token.tokens && token.tokens.length > 0) {
          return { kind: 'unknown', type: 'text', children: this.convertInlines(token.tokens) };
        }
        // Entity and numeric character references become the characters they name
        return { kind: 'text', raw: decode(token.raw) };
      case 'escape':
        return { kind: 'text', raw: token.raw.slice(1) };
      case 'strong':
        return { kind: 'strong', children: this.convertInlines(token.tokens) };
      case 'em':
        return { kind: 'emphasis', children: this.convertInlines(token.tokens) };
      case 'codespan':
        return { kind: 'codespan', raw: codespanContent(token.raw) };
      case 'link':
        return { kind: 'link', url: token.href, children: this.convertInlines(token.tokens) };
      case 'br':
        return { kind: 'linebreak' };
      case 'del':
        return { kind: 'unknown', type: token.type, children: this.convertInlines(token.tokens) };
      case 'image':
        return { kind: 'unknown', type: token.type, raw: token.text };
      default:
        return { kind: 'unknown', type: token.type, raw: token.raw };
    }
  }
}

/**
 * Resolve the structural parser. Returns null when the markdown library
 * cannot be loaded; the formatter then runs the line-based fallback for every call.
 */
export async function loadMarkdownParser(): Promise<MarkdownParser | null> {
  try {
    const { marked } = await import('marked');
    return new MarkedMarkdownParser((src) => marked.lexer(src));
  } catch (error) {
    logger.warn(`marked not available - BHK formatting will use the line-based fallback (${describeError(error)})`);
    return null;
  }
}
