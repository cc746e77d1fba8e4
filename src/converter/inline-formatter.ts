// Inline Formatter - turns inline markdown into additive text runs

import type { DocumentAssembler } from '../document/document-assembler';
import type { DocumentParagraph, TextFormatting } from '../types/document.types';
import type { MarkdownNode } from '../types/markdown.types';

export const MONOSPACE_FONT = 'Courier New';

// **bold** or __bold__, *italic* or _italic_
const BOLD_PATTERN = /\*\*(.+?)\*\*|__(.+?)__/;
const ITALIC_PATTERN = /\*(.+?)\*|_(.+?)_/;

/**
 * Concatenate the literal text of a node list, depth first.
 */
export function extractText(nodes: readonly MarkdownNode[]): string {
  let text = '';
  for (const node of nodes) {
    text += extractNodeText(node);
  }
  return text;
}

function extractNodeText(node: MarkdownNode): string {
  switch (node.kind) {
    case 'text':
    case 'codespan':
    case 'block_code':
      return node.raw;
    case 'linebreak':
    case 'thematic_break':
      return '';
    case 'unknown':
      if (node.children) {
        return extractText(node.children);
      }
      return node.raw ?? '';
    default:
      return extractText(node.children);
  }
}

export class InlineFormatter {
  constructor(private readonly assembler: DocumentAssembler) {}

  /**
   * Append one run per inline node, in order. Nested formatting collapses:
   * a strong node yields a single bold run of its plain text.
   */
  formatNodes(paragraph: DocumentParagraph, nodes: readonly MarkdownNode[]): void {
    for (const node of nodes) {
      this.formatNode(paragraph, node);
    }
  }

  /**
   * Regex-driven variant for the line-based fallback. Scans for the leftmost
   * bold or italic span; unterminated markers end up as plain text.
   */
  formatPlainText(paragraph: DocumentParagraph, text: string): void {
    let remaining = text;

    while (remaining) {
      const bold = BOLD_PATTERN.exec(remaining);
      const italic = ITALIC_PATTERN.exec(remaining);

      // On a tie the bold span wins: "**x**" also matches the italic pattern at offset 0
      let match: RegExpExecArray | null = null;
      let formatting: TextFormatting = {};
      if (bold && (!italic || bold.index <= italic.index)) {
        match = bold;
        formatting = { bold: true };
      } else if (italic) {
        match = italic;
        formatting = { italic: true };
      }

      if (!match) {
        this.assembler.addRun(paragraph, remaining);
        break;
      }

      const before = remaining.slice(0, match.index);
      if (before) {
        this.assembler.addRun(paragraph, before);
      }
      this.assembler.addRun(paragraph, match[1] ?? match[2] ?? '', formatting);
      remaining = remaining.slice(match.index + match[0].length);
    }
  }

  private formatNode(paragraph: DocumentParagraph, node: MarkdownNode): void {
    switch (node.kind) {
      case 'text':
        this.assembler.addRun(paragraph, node.raw);
        break;
      case 'strong':
        this.assembler.addRun(paragraph, extractText(node.children), { bold: true });
        break;
      case 'emphasis':
        this.assembler.addRun(paragraph, extractText(node.children), { italic: true });
        break;
      case 'codespan':
        this.assembler.addRun(paragraph, node.raw, { font: MONOSPACE_FONT });
        break;
      case 'link':
        this.assembler.addRun(paragraph, `${extractText(node.children)} (${node.url})`, { underline: true });
        break;
      case 'linebreak':
        this.assembler.addRun(paragraph, '\n');
        break;
      default: {
        const text = extractNodeText(node);
        if (text) {
          this.assembler.addRun(paragraph, text);
        }
      }
    }
  }
}
