// Block Converter - flattens block-level markdown into BHK_Standard paragraphs

import type { DocumentAssembler } from '../document/document-assembler';
import { getLogger } from '../logging/logger';
import type { DocumentParagraph } from '../types/document.types';
import type {
  BlockCodeNode,
  BlockNode,
  HeadingNode,
  ListNode,
  ParagraphNode
} from '../types/markdown.types';
import { InlineFormatter, MONOSPACE_FONT, extractText } from './inline-formatter';

const logger = getLogger('block-converter');

export const BULLET_MARKER = '• ';
export const HEADING_SPACE_AFTER_PT = 6;
export const LIST_INDENT_INCHES = 0.25;

/**
 * Make every run of a paragraph bold. Headings are distinguished this way
 * instead of through heading styles.
 */
export function emboldenRuns(paragraph: DocumentParagraph): void {
  for (const run of paragraph.runs) {
    run.formatting.bold = true;
  }
}

export class BlockConverter {
  private readonly inline: InlineFormatter;

  constructor(private readonly assembler: DocumentAssembler) {
    this.inline = new InlineFormatter(assembler);
  }

  convert(nodes: readonly BlockNode[]): void {
    for (const node of nodes) {
      switch (node.kind) {
        case 'heading':
          this.convertHeading(node);
          break;
        case 'paragraph':
          this.convertParagraph(node);
          break;
        case 'list':
          this.convertList(node, 0);
          break;
        case 'block_code':
          this.convertCodeBlock(node);
          break;
        case 'thematic_break':
          // --- separators carry no content
          break;
        default:
          logger.debug(`Unhandled node type: ${node.type}`);
      }
    }
  }

  private convertHeading(node: HeadingNode): void {
    if (!extractText(node.children).trim()) {
      return;
    }

    logger.debug(`Processing H${node.level} as BHK_Standard (bold)`);

    const paragraph = this.assembler.newParagraph();
    this.inline.formatNodes(paragraph, node.children);
    emboldenRuns(paragraph);
    this.assembler.applyStyle(paragraph);
    paragraph.formatting.spaceAfterPt = HEADING_SPACE_AFTER_PT;
  }

  private convertParagraph(node: ParagraphNode): void {
    if (!extractText(node.children).trim()) {
      return;
    }

    const paragraph = this.assembler.newParagraph();
    this.inline.formatNodes(paragraph, node.children);
    this.assembler.applyStyle(paragraph);
  }

  private convertCodeBlock(node: BlockCodeNode): void {
    if (!node.raw.trim()) {
      return;
    }

    const paragraph = this.assembler.newParagraph();
    this.assembler.addRun(paragraph, node.raw);
    this.assembler.applyStyle(paragraph);
    for (const run of paragraph.runs) {
      run.formatting.font = MONOSPACE_FONT;
    }
  }

  /**
   * One paragraph per item, marker first. Nested lists are emitted as sibling
   * paragraphs right after their parent item and indented by depth.
   */
  private convertList(node: ListNode, depth: number): void {
    node.children.forEach((item, index) => {
      const paragraph = this.assembler.newParagraph();
      this.assembler.addRun(paragraph, node.ordered ? `${index + 1}. ` : BULLET_MARKER);

      for (const child of item.children) {
        if (child.kind === 'list') {
          this.convertList(child, depth + 1);
        } else if (child.kind === 'paragraph') {
          this.inline.formatNodes(paragraph, child.children);
        } else {
          this.inline.formatNodes(paragraph, [child]);
        }
      }

      this.assembler.applyStyle(paragraph);
      if (depth > 0) {
        paragraph.formatting.leftIndentInches = LIST_INDENT_INCHES * depth;
      }
    });
  }
}
