// Fallback Line Parser - regex, line-by-line conversion when no AST is available

import type { DocumentAssembler } from '../document/document-assembler';
import { describeError } from '../errors';
import { getLogger } from '../logging/logger';
import { BULLET_MARKER, HEADING_SPACE_AFTER_PT, emboldenRuns } from './block-converter';
import { InlineFormatter } from './inline-formatter';

const logger = getLogger('fallback-line-parser');

const SEPARATORS: ReadonlySet<string> = new Set(['---', '***', '___']);
const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/;
const BULLET_PATTERN = /^\s*[-*+]\s+(.+)$/;
const NUMBERED_PATTERN = /^\s*(\d+)\.\s+(.+)$/;

export type LineRule = 'separator' | 'heading' | 'bullet' | 'numbered' | 'paragraph' | 'blank';

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Which rule a single line falls under. Rules are tried top to bottom and
 * the first match wins.
 */
export function classifyLine(line: string): LineRule {
  if (SEPARATORS.has(line.trim())) {
    return 'separator';
  }
  if (HEADING_PATTERN.test(line)) {
    return 'heading';
  }
  if (BULLET_PATTERN.test(line)) {
    return 'bullet';
  }
  if (NUMBERED_PATTERN.test(line)) {
    return 'numbered';
  }
  return line.trim() ? 'paragraph' : 'blank';
}

export class FallbackLineParser {
  private readonly inline: InlineFormatter;

  constructor(private readonly assembler: DocumentAssembler) {
    this.inline = new InlineFormatter(assembler);
  }

  /**
   * Never throws. If the regex pass fails, whatever it emitted is rolled back
   * and every non-blank line becomes a plain paragraph.
   */
  convert(text: string): void {
    const mark = this.assembler.checkpoint();
    try {
      for (const line of splitLines(text)) {
        this.convertLine(line);
      }
    } catch (error) {
      logger.error(`Line-based conversion failed, emitting plain paragraphs: ${describeError(error)}`);
      this.assembler.rollback(mark);
      this.convertPlain(text);
    }
  }

  private convertLine(line: string): void {
    switch (classifyLine(line)) {
      case 'heading': {
        const [, , text] = HEADING_PATTERN.exec(line) ?? [];
        const paragraph = this.assembler.newParagraph();
        this.inline.formatPlainText(paragraph, text ?? '');
        emboldenRuns(paragraph);
        this.assembler.applyStyle(paragraph);
        paragraph.formatting.spaceAfterPt = HEADING_SPACE_AFTER_PT;
        break;
      }
      case 'bullet': {
        const [, text] = BULLET_PATTERN.exec(line) ?? [];
        const paragraph = this.assembler.newParagraph();
        this.assembler.addRun(paragraph, BULLET_MARKER);
        this.inline.formatPlainText(paragraph, text ?? '');
        this.assembler.applyStyle(paragraph);
        break;
      }
      case 'numbered': {
        const [, number, text] = NUMBERED_PATTERN.exec(line) ?? [];
        const paragraph = this.assembler.newParagraph();
        this.assembler.addRun(paragraph, `${number}. `);
        this.inline.formatPlainText(paragraph, text ?? '');
        this.assembler.applyStyle(paragraph);
        break;
      }
      case 'paragraph': {
        const paragraph = this.assembler.newParagraph();
        this.inline.formatPlainText(paragraph, line);
        this.assembler.applyStyle(paragraph);
        break;
      }
      case 'separator':
      case 'blank':
        break;
    }
  }

  private convertPlain(text: string): void {
    for (const line of splitLines(text)) {
      if (line.trim()) {
        const paragraph = this.assembler.newParagraph();
        this.assembler.addRun(paragraph, line);
      }
    }
  }
}
