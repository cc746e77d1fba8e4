// BHK Formatter - converts markdown text into flat BHK_Standard paragraphs
//
// Headings become bold paragraphs, list items become paragraphs with manual
// markers ("• " or "n. "), nested lists are indented instead of restyled.
// Structural conversion runs over the markdown AST; when no parser is
// available, or parsing or conversion fails, a line-based fallback is used.

import type { DocumentAssembler } from '../document/document-assembler';
import { describeError } from '../errors';
import { getLogger } from '../logging/logger';
import type { MarkdownParser } from '../parsers/markdown-parser';
import { BlockConverter } from './block-converter';
import { FallbackLineParser } from './fallback-line-parser';

const logger = getLogger('bhk-formatter');

export interface BhkFormatterOptions {
  /** Structural markdown parser; null forces the line-based fallback */
  parser: MarkdownParser | null;
}

export class BhkFormatter {
  private readonly parser: MarkdownParser | null;

  constructor(options: BhkFormatterOptions) {
    this.parser = options.parser;
  }

  get hasParser(): boolean {
    return this.parser !== null;
  }

  /**
   * Populate the assembler with the converted text. Never throws for content reasons.
   */
  convert(assembler: DocumentAssembler, text: string): void {
    if (!this.parser) {
      logger.debug('Using fallback converter (no markdown parser)');
      new FallbackLineParser(assembler).convert(text);
      return;
    }

    const result = this.parser.parse(text);
    if (!result.ok) {
      logger.warn(`${result.error.message}, using fallback converter`);
      new FallbackLineParser(assembler).convert(text);
      return;
    }

    const mark = assembler.checkpoint();
    try {
      new BlockConverter(assembler).convert(result.nodes);
    } catch (error) {
      logger.warn(`Structural conversion failed, using fallback converter: ${describeError(error)}`);
      assembler.rollback(mark);
      new FallbackLineParser(assembler).convert(text);
    }
  }
}
