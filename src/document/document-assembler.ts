// Document Assembler - output sink for the converters, owns paragraphs and styling

import { getLogger } from '../logging/logger';
import type {
  DocumentParagraph,
  StyleCatalog,
  StyleDefinition,
  TextFormatting,
  TextRun
} from '../types/document.types';
import {
  BHK_STANDARD_STYLE,
  DEFAULT_STYLE_CATALOG,
  getDefaultParagraphStyle,
  resolveParagraphStyle
} from './style-resolver';

const logger = getLogger('document-assembler');

export class DocumentAssembler {
  private readonly output: DocumentParagraph[] = [];
  private readonly reportedMisses = new Set<string>();

  constructor(private readonly catalog: StyleCatalog = DEFAULT_STYLE_CATALOG) {}

  get paragraphs(): readonly DocumentParagraph[] {
    return this.output;
  }

  get styles(): StyleCatalog {
    return this.catalog;
  }

  /**
   * Create an empty paragraph and append it to the document.
   */
  newParagraph(): DocumentParagraph {
    const paragraph: DocumentParagraph = { runs: [], formatting: {} };
    this.output.push(paragraph);
    return paragraph;
  }

  addRun(paragraph: DocumentParagraph, text: string, formatting: TextFormatting = {}): TextRun {
    const run: TextRun = { text, formatting: { ...formatting } };
    paragraph.runs.push(run);
    return run;
  }

  /**
   * Apply the preferred style, else the template's default paragraph style,
   * else leave the paragraph unstyled. Returns the style that was applied.
   */
  applyStyle(paragraph: DocumentParagraph, preferred: string = BHK_STANDARD_STYLE): StyleDefinition | null {
    const fallback = getDefaultParagraphStyle(this.catalog);
    const candidates = fallback ? [preferred, fallback.id] : [preferred];
    const style = resolveParagraphStyle(candidates, this.catalog);

    if (!style) {
      this.reportMiss(`${preferred}:none`, `${preferred} style not found and template has no default style, leaving paragraph unstyled`);
      paragraph.style = undefined;
      return null;
    }

    if (fallback && style === fallback && resolveParagraphStyle([preferred], this.catalog) === null) {
      this.reportMiss(preferred, `${preferred} style not found in template, using ${fallback.name}`);
    }

    paragraph.style = style.id;
    return style;
  }

  /** Position marker for rollback */
  checkpoint(): number {
    return this.output.length;
  }

  /**
   * Discard every paragraph appended after the checkpoint.
   */
  rollback(mark: number): void {
    if (mark < this.output.length) {
      this.output.splice(mark);
    }
  }

  private reportMiss(key: string, message: string): void {
    if (this.reportedMisses.has(key)) {
      logger.debug(message);
      return;
    }
    this.reportedMisses.add(key);
    logger.warn(message);
  }
}
