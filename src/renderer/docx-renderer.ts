// DOCX Renderer - turns assembled paragraphs into a Word document

import {
  Document,
  Packer,
  Paragraph,
  TextRun as DocxTextRun,
  UnderlineType,
  convertInchesToTwip
} from 'docx';
import type { DocumentAssembler } from '../document/document-assembler';
import type { DocumentParagraph, TextRun } from '../types/document.types';

const TWIPS_PER_POINT = 20;

export interface RenderOptions {
  title?: string;
  creator?: string;
}

export class DocxRenderer {
  render(assembler: DocumentAssembler, options: RenderOptions = {}): Document {
    const children = assembler.paragraphs.map((paragraph) => this.renderParagraph(paragraph));
    const { stylesXml } = assembler.styles;

    return new Document({
      title: options.title,
      creator: options.creator,
      ...(stylesXml ? { externalStyles: stylesXml } : {}),
      sections: [{
        properties: {},
        children
      }]
    });
  }

  async toBuffer(assembler: DocumentAssembler, options: RenderOptions = {}): Promise<Buffer> {
    return Packer.toBuffer(this.render(assembler, options));
  }

  private renderParagraph(paragraph: DocumentParagraph): Paragraph {
    const { spaceAfterPt, leftIndentInches } = paragraph.formatting;

    return new Paragraph({
      style: paragraph.style,
      spacing: spaceAfterPt !== undefined ? { after: spaceAfterPt * TWIPS_PER_POINT } : undefined,
      indent: leftIndentInches !== undefined ? { left: convertInchesToTwip(leftIndentInches) } : undefined,
      children: paragraph.runs.flatMap((run) => this.createTextRuns(run))
    });
  }

  /**
   * Newlines inside a run become line breaks; every line keeps the run's formatting.
   */
  private createTextRuns(run: TextRun): DocxTextRun[] {
    const { bold, italic, underline, font } = run.formatting;

    return run.text.split('\n').map((line, index) => new DocxTextRun({
      text: line,
      break: index > 0 ? 1 : undefined,
      bold,
      italics: italic,
      underline: underline ? { type: UnderlineType.SINGLE } : undefined,
      font
    }));
  }
}
