// Legacy Converter - plain text mode used when BHK formatting is switched off

import type { DocumentAssembler } from '../document/document-assembler';
import { NORMAL_STYLE } from '../document/style-resolver';

export const TITLE_STYLE = 'Heading1';
const MAX_TITLE_LENGTH = 100;
const LINE_BREAK = /\r?\n/;
const BLANK_LINE = /\r?\n\r?\n/;

/**
 * First line becomes a title when it is short and not indented; the rest is
 * split on blank lines into paragraphs.
 */
export function convertPlainText(assembler: DocumentAssembler, text: string): void {
  const lines = text.split(LINE_BREAK);
  let content = text;

  const [firstLine] = lines;
  if (firstLine !== undefined && firstLine.trim() && firstLine.length < MAX_TITLE_LENGTH && !firstLine.startsWith(' ')) {
    const title = assembler.newParagraph();
    assembler.addRun(title, firstLine);
    assembler.applyStyle(title, TITLE_STYLE);
    content = lines.slice(1).join('\n');
  }

  for (const chunk of content.split(BLANK_LINE)) {
    if (!chunk.trim()) {
      continue;
    }
    const paragraph = assembler.newParagraph();
    assembler.addRun(paragraph, chunk.trim());
    assembler.applyStyle(paragraph, NORMAL_STYLE);
  }
}
