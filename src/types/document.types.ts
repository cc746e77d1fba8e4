// Output document model built by the converter and rendered by the DOCX writer

export interface TextFormatting {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  font?: string;
}

export interface TextRun {
  text: string;
  formatting: TextFormatting;
}

export interface ParagraphFormatting {
  spaceAfterPt?: number;
  leftIndentInches?: number;
}

export interface DocumentParagraph {
  runs: TextRun[];
  /** Style id applied by the assembler; undefined means no explicit style */
  style?: string;
  formatting: ParagraphFormatting;
}

export interface StyleDefinition {
  id: string;
  name: string;
  isDefault: boolean;
}

export interface StyleCatalog {
  /** Paragraph styles defined by the template, in declaration order */
  paragraphStyles: StyleDefinition[];
  /** Raw word/styles.xml of the template, passed through to the writer */
  stylesXml?: string;
}
