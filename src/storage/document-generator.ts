// Document Generator - converts text and stores the .docx beside its source .txt

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { BhkFormatter } from '../converter/bhk-formatter';
import { convertPlainText } from '../converter/legacy-converter';
import { DocumentAssembler } from '../document/document-assembler';
import { DEFAULT_STYLE_CATALOG } from '../document/style-resolver';
import { describeError } from '../errors';
import { getLogger } from '../logging/logger';
import { DocxRenderer } from '../renderer/docx-renderer';
import type { StyleCatalog } from '../types/document.types';
import { buildFilenames } from './filenames';

const logger = getLogger('document-generator');

export interface GenerateRequest {
  text: string;
  filename?: string;
  /** Overrides the generator's default formatting mode */
  useBhkFormat?: boolean;
}

export interface GeneratedDocument {
  docxFilename: string;
  txtFilename: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface DocumentGeneratorOptions {
  uploadFolder: string;
  formatter: BhkFormatter;
  /** Template styles; null uses the built-in stylesheet */
  styles: StyleCatalog | null;
  useBhkFormat: boolean;
  retentionMs: number;
  clock?: () => Date;
}

export class DocumentGenerator {
  private readonly renderer = new DocxRenderer();
  private readonly clock: () => Date;

  constructor(private readonly options: DocumentGeneratorOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async generate(request: GenerateRequest): Promise<GeneratedDocument> {
    const createdAt = this.clock();
    const names = buildFilenames(request.text, request.filename, createdAt);
    const { uploadFolder } = this.options;

    try {
      await mkdir(uploadFolder, { recursive: true });

      await writeFile(join(uploadFolder, names.txt), request.text, 'utf-8');
      logger.info(`Saved source text: ${names.txt}`);

      const assembler = new DocumentAssembler(this.options.styles ?? DEFAULT_STYLE_CATALOG);
      if (request.useBhkFormat ?? this.options.useBhkFormat) {
        logger.info('Using BHK format conversion (Markdown-aware)');
        this.options.formatter.convert(assembler, request.text);
      } else {
        logger.info('Using legacy plain text conversion');
        convertPlainText(assembler, request.text);
      }

      const buffer = await this.renderer.toBuffer(assembler, { creator: 'BHK DOCX Generator' });
      await writeFile(join(uploadFolder, names.docx), buffer);
      logger.info(`Generated DOCX: ${names.docx}`);
    } catch (error) {
      logger.error(`Error generating DOCX: ${describeError(error)}`);
      throw error;
    }

    return {
      docxFilename: names.docx,
      txtFilename: names.txt,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.options.retentionMs)
    };
  }
}
