// DOCX Controller - request handling independent of the HTTP framework

import { timingSafeEqual } from 'crypto';
import { access } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { DocumentNotFoundError, InvalidFilenameError, describeError } from '../errors';
import { getLogger } from '../logging/logger';
import type { ArchiveManager } from '../storage/archive-manager';
import type { DocumentGenerator } from '../storage/document-generator';
import { isSafeFilename } from '../storage/filenames';

const logger = getLogger('docx-controller');

export const SERVICE_NAME = 'docx-generator';
export const SERVICE_VERSION = '1.0.0';

const GenerateDocxSchema = z.object({
  text: z.string().default(''),
  filename: z.string().nullish(),
  use_bhk_format: z.boolean().optional()
});

export type JsonBody = Record<string, unknown>;

export interface JsonResult {
  status: number;
  body: JsonBody;
}

export interface DocxControllerOptions {
  generator: DocumentGenerator;
  archives: ArchiveManager;
  apiKey: string;
  publicUrl: string;
  uploadFolder: string;
  archiveFolder: string;
  retentionMs: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class DocxController {
  constructor(private readonly options: DocxControllerOptions) {}

  isAuthorized(authorization: string | undefined): boolean {
    const expected = Buffer.from(`Bearer ${this.options.apiKey}`);
    const received = Buffer.from(authorization ?? '');
    if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
      logger.warn('Unauthorized access attempt');
      return false;
    }
    return true;
  }

  health(): JsonResult {
    return {
      status: 200,
      body: {
        status: 'healthy',
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        upload_folder: this.options.uploadFolder,
        archive_folder: this.options.archiveFolder
      }
    };
  }

  async generateDocx(authorization: string | undefined, payload: unknown): Promise<JsonResult> {
    if (!this.isAuthorized(authorization)) {
      return { status: 401, body: { error: 'Unauthorized' } };
    }

    if (!isPlainObject(payload)) {
      return { status: 400, body: { error: 'No JSON payload provided' } };
    }

    const parsed = GenerateDocxSchema.safeParse(payload);
    if (!parsed.success) {
      return {
        status: 400,
        body: {
          error: 'Invalid payload',
          details: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        }
      };
    }

    const { text, filename, use_bhk_format: useBhkFormat } = parsed.data;
    if (!text) {
      return { status: 400, body: { error: 'No text provided' } };
    }

    try {
      const generated = await this.options.generator.generate({
        text,
        filename: filename ?? undefined,
        useBhkFormat
      });

      this.options.archives.scheduleArchive(
        [generated.docxFilename, generated.txtFilename],
        this.options.retentionMs
      );

      return {
        status: 200,
        body: {
          download_url: `${this.options.publicUrl}/download/${encodeURIComponent(generated.docxFilename)}`,
          filename: generated.docxFilename,
          source_filename: generated.txtFilename,
          expires_at: generated.expiresAt.toISOString(),
          message: `DOCX generated successfully. Files will be archived after ${this.retentionHours()} hours.`
        }
      };
    } catch (error) {
      return {
        status: 500,
        body: { error: 'Failed to generate DOCX', details: describeError(error) }
      };
    }
  }

  /**
   * Absolute path of a downloadable document. Throws InvalidFilenameError for
   * names that could leave the upload folder, DocumentNotFoundError when the
   * file is gone (usually archived).
   */
  async resolveDownload(filename: string): Promise<string> {
    if (!isSafeFilename(filename)) {
      throw new InvalidFilenameError(filename);
    }

    const filePath = join(this.options.uploadFolder, filename);
    try {
      await access(filePath);
    } catch {
      logger.warn(`File not found: ${filename}`);
      throw new DocumentNotFoundError(filename);
    }

    logger.info(`Downloading file: ${filename}`);
    return filePath;
  }

  downloadError(error: unknown): JsonResult {
    if (error instanceof InvalidFilenameError) {
      return { status: 400, body: { error: 'Invalid filename' } };
    }
    if (error instanceof DocumentNotFoundError) {
      return {
        status: 404,
        body: {
          error: 'File not found',
          message: `The file may have been archived or deleted after ${this.retentionHours()} hours.`
        }
      };
    }
    return { status: 500, body: { error: 'Failed to download file', details: describeError(error) } };
  }

  async listArchives(authorization: string | undefined): Promise<JsonResult> {
    if (!this.isAuthorized(authorization)) {
      return { status: 401, body: { error: 'Unauthorized' } };
    }

    try {
      return { status: 200, body: { archives: await this.options.archives.listArchives() } };
    } catch (error) {
      logger.error(`Error listing archives: ${describeError(error)}`);
      return { status: 500, body: { error: 'Failed to list archives' } };
    }
  }

  async stats(authorization: string | undefined): Promise<JsonResult> {
    if (!this.isAuthorized(authorization)) {
      return { status: 401, body: { error: 'Unauthorized' } };
    }

    try {
      const stats = await this.options.archives.getStats();
      return {
        status: 200,
        body: {
          active_files: stats.activeFiles,
          archived_files: stats.archivedFiles,
          upload_folder: this.options.uploadFolder,
          archive_folder: this.options.archiveFolder
        }
      };
    } catch (error) {
      logger.error(`Error getting stats: ${describeError(error)}`);
      return { status: 500, body: { error: 'Failed to get statistics' } };
    }
  }

  private retentionHours(): number {
    return Math.round(this.options.retentionMs / (60 * 60 * 1000));
  }
}
