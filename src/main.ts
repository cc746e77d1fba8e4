// Main service entry point

import type { Server } from 'http';
import { mkdir } from 'fs/promises';
import { loadConfig, loadEnvironment, type AppConfig } from './config/config';
import { BhkFormatter } from './converter/bhk-formatter';
import { describeError } from './errors';
import { configureLogging, getLogger } from './logging/logger';
import { loadMarkdownParser } from './parsers/markdown-parser';
import { loadStyleTemplate } from './parsers/template-parser';
import { createApp } from './server/app';
import { DocxController } from './server/docx-controller';
import { ArchiveManager } from './storage/archive-manager';
import { DocumentGenerator } from './storage/document-generator';

const logger = getLogger('main');

export interface DocxService {
  controller: DocxController;
  archives: ArchiveManager;
}

export async function createService(config: AppConfig): Promise<DocxService> {
  await mkdir(config.uploadFolder, { recursive: true });
  await mkdir(config.archiveFolder, { recursive: true });

  const parser = await loadMarkdownParser();
  const styles = config.templatePath ? await loadStyleTemplate(config.templatePath) : null;

  const generator = new DocumentGenerator({
    uploadFolder: config.uploadFolder,
    formatter: new BhkFormatter({ parser }),
    styles,
    useBhkFormat: config.useBhkFormat,
    retentionMs: config.retentionMs
  });
  const archives = new ArchiveManager({
    uploadFolder: config.uploadFolder,
    archiveFolder: config.archiveFolder
  });
  const controller = new DocxController({
    generator,
    archives,
    apiKey: config.apiKey,
    publicUrl: config.publicUrl,
    uploadFolder: config.uploadFolder,
    archiveFolder: config.archiveFolder,
    retentionMs: config.retentionMs
  });

  return { controller, archives };
}

async function start(): Promise<Server> {
  loadEnvironment();
  const config = loadConfig();
  configureLogging({
    level: config.logLevel,
    file: config.logFile ? { logfile: config.logFile } : undefined
  });

  logger.info('Starting DOCX Generator Service');
  logger.info(`Upload folder: ${config.uploadFolder}`);
  logger.info(`Archive folder: ${config.archiveFolder}`);
  if (config.apiKeyIsDefault) {
    logger.warn('API_KEY is not set, using the placeholder key');
  }

  const { controller, archives } = await createService(config);
  const swept = await archives.sweepExpired(config.retentionMs);
  if (swept.length > 0) {
    logger.info(`Archived ${swept.length} expired files left from a previous run`);
  }
  const app = createApp(controller);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Listening on http://${config.host}:${config.port} (public URL ${config.publicUrl})`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    archives.dispose();
    server.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

if (require.main === module) {
  start().catch((error: unknown) => {
    logger.error(`Failed to start: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
