// Archive Manager - moves generated files into dated archive folders after a delay

import type { Stats } from 'fs';
import { copyFile, mkdir, readdir, rename, stat, unlink } from 'fs/promises';
import { join } from 'path';
import { describeError } from '../errors';
import { getLogger } from '../logging/logger';
import { formatDateStamp } from './filenames';

const logger = getLogger('archive-manager');

export interface ArchiveManagerOptions {
  uploadFolder: string;
  archiveFolder: string;
  clock?: () => Date;
}

export interface ArchiveListing {
  [date: string]: {
    count: number;
    files: string[];
  };
}

export interface StorageStats {
  activeFiles: {
    docx: number;
    txt: number;
    total: number;
  };
  archivedFiles: number;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isCrossDevice(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

async function listDirectory(path: string): Promise<string[]> {
  try {
    return await readdir(path);
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  return (await stat(path)).isDirectory();
}

export class ArchiveManager {
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly clock: () => Date;

  constructor(private readonly options: ArchiveManagerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  /**
   * Archive the files once the delay has passed. The timer does not keep the
   * process alive; failures are logged when it fires.
   */
  scheduleArchive(filenames: readonly string[], delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      void this.archiveNow(filenames).catch((error: unknown) => {
        logger.error(`Error archiving files: ${describeError(error)}`);
      });
    }, delayMs);
    timer.unref();
    this.timers.add(timer);
  }

  /**
   * Move the files from the upload folder into archive/{yyMMdd}. Files that
   * are already gone are skipped. Returns the names that were moved.
   */
  async archiveNow(filenames: readonly string[]): Promise<string[]> {
    const dailyArchive = join(this.options.archiveFolder, formatDateStamp(this.clock()));
    await mkdir(dailyArchive, { recursive: true });

    const moved: string[] = [];
    for (const filename of filenames) {
      const source = join(this.options.uploadFolder, filename);
      try {
        await this.moveFile(source, join(dailyArchive, filename));
      } catch (error) {
        if (isMissingFile(error)) {
          logger.debug(`Nothing to archive for ${filename}`);
          continue;
        }
        throw error;
      }
      moved.push(filename);
      logger.info(`Archived ${filename} -> ${dailyArchive}`);
    }
    return moved;
  }

  /**
   * Archive active files whose last modification is older than the retention
   * period. Covers timers lost to a restart.
   */
  async sweepExpired(retentionMs: number): Promise<string[]> {
    const cutoff = this.clock().getTime() - retentionMs;
    const expired: string[] = [];

    for (const filename of await listDirectory(this.options.uploadFolder)) {
      let info: Stats;
      try {
        info = await stat(join(this.options.uploadFolder, filename));
      } catch (error) {
        if (isMissingFile(error)) {
          logger.debug(`Skipping ${filename}: removed before it could be checked`);
          continue;
        }
        throw error;
      }
      if (info.isFile() && info.mtimeMs <= cutoff) {
        expired.push(filename);
      }
    }

    return expired.length > 0 ? this.archiveNow(expired) : [];
  }

  async listArchives(): Promise<ArchiveListing> {
    const archives: ArchiveListing = {};
    for (const dateFolder of await listDirectory(this.options.archiveFolder)) {
      const datePath = join(this.options.archiveFolder, dateFolder);
      if (await isDirectory(datePath)) {
        const files = (await readdir(datePath)).sort();
        archives[dateFolder] = { count: files.length, files };
      }
    }
    return archives;
  }

  async getStats(): Promise<StorageStats> {
    const activeFiles = await listDirectory(this.options.uploadFolder);
    const archives = await this.listArchives();

    return {
      activeFiles: {
        docx: activeFiles.filter((name) => name.endsWith('.docx')).length,
        txt: activeFiles.filter((name) => name.endsWith('.txt')).length,
        total: activeFiles.length
      },
      archivedFiles: Object.values(archives).reduce((sum, entry) => sum + entry.count, 0)
    };
  }

  /** Cancel every pending archive timer */
  dispose(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private async moveFile(source: string, destination: string): Promise<void> {
    try {
      await rename(source, destination);
    } catch (error) {
      if (!isCrossDevice(error)) {
        throw error;
      }
      await copyFile(source, destination);
      await unlink(source);
    }
  }
}
