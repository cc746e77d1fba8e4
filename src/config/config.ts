// Config - environment driven settings, validated with zod

import * as dotenv from 'dotenv';
import { z } from 'zod';

export const DEFAULT_API_KEY = 'YOUR_API_KEY';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvironmentSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().default('0.0.0.0'),
  API_KEY: z.string().min(1).default(DEFAULT_API_KEY),
  PUBLIC_URL: z.string().url().optional(),
  UPLOAD_FOLDER: z.string().default('./docx_files'),
  ARCHIVE_FOLDER: z.string().default('./archive'),
  TEMPLATE_PATH: z.string().optional(),
  RETENTION_HOURS: z.coerce.number().positive().max(596).default(24),
  USE_BHK_FORMAT: booleanFlag.default('true'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional()
});

export interface AppConfig {
  port: number;
  host: string;
  apiKey: string;
  /** True when API_KEY was not set and the placeholder is in use */
  apiKeyIsDefault: boolean;
  publicUrl: string;
  uploadFolder: string;
  archiveFolder: string;
  templatePath?: string;
  retentionMs: number;
  useBhkFormat: boolean;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  logFile?: string;
}

/**
 * Read a .env file into process.env. Values already present win.
 */
export function loadEnvironment(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvironmentSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const settings = parsed.data;
  return {
    port: settings.PORT,
    host: settings.HOST,
    apiKey: settings.API_KEY,
    apiKeyIsDefault: settings.API_KEY === DEFAULT_API_KEY,
    publicUrl: (settings.PUBLIC_URL ?? `http://localhost:${settings.PORT}`).replace(/\/+$/, ''),
    uploadFolder: settings.UPLOAD_FOLDER,
    archiveFolder: settings.ARCHIVE_FOLDER,
    templatePath: settings.TEMPLATE_PATH,
    retentionMs: settings.RETENTION_HOURS * 60 * 60 * 1000,
    useBhkFormat: settings.USE_BHK_FORMAT,
    logLevel: settings.LOG_LEVEL,
    logFile: settings.LOG_FILE
  };
}
