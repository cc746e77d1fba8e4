// Logger - winston setup shared by every module

import * as winston from 'winston';

const TIMESTAMP = 'YYYY-MM-DD HH:mm:ss';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LoggerConfig = {
  level?: LogLevel;
  file?: {
    logfile: string;
  };
  /** Drop all output; used by the test setup */
  silent?: boolean;
};

export type Logger = winston.Logger;

// Return a log entry that can be emitted as-is.
function formatEntry(info: winston.Logform.TransformableInfo): string {
  const label = info.label ? ` [${String(info.label)}]` : '';
  const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
  return `${String(info.timestamp)} ${info.level.toUpperCase()}${label}: ${String(info.message)}${stack}`;
}

function getFormatter(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: TIMESTAMP }),
    winston.format.printf(formatEntry)
  );
}

function getTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console()];
  if (config.file) {
    transports.push(new winston.transports.File({ filename: config.file.logfile }));
  }
  return transports;
}

function getOptions(config: LoggerConfig): winston.LoggerOptions {
  return {
    level: config.level ?? 'info',
    format: getFormatter(),
    silent: config.silent ?? false,
    transports: getTransports(config)
  };
}

// Create a logger just the way we like it.
export function createLogger(config: LoggerConfig = {}): Logger {
  return winston.createLogger(getOptions(config));
}

const rootLogger: Logger = createLogger();

/**
 * Reconfigure the process-wide root logger in place, so child loggers that
 * modules created at load time pick up the new level and transports.
 */
export function configureLogging(config: LoggerConfig): Logger {
  rootLogger.configure(getOptions(config));
  return rootLogger;
}

export function getLogger(label?: string): Logger {
  return label ? rootLogger.child({ label }) : rootLogger;
}
