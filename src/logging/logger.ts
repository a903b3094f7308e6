/**
 * Logger setup for graphvcs
 *
 * Provides configurable logging with:
 * - Colorized console output
 * - Optional size-rotated file output
 * - Separate console and file thresholds
 * - Per-repository loggers named `<appName>.<repo folder>`
 */

import { mkdirSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import type { Settings } from '../config/schema.js';
import { getRepoLogsPath } from '../config/paths.js';
import { ColoredFormatter, PlainFormatter } from './formatters.js';
import { mostVerbose, parseLevel } from './levels.js';
import { LoggerRegistry, type LogContext, type LoggerHandle } from './registry.js';
import { ConsoleSink, RotatingFileSink, type LogSink, type TextStream } from './sinks.js';

/**
 * Default rotation threshold (5 MiB)
 */
export const DEFAULT_MAX_FILE_SIZE_BYTES = 5 * 1024 * 1024;

/**
 * Default number of rotated files kept
 */
export const DEFAULT_BACKUP_COUNT = 5;

/**
 * What logger setup needs from the entry point
 */
export interface LoggingContext {
  settings: Settings;
  registry: LoggerRegistry;
}

/**
 * Logger setup options
 */
export interface SetupLoggerOptions {
  /** Log file path; file output is skipped when omitted */
  logFile?: string;
  /** Console threshold (default: settings.logLevel) */
  consoleLevel?: string;
  /** File threshold (default: debug) */
  fileLevel?: string;
  /** Line template (default: settings.logFormat) */
  format?: string;
  /** Rotation threshold in bytes */
  maxFileSizeBytes?: number;
  /** Rotated files to keep */
  backupCount?: number;
  /** Console stream (default: stdout) */
  console?: TextStream;
  /** Color console lines (default: true) */
  colorize?: boolean;
}

/**
 * Create the logging context for a process
 */
export function createLoggingContext(settings: Settings): LoggingContext {
  return { settings, registry: new LoggerRegistry() };
}

/**
 * Configure a named logger
 *
 * Calling again with the same name replaces the previous sinks rather
 * than adding to them.
 *
 * @throws InvalidLevelNameError for an unknown console or file level
 * @returns The configured handle
 */
export function setupLogger(
  context: LoggingContext,
  name: string,
  options: SetupLoggerOptions = {}
): LoggerHandle {
  const { settings, registry } = context;
  const consoleLevel = parseLevel(options.consoleLevel ?? settings.logLevel);
  const fileLevel = parseLevel(options.fileLevel ?? 'debug');
  const format = options.format ?? settings.logFormat;

  const consoleFormatter =
    options.colorize === false ? new PlainFormatter(format) : new ColoredFormatter(format);
  const sinks: LogSink[] = [new ConsoleSink(consoleLevel, consoleFormatter, options.console)];

  if (options.logFile !== undefined && options.logFile !== '') {
    mkdirSync(dirname(options.logFile), { recursive: true });
    sinks.push(
      new RotatingFileSink(fileLevel, new PlainFormatter(format), options.logFile, {
        maxBytes: options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
        backupCount: options.backupCount ?? DEFAULT_BACKUP_COUNT,
      })
    );
  }

  const handle = registry.getOrCreate(name);
  handle.configure(sinks, mostVerbose(consoleLevel, fileLevel));
  return handle;
}

/**
 * Logger name for a repository (`<appName>.<repo folder name>`)
 */
export function getRepositoryLoggerName(settings: Settings, repoPath: string): string {
  return `${settings.appName}.${basename(resolve(repoPath))}`;
}

/**
 * Log file for a repository (`<repo>/.gvcs/logs/<appName>.log`)
 */
export function getRepositoryLogFile(settings: Settings, repoPath: string): string {
  return join(getRepoLogsPath(settings, repoPath), `${settings.appName}.log`);
}

/**
 * Configure the logger for a repository
 *
 * Repositories whose folders share a name share a logger.
 */
export function getRepositoryLogger(
  context: LoggingContext,
  repoPath: string,
  options: Omit<SetupLoggerOptions, 'logFile'> = {}
): LoggerHandle {
  const { settings } = context;
  return setupLogger(context, getRepositoryLoggerName(settings, repoPath), {
    ...options,
    logFile: getRepositoryLogFile(settings, repoPath),
  });
}

/**
 * Run an operation, logging its start, completion and failure
 */
export function withLogging<T>(
  logger: LoggerHandle,
  operation: string,
  fn: () => T,
  context?: LogContext
): T {
  const start = Date.now();
  logger.debug(`Starting ${operation}`, { operation, ...context });

  try {
    const result = fn();
    const durationMs = Date.now() - start;
    logger.info(`Completed ${operation} in ${durationMs}ms`, { operation, durationMs, ...context });
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Failed ${operation}: ${err.message}`, {
      operation,
      error: { message: err.message, name: err.name, stack: err.stack },
      ...context,
    });
    throw error;
  }
}
