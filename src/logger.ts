/**
 * wt - Logging
 *
 * Structured logging with one logger per concern. Console output is minimal
 * and goes to stderr so stdout stays usable for paths and JSON; detailed logs
 * go to files when a log directory is configured.
 *
 * Log format: [ISO-timestamp] [module] [level] [event:name] [key:value]... Message
 */

import { existsSync, mkdirSync, appendFileSync } from 'fs';
import { join } from 'path';

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Log severity levels.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Module names for categorizing logs.
 */
export type LogModule = 'lifecycle' | 'git' | 'hooks' | 'lock';

/**
 * Tags for structured log entries.
 */
export type LogTags = Record<string, string | number | boolean | undefined>;

/**
 * Module-specific logger interface.
 */
export interface ModuleLogger {
  debug(event: string, tags: LogTags, message: string): void;
  info(event: string, tags: LogTags, message: string): void;
  warn(event: string, tags: LogTags, message: string): void;
  error(event: string, tags: LogTags, message: string): void;
}

/**
 * Main logger interface providing module-specific loggers.
 */
export interface Logger {
  lifecycle: ModuleLogger;
  git: ModuleLogger;
  hooks: ModuleLogger;
  lock: ModuleLogger;
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /** Minimum level for console output (default: 'warn') */
  consoleLevel?: LogLevel;
  /** Minimum level for file output (default: 'debug') */
  fileLevel?: LogLevel;
  /** Directory for log files; no files are written when unset */
  logDir?: string;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// =============================================================================
// Formatting Functions
// =============================================================================

/**
 * Format a log entry in the standard format.
 */
export function formatLogEntry(
  timestamp: string,
  module: LogModule,
  level: LogLevel,
  event: string,
  tags: LogTags,
  message: string
): string {
  const parts: string[] = [
    `[${timestamp}]`,
    `[${module}]`,
    `[${level}]`,
    `[event:${event}]`,
  ];

  for (const [key, value] of Object.entries(tags)) {
    if (value !== undefined) {
      parts.push(`[${key}:${value}]`);
    }
  }

  parts.push(message);

  return parts.join(' ');
}

function formatConsoleMessage(level: LogLevel, module: LogModule, message: string): string {
  const symbols: Record<LogLevel, string> = {
    debug: '*',
    info: '-',
    warn: '[!]',
    error: '[x]',
  };

  return `${symbols[level]} ${module}: ${message}`;
}

// =============================================================================
// File Operations
// =============================================================================

function writeToFile(filePath: string, content: string): void {
  try {
    appendFileSync(filePath, content + '\n', 'utf-8');
  } catch (error) {
    // Logging must never take the command down with it
    console.error(`[logger] Failed to write to ${filePath}: ${error}`);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

function createModuleLogger(
  module: LogModule,
  logDir: string | undefined,
  fileLevel: LogLevel,
  consoleLevel: LogLevel
): ModuleLogger {
  const logFilePath = logDir ? join(logDir, `${module}.log`) : undefined;
  const errorsFilePath = logDir ? join(logDir, 'errors.log') : undefined;

  const log = (level: LogLevel, event: string, tags: LogTags, message: string): void => {
    if (logFilePath && LOG_LEVELS[level] >= LOG_LEVELS[fileLevel]) {
      const entry = formatLogEntry(new Date().toISOString(), module, level, event, tags, message);
      writeToFile(logFilePath, entry);

      if (errorsFilePath && (level === 'error' || level === 'warn')) {
        writeToFile(errorsFilePath, entry);
      }
    }

    if (LOG_LEVELS[level] >= LOG_LEVELS[consoleLevel]) {
      console.error(formatConsoleMessage(level, module, message));
    }
  };

  return {
    debug: (event, tags, message) => log('debug', event, tags, message),
    info: (event, tags, message) => log('info', event, tags, message),
    warn: (event, tags, message) => log('warn', event, tags, message),
    error: (event, tags, message) => log('error', event, tags, message),
  };
}

/**
 * Create a logger. Environment variables WT_LOG_LEVEL, WT_CONSOLE_LEVEL and
 * WT_LOG_DIR take precedence over the options.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const envFileLevel = process.env.WT_LOG_LEVEL;
  const envConsoleLevel = process.env.WT_CONSOLE_LEVEL;

  const fileLevel = isLogLevel(envFileLevel) ? envFileLevel : options?.fileLevel ?? 'debug';
  const consoleLevel = isLogLevel(envConsoleLevel) ? envConsoleLevel : options?.consoleLevel ?? 'warn';
  const logDir = process.env.WT_LOG_DIR || options?.logDir;

  if (logDir && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const forModule = (module: LogModule): ModuleLogger =>
    createModuleLogger(module, logDir, fileLevel, consoleLevel);

  return {
    lifecycle: forModule('lifecycle'),
    git: forModule('git'),
    hooks: forModule('hooks'),
    lock: forModule('lock'),
  };
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNoopLogger(): Logger {
  const noopModule: ModuleLogger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };

  return {
    lifecycle: noopModule,
    git: noopModule,
    hooks: noopModule,
    lock: noopModule,
  };
}

/**
 * Format duration for logging.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

/**
 * Truncate output for logging (prevents huge log entries).
 */
export function truncateOutput(output: string, maxLength: number = 10240): string {
  if (output.length <= maxLength) return output;
  return output.substring(0, maxLength) + `... [truncated ${output.length - maxLength} chars]`;
}
