/**
 * Levelled logger. Writes every line to <SECTOOLS_DIR>/logs/sectools.log.
 * With mirroring enabled (--verbose) lines are echoed to stderr as well;
 * regular terminal output is handled by src/ui/
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { LOG_DIR, LOG_FILE } from './config-constants.js';

const LOG_LEVELS = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

type LogFunction = (message: string, ...args: unknown[]) => void;

export interface LoggerInterface {
  debug: LogFunction;
  info: LogFunction;
  warn: LogFunction;
  error: LogFunction;
}

interface LoggerConfig {
  level: LogLevel;
  mirrorToStderr: boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

let config: LoggerConfig = {
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'INFO',
  mirrorToStderr: false,
};

let logDirCreated = false;

function ensureLogDir(): void {
  if (!logDirCreated) {
    mkdirSync(LOG_DIR, { recursive: true });
    logDirCreated = true;
  }
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) return envLevel;
  return config.level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

function serializeArgs(args: unknown[]): string {
  if (args.length === 0) return '';
  return ' ' + args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  const extra = serializeArgs(args);
  if (config.mirrorToStderr) {
    process.stderr.write(`[${level}] ${message}${extra}\n`);
  }
  try {
    ensureLogDir();
    const timestamp = new Date().toISOString();
    appendFileSync(LOG_FILE, `[${timestamp}] [${level}] ${message}${extra}\n`, 'utf-8');
  } catch {
    // File logging never fails the run
  }
}

class DefaultLogger implements LoggerInterface {
  debug(message: string, ...args: unknown[]): void { write('DEBUG', message, args); }
  info(message: string, ...args: unknown[]): void  { write('INFO',  message, args); }
  warn(message: string, ...args: unknown[]): void  { write('WARN',  message, args); }
  error(message: string, ...args: unknown[]): void { write('ERROR', message, args); }
}

class Logger {
  private impl: LoggerInterface = new DefaultLogger();

  setImplementation(impl: LoggerInterface): void { this.impl = impl; }

  debug(message: string, ...args: unknown[]): void {
    if (shouldLog('DEBUG')) this.impl.debug(message, ...args);
  }
  info(message: string, ...args: unknown[]): void {
    if (shouldLog('INFO')) this.impl.info(message, ...args);
  }
  warn(message: string, ...args: unknown[]): void {
    if (shouldLog('WARN')) this.impl.warn(message, ...args);
  }
  error(message: string, ...args: unknown[]): void {
    if (shouldLog('ERROR')) this.impl.error(message, ...args);
  }
}

const logger = new Logger();

export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

export function setMockLogger(mock: LoggerInterface | null): void {
  logger.setImplementation(mock ?? new DefaultLogger());
}

export function getLogLevelConfig(): LogLevel {
  return getLogLevel();
}

export default logger;
