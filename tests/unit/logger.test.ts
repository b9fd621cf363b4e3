import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { LOG_FILE } from '../../src/lib/config-constants.js';
import logger, {
  configureLogger,
  setMockLogger,
  getLogLevelConfig,
} from '../../src/lib/logger.js';

describe('Logger', () => {
  let logOutput: string[];
  let errorOutput: string[];

  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', '');
    logOutput = [];
    errorOutput = [];

    const mockLogger = {
      debug: (msg: string) => logOutput.push(`[DEBUG] ${msg}`),
      info: (msg: string) => logOutput.push(`[INFO] ${msg}`),
      warn: (msg: string) => errorOutput.push(`[WARN] ${msg}`),
      error: (msg: string) => errorOutput.push(`[ERROR] ${msg}`),
    };

    setMockLogger(mockLogger);
  });

  afterEach(() => {
    setMockLogger(null);
    configureLogger({ level: 'INFO', mirrorToStderr: false });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should log info messages', () => {
    logger.info('Test message');
    expect(logOutput).toContain('[INFO] Test message');
  });

  it('should log error messages', () => {
    logger.error('Error message');
    expect(errorOutput).toContain('[ERROR] Error message');
  });

  it('should log warn messages', () => {
    logger.warn('Warning message');
    expect(errorOutput).toContain('[WARN] Warning message');
  });

  it('should drop debug messages at the default level', () => {
    logger.debug('Hidden message');
    expect(logOutput).toEqual([]);
  });

  it('should log debug messages when DEBUG level is set', () => {
    configureLogger({ level: 'DEBUG' });
    logger.debug('Debug message');
    expect(logOutput).toContain('[DEBUG] Debug message');
  });

  it('should respect log level configuration', () => {
    configureLogger({ level: 'WARN' });
    logger.info('Info message');
    logger.warn('Warn message');

    expect(logOutput).toEqual([]);
    expect(errorOutput).toEqual(['[WARN] Warn message']);
  });

  it('should let LOG_LEVEL override the configured level', () => {
    configureLogger({ level: 'INFO' });
    vi.stubEnv('LOG_LEVEL', 'ERROR');

    logger.warn('Suppressed');
    expect(errorOutput).toEqual([]);
    expect(getLogLevelConfig()).toBe('ERROR');
  });

  it('should ignore an unknown LOG_LEVEL', () => {
    configureLogger({ level: 'DEBUG' });
    vi.stubEnv('LOG_LEVEL', 'verbose');

    expect(getLogLevelConfig()).toBe('DEBUG');
  });

  it('should handle SILENT level', () => {
    configureLogger({ level: 'SILENT' });
    logger.error('Silent error');
    logger.info('Silent info');

    expect(logOutput.length).toBe(0);
    expect(errorOutput.length).toBe(0);
  });

  describe('default implementation', () => {
    beforeEach(() => {
      setMockLogger(null);
    });

    it('should append lines to the log file', () => {
      logger.info('file-line', { tool: 'trivy' }, 'extra');

      const lines = readFileSync(LOG_FILE, 'utf-8').trimEnd().split('\n');
      expect(lines.at(-1)).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] file-line \{"tool":"trivy"\} extra$/);
    });

    it('should mirror lines to stderr when enabled', () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      configureLogger({ mirrorToStderr: true });

      logger.warn('mirrored');

      expect(stderr).toHaveBeenCalledWith('[WARN] mirrored\n');
    });

    it('should not write to stderr by default', () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      logger.error('file only');

      expect(stderr).not.toHaveBeenCalled();
    });
  });
});
