import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { setupLogger } from '@shared/utils/logger';

describe('Logger Configuration', () => {
  let capturedLogs: string[] = [];
  let originalEnv: string | undefined;

  beforeEach(() => {
    capturedLogs = [];
    originalEnv = process.env.LOG_LEVEL;
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      capturedLogs.push(chunk.toString());
      return true;
    });
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.LOG_LEVEL = originalEnv;
    } else {
      delete process.env.LOG_LEVEL;
    }
  });

  it('should create a logger with default name and level', () => {
    delete process.env.LOG_LEVEL;
    const logger = setupLogger();
    logger.info('ready');

    expect(logger.level).toBe('info');
    expect(JSON.parse(capturedLogs[0].trim()).name).toBe('lookup-filters');
  });

  it('should create a logger with custom name', () => {
    const logger = setupLogger('lookup-filters:instances', 'info');
    logger.info('test message');

    expect(capturedLogs).toHaveLength(1);
    const logEntry = JSON.parse(capturedLogs[0].trim());
    expect(logEntry.name).toBe('lookup-filters:instances');
    expect(logEntry.msg).toBe('test message');
  });

  it('should respect explicit log level parameter', () => {
    const logger = setupLogger('test', 'debug');

    expect(logger.level).toBe('debug');
  });

  it('should read log level from LOG_LEVEL environment variable', () => {
    process.env.LOG_LEVEL = 'DEBUG';
    const logger = setupLogger('env-test');

    expect(logger.level).toBe('debug');
  });

  it('should fall back to info for an unknown level', () => {
    process.env.LOG_LEVEL = 'verbose';
    const logger = setupLogger('env-test');

    expect(logger.level).toBe('info');
  });

  it('should output uppercase level names and ISO timestamps', () => {
    const logger = setupLogger('level-test', 'info');
    logger.warn('careful');

    const logEntry = JSON.parse(capturedLogs[0].trim());
    expect(logEntry.level).toBe('WARN');
    expect(typeof logEntry.time).toBe('string');
    expect(new Date(logEntry.time).toISOString()).toBe(logEntry.time);
  });

  it('should suppress messages below the configured level', () => {
    const logger = setupLogger('filter-test', 'info');

    logger.debug('debug message');
    expect(capturedLogs).toHaveLength(0);

    logger.info('info message');
    expect(capturedLogs).toHaveLength(1);
  });
});
