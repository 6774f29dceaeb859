import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Logger, type LogEntry } from './logger.js';

async function readEntries(path: string): Promise<LogEntry[]> {
  const content = await readFile(path, 'utf-8');
  return content
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

describe('Logger', () => {
  let testDir: string;
  let logPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `toolweave-logger-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    logPath = join(testDir, 'test.log');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('log level filtering', () => {
    it('should filter logs below configured level', async () => {
      const logger = new Logger({ level: 'warn', path: logPath });

      await logger.debug('debug message');
      await logger.info('info message');
      await logger.warn('warn message');
      await logger.error('error message');

      const entries = await readEntries(logPath);
      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('should log all levels when set to debug', async () => {
      const logger = new Logger({ level: 'debug', path: logPath });

      await logger.debug('debug');
      await logger.info('info');
      await logger.warn('warn');
      await logger.error('error');

      const entries = await readEntries(logPath);
      expect(entries).toHaveLength(4);
    });

    it('should report which levels pass the filter', () => {
      const logger = new Logger({ level: 'warn', path: logPath });

      expect(logger.shouldLog('debug')).toBe(false);
      expect(logger.shouldLog('info')).toBe(false);
      expect(logger.shouldLog('warn')).toBe(true);
      expect(logger.shouldLog('error')).toBe(true);
    });
  });

  describe('structured JSON format', () => {
    it('should output timestamp, level and message', async () => {
      const logger = new Logger({ level: 'info', path: logPath });
      await logger.info('tool registered');

      const [entry] = await readEntries(logPath);
      expect(entry?.level).toBe('info');
      expect(entry?.message).toBe('tool registered');
      expect(new Date(entry?.timestamp ?? '').toISOString()).toBe(entry?.timestamp);
      expect(entry?.context).toBeUndefined();
    });

    it('should merge default context with provided context', async () => {
      const logger = new Logger({ level: 'info', path: logPath }, { component: 'tool-manager' });
      await logger.info('search', { query: 'create a page' });

      const [entry] = await readEntries(logPath);
      expect(entry?.context).toEqual({ component: 'tool-manager', query: 'create a page' });
    });

    it('should create nested log directories on first write', async () => {
      const nestedPath = join(testDir, 'logs', 'nested', 'agent.log');
      const logger = new Logger({ level: 'info', path: nestedPath });
      await logger.info('hello');

      const entries = await readEntries(nestedPath);
      expect(entries).toHaveLength(1);
    });
  });

  describe('error logging', () => {
    it('should include the stack trace of Error values', async () => {
      const logger = new Logger({ level: 'error', path: logPath });
      await logger.error('Tool failed', new Error('boom'), { toolName: 'greeting' });

      const [entry] = await readEntries(logPath);
      expect(entry?.stack).toContain('Error: boom');
      expect(entry?.context?.toolName).toBe('greeting');
    });

    it('should record non-Error values as errorDetails', async () => {
      const logger = new Logger({ level: 'error', path: logPath });
      await logger.error('Tool failed', 'string error');

      const [entry] = await readEntries(logPath);
      expect(entry?.stack).toBeUndefined();
      expect(entry?.context?.errorDetails).toBe('string error');
    });
  });

  describe('log rotation', () => {
    it('should rotate when the file exceeds maxSize', async () => {
      const logger = new Logger({ level: 'info', path: logPath, maxSize: 100, maxFiles: 3 });

      for (let i = 0; i < 10; i++) {
        await logger.info(`Message ${i} with some extra content to fill space`);
      }

      const files = await readdir(testDir);
      expect(files).toContain('test.log.1');
    });

    it('should keep at most maxFiles rotated files', async () => {
      const logger = new Logger({ level: 'info', path: logPath, maxSize: 50, maxFiles: 2 });

      for (let i = 0; i < 20; i++) {
        await logger.info(`Message ${i} with padding content`);
      }

      const files = (await readdir(testDir)).sort();
      expect(files).toEqual(['test.log', 'test.log.1', 'test.log.2']);
    });
  });

  describe('child logger', () => {
    it('should inherit file and level and merge context', async () => {
      const parent = new Logger({ level: 'info', path: logPath }, { component: 'agent' });
      const child = parent.child({ operation: 'process_message' });
      await child.debug('hidden');
      await child.info('visible');

      const entries = await readEntries(logPath);
      expect(entries).toHaveLength(1);
      expect(entries[0]?.context).toEqual({ component: 'agent', operation: 'process_message' });
    });
  });

  describe('write ordering', () => {
    it('should keep call order for writes that are not awaited one by one', async () => {
      const logger = new Logger({ level: 'debug', path: logPath });
      const child = logger.child({ component: 'router' });

      await Promise.all(
        Array.from({ length: 20 }, (_, i) => (i % 2 === 0 ? logger : child).info(`entry ${i}`))
      );

      const entries = await readEntries(logPath);
      expect(entries.map((entry) => entry.message)).toEqual(Array.from({ length: 20 }, (_, i) => `entry ${i}`));
    });

    it('should rotate between queued writes without losing entries', async () => {
      const logger = new Logger({ level: 'info', path: logPath, maxSize: 50, maxFiles: 10 });

      await Promise.all(Array.from({ length: 5 }, (_, i) => logger.info(`rotating entry ${i}`)));
      await logger.flush();

      const files = await readdir(testDir);
      const rotated = files.filter((file) => file.startsWith('test.log.'));
      expect(rotated).toHaveLength(4);
      expect((await readEntries(logPath)).map((entry) => entry.message)).toEqual(['rotating entry 4']);
    });
  });
});
