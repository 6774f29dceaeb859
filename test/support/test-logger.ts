import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Logger } from '../../src/logging/logger.js';

/**
 * Logger writing to a throwaway file so tests never touch the working directory
 */
export function createTestLogger(): Logger {
  return new Logger({ path: join(tmpdir(), `toolweave-test-${randomUUID()}`, 'test.log'), level: 'debug' });
}
