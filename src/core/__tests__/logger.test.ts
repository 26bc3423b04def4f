// src/core/__tests__/logger.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Logger } from '../logger.js';

describe('Logger', () => {
  let stderr: jest.Mock<(...data: unknown[]) => void>;

  beforeEach(() => {
    stderr = jest.fn<(...data: unknown[]) => void>();
    jest.spyOn(console, 'error').mockImplementation(stderr);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prefixes lines with the level', () => {
    new Logger('debug').warn('careful');

    expect(stderr).toHaveBeenCalledWith('[WARN] careful');
  });

  it('drops messages below the level', () => {
    const logger = new Logger('warn');
    logger.info('hidden');
    logger.error('shown');

    expect(stderr.mock.calls).toEqual([['[ERROR] shown']]);
  });

  it('falls back to info for an unknown level', () => {
    const logger = new Logger('verbose');
    logger.debug('hidden');
    logger.info('shown');

    expect(stderr.mock.calls).toEqual([['[INFO] shown']]);
  });

  it('mirrors timestamped lines into the attached file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sitewatch-log-'));
    const file = path.join(dir, 'logs', 'run.log');
    const logger = new Logger('info');

    logger.attachLogFile(file);
    logger.info('first');

    expect(await fs.readFile(file, 'utf-8')).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] first\n$/);
    await fs.rm(dir, { recursive: true, force: true });
  });
});
