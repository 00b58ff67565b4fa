import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '../../src/infrastructure/logger.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-logger');
const LOG_PATH = join(TMP_DIR, 'logs', 'agent.log');

function readRecords(path: string): unknown[] {
  return readFileSync(path, 'utf-8')
    .split('\n')
    .filter((line) => line !== '')
    .map((line): unknown => JSON.parse(line));
}

describe('createLogger', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('logs to stdout only when no file is configured', () => {
    const log = createLogger('warn', null);

    expect(log.level).toBe('warn');
    expect(log.isLevelEnabled('info')).toBe(false);
    expect(log.isLevelEnabled('error')).toBe(true);
  });

  it('writes records at or above the level to the log file', () => {
    const log = createLogger('info', LOG_PATH);

    log.info({ host: 'PC1' }, 'Print agent started');
    log.debug('Delivery ledger saved');

    const records = readRecords(LOG_PATH);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 30, host: 'PC1', msg: 'Print agent started' });
  });

  it('passes debug records through when the level is debug', () => {
    const log = createLogger('debug', LOG_PATH);

    log.debug({ total: 3 }, 'Delivery ledger saved');

    expect(readRecords(LOG_PATH)).toEqual([expect.objectContaining({ level: 20, total: 3 })]);
  });

  it('writes nothing at the silent level', () => {
    const log = createLogger('silent', LOG_PATH);

    log.fatal('Agent crashed');

    expect(log.level).toBe('silent');
    expect(existsSync(LOG_PATH)).toBe(true);
    expect(readFileSync(LOG_PATH, 'utf-8')).toBe('');
  });
});
