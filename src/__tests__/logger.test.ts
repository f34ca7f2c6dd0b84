import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { getLogFile, getLogLevel, logger, setLogLevel } from '../utils/logger.js';
import { paths } from '../utils/paths.js';

const TEST_DATA_DIR = '/logger-test';

function readLines(): Array<Record<string, unknown>> {
  return readFileSync(getLogFile(), 'utf-8')
    .trim()
    .split('\n')
    .map(line => JSON.parse(line));
}

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(paths, 'dataDir', 'get').mockReturnValue(TEST_DATA_DIR);
  });

  afterEach(() => {
    setLogLevel(undefined);
    vi.restoreAllMocks();
  });

  it('names the daily log file under the data directory', () => {
    expect(getLogFile(new Date('2026-04-05T10:00:00Z'))).toBe('/logger-test/logs/context-engine-2026-04-05.log');
  });

  it('appends JSON lines at or above the configured level', async () => {
    setLogLevel('warn');
    logger.info('not written');
    logger.warn('Sweep slow', { durationMs: 12 });

    await vi.waitFor(() => expect(existsSync(getLogFile())).toBe(true));
    const lines = readLines();

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'warn', message: 'Sweep slow', durationMs: 12 });
  });

  it('prefers an explicit level over LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    expect(getLogLevel()).toBe('error');
    setLogLevel('debug');
    expect(getLogLevel()).toBe('debug');
    vi.unstubAllEnvs();
  });
});
