import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, formatEntry } from './logger.js';

describe('formatEntry', () => {
  const entry = { ts: '2024-01-01T00:00:00.000Z', level: 'INFO' as const, component: 'health', msg: 'probe', status: 200 };

  it('renders a readable line with extra fields', () => {
    expect(formatEntry(entry, false)).toBe('2024-01-01T00:00:00.000Z INFO  health: probe status=200');
  });

  it('quotes field values containing whitespace', () => {
    expect(formatEntry({ ...entry, status: undefined, error: 'fetch failed', pid: 7 }, false)).toBe(
      '2024-01-01T00:00:00.000Z INFO  health: probe status=undefined error="fetch failed" pid=7'
    );
  });

  it('renders JSON when requested', () => {
    expect(JSON.parse(formatEntry(entry, true))).toEqual(entry);
  });
});

describe('createLogger', () => {
  const saved = { ...process.env };
  let dir: string | undefined;

  afterEach(() => {
    process.env = { ...saved };
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
    vi.restoreAllMocks();
  });

  it('writes entries at or above the configured level to stderr', () => {
    process.env.TETHER_LOG_LEVEL = 'warn';
    delete process.env.TETHER_LOG_FILE;
    delete process.env.TETHER_LOG_JSON;
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const log = createLogger('test');
    log.info('hidden');
    log.warn('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(/ WARN  test: shown\n$/);
  });

  it('writes to the log file instead of the console', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tether-log-'));
    const file = path.join(dir, 'nested', 'tether.log');
    process.env.TETHER_LOG_LEVEL = 'DEBUG';
    process.env.TETHER_LOG_JSON = '1';
    process.env.TETHER_LOG_FILE = file;
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createLogger('connection').debug('Reconnect scheduled', { delay: 500 });

    const written = JSON.parse(fs.readFileSync(file, 'utf-8').trim());
    expect(written).toMatchObject({ level: 'DEBUG', component: 'connection', msg: 'Reconnect scheduled', delay: 500 });
    expect(stderr).not.toHaveBeenCalled();
  });
});
