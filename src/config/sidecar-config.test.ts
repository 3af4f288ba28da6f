import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  DEFAULT_API_URL,
  DEFAULT_BACKEND_MODULE,
  resolveApiUrl,
  resolvePythonPath,
  resolveSidecarConfig,
  resolveWorkspaceRoot,
} from './sidecar-config.js';

describe('resolveApiUrl', () => {
  it('prefers the IDE-specific override', () => {
    expect(
      resolveApiUrl({ TETHER_IDE_API_URL: 'http://ide:1', TETHER_API_URL: 'http://general:2' })
    ).toBe('http://ide:1');
  });

  it('falls back to the general override', () => {
    expect(resolveApiUrl({ TETHER_API_URL: 'http://general:2' })).toBe('http://general:2');
  });

  it('skips blank values and uses the default', () => {
    expect(resolveApiUrl({ TETHER_IDE_API_URL: '  ' })).toBe(DEFAULT_API_URL);
    expect(resolveApiUrl({})).toBe('http://127.0.0.1:8765');
  });
});

describe('resolvePythonPath', () => {
  it('walks the override chain in order', () => {
    expect(resolvePythonPath({ TETHER_PYTHON: '/c', TETHER_PYTHON_PATH: '/b' })).toBe('/b');
    expect(resolvePythonPath({ TETHER_PYTHON: '/c' })).toBe('/c');
    expect(resolvePythonPath({ TETHER_IDE_PYTHON_PATH: '/a', TETHER_PYTHON: '/c' })).toBe('/a');
  });

  it('uses a platform default', () => {
    expect(resolvePythonPath({}, 'win32')).toBe('python');
    expect(resolvePythonPath({}, 'linux')).toBe('python3');
  });
});

describe('resolveWorkspaceRoot', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'tether-root-')));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('finds the nearest ancestor holding .git', () => {
    fs.mkdirSync(path.join(tmp, '.git'));
    const nested = path.join(tmp, 'src', 'deep');
    fs.mkdirSync(nested, { recursive: true });

    expect(resolveWorkspaceRoot({}, nested)).toBe(tmp);
  });

  it('honours an explicit override relative to cwd', () => {
    expect(resolveWorkspaceRoot({ TETHER_WORKSPACE_ROOT: 'project' }, tmp)).toBe(path.join(tmp, 'project'));
  });
});

describe('resolveSidecarConfig', () => {
  it('fills defaults and applies overrides', () => {
    const config = resolveSidecarConfig({}, { workspaceRoot: '/work', stopGraceMs: 10 });

    expect(config.apiUrl).toBe(DEFAULT_API_URL);
    expect(config.backendModule).toBe(DEFAULT_BACKEND_MODULE);
    expect(config.workspaceRoot).toBe('/work');
    expect(config.stopGraceMs).toBe(10);
    expect(config.reconnectBaseMs).toBe(500);
    expect(config.reconnectMaxMs).toBe(5000);
  });

  it('keeps a malformed API URL as given', () => {
    expect(resolveSidecarConfig({ TETHER_API_URL: '127.0.0.1:8765' }).apiUrl).toBe('127.0.0.1:8765');
  });

  it('rejects an invalid override', () => {
    expect(() => resolveSidecarConfig({}, { stopGraceMs: -1 })).toThrow();
  });
});
