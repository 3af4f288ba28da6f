import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_API_URL = 'http://127.0.0.1:8765';
export const DEFAULT_BACKEND_MODULE = 'tether.ide.api_server';

export const DEFAULT_SIDECAR_CONFIG = {
  healthTimeoutMs: 2000,
  stopGraceMs: 3000,
  requestTimeoutMs: 300_000,
  reconnectBaseMs: 500,
  reconnectMaxMs: 5000,
} as const;

/** Lookup order for each setting; first non-blank value wins. */
export const API_URL_ENV_VARS = ['TETHER_IDE_API_URL', 'TETHER_API_URL'] as const;
export const PYTHON_PATH_ENV_VARS = ['TETHER_IDE_PYTHON_PATH', 'TETHER_PYTHON_PATH', 'TETHER_PYTHON'] as const;

export const SidecarConfigSchema = z.object({
  // Not checked as a URL: an unusable value only disables the event stream
  apiUrl: z.string().min(1),
  pythonPath: z.string().min(1),
  backendModule: z.string().min(1),
  workspaceRoot: z.string().min(1),
  healthTimeoutMs: z.number().int().positive(),
  stopGraceMs: z.number().int().nonnegative(),
  requestTimeoutMs: z.number().int().positive(),
  reconnectBaseMs: z.number().int().positive(),
  reconnectMaxMs: z.number().int().positive(),
});

export type SidecarConfig = z.infer<typeof SidecarConfigSchema>;

type Env = Record<string, string | undefined>;

function firstSet(env: Env, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

export function resolveApiUrl(env: Env = process.env): string {
  return firstSet(env, API_URL_ENV_VARS) ?? DEFAULT_API_URL;
}

export function resolvePythonPath(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  return firstSet(env, PYTHON_PATH_ENV_VARS) ?? (platform === 'win32' ? 'python' : 'python3');
}

/**
 * Working directory for the backend: explicit override, else the nearest
 * ancestor holding a .git directory, else the current directory.
 */
export function resolveWorkspaceRoot(env: Env = process.env, cwd: string = process.cwd()): string {
  const override = firstSet(env, ['TETHER_WORKSPACE_ROOT']);
  if (override) return path.resolve(cwd, override);

  let dir = path.resolve(cwd);
  for (;;) {
    if (fs.existsSync(path.join(dir, '.git'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return cwd;
    dir = parent;
  }
}

/**
 * Build the effective configuration from the environment plus explicit overrides.
 * Throws a ZodError when an override is malformed.
 */
export function resolveSidecarConfig(
  env: Env = process.env,
  overrides: Partial<SidecarConfig> = {}
): SidecarConfig {
  return SidecarConfigSchema.parse({
    ...DEFAULT_SIDECAR_CONFIG,
    apiUrl: resolveApiUrl(env),
    pythonPath: resolvePythonPath(env),
    backendModule: firstSet(env, ['TETHER_BACKEND_MODULE']) ?? DEFAULT_BACKEND_MODULE,
    workspaceRoot: resolveWorkspaceRoot(env),
    ...overrides,
  });
}
