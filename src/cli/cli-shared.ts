import { existsSync } from 'node:fs';
import { getReelPaths } from '../workspace/paths.js';
import { loadReelConfig, readSecrets } from '../workspace/config.js';
import { loadWorkspaceEnv } from '../workspace/env.js';
import { ConfigError } from '../shared/errors.js';
import { buildServices, type CollaboratorOverrides, type Services } from '../runtime/services.js';

/**
 * Load the workspace at `cwd` and wire its services. Use at the top of every
 * command that needs an initialized workspace.
 */
export function requireWorkspace(cwd?: string, overrides: CollaboratorOverrides = {}): Services {
  const dir = cwd ?? process.cwd();
  loadWorkspaceEnv(dir);
  const paths = getReelPaths(dir);
  if (!existsSync(paths.config)) {
    throw new ConfigError('Workspace not initialized. Run: reelrunner init');
  }
  return buildServices(paths, loadReelConfig(paths.config), readSecrets(), overrides);
}

export function parsePositiveNumber(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new ConfigError(`${flag} must be a positive number (got "${value}")`);
  }
  return n;
}

export function parsePositiveInt(value: string, flag: string): number {
  const n = parsePositiveNumber(value, flag);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`${flag} must be a whole number (got "${value}")`);
  }
  return n;
}
