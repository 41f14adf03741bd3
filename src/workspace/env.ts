import { existsSync, readFileSync, writeFileSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import { getReelPaths } from './paths.js';
import { logger, errorMessage } from '../shared/logger.js';

/** Keys that may be supplied through .reelrunner/env.json. */
export const WORKSPACE_ENV_KEYS = [
  'LLM_API_KEY',
  'LLM_API_BASE',
  'LLM_MODEL',
  'CLIPPING_API_KEY',
  'GATEWAY_TOKEN',
  'INSTAGRAM_ACCESS_TOKEN',
  'INSTAGRAM_USER_ID',
  'REELRUNNER_API_TOKEN',
  'REELRUNNER_GATEWAY_URL',
  'REELRUNNER_APPROVAL_RECIPIENT',
] as const;

export type WorkspaceEnvKey = (typeof WORKSPACE_ENV_KEYS)[number];

const WorkspaceEnvFileSchema = z.record(z.string());

/**
 * Load workspace-level environment variables (API keys, gateway settings) into
 * the current process. Values already present in the environment win.
 */
export function loadWorkspaceEnv(cwd: string = process.cwd()): void {
  const filePath = getReelPaths(cwd).envFile;
  if (!existsSync(filePath)) return;
  try {
    const parsed = WorkspaceEnvFileSchema.parse(JSON.parse(readFileSync(filePath, 'utf8')));
    for (const key of WORKSPACE_ENV_KEYS) {
      const value = parsed[key];
      if (value && !process.env[key]) {
        process.env[key] = value;
      }
    }
  } catch (err) {
    logger.warn('Failed to load workspace env file', { path: filePath, error: errorMessage(err) });
  }
}

/**
 * Persist one env value to .reelrunner/env.json (chmod 600) so later CLI and
 * API invocations pick it up.
 */
export function persistWorkspaceEnv(
  cwd: string,
  key: WorkspaceEnvKey,
  value: string,
): string {
  const filePath = getReelPaths(cwd).envFile;
  let current: Record<string, string> = {};
  if (existsSync(filePath)) {
    const parsed = WorkspaceEnvFileSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf8')));
    if (parsed.success) current = parsed.data;
  }
  current[key] = value;
  writeFileSync(filePath, JSON.stringify(current, null, 2), { mode: 0o600 });
  chmodSync(filePath, 0o600);
  return filePath;
}

export function isWorkspaceEnvKey(value: string): value is WorkspaceEnvKey {
  return (WORKSPACE_ENV_KEYS as readonly string[]).includes(value);
}
