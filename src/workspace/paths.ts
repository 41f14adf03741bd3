import { join } from 'node:path';
import type { DayPaths, ReelPaths } from './types.js';

export const WORKSPACE_DIR = '.reelrunner';

export function getReelPaths(cwd: string = process.cwd()): ReelPaths {
  const root = join(cwd, WORKSPACE_DIR);
  return {
    root,
    config: join(root, 'config.yaml'),
    envFile: join(root, 'env.json'),
    creators: join(root, 'creators.json'),
    ledger: join(root, 'processed.json'),
    payments: join(root, 'payments.json'),
    workDir: join(root, 'work'),
    outputDir: join(root, 'output'),
    campaignsDir: join(root, 'campaigns'),
  };
}

export function getDayPaths(outputDir: string, date: string): DayPaths {
  const root = join(outputDir, date);
  return {
    root,
    clipsDir: join(root, 'clips'),
    metadataDir: join(root, 'metadata'),
    manifest: join(root, 'manifest.json'),
  };
}

/**
 * Local calendar day as YYYY-MM-DD. Manifests and output folders are keyed by it.
 */
export function formatDay(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function isDay(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value);
}
