import { mkdirSync, existsSync } from 'node:fs';
import { getReelPaths } from './paths.js';
import { defaultConfig, writeReelConfig } from './config.js';
import { writeJsonAtomic } from './json-file.js';
import type { ReelConfig } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
}

export function initWorkspace(opts: InitOptions = {}): ReelConfig {
  const paths = getReelPaths(opts.cwd);

  if (existsSync(paths.root) && !opts.force) {
    throw new Error(
      `Workspace already exists at ${paths.root}. Use --force to reinitialize.`,
    );
  }

  mkdirSync(paths.root, { recursive: true, mode: 0o700 });
  for (const dir of [paths.workDir, paths.outputDir, paths.campaignsDir]) {
    mkdirSync(dir, { recursive: true });
  }

  const config = defaultConfig();
  writeReelConfig(paths.config, config);

  // Stores are only created when missing; --force must not wipe the ledger.
  if (!existsSync(paths.creators)) writeJsonAtomic(paths.creators, []);
  if (!existsSync(paths.ledger)) writeJsonAtomic(paths.ledger, []);
  if (!existsSync(paths.payments)) writeJsonAtomic(paths.payments, { creators: {} });

  return config;
}
