import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { ConfigError } from '../../shared/errors.js';
import { getReelPaths } from '../../workspace/paths.js';
import { isWorkspaceEnvKey, persistWorkspaceEnv, WORKSPACE_ENV_KEYS } from '../../workspace/env.js';

export function registerEnvCommand(program: Command): void {
  const env = program.command('env').description('Manage workspace secrets and endpoints (.reelrunner/env.json)');

  env
    .command('set <key> <value>')
    .description(`Store a value. Keys: ${WORKSPACE_ENV_KEYS.join(', ')}`)
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((key: string, value: string, opts: { cwd: string }) => {
      if (!isWorkspaceEnvKey(key)) {
        throw new ConfigError(`Unknown key: ${key}. Use one of ${WORKSPACE_ENV_KEYS.join(', ')}`);
      }
      if (!existsSync(getReelPaths(opts.cwd).root)) {
        throw new ConfigError('Workspace not initialized. Run: reelrunner init');
      }
      const filePath = persistWorkspaceEnv(opts.cwd, key, value);
      console.log(`Saved ${key} to ${filePath}`);
    });

  env
    .command('keys')
    .description('List the keys env.json may hold')
    .action(() => {
      for (const key of WORKSPACE_ENV_KEYS) console.log(`  ${key}`);
    });
}
