import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';
import { getReelPaths } from '../../workspace/paths.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a reelrunner workspace in the current directory')
    .option('--force', 'Overwrite config.yaml if the workspace already exists', false)
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { force: boolean; cwd: string }) => {
      const config = initWorkspace({ cwd: opts.cwd, force: opts.force });
      const paths = getReelPaths(opts.cwd);
      console.log('Workspace initialized!');
      console.log(`  Config:   ${paths.config}`);
      console.log(`  Output:   ${paths.outputDir}`);
      console.log(`  Clips:    ${config.clip.per_video} per video, ${config.clip.length_seconds}s each`);
      console.log(`  Approval: ${config.approval.enabled ? 'enabled' : 'disabled'}`);
      console.log('\nNext steps:');
      console.log('  reelrunner creators add <name> <channel-url> <instagram-handle>');
      console.log('  reelrunner env set LLM_API_KEY <key>');
      console.log('  reelrunner doctor');
    });
}
