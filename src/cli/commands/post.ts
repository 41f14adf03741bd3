import type { Command } from 'commander';
import { requireWorkspace, parsePositiveInt } from '../cli-shared.js';
import type { CollaboratorOverrides } from '../../runtime/services.js';
import type { PostRunReport } from '../../runtime/poster.js';

export function registerPostCommand(program: Command, overrides: CollaboratorOverrides = {}): void {
  program
    .command('post-approved')
    .description('Publish approved clips to Instagram')
    .option('--max <n>', 'Maximum posts this run (default: posting.max_posts_per_run)')
    .option('--no-delay', 'Post back-to-back without the random delay')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (opts: { max?: string; delay: boolean; cwd: string }) => {
      const { poster } = requireWorkspace(opts.cwd, overrides);
      const maxPosts = opts.max ? parsePositiveInt(opts.max, '--max') : undefined;

      const controller = new AbortController();
      const stop = () => controller.abort();
      process.once('SIGINT', stop);
      let report: PostRunReport;
      try {
        report = await poster.postApproved({ maxPosts, delay: opts.delay, signal: controller.signal });
      } finally {
        process.removeListener('SIGINT', stop);
      }

      if (report.eligible === 0) {
        console.log('No approved clips waiting to be posted.');
        return;
      }
      const posted = report.outcomes.filter((o) => o.status === 'posted').length;
      console.log(`\nPosted ${posted}/${report.outcomes.length} (${report.eligible} eligible):`);
      for (const outcome of report.outcomes) {
        if (outcome.status === 'posted') console.log(`  ✓ ${outcome.clip_id} → ${outcome.post_id ?? ''}`);
        else console.log(`  ✗ ${outcome.clip_id}: ${outcome.error ?? 'failed'}`);
      }
      if (report.cancelled) console.log('  Stopped early.');
    });
}
