import type { Command } from 'commander';
import { requireWorkspace } from '../cli-shared.js';
import type { CollaboratorOverrides } from '../../runtime/services.js';
import type { CycleReport } from '../../runtime/monitor.js';

export function printCycleReport(report: CycleReport): void {
  const checked = report.creators.filter((c) => c.status === 'ok' || c.status === 'failed');
  console.log(`\nCycle ${report.started_at} → ${report.finished_at} (${checked.length} creator(s) checked)`);
  for (const creator of report.creators) {
    if (creator.status === 'not_due' || creator.status === 'inactive') {
      console.log(`  - ${creator.name}: ${creator.status.replace('_', ' ')}`);
      continue;
    }
    if (creator.status === 'failed') {
      console.log(`  ✗ ${creator.name}: ${creator.error ?? 'failed'}`);
      continue;
    }
    console.log(`  ✓ ${creator.name}: ${creator.new_videos} new video(s)`);
    for (const video of creator.videos) {
      if (video.status === 'failed') {
        console.log(`      ✗ ${video.video_id} ${video.title}: ${video.error ?? 'failed'}`);
        continue;
      }
      const extras: string[] = [];
      if (video.skipped_clips) extras.push(`${video.skipped_clips} skipped`);
      if (video.approval_failures) extras.push(`${video.approval_failures} approval request(s) failed`);
      const suffix = extras.length ? ` (${extras.join(', ')})` : '';
      console.log(`      ✓ ${video.video_id} ${video.title}: ${video.clip_count} clip(s)${suffix}`);
    }
  }
  if (report.cancelled) console.log('  Cycle cancelled before all creators were checked.');
}

export function registerCheckCommand(program: Command, overrides: CollaboratorOverrides = {}): void {
  program
    .command('check [creator]')
    .description('Check all creators (or one) for new videos right now')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (creator: string | undefined, opts: { cwd: string }) => {
      const { monitor } = requireWorkspace(opts.cwd, overrides);
      const report = await monitor.check(creator);
      printCycleReport(report);
    });
}
