import type { Command } from 'commander';
import { requireWorkspace } from '../cli-shared.js';
import { ConfigError } from '../../shared/errors.js';
import { formatDay, isDay } from '../../workspace/paths.js';

export function registerManifestCommand(program: Command): void {
  program
    .command('manifest [date]')
    .description("Show a day's manifest (default: today)")
    .option('--list', 'List the dates that have a manifest')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((date: string | undefined, opts: { list?: boolean; cwd: string }) => {
      const { manifests, clock } = requireWorkspace(opts.cwd);
      if (opts.list) {
        const dates = manifests.dates();
        if (dates.length === 0) console.log('No manifests yet.');
        for (const d of dates) console.log(`  ${d}`);
        return;
      }

      const day = date ?? formatDay(clock.now());
      if (!isDay(day)) throw new ConfigError(`Invalid date: ${day}. Use YYYY-MM-DD.`);
      const manifest = manifests.read(day);
      console.log(`\nManifest ${manifest.date} – ${manifest.total_count} clip(s), updated ${manifest.timestamp}\n`);
      for (const clip of manifest.clips) {
        console.log(`  [${clip.approval_status.toUpperCase().padEnd(12)}] ${clip.clip_id}`);
        console.log(`          Creator: ${clip.creator_name ?? '-'}`);
        console.log(`          Source:  ${clip.source_url} (${clip.start_time}s–${clip.end_time}s)`);
        console.log(`          Video:   ${clip.video_path}`);
      }
    });

  program
    .command('processed')
    .description('List videos already turned into clips')
    .option('--creator <name>', 'Only this creator')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { creator?: string; cwd: string }) => {
      const { ledger } = requireWorkspace(opts.cwd);
      const records = ledger.list({ creatorName: opts.creator });
      if (records.length === 0) {
        console.log('No processed videos.');
        return;
      }
      console.log(`\nProcessed videos (${records.length}):\n`);
      for (const r of records) {
        console.log(`  ${r.platform}:${r.video_id}  ${r.creator_name}  ${r.clip_count} clip(s)  ${r.timestamp}`);
      }
    });
}
