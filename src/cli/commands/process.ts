import type { Command } from 'commander';
import { requireWorkspace, parsePositiveInt } from '../cli-shared.js';
import { ConfigError } from '../../shared/errors.js';
import { videoIdFromUrl } from '../../shared/ids.js';
import type { BundleRunResult } from '../../pipeline/bundler.js';
import type { CollaboratorOverrides } from '../../runtime/services.js';

interface ProcessFlags {
  cwd: string;
  clips?: string;
  creator?: string;
  campaign?: string;
  title?: string;
}

export function printBundleRun(result: BundleRunResult): void {
  console.log(`\nCreated ${result.bundles.length} clip(s):`);
  for (const bundle of result.bundles) {
    console.log(`  ✓ ${bundle.clip_id} [${bundle.approval_status}] ${bundle.video_path}`);
  }
  for (const skip of result.skipped) {
    console.log(`  ✗ clip ${skip.ordinal} (${skip.start}s–${skip.end}s): ${skip.error}`);
  }
  for (const failure of result.submissionFailures) {
    console.log(`  ⚠ approval request for ${failure.clip_id} failed: ${failure.error}`);
  }
}

export function registerProcessCommand(program: Command, overrides: CollaboratorOverrides = {}): void {
  program
    .command('process <url>')
    .description('Clip a single video by URL without recording it as processed')
    .option('--clips <n>', 'Number of clips')
    .option('--creator <name>', 'Attribute clips to a registered creator')
    .option('--campaign <id>', 'Clip for a campaign: the URL must be an approved source')
    .option('--title <title>', 'Title used when the download reports none')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (url: string, opts: ProcessFlags) => {
      if (opts.creator && opts.campaign) {
        throw new ConfigError('Use either --creator or --campaign, not both');
      }
      const { processor, campaignProcessor, registry, config } = requireWorkspace(opts.cwd, overrides);
      const creator = opts.creator ? registry.get(opts.creator) : null;
      const clipCount = opts.clips
        ? parsePositiveInt(opts.clips, '--clips')
        : (creator?.clips_per_video ?? config.clip.per_video);
      const videoId = videoIdFromUrl(url);

      const result = opts.campaign
        ? await campaignProcessor.processForCampaign(opts.campaign, url, { videoId, clipCount, title: opts.title })
        : await processor.processVideo({
            video_id: videoId,
            url,
            title: opts.title ?? '',
            creatorName: creator?.name ?? null,
            clipCount,
          });

      printBundleRun(result);
    });
}
