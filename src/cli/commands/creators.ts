import type { Command } from 'commander';
import { requireWorkspace, parsePositiveInt, parsePositiveNumber } from '../cli-shared.js';
import type { CreatorPatch } from '../../store/creators.js';
import type { Creator } from '../../workspace/types.js';

interface CreatorFlags {
  cwd: string;
  paymentLink?: string;
  interval?: string;
  clips?: string;
}

interface EditFlags extends CreatorFlags {
  channelUrl?: string;
  destination?: string;
  active?: boolean;
}

function printCreator(c: Creator): void {
  const state = c.active ? '' : ' (inactive)';
  console.log(`  ${c.name}${state}`);
  console.log(`      Channel:     ${c.channel_url}`);
  console.log(`      Destination: ${c.destination_handle}`);
  console.log(`      Interval:    ${c.check_interval_minutes} min, ${c.clips_per_video} clips/video`);
  console.log(`      Last check:  ${c.last_checked ?? 'never'}`);
  if (c.payment_link) console.log(`      Payment:     ${c.payment_link}`);
}

export function registerCreatorsCommand(program: Command): void {
  const creators = program.command('creators').description('Manage monitored creators');

  creators
    .command('add <name> <channelUrl> <destination>')
    .description('Register a creator channel and the Instagram handle clips go to')
    .option('--payment-link <url>', 'Creator payment link')
    .option('--interval <minutes>', 'Check interval in minutes')
    .option('--clips <n>', 'Clips per video')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((name: string, channelUrl: string, destination: string, opts: CreatorFlags) => {
      const { registry } = requireWorkspace(opts.cwd);
      const creator = registry.add({
        name,
        channel_url: channelUrl,
        destination_handle: destination,
        payment_link: opts.paymentLink ?? null,
        check_interval_minutes: opts.interval ? parsePositiveNumber(opts.interval, '--interval') : undefined,
        clips_per_video: opts.clips ? parsePositiveInt(opts.clips, '--clips') : undefined,
      });
      console.log(`Added creator: ${creator.name}`);
      printCreator(creator);
    });

  creators
    .command('remove <name>')
    .description('Stop monitoring a creator')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((name: string, opts: { cwd: string }) => {
      const { registry } = requireWorkspace(opts.cwd);
      registry.remove(name);
      console.log(`Removed creator: ${name}`);
    });

  creators
    .command('list')
    .description('List registered creators')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { cwd: string }) => {
      const { registry } = requireWorkspace(opts.cwd);
      if (registry.size === 0) {
        console.log('No creators registered.');
        return;
      }
      console.log(`\nCreators (${registry.size}):\n`);
      for (const creator of registry.list()) printCreator(creator);
    });

  creators
    .command('edit <name>')
    .description('Update a creator')
    .option('--channel-url <url>', 'Channel URL')
    .option('--destination <handle>', 'Instagram handle')
    .option('--payment-link <url>', 'Creator payment link')
    .option('--interval <minutes>', 'Check interval in minutes')
    .option('--clips <n>', 'Clips per video')
    .option('--active', 'Resume monitoring')
    .option('--no-active', 'Pause monitoring')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((name: string, opts: EditFlags) => {
      const { registry } = requireWorkspace(opts.cwd);
      const patch: CreatorPatch = {
        channel_url: opts.channelUrl,
        destination_handle: opts.destination,
        payment_link: opts.paymentLink,
        check_interval_minutes: opts.interval ? parsePositiveNumber(opts.interval, '--interval') : undefined,
        clips_per_video: opts.clips ? parsePositiveInt(opts.clips, '--clips') : undefined,
        active: opts.active,
      };
      const updated = registry.update(name, patch);
      console.log(`Updated creator: ${updated.name}`);
      printCreator(updated);
    });
}
