import type { Command } from 'commander';
import { requireWorkspace, parsePositiveInt } from '../cli-shared.js';
import { ConfigError } from '../../shared/errors.js';
import { isPricingType, PRICING_TYPES } from '../../store/payments.js';

export function registerPaymentsCommand(program: Command): void {
  const payments = program.command('payments').description('Track creator payment links');

  payments
    .command('create <creator> <videoTitle> <clips>')
    .description('Create a pending payment link for clipping work')
    .option('--pricing <type>', `Pricing: ${PRICING_TYPES.join(', ')}`, 'per_video')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((creatorName: string, videoTitle: string, clips: string, opts: { pricing: string; cwd: string }) => {
      if (!isPricingType(opts.pricing)) {
        throw new ConfigError(`Invalid pricing: ${opts.pricing}. Use ${PRICING_TYPES.join(', ')}.`);
      }
      const { payments: tracker, registry } = requireWorkspace(opts.cwd);
      const creator = registry.get(creatorName);
      const record = tracker.createPaymentLink(
        creator.name,
        videoTitle,
        parsePositiveInt(clips, '<clips>'),
        opts.pricing,
        creator.payment_link,
      );
      console.log(`Payment link created ($${record.amount.toFixed(2)}):`);
      console.log(`  ${record.link}`);
    });

  payments
    .command('summary <creator>')
    .description("Show a creator's earnings and pending links")
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((creatorName: string, opts: { cwd: string }) => {
      const { payments: tracker } = requireWorkspace(opts.cwd);
      const summary = tracker.summary(creatorName);
      console.log(`\n${creatorName}`);
      console.log(`  Total earned: $${summary.total_earned.toFixed(2)}`);
      console.log(`  Total clips:  ${summary.total_clips}`);
      console.log(`  Pending:      ${summary.pending_payments}`);
      for (const p of summary.payment_links) {
        console.log(`  [${p.status.toUpperCase().padEnd(9)}] $${p.amount.toFixed(2)} ${p.video_title}`);
        console.log(`              ${p.link}`);
      }
    });

  payments
    .command('complete <creator> <link>')
    .description('Mark a pending payment link as paid')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((creatorName: string, link: string, opts: { cwd: string }) => {
      const { payments: tracker } = requireWorkspace(opts.cwd);
      const record = tracker.markCompleted(creatorName, link);
      console.log(`Marked completed: $${record.amount.toFixed(2)} for ${record.video_title}`);
    });
}
