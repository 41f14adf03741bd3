import type { Command } from 'commander';
import { requireWorkspace } from '../cli-shared.js';
import { ConfigError } from '../../shared/errors.js';
import { ApprovalStatusSchema } from '../../shared/schemas.js';
import { isApprovalDecision, type ApprovalDecision } from '../../governance/approvals.js';
import type { CollaboratorOverrides } from '../../runtime/services.js';

function decide(cwd: string, clipId: string, decision: ApprovalDecision, note?: string): void {
  const { approvals } = requireWorkspace(cwd);
  const updated = approvals.recordResponse(clipId, decision, note === undefined ? undefined : { note });
  console.log(`${decision === 'approved' ? 'Approved' : 'Rejected'}: ${updated.clip_id}`);
}

export function registerApprovalsCommand(program: Command, overrides: CollaboratorOverrides = {}): void {
  const approvals = program.command('approvals').description('Review clip approval state');

  approvals
    .command('list')
    .description('List clip bundles and their approval state')
    .option('--status <status>', 'Filter: pending, approved, rejected, not_required')
    .option('--date <date>', 'Only bundles from this day (YYYY-MM-DD)')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { status?: string; date?: string; cwd: string }) => {
      const status = opts.status === undefined ? undefined : ApprovalStatusSchema.safeParse(opts.status);
      if (status && !status.success) {
        throw new ConfigError(`Invalid status: ${opts.status}. Use pending, approved, rejected or not_required.`);
      }
      const { approvals: tracker } = requireWorkspace(opts.cwd);
      const items = tracker.list({ status: status?.data, date: opts.date });

      if (items.length === 0) {
        console.log('No clips found.');
        return;
      }
      console.log(`\nClips (${items.length}):\n`);
      for (const b of items) {
        console.log(`  [${b.approval_status.toUpperCase().padEnd(12)}] ${b.clip_id}`);
        console.log(`          Source:  ${b.metadata.source_title} (${b.metadata.start_time}s–${b.metadata.end_time}s)`);
        console.log(`          Created: ${b.metadata.created_at}`);
        if (b.decided_at) console.log(`          Decided: ${b.decided_at}`);
        if (b.approval_error) console.log(`          Error:   ${b.approval_error}`);
        if (b.posted_at) console.log(`          Posted:  ${b.posted_at} (${b.post_id ?? '?'})`);
        console.log();
      }
    });

  approvals
    .command('submit <clipId>')
    .description('Send (or re-send) a pending clip to the approval gateway')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (clipId: string, opts: { cwd: string }) => {
      const { approvals: tracker } = requireWorkspace(opts.cwd, overrides);
      await tracker.submit(clipId);
      console.log(`Approval requested: ${clipId}`);
    });

  approvals
    .command('approve <clipId>')
    .description('Approve a pending clip')
    .option('--note <note>', 'Stored with the decision')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((clipId: string, opts: { note?: string; cwd: string }) => {
      decide(opts.cwd, clipId, 'approved', opts.note);
    });

  approvals
    .command('reject <clipId>')
    .description('Reject a pending clip')
    .option('--note <note>', 'Stored with the decision')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((clipId: string, opts: { note?: string; cwd: string }) => {
      decide(opts.cwd, clipId, 'rejected', opts.note);
    });

  program
    .command('record-approval <clipId> <decision>')
    .description('Record a reviewer decision (approved | rejected)')
    .option('--note <note>', 'Stored with the decision')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((clipId: string, decision: string, opts: { note?: string; cwd: string }) => {
      if (!isApprovalDecision(decision)) {
        throw new ConfigError(`Invalid decision: ${decision}. Use approved or rejected.`);
      }
      decide(opts.cwd, clipId, decision, opts.note);
    });
}
