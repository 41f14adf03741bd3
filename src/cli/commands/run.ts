import type { Command } from 'commander';
import { requireWorkspace, parsePositiveNumber } from '../cli-shared.js';
import { printCycleReport } from './check.js';
import type { CollaboratorOverrides } from '../../runtime/services.js';

export function registerRunCommand(program: Command, overrides: CollaboratorOverrides = {}): void {
  program
    .command('run')
    .description('Monitor creators continuously until interrupted')
    .option('--interval <minutes>', 'Check every creator on this fixed interval')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (opts: { interval?: string; cwd: string }) => {
      const intervalMinutes = opts.interval ? parsePositiveNumber(opts.interval, '--interval') : undefined;
      const { monitor, registry } = requireWorkspace(opts.cwd, overrides);

      const controller = new AbortController();
      const stop = () => {
        console.log('\nStopping after the current creator...');
        controller.abort();
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);

      console.log(`Monitoring ${registry.size} creator(s)`);
      console.log(
        intervalMinutes !== undefined
          ? `  Interval: every ${intervalMinutes} min`
          : '  Interval: per creator (check_interval_minutes)',
      );
      console.log('Press Ctrl+C to stop\n');

      try {
        await monitor.run({ signal: controller.signal, intervalMinutes, onCycle: printCycleReport });
      } finally {
        process.removeListener('SIGINT', stop);
        process.removeListener('SIGTERM', stop);
      }
    });
}
