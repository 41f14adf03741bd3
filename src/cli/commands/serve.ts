import type { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { parsePositiveInt } from '../cli-shared.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the approval webhook API')
    .option('--host <host>', 'Bind host (default: 127.0.0.1)', '127.0.0.1')
    .option('--port <port>', 'Port (default: 7810)', '7810')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (opts: { host: string; port: string; cwd: string }) => {
      const port = parsePositiveInt(opts.port, '--port');

      console.log('Starting reelrunner approval API...');
      console.log(`  API: http://${opts.host}:${port}/v1`);
      console.log('\nPress Ctrl+C to stop\n');

      const fastify = await startServer({ host: opts.host, port, cwd: opts.cwd });
      const stop = () => {
        fastify.close().catch((err: unknown) => console.error('Shutdown failed:', err));
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
    });
}
