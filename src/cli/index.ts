#!/usr/bin/env node
import { Command } from 'commander';
import { isLogLevel, setLogLevel } from '../shared/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerCreatorsCommand } from './commands/creators.js';
import { registerCheckCommand } from './commands/check.js';
import { registerRunCommand } from './commands/run.js';
import { registerProcessCommand } from './commands/process.js';
import { registerApprovalsCommand } from './commands/approvals.js';
import { registerPostCommand } from './commands/post.js';
import { registerManifestCommand } from './commands/manifest.js';
import { registerPaymentsCommand } from './commands/payments.js';
import { registerCampaignsCommand } from './commands/campaigns.js';
import { registerEnvCommand } from './commands/env.js';
import { registerServeCommand } from './commands/serve.js';
import { registerDoctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('reelrunner')
  .description('reelrunner – creator clip pipeline: monitor, clip, caption, approve, post')
  .version('0.1.0')
  .option('--log-level <level>', 'debug, info, warn or error')
  .hook('preAction', (cmd) => {
    const level = cmd.opts<{ logLevel?: string }>().logLevel;
    if (isLogLevel(level)) setLogLevel(level);
  });

registerInitCommand(program);
registerCreatorsCommand(program);
registerCheckCommand(program);
registerRunCommand(program);
registerProcessCommand(program);
registerApprovalsCommand(program);
registerPostCommand(program);
registerManifestCommand(program);
registerPaymentsCommand(program);
registerCampaignsCommand(program);
registerEnvCommand(program);
registerServeCommand(program);
registerDoctorCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
