import { existsSync, statSync } from 'node:fs';
import { execTool, type ExecFn } from '../connector/exec.js';
import { GatewayBridge } from '../connector/gateway/bridge.js';
import { errorMessage } from '../shared/logger.js';
import { getReelPaths } from '../workspace/paths.js';
import { applyEnvOverrides, readReelConfig, readSecrets } from '../workspace/config.js';
import { loadWorkspaceEnv } from '../workspace/env.js';
import type { MessagingGateway } from '../connector/types.js';
import type { ReelConfig } from '../workspace/types.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  summary: string;
}

export interface DoctorOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  exec?: ExecFn;
  /** Gateway to check; built from config when omitted. */
  gateway?: MessagingGateway | null;
  nodeVersion?: string;
}

type CheckResult = Omit<DoctorCheck, 'name'>;

async function check(name: string, fn: () => Promise<CheckResult> | CheckResult): Promise<DoctorCheck> {
  try {
    const result = await fn();
    return { name, ...result };
  } catch (err) {
    return { name, status: 'fail', message: `Check threw: ${errorMessage(err)}` };
  }
}

async function binaryCheck(exec: ExecFn, bin: string, versionFlag: string, install: string): Promise<CheckResult> {
  try {
    const { stdout } = await exec(bin, [versionFlag], { timeoutMs: 10_000 });
    const firstLine = stdout.split(/\r?\n/)[0]?.trim() ?? '';
    return { status: 'pass', message: firstLine || `${bin} found` };
  } catch {
    return { status: 'fail', message: `${bin} not found or not runnable`, fix: install };
  }
}

export async function runDoctorChecks(opts: DoctorOptions = {}): Promise<DoctorReport> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const exec = opts.exec ?? execTool;
  if (!opts.env) loadWorkspaceEnv(cwd);
  const paths = getReelPaths(cwd);
  const checks: DoctorCheck[] = [];

  // Environment
  checks.push(
    await check('Node.js >= 20', () => {
      const v = (opts.nodeVersion ?? process.version).replace(/^v/, '');
      const major = Number.parseInt(v.split('.')[0] ?? '0', 10);
      if (major >= 20) return { status: 'pass', message: `Node.js ${v}` };
      return { status: 'fail', message: `Node.js ${v} is below required v20`, fix: 'Upgrade Node.js to v20 or later' };
    }),
  );

  let config: ReelConfig | null = null;
  let configError: string | null = null;
  if (existsSync(paths.config)) {
    try {
      config = applyEnvOverrides(readReelConfig(paths.config), env);
    } catch (err) {
      configError = errorMessage(err);
    }
  }

  // Workspace
  checks.push(
    await check('Workspace initialized (.reelrunner/)', () => {
      if (!existsSync(paths.root)) {
        return { status: 'fail', message: 'Workspace not initialized', fix: 'Run: reelrunner init' };
      }
      const mode = statSync(paths.root).mode & 0o777;
      if (mode & 0o077) {
        return {
          status: 'warn',
          message: `.reelrunner/ permissions are ${mode.toString(8)} (expected 700)`,
          fix: `Run: chmod 700 "${paths.root}"`,
        };
      }
      return { status: 'pass', message: `.reelrunner/ found at ${paths.root}` };
    }),
  );

  checks.push(
    await check('Config valid', () => {
      if (!existsSync(paths.config)) {
        return { status: 'fail', message: 'config.yaml missing', fix: 'Run: reelrunner init' };
      }
      if (configError) {
        return { status: 'fail', message: configError, fix: `Fix ${paths.config} or re-run: reelrunner init --force` };
      }
      return { status: 'pass', message: 'config.yaml parsed and validated' };
    }),
  );

  const tools = config?.tools ?? { ffmpeg_bin: 'ffmpeg', ffprobe_bin: 'ffprobe', ytdlp_bin: 'yt-dlp' };
  const approval = config?.approval ?? null;
  const posting = config?.posting ?? null;

  // External tools
  checks.push(
    await check('ffmpeg available', () =>
      binaryCheck(exec, tools.ffmpeg_bin, '-version', 'Install ffmpeg (https://ffmpeg.org) or set FFMPEG_BIN'),
    ),
  );
  checks.push(
    await check('ffprobe available', () =>
      binaryCheck(exec, tools.ffprobe_bin, '-version', 'Install ffmpeg (ships ffprobe) or set FFPROBE_BIN'),
    ),
  );
  checks.push(
    await check('yt-dlp available', () =>
      binaryCheck(exec, tools.ytdlp_bin, '--version', 'Install yt-dlp (pipx install yt-dlp) or set YTDLP_BIN'),
    ),
  );

  // Services
  const secrets = readSecrets(env);
  checks.push(
    await check('LLM API key configured', () => {
      if (secrets.llmApiKey) return { status: 'pass', message: 'LLM API key found' };
      return {
        status: 'warn',
        message: 'LLM API key not configured; fallback captions will be used',
        fix: 'Run: reelrunner env set LLM_API_KEY <key>  or set LLM_API_KEY',
      };
    }),
  );

  checks.push(
    await check('Approval gateway reachable', async () => {
      if (!approval) return { status: 'warn', message: 'Workspace not initialized; skipping gateway check' };
      if (!approval.enabled) return { status: 'pass', message: 'Approval disabled' };
      if (!approval.recipient) {
        return {
          status: 'warn',
          message: 'approval.recipient is empty',
          fix: 'Set approval.recipient in config.yaml or REELRUNNER_APPROVAL_RECIPIENT',
        };
      }
      const gateway =
        opts.gateway !== undefined
          ? opts.gateway
          : new GatewayBridge({ url: approval.gateway_url, recipient: approval.recipient, token: secrets.gatewayToken });
      if (gateway && (await gateway.checkHealth())) {
        return { status: 'pass', message: `Gateway healthy at ${approval.gateway_url}` };
      }
      return {
        status: 'warn',
        message: `Gateway not reachable at ${approval.gateway_url}; approval requests will fail`,
        fix: 'Start the messaging gateway or set REELRUNNER_GATEWAY_URL',
      };
    }),
  );

  checks.push(
    await check('Instagram posting configured', () => {
      if (!posting) return { status: 'warn', message: 'Workspace not initialized; skipping posting check' };
      const missing: string[] = [];
      if (!secrets.instagramAccessToken) missing.push('INSTAGRAM_ACCESS_TOKEN');
      if (!posting.media_base_url) missing.push('posting.media_base_url');
      if (!posting.default_account && Object.keys(posting.accounts).length === 0) {
        missing.push('posting.default_account or posting.accounts');
      }
      if (missing.length === 0) return { status: 'pass', message: 'Graph API posting configured' };
      return { status: 'warn', message: `Posting not configured: ${missing.join(', ')}` };
    }),
  );

  checks.push(
    await check('API bind is loopback', () => {
      const host = env['REELRUNNER_API_HOST'] ?? '127.0.0.1';
      const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
      if (isLoopback) return { status: 'pass', message: `API binds to ${host} (loopback)` };
      if (secrets.apiToken) {
        return { status: 'pass', message: `API binds to ${host}; bearer token required` };
      }
      return {
        status: 'warn',
        message: `API configured to bind to ${host} without REELRUNNER_API_TOKEN`,
        fix: 'Set REELRUNNER_API_HOST=127.0.0.1 or REELRUNNER_API_TOKEN',
      };
    }),
  );

  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');
  const overall: CheckStatus = hasFailure ? 'fail' : hasWarning ? 'warn' : 'pass';

  const passCount = checks.filter((c) => c.status === 'pass').length;
  const summary =
    `${passCount}/${checks.length} checks passed` +
    (hasFailure ? ' – FAILURES detected' : '') +
    (hasWarning && !hasFailure ? ' – warnings present' : '');

  return { overall, checks, summary };
}
