import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import type { ReelConfig } from './types.js';
import { ReelConfigSchema } from '../shared/schemas.js';
import { ConfigError } from '../shared/errors.js';
import { errorMessage } from '../shared/logger.js';

type Env = Record<string, string | undefined>;

export function defaultConfig(): ReelConfig {
  return ReelConfigSchema.parse({});
}

export function parseReelConfig(raw: unknown): ReelConfig {
  const result = ReelConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigError(`Invalid config at ${where}: ${issue?.message ?? 'schema mismatch'}`);
  }
  return result.data;
}

export function readReelConfig(configPath: string): ReelConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError('Workspace not initialized. Run `reelrunner init` first.');
  }
  let parsed: unknown;
  try {
    parsed = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseReelConfig(parsed);
}

export function writeReelConfig(configPath: string, config: ReelConfig): void {
  writeFileSync(configPath, dump(config), 'utf8');
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function envString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Apply recognized environment overrides on top of the file config.
 * Returns a new object; the input is not modified.
 */
export function applyEnvOverrides(config: ReelConfig, env: Env = process.env): ReelConfig {
  const approvalEnabled = envBool(env['REELRUNNER_APPROVAL_ENABLED']);
  const clippingEnabled = envBool(env['CLIPPING_API_ENABLED']);
  const igUserId = envString(env['INSTAGRAM_USER_ID']);

  return {
    ...config,
    selection: {
      ...config.selection,
      clipping_api: {
        ...config.selection.clipping_api,
        enabled: clippingEnabled ?? config.selection.clipping_api.enabled,
        url: envString(env['CLIPPING_API_URL']) ?? config.selection.clipping_api.url,
      },
    },
    captions: {
      ...config.captions,
      api_base: envString(env['LLM_API_BASE']) ?? config.captions.api_base,
      model: envString(env['LLM_MODEL']) ?? config.captions.model,
    },
    approval: {
      ...config.approval,
      enabled: approvalEnabled ?? config.approval.enabled,
      gateway_url: envString(env['REELRUNNER_GATEWAY_URL']) ?? config.approval.gateway_url,
      recipient: envString(env['REELRUNNER_APPROVAL_RECIPIENT']) ?? config.approval.recipient,
    },
    posting: {
      ...config.posting,
      default_account: igUserId ?? config.posting.default_account,
    },
    tools: {
      ffmpeg_bin: envString(env['FFMPEG_BIN']) ?? config.tools.ffmpeg_bin,
      ffprobe_bin: envString(env['FFPROBE_BIN']) ?? config.tools.ffprobe_bin,
      ytdlp_bin: envString(env['YTDLP_BIN']) ?? config.tools.ytdlp_bin,
    },
  };
}

export function loadReelConfig(configPath: string, env: Env = process.env): ReelConfig {
  return applyEnvOverrides(readReelConfig(configPath), env);
}

export interface Secrets {
  llmApiKey: string | null;
  clippingApiKey: string | null;
  gatewayToken: string | null;
  instagramAccessToken: string | null;
  apiToken: string | null;
}

export function readSecrets(env: Env = process.env): Secrets {
  return {
    llmApiKey: envString(env['LLM_API_KEY']) ?? envString(env['OPENAI_API_KEY']) ?? null,
    clippingApiKey: envString(env['CLIPPING_API_KEY']) ?? null,
    gatewayToken: envString(env['GATEWAY_TOKEN']) ?? null,
    instagramAccessToken: envString(env['INSTAGRAM_ACCESS_TOKEN']) ?? null,
    apiToken: envString(env['REELRUNNER_API_TOKEN']) ?? null,
  };
}
