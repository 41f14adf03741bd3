import type { Command } from 'commander';
import { requireWorkspace, parsePositiveInt } from '../cli-shared.js';
import { ConfigError } from '../../shared/errors.js';
import { parseSourceEntry } from '../../store/campaigns.js';
import type { CollaboratorOverrides } from '../../runtime/services.js';
import type { Campaign, CampaignSourceType } from '../../workspace/types.js';

interface AddFlags {
  cwd: string;
  name: string;
  whopUrl?: string;
  source: string[];
  rule: string[];
  focus: string[];
  tags?: string;
  youtubeTags?: string;
  style?: string;
  tone?: string;
  keepLiveDays?: string;
  minEngagement?: string;
  force?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function splitTags(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}

function parseRate(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`--min-engagement must be a non-negative number (got "${value}")`);
  }
  return n;
}

function printCampaign(c: Campaign): void {
  console.log(`\nCampaign: ${c.campaign_name}`);
  console.log(`ID: ${c.campaign_id}`);
  if (c.whop_campaign_url) console.log(`Whop: ${c.whop_campaign_url}`);
  if (c.clipping_rules.critical.length > 0) {
    console.log('\nClipping rules:');
    for (const rule of c.clipping_rules.critical) console.log(`  ⚠ ${rule}`);
  }
  if (c.clipping_rules.focus_on.length > 0) {
    console.log('\nFocus on:');
    for (const point of c.clipping_rules.focus_on) console.log(`  - ${point}`);
  }
  console.log('\nApproved sources:');
  for (const [type, urls] of Object.entries(c.approved_sources)) {
    for (const url of urls ?? []) console.log(`  [${type}] ${url}`);
  }
  for (const [platform, tagging] of Object.entries(c.tagging_requirements)) {
    if (tagging.tags.length > 0) console.log(`\n${platform} tags: ${tagging.tags.join(' ')}`);
  }
  console.log(`\nCaption style: ${c.caption_guidelines.style} (tone: ${c.caption_guidelines.tone})`);
}

export function registerCampaignsCommand(program: Command, overrides: CollaboratorOverrides = {}): void {
  const campaigns = program.command('campaigns').description('Manage campaigns and their approved sources');

  campaigns
    .command('list')
    .description('List campaigns')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((opts: { cwd: string }) => {
      const { campaigns: registry } = requireWorkspace(opts.cwd);
      const all = registry.list();
      if (all.length === 0) {
        console.log('No campaigns found.');
        return;
      }
      console.log('\nCampaigns:');
      for (const c of all) console.log(`  ${c.campaign_id}: ${c.campaign_name}`);
    });

  campaigns
    .command('show <id>')
    .description("Show a campaign's rules, sources and tags")
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((id: string, opts: { cwd: string }) => {
      const { campaigns: registry } = requireWorkspace(opts.cwd);
      printCampaign(registry.get(id));
    });

  campaigns
    .command('add <id>')
    .description('Create a campaign from its guidelines')
    .requiredOption('--name <name>', 'Campaign name')
    .option('--whop-url <url>', 'Whop campaign URL')
    .option('--source <source>', 'Approved source, type:url or a URL (repeatable)', collect, [])
    .option('--rule <text>', 'Critical clipping rule (repeatable)', collect, [])
    .option('--focus <text>', 'What clips should focus on (repeatable)', collect, [])
    .option('--tags <list>', 'Comma-separated Instagram tags added to every caption')
    .option('--youtube-tags <list>', 'Comma-separated YouTube tags')
    .option('--style <text>', 'Caption style')
    .option('--tone <text>', 'Caption tone')
    .option('--keep-live-days <n>', 'Days posts must stay live')
    .option('--min-engagement <rate>', 'Minimum engagement rate, e.g. 0.01')
    .option('--force', 'Overwrite an existing campaign')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((id: string, opts: AddFlags) => {
      const sources: Partial<Record<CampaignSourceType, string[]>> = {};
      for (const entry of opts.source) {
        const { type, url } = parseSourceEntry(entry);
        sources[type] = [...(sources[type] ?? []), url];
      }
      const instagramTags = splitTags(opts.tags);
      const youtubeTags = splitTags(opts.youtubeTags);

      const { campaigns: registry } = requireWorkspace(opts.cwd);
      const campaign = registry.create(
        {
          campaign_id: id.trim().toLowerCase(),
          campaign_name: opts.name,
          whop_campaign_url: opts.whopUrl,
          clipping_rules: { critical: opts.rule, focus_on: opts.focus },
          approved_sources: sources,
          tagging_requirements: {
            instagram: { required: instagramTags.length > 0, tags: instagramTags },
            youtube: { required: youtubeTags.length > 0, tags: youtubeTags },
          },
          caption_guidelines: { style: opts.style, tone: opts.tone },
          requirements: {
            keep_live_days: opts.keepLiveDays ? parsePositiveInt(opts.keepLiveDays, '--keep-live-days') : undefined,
            min_engagement_rate: opts.minEngagement ? parseRate(opts.minEngagement) : undefined,
          },
        },
        { force: opts.force },
      );
      console.log(`Campaign created: ${campaign.campaign_id}`);
      console.log(`  Guidelines: ${registry.guidelinesPath(campaign.campaign_id)}`);
    });

  campaigns
    .command('validate <url> <id>')
    .description("Check a URL against a campaign's approved sources")
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((url: string, id: string, opts: { cwd: string }) => {
      const { campaigns: registry } = requireWorkspace(opts.cwd);
      if (registry.validateSourceUrl(url, id)) {
        console.log(`✓ URL is approved for campaign '${id}'`);
      } else {
        console.log(`✗ URL is NOT approved for campaign '${id}'`);
      }
    });

  campaigns
    .command('check <id>')
    .description('List approved sources not yet clipped')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action((id: string, opts: { cwd: string }) => {
      const { campaignProcessor } = requireWorkspace(opts.cwd, overrides);
      const pending = campaignProcessor.pendingSources(id);
      if (pending.length === 0) {
        console.log(`No new content found for '${id}'`);
        return;
      }
      console.log(`Found ${pending.length} new source(s) for '${id}':`);
      for (const source of pending) console.log(`  - ${source.url}`);
    });

  campaigns
    .command('process <id>')
    .description('Clip approved sources not yet clipped for a campaign')
    .option('--max <n>', 'Most sources to clip this run', '5')
    .option('--clips <n>', 'Clips per source')
    .option('--cwd <dir>', 'Workspace directory', process.cwd())
    .action(async (id: string, opts: { cwd: string; max: string; clips?: string }) => {
      const { campaignProcessor } = requireWorkspace(opts.cwd, overrides);
      const outcomes = await campaignProcessor.processPending(
        id,
        parsePositiveInt(opts.max, '--max'),
        opts.clips ? parsePositiveInt(opts.clips, '--clips') : undefined,
      );
      let clips = 0;
      for (const o of outcomes) {
        if (o.status === 'processed') {
          clips += o.clip_count;
          console.log(`  ✓ ${o.video_id}: ${o.clip_count} clip(s)`);
        } else {
          console.log(`  ✗ ${o.video_id}: ${o.error ?? 'failed'}`);
        }
      }
      console.log(`Processed ${clips} clip(s) for '${id}'`);
    });
}
