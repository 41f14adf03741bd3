import { errorMessage, logger } from '../shared/logger.js';
import { formatCaptionText } from '../connector/llm/captions.js';
import type { Publisher } from '../connector/types.js';
import type { BundleStore } from '../store/bundles.js';
import type { CreatorRegistry } from '../store/creators.js';
import type { ManifestWriter } from '../store/manifest.js';
import type { ClipBundle, ReelConfig } from '../workspace/types.js';
import type { Clock } from './clock.js';

const DEFAULT_CAPTION = 'Check this out! 🔥';

export interface PostOutcome {
  clip_id: string;
  status: 'posted' | 'failed';
  post_id?: string;
  error?: string;
}

export interface PostRunReport {
  eligible: number;
  outcomes: PostOutcome[];
  cancelled: boolean;
}

export interface PostOptions {
  maxPosts?: number;
  /** Wait a random delay between posts. Defaults to true. */
  delay?: boolean;
  signal?: AbortSignal;
}

export interface ApprovedPosterDeps {
  bundles: BundleStore;
  manifests: ManifestWriter;
  publisher: Publisher;
  registry: CreatorRegistry;
  clock: Clock;
  posting: Pick<ReelConfig['posting'], 'max_posts_per_run' | 'min_delay_minutes' | 'max_delay_minutes'>;
  random?: () => number;
}

/** Publishes approved, not yet posted bundles, oldest manifest first. */
export class ApprovedPoster {
  private readonly random: () => number;

  constructor(private readonly deps: ApprovedPosterDeps) {
    this.random = deps.random ?? Math.random;
  }

  eligible(): ClipBundle[] {
    const seen = new Set<string>();
    const out: ClipBundle[] = [];
    for (const date of this.deps.manifests.dates()) {
      for (const summary of this.deps.manifests.read(date).clips) {
        if (seen.has(summary.clip_id)) continue;
        seen.add(summary.clip_id);
        const bundle = this.deps.bundles.find(summary.clip_id);
        if (bundle && bundle.approval_status === 'approved' && !bundle.posted_at) {
          out.push(bundle);
        }
      }
    }
    return out;
  }

  delayMs(): number {
    const { min_delay_minutes: min, max_delay_minutes: max } = this.deps.posting;
    const lo = Math.min(min, max);
    const hi = Math.max(min, max);
    return Math.round((lo + this.random() * (hi - lo)) * 60_000);
  }

  async postApproved(opts: PostOptions = {}): Promise<PostRunReport> {
    const eligible = this.eligible();
    const limit = opts.maxPosts ?? this.deps.posting.max_posts_per_run;
    const batch = eligible.slice(0, limit);
    const report: PostRunReport = { eligible: eligible.length, outcomes: [], cancelled: false };
    logger.info('Posting approved clips', { eligible: eligible.length, batch: batch.length });

    for (const [i, bundle] of batch.entries()) {
      if (opts.signal?.aborted) {
        report.cancelled = true;
        break;
      }
      if (i > 0 && opts.delay !== false) {
        const ms = this.delayMs();
        logger.info('Waiting before next post', { minutes: Math.round(ms / 60_000) });
        await this.deps.clock.sleep(ms, opts.signal);
        if (opts.signal?.aborted) {
          report.cancelled = true;
          break;
        }
      }
      report.outcomes.push(await this.postOne(bundle));
    }
    return report;
  }

  private async postOne(bundle: ClipBundle): Promise<PostOutcome> {
    const creatorName = bundle.metadata.creator_name;
    const destination = creatorName ? (this.deps.registry.find(creatorName)?.destination_handle ?? '') : '';
    if (!destination) {
      logger.warn('No destination handle for clip; publishing to the default account', {
        clip_id: bundle.clip_id,
        creator: creatorName,
      });
    }
    const caption = formatCaptionText(bundle.captions[0]) || DEFAULT_CAPTION;

    let postId: string;
    try {
      postId = await this.deps.publisher.publish({ videoPath: bundle.video_path, caption, destination });
    } catch (err) {
      const error = errorMessage(err);
      logger.error('Post failed', { clip_id: bundle.clip_id, error });
      return { clip_id: bundle.clip_id, status: 'failed', error };
    }

    this.deps.bundles.save({ ...bundle, posted_at: this.deps.clock.now().toISOString(), post_id: postId });
    logger.info('Clip posted', { clip_id: bundle.clip_id, post_id: postId });
    return { clip_id: bundle.clip_id, status: 'posted', post_id: postId };
  }
}
