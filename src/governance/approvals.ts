import { GatewayError, InvalidTransitionError, NotFoundError } from '../shared/errors.js';
import { errorMessage, logger } from '../shared/logger.js';
import { formatCaptionText } from '../connector/llm/captions.js';
import type { MessagingGateway } from '../connector/types.js';
import type { BundleFilter, BundleStore } from '../store/bundles.js';
import type { ClipBundle } from '../workspace/types.js';

export type ApprovalDecision = 'approved' | 'rejected';

export const APPROVAL_DECISIONS: readonly ApprovalDecision[] = ['approved', 'rejected'];

export function isApprovalDecision(value: unknown): value is ApprovalDecision {
  return value === 'approved' || value === 'rejected';
}

/**
 * Approval state for clip bundles:
 *   pending --approve--> approved
 *   pending --reject---> rejected
 * not_required is terminal from creation. State lives in the bundle's
 * metadata record so it survives restarts.
 */
export class ApprovalTracker {
  constructor(
    private readonly bundles: BundleStore,
    private readonly gateway: MessagingGateway | null,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Send a pending bundle to the reviewer. On gateway failure the error is
   * recorded on the bundle, which stays pending, and the GatewayError is
   * rethrown so the caller can report it.
   */
  async submit(clipId: string): Promise<ClipBundle> {
    const bundle = this.bundles.get(clipId);
    if (bundle.approval_status !== 'pending') {
      throw new InvalidTransitionError(clipId, bundle.approval_status, 'submitted');
    }

    let response: unknown;
    try {
      if (!this.gateway) {
        throw new GatewayError('Approval gateway is not configured');
      }
      response = await this.gateway.sendApprovalRequest({
        clipId,
        videoPath: bundle.video_path,
        caption: formatCaptionText(bundle.captions[0]),
        metadata: bundle.metadata,
      });
    } catch (err) {
      const failure = err instanceof GatewayError ? err : new GatewayError(errorMessage(err), null, { cause: err });
      this.bundles.save({ ...bundle, approval_error: failure.message });
      logger.error('Approval request failed', { clip_id: clipId, error: failure.message });
      throw failure;
    }

    const updated: ClipBundle = { ...bundle, approval_response: response, approval_error: null };
    this.bundles.save(updated);
    logger.info('Approval requested', { clip_id: clipId });
    return updated;
  }

  recordResponse(clipId: string, decision: ApprovalDecision, response?: unknown): ClipBundle {
    const bundle = this.bundles.find(clipId);
    if (!bundle) throw new NotFoundError('clip', clipId);
    if (bundle.approval_status !== 'pending') {
      throw new InvalidTransitionError(clipId, bundle.approval_status, decision);
    }

    const updated: ClipBundle = {
      ...bundle,
      approval_status: decision,
      approval_response: response === undefined ? bundle.approval_response : response,
      decided_at: this.now().toISOString(),
    };
    this.bundles.save(updated);
    logger.info('Approval recorded', { clip_id: clipId, decision });
    return updated;
  }

  get(clipId: string): ClipBundle {
    return this.bundles.get(clipId);
  }

  list(filter: BundleFilter = {}): ClipBundle[] {
    return this.bundles.list(filter);
  }
}
