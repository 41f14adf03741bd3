import { PaymentsFileSchema } from '../shared/schemas.js';
import { NotFoundError } from '../shared/errors.js';
import { readJsonFile, writeJsonAtomic } from '../workspace/json-file.js';
import type { PaymentRecord, PaymentsFile, ReelConfig } from '../workspace/types.js';

export type PricingType = 'per_clip' | 'per_video' | 'monthly';

export const PRICING_TYPES: readonly PricingType[] = ['per_clip', 'per_video', 'monthly'];

export interface PaymentSummary {
  total_earned: number;
  total_clips: number;
  pending_payments: number;
  payment_links: PaymentRecord[];
}

export function isPricingType(value: string): value is PricingType {
  return (PRICING_TYPES as readonly string[]).includes(value);
}

/**
 * Payment links handed to creators for clipping work, kept in payments.json.
 */
export class PaymentTracker {
  private data: PaymentsFile;

  constructor(
    private readonly filePath: string,
    private readonly config: ReelConfig['payments'],
    private readonly now: () => Date = () => new Date(),
  ) {
    this.data = readJsonFile(filePath, PaymentsFileSchema, { creators: {} });
  }

  amountFor(pricing: PricingType, clipCount: number): number {
    const rates = this.config.pricing;
    switch (pricing) {
      case 'per_clip':
        return rates.per_clip * clipCount;
      case 'per_video':
        return rates.per_video;
      case 'monthly':
        return rates.monthly;
    }
  }

  /**
   * Create a pending payment record. The link starts from the creator's own
   * payment link when one is registered, else the configured checkout base.
   */
  createPaymentLink(
    creatorName: string,
    videoTitle: string,
    clipCount: number,
    pricing: PricingType = 'per_video',
    baseLink?: string | null,
  ): PaymentRecord {
    const amount = this.amountFor(pricing, clipCount);
    const url = new URL(baseLink || this.config.checkout_base);
    url.searchParams.set('creator', creatorName);
    url.searchParams.set('amount', amount.toFixed(2));
    url.searchParams.set('clips', String(clipCount));
    url.searchParams.set('video', videoTitle);

    const record: PaymentRecord = {
      link: url.toString(),
      amount,
      video_title: videoTitle,
      num_clips: clipCount,
      created_at: this.now().toISOString(),
      status: 'pending',
      completed_at: null,
    };

    const entry = this.data.creators[creatorName] ?? {
      payment_links: [],
      total_earned: 0,
      total_clips: 0,
    };
    this.persist({
      creators: {
        ...this.data.creators,
        [creatorName]: {
          payment_links: [...entry.payment_links, record],
          total_earned: entry.total_earned,
          total_clips: entry.total_clips + clipCount,
        },
      },
    });
    return record;
  }

  summary(creatorName: string): PaymentSummary {
    const entry = this.data.creators[creatorName];
    if (!entry) {
      return { total_earned: 0, total_clips: 0, pending_payments: 0, payment_links: [] };
    }
    return {
      total_earned: entry.total_earned,
      total_clips: entry.total_clips,
      pending_payments: entry.payment_links.filter((p) => p.status === 'pending').length,
      payment_links: entry.payment_links.map((p) => ({ ...p })),
    };
  }

  markCompleted(creatorName: string, link: string): PaymentRecord {
    const entry = this.data.creators[creatorName];
    const target = entry?.payment_links.find((p) => p.link === link && p.status === 'pending');
    if (!entry || !target) {
      throw new NotFoundError('payment', link);
    }
    const completed: PaymentRecord = {
      ...target,
      status: 'completed',
      completed_at: this.now().toISOString(),
    };
    this.persist({
      creators: {
        ...this.data.creators,
        [creatorName]: {
          payment_links: entry.payment_links.map((p) => (p === target ? completed : p)),
          total_earned: entry.total_earned + target.amount,
          total_clips: entry.total_clips,
        },
      },
    });
    return completed;
  }

  private persist(next: PaymentsFile): void {
    writeJsonAtomic(this.filePath, next);
    this.data = next;
  }
}
