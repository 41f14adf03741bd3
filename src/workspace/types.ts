import type { z } from 'zod';
import type {
  ReelConfigSchema,
  CreatorSchema,
  ProcessedVideoSchema,
  ClipBundleSchema,
  ClipMetadataSchema,
  BundleSummarySchema,
  ManifestSchema,
  ApprovalStatusSchema,
  PaymentRecordSchema,
  PaymentsFileSchema,
  CampaignSchema,
  CampaignSourceTypeSchema,
} from '../shared/schemas.js';

export type ReelConfig = z.infer<typeof ReelConfigSchema>;
export type Creator = z.infer<typeof CreatorSchema>;
export type ProcessedVideoRecord = z.infer<typeof ProcessedVideoSchema>;
export type ApprovalStatus = z.infer<typeof ApprovalStatusSchema>;
export type ClipMetadata = z.infer<typeof ClipMetadataSchema>;
export type ClipBundle = z.infer<typeof ClipBundleSchema>;
export type BundleSummary = z.infer<typeof BundleSummarySchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
export type PaymentRecord = z.infer<typeof PaymentRecordSchema>;
export type PaymentsFile = z.infer<typeof PaymentsFileSchema>;
export type Campaign = z.infer<typeof CampaignSchema>;
export type CampaignInput = z.input<typeof CampaignSchema>;
export type CampaignSourceType = z.infer<typeof CampaignSourceTypeSchema>;

export interface CaptionCandidate {
  caption: string;
  hashtags: string[];
}

export interface ReelPaths {
  root: string;         // .reelrunner/
  config: string;       // .reelrunner/config.yaml
  envFile: string;      // .reelrunner/env.json
  creators: string;     // .reelrunner/creators.json
  ledger: string;       // .reelrunner/processed.json
  payments: string;     // .reelrunner/payments.json
  workDir: string;      // .reelrunner/work/ (downloads, removed after each video)
  outputDir: string;    // .reelrunner/output/
  campaignsDir: string; // .reelrunner/campaigns/<id>/guidelines.json
}

export interface DayPaths {
  root: string;         // output/<date>/
  clipsDir: string;     // output/<date>/clips/
  metadataDir: string;  // output/<date>/metadata/
  manifest: string;     // output/<date>/manifest.json
}
