export * from './shared/errors.js';
export { logger, setLogLevel, type LogLevel } from './shared/logger.js';
export type * from './connector/types.js';
export type {
  ReelConfig,
  Creator,
  ProcessedVideoRecord,
  ApprovalStatus,
  ClipMetadata,
  ClipBundle,
  BundleSummary,
  Manifest,
  PaymentRecord,
  CaptionCandidate,
  ReelPaths,
} from './workspace/types.js';
export { getReelPaths, formatDay } from './workspace/paths.js';
export { defaultConfig, loadReelConfig, readSecrets, type Secrets } from './workspace/config.js';
export { initWorkspace } from './workspace/init.js';
export { CreatorRegistry } from './store/creators.js';
export { ProcessedVideoLedger } from './store/ledger.js';
export { ManifestWriter } from './store/manifest.js';
export { BundleStore } from './store/bundles.js';
export { PaymentTracker, type PricingType } from './store/payments.js';
export { ApprovalTracker, type ApprovalDecision } from './governance/approvals.js';
export { selectSegments, rankSegments, SegmentSelector } from './pipeline/segments.js';
export { ClipBundler, type BundleRunResult } from './pipeline/bundler.js';
export { VideoProcessor, type VideoPipeline } from './pipeline/processor.js';
export { CreatorMonitor, type CycleReport } from './runtime/monitor.js';
export { ApprovedPoster, type PostRunReport } from './runtime/poster.js';
export { systemClock, type Clock } from './runtime/clock.js';
export { buildServices, type Services, type CollaboratorOverrides } from './runtime/services.js';
export { createServer, startServer } from './api/server.js';
