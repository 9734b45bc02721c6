export { normalizeBatch, normalizeTrack } from "./adapters/track.adapter";
export { loadConfig, type AppConfig, type MalformedRecordPolicy } from "./config/config";
export { createLogger, logger, type Logger, type LogLevel } from "./config/logger";
export * from "./domain/errors";
export type * from "./domain/ports";
export type * from "./domain/types";
export { computeFingerprint, FINGERPRINT_FIELDS } from "./domain/fingerprint";
export { latestPerTrack } from "./ingest/dedup";
export { batchIdFor, parseBatch, serializeBatch, toStagedRecords } from "./ingest/staging";
export { LocalStagingStore } from "./integrations/staging/local-staging.repo";
export { S3StagingStore } from "./integrations/staging/s3-staging.repo";
export { SqliteHistoryTable } from "./integrations/warehouse/history.repo";
export { cleanupStagingBatch } from "./services/batch-cleanup.service";
export { auditHistory, healTrack } from "./services/history-audit.service";
export { reconcileHistory, reconcileTrack, type ReconcileSummary } from "./services/history-reconciler.service";
export { buildDependencies } from "./workflows/track-dim-sync/dependencies";
export {
  runTrackDimSync,
  runTrackDimSync as default,
  type TrackDimSyncDependencies,
  type TrackDimSyncOptions,
  type TrackDimSyncResult,
} from "./workflows/track-dim-sync/orchestrator";
