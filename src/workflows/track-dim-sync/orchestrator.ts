import { randomUUID } from "node:crypto";

import { normalizeBatch } from "../../adapters/track.adapter";
import type { AppConfig } from "../../config/config";
import { logger as defaultLogger, type Logger } from "../../config/logger";
import {
  HistoryAuditFailure,
  PartialBatchFailure,
  PipelineError,
  SourceUnavailableError,
  StagingCleanupFailure,
  StagingReadFailure,
  StagingWriteFailure,
  errorMessage,
  type PipelineErrorContext,
} from "../../domain/errors";
import type { HistoryTable, RunLock, SourceDataProvider, StagingStore } from "../../domain/ports";
import type { StagedRecord } from "../../domain/types";
import { latestPerTrack } from "../../ingest/dedup";
import { batchIdFor, toStagedRecords } from "../../ingest/staging";
import { cleanupStagingBatch } from "../../services/batch-cleanup.service";
import { auditHistory } from "../../services/history-audit.service";
import { reconcileHistory } from "../../services/history-reconciler.service";

export const RUN_LOCK_KEY = "track-dim-sync";

export interface TrackDimSyncDependencies {
  source: SourceDataProvider;
  staging: StagingStore;
  history: HistoryTable;
  lock?: RunLock;
}

export interface TrackDimSyncOptions {
  config: AppConfig;
  dependencies: TrackDimSyncDependencies;
  logger?: Logger;
  // Stop after dedup: nothing is staged, reconciled or cleared
  dryRun?: boolean;
  // Reprocess a batch left in staging by a failed run instead of fetching
  replayLocation?: string;
  now?: () => Date;
}

export type TrackDimSyncStatus = "succeeded" | "no_data" | "skipped" | "dry_run";

export interface TrackDimSyncResult {
  status: TrackDimSyncStatus;
  batchId: string | null;
  location: string | null;
  fetched: number;
  rejected: number;
  deduplicated: number;
  inserted: number;
  versioned: number;
  unchanged: number;
  stale: number;
  healed: number;
  processed: number;
}

function emptyResult(status: TrackDimSyncStatus, batchId: string | null, location: string | null): TrackDimSyncResult {
  return {
    status,
    batchId,
    location,
    fetched: 0,
    rejected: 0,
    deduplicated: 0,
    inserted: 0,
    versioned: 0,
    unchanged: 0,
    stale: 0,
    healed: 0,
    processed: 0,
  };
}

// Run a stage; failures that are not already typed get the stage's error type, and
// typed ones gain whatever batch context they lack
async function stage<T>(
  fn: () => Promise<T>,
  wrap: (message: string, context: PipelineErrorContext, cause: unknown) => PipelineError,
  what: string,
  context: PipelineErrorContext
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof PipelineError) {
      for (const [key, value] of Object.entries(context)) {
        if (err.context[key] === undefined && value !== undefined) err.context[key] = value;
      }
      throw err;
    }
    throw wrap(`${what}: ${errorMessage(err)}`, context, err);
  }
}

function batchIdFromLocation(location: string): string {
  const base = location.split(/[\\/]/).pop() ?? location;
  return base.replace(/\.jsonl$/, "");
}

/**
 * fetch → stage → read back → normalize → dedup → reconcile → audit → cleanup.
 *
 * Any stage failure aborts the rest and surfaces as a PipelineError carrying the batch id.
 * Staging is only cleared after every track reconciled, so a failed batch can be replayed.
 * The audit only runs once the whole batch reconciled.
 */
export async function runTrackDimSync(options: TrackDimSyncOptions): Promise<TrackDimSyncResult> {
  const { config, dependencies, logger = defaultLogger, dryRun = false, replayLocation } = options;
  const now = options.now ?? (() => new Date());
  const { lock } = dependencies;

  const owner = randomUUID();
  if (lock && !dryRun) {
    const acquired = await lock.acquire(RUN_LOCK_KEY, owner);
    if (!acquired) {
      logger.warn("sync:skipped:locked", { key: RUN_LOCK_KEY });
      return emptyResult("skipped", null, null);
    }
  }

  try {
    return await runLocked({ ...options, logger, dryRun, now }, replayLocation);
  } finally {
    if (lock && !dryRun) {
      // A failed release leaves the lease to expire by TTL
      try {
        await lock.release(RUN_LOCK_KEY, owner);
      } catch (err) {
        logger.error("sync:lock:release:failed", { key: RUN_LOCK_KEY, message: errorMessage(err) });
      }
    }
  }
}

async function runLocked(
  options: TrackDimSyncOptions & { logger: Logger; dryRun: boolean; now: () => Date },
  replayLocation: string | undefined
): Promise<TrackDimSyncResult> {
  const { config, dependencies, logger, dryRun, now } = options;
  const { source, staging, history } = dependencies;

  let batchId: string;
  let location: string | null = null;
  let records: StagedRecord[] = [];
  let fetched = 0;

  if (replayLocation) {
    location = replayLocation;
    batchId = batchIdFromLocation(replayLocation);
    logger.info("sync:replay", { batchId, location });
  } else {
    batchId = batchIdFor(now());
    const filter = { albumLimit: config.spotify.albumLimit, market: config.spotify.market };
    const raw = await stage(() => source.fetchEntities(filter), (m, c, e) => new SourceUnavailableError(m, c, e), "extract", {
      batchId,
    });
    fetched = raw.length;
    logger.info("sync:extracted", { batchId, fetched });

    if (raw.length === 0) return emptyResult("no_data", batchId, null);
    records = toStagedRecords(raw);

    // Dry runs transform the fetched records in memory
    if (!dryRun) {
      const id = batchId;
      const toStage = records;
      location = await stage(() => staging.writeBatch(id, toStage), (m, c, e) => new StagingWriteFailure(m, c, e), "stage", {
        batchId,
      });
      logger.info("sync:staged", { batchId, location, records: toStage.length });
    }
  }

  // Transform what staging holds, not what was fetched
  if (location !== null) {
    const at = location;
    records = await stage(() => staging.readBatch(at), (m, c, e) => new StagingReadFailure(m, c, e), "read back", {
      batchId,
      location: at,
    });
  }

  const { snapshots, rejected } = normalizeBatch(records, {
    policy: config.pipeline.malformedRecordPolicy,
    batchId,
    logger,
  });
  const unique = latestPerTrack(snapshots);
  logger.info("sync:transformed", {
    batchId,
    records: records.length,
    rejected: rejected.length,
    deduplicated: unique.length,
  });

  const base = {
    ...emptyResult("succeeded", batchId, location),
    fetched: replayLocation ? records.length : fetched,
    rejected: rejected.length,
    deduplicated: unique.length,
  };

  if (dryRun) {
    logger.info("sync:dry-run", { batchId, deduplicated: unique.length });
    return { ...base, status: "dry_run" };
  }

  const summary = await reconcileHistory(history, unique, { batchId, logger });
  const batchContext = { batchId, location: location ?? undefined };

  if (summary.failures.length > 0) {
    const first = summary.failures[0];
    // A failed heal adds a second failure for the same track
    const failedTrackIds = Array.from(new Set(summary.failures.map((f) => f.trackId)));
    throw new PartialBatchFailure(
      `${failedTrackIds.length} track(s) failed to reconcile in ${batchId}; staging kept for replay`,
      {
        ...batchContext,
        trackId: first.trackId,
        failedTrackIds,
        skipped: summary.skipped,
        healed: summary.healed.length,
      },
      first.error
    );
  }

  const audit = await stage(
    () => auditHistory(history, { heal: true, logger }),
    (m, c, e) => new HistoryAuditFailure(m, c, e),
    "audit",
    batchContext
  );
  const healed = summary.healed.length + audit.healed.length;

  if (location !== null) {
    const at = location;
    await stage(
      () => cleanupStagingBatch(staging, at, summary, logger),
      (m, c, e) => new StagingCleanupFailure(m, c, e),
      "cleanup",
      batchContext
    );
  }

  const result: TrackDimSyncResult = {
    ...base,
    inserted: summary.inserted,
    versioned: summary.versioned,
    unchanged: summary.unchanged,
    stale: summary.stale,
    healed,
    processed: summary.inserted + summary.versioned + summary.unchanged + summary.stale,
  };
  logger.info("sync:done", { ...result });
  return result;
}

export default runTrackDimSync;
