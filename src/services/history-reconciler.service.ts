import { logger as defaultLogger, type Logger } from "../config/logger";
import { ReconciliationIntegrityViolation, errorMessage } from "../domain/errors";
import { pickAttributes } from "../domain/fingerprint";
import type { HistoryTable } from "../domain/ports";
import type { FingerprintedSnapshot, HistoryRow, TrackTransition } from "../domain/types";
import { healTrack, type HealAction } from "./history-audit.service";

function toCurrentRow({ snapshot, fingerprint }: FingerprintedSnapshot, version: number): HistoryRow {
  return {
    trackId: snapshot.trackId,
    ...pickAttributes(snapshot),
    rowHash: fingerprint,
    effectiveStart: snapshot.arrivedAt,
    effectiveEnd: null,
    isCurrent: true,
    version,
  };
}

/**
 * Apply one deduplicated snapshot to the history table.
 *
 * Runs in a single transaction: a changed track has its current row expired and the
 * next version inserted, both stamped with the snapshot's arrival time, or neither.
 */
export async function reconcileTrack(table: HistoryTable, item: FingerprintedSnapshot): Promise<TrackTransition> {
  const { snapshot, fingerprint } = item;
  const trackId = snapshot.trackId;

  return table.transaction(async (tx) => {
    const current = await tx.selectCurrent(trackId);

    if (!current) {
      const latest = await tx.latestVersion(trackId);
      if (latest !== null) {
        throw new ReconciliationIntegrityViolation(`track ${trackId} has history up to v${latest} but no current row`, {
          trackId,
          latestVersion: latest,
        });
      }
      await tx.insertVersion(toCurrentRow(item, 1));
      return "inserted";
    }

    if (current.effectiveEnd !== null) {
      throw new ReconciliationIntegrityViolation(`track ${trackId} v${current.version} is current but already expired`, {
        trackId,
        version: current.version,
      });
    }
    const latest = await tx.latestVersion(trackId);
    if (latest !== current.version) {
      throw new ReconciliationIntegrityViolation(`track ${trackId} is current at v${current.version} but history reaches v${latest}`, {
        trackId,
        currentVersion: current.version,
        latestVersion: latest,
      });
    }

    if (current.rowHash === fingerprint) return "unchanged";

    // An older observation must not open an empty or inverted interval
    if (Date.parse(snapshot.arrivedAt) <= Date.parse(current.effectiveStart)) return "stale";

    await tx.expire(trackId, current.version, snapshot.arrivedAt);
    await tx.insertVersion(toCurrentRow(item, current.version + 1));
    return "versioned";
  });
}

export interface TrackFailure {
  trackId: string;
  error: unknown;
}

export interface ReconcileSummary {
  inserted: number;
  versioned: number;
  unchanged: number;
  stale: number;
  failures: TrackFailure[];
  healed: HealAction[];
  // Tracks never attempted because an earlier failure stopped the batch
  skipped: number;
}

export interface ReconcileOptions {
  batchId?: string;
  logger?: Logger;
}

export function emptySummary(): ReconcileSummary {
  return { inserted: 0, versioned: 0, unchanged: 0, stale: 0, failures: [], healed: [], skipped: 0 };
}

/**
 * Reconcile a batch sequentially. An integrity violation heals the offending track and
 * moves on; any other failure, a failed heal included, stops the batch so the rest can
 * be replayed as-is.
 */
export async function reconcileHistory(
  table: HistoryTable,
  items: FingerprintedSnapshot[],
  options: ReconcileOptions = {}
): Promise<ReconcileSummary> {
  const { batchId, logger = defaultLogger } = options;
  const summary = emptySummary();

  for (let i = 0; i < items.length; i++) {
    const trackId = items[i].snapshot.trackId;
    try {
      const transition = await reconcileTrack(table, items[i]);
      summary[transition]++;
      logger.debug("reconcile:track", { batchId, trackId, transition });
    } catch (err) {
      summary.failures.push({ trackId, error: err });

      if (err instanceof ReconciliationIntegrityViolation) {
        logger.error("reconcile:integrity", { batchId, trackId, message: err.message });
        try {
          const action = await healTrack(table, trackId, { logger });
          if (action) summary.healed.push(action);
          continue;
        } catch (healErr) {
          summary.failures.push({ trackId, error: healErr });
          logger.error("reconcile:heal:failed", { batchId, trackId, message: errorMessage(healErr) });
        }
      } else {
        logger.error("reconcile:failed", { batchId, trackId, message: errorMessage(err) });
      }

      summary.skipped = items.length - i - 1;
      break;
    }
  }

  logger.info("reconcile:done", {
    batchId,
    inserted: summary.inserted,
    versioned: summary.versioned,
    unchanged: summary.unchanged,
    stale: summary.stale,
    failed: summary.failures.length,
    healed: summary.healed.length,
    skipped: summary.skipped,
  });
  return summary;
}
