import { logger as defaultLogger, type Logger } from "../config/logger";
import type { StagingStore } from "../domain/ports";
import type { ReconcileSummary } from "./history-reconciler.service";

export interface CleanupResult {
  cleared: boolean;
}

/**
 * Remove a consumed staging batch. Refuses when reconciliation reported any failure,
 * so a retry can rebuild the same dedup output from the same staging contents.
 */
export async function cleanupStagingBatch(
  staging: StagingStore,
  location: string,
  summary: Pick<ReconcileSummary, "failures">,
  logger: Logger = defaultLogger
): Promise<CleanupResult> {
  if (summary.failures.length > 0) {
    logger.warn("cleanup:skipped", { location, failures: summary.failures.length });
    return { cleared: false };
  }

  await staging.clearBatch(location);
  logger.info("cleanup:cleared", { location });
  return { cleared: true };
}

export default cleanupStagingBatch;
