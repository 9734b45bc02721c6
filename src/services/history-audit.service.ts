import { logger as defaultLogger, type Logger } from "../config/logger";
import { pickAttributes } from "../domain/fingerprint";
import type { HistoryTable } from "../domain/ports";
import type { HistoryRow, IntegrityIssue } from "../domain/types";

export interface HealAction {
  trackId: string;
  expiredVersions: number[];
  insertedVersion: number | null;
}

export interface HealOptions {
  logger?: Logger;
}

/**
 * Restore the single-current invariant for one track.
 *
 * Current rows below the latest version are closed at the start of the version that
 * follows them; rows flagged current after their interval closed lose the flag. If the
 * latest version is not left open and current, it is carried forward as a new version
 * starting where it ended. Expired rows are never reopened.
 */
export async function healTrack(table: HistoryTable, trackId: string, options: HealOptions = {}): Promise<HealAction | null> {
  const { logger = defaultLogger } = options;

  const action = await table.transaction(async (tx): Promise<HealAction | null> => {
    const versions = await tx.listVersions(trackId);
    const latest = versions[versions.length - 1];
    if (!latest) return null;

    const expiredVersions: number[] = [];
    for (let i = 0; i < versions.length; i++) {
      const row = versions[i];
      if (!row.isCurrent) continue;
      if (row.effectiveEnd !== null) {
        await tx.clearStaleCurrent(trackId, row.version);
      } else if (row !== latest) {
        await tx.expire(trackId, row.version, versions[i + 1].effectiveStart);
      } else {
        continue;
      }
      expiredVersions.push(row.version);
    }

    let insertedVersion: number | null = null;
    if (!latest.isCurrent || latest.effectiveEnd !== null) {
      const carried: HistoryRow = {
        trackId,
        ...pickAttributes(latest),
        rowHash: latest.rowHash,
        effectiveStart: latest.effectiveEnd ?? latest.effectiveStart,
        effectiveEnd: null,
        isCurrent: true,
        version: latest.version + 1,
      };
      await tx.insertVersion(carried);
      insertedVersion = carried.version;
    }

    if (expiredVersions.length === 0 && insertedVersion === null) return null;
    return { trackId, expiredVersions, insertedVersion };
  });

  if (action) logger.warn("audit:healed", { ...action });
  return action;
}

export interface AuditOptions {
  heal?: boolean;
  logger?: Logger;
}

export interface AuditReport {
  issues: IntegrityIssue[];
  healed: HealAction[];
}

/** Sweep the whole table for tracks without exactly one open current row at their latest version. */
export async function auditHistory(table: HistoryTable, options: AuditOptions = {}): Promise<AuditReport> {
  const { heal = false, logger = defaultLogger } = options;

  const issues = await table.findIntegrityIssues();
  if (issues.length === 0) {
    logger.debug("audit:clean");
    return { issues, healed: [] };
  }

  logger.error("audit:issues", { count: issues.length, trackIds: issues.map((i) => i.trackId) });
  if (!heal) return { issues, healed: [] };

  const healed: HealAction[] = [];
  for (const issue of issues) {
    const action = await healTrack(table, issue.trackId, { logger });
    if (action) healed.push(action);
  }
  return { issues, healed };
}
