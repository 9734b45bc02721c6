import type Database from "better-sqlite3";
import { z } from "zod";

import { logger as defaultLogger, type Logger } from "../../config/logger";
import { ReconciliationIntegrityViolation } from "../../domain/errors";
import type { HistoryTable, HistoryTransaction } from "../../domain/ports";
import type { HistoryRow, IntegrityIssue } from "../../domain/types";
import { openWarehouse } from "./sqlite.sdk";

const COLUMNS = `
  track_id, track_name, duration_ms, is_explicit, popularity, preview_url,
  album_id, album_name, album_release_date, album_type,
  primary_artist_id, primary_artist_name, all_artist_ids, all_artist_names,
  row_hash, effective_start_timestamp, effective_end_timestamp, is_current_flag, version_number
`;

const trackDimRecord = z.object({
  track_id: z.string(),
  track_name: z.string().nullable(),
  duration_ms: z.number().nullable(),
  is_explicit: z.number().nullable(),
  popularity: z.number(),
  preview_url: z.string().nullable(),
  album_id: z.string().nullable(),
  album_name: z.string().nullable(),
  album_release_date: z.string().nullable(),
  album_type: z.string().nullable(),
  primary_artist_id: z.string().nullable(),
  primary_artist_name: z.string().nullable(),
  all_artist_ids: z.string(),
  all_artist_names: z.string(),
  row_hash: z.string(),
  effective_start_timestamp: z.string(),
  effective_end_timestamp: z.string().nullable(),
  is_current_flag: z.number(),
  version_number: z.number(),
});

const stringList = z.array(z.string());

const latestVersionRecord = z.object({ latest: z.number().nullable() });

const issueRecord = z.object({
  track_id: z.string(),
  latest_version: z.number(),
  current_count: z.number(),
  closed_current: z.number(),
});

function toHistoryRow(raw: unknown): HistoryRow {
  const r = trackDimRecord.parse(raw);
  return {
    trackId: r.track_id,
    trackName: r.track_name,
    durationMs: r.duration_ms,
    isExplicit: r.is_explicit === null ? null : r.is_explicit === 1,
    popularity: r.popularity,
    previewUrl: r.preview_url,
    albumId: r.album_id,
    albumName: r.album_name,
    albumReleaseDate: r.album_release_date,
    albumType: r.album_type,
    primaryArtistId: r.primary_artist_id,
    primaryArtistName: r.primary_artist_name,
    allArtistIds: stringList.parse(JSON.parse(r.all_artist_ids)),
    allArtistNames: stringList.parse(JSON.parse(r.all_artist_names)),
    rowHash: r.row_hash,
    effectiveStart: r.effective_start_timestamp,
    effectiveEnd: r.effective_end_timestamp,
    isCurrent: r.is_current_flag === 1,
    version: r.version_number,
  };
}

export interface SqliteHistoryTableOptions {
  logger?: Logger;
  clock?: () => Date;
}

/**
 * `track_dim` in a SQLite warehouse. Writes inside `transaction` share one
 * BEGIN IMMEDIATE ... COMMIT, so an expire and the insert of the next version
 * commit or roll back together.
 */
export class SqliteHistoryTable implements HistoryTable {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly db: Database.Database, options: SqliteHistoryTableOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  static open(filename: string, options: SqliteHistoryTableOptions = {}): SqliteHistoryTable {
    return new SqliteHistoryTable(openWarehouse(filename), options);
  }

  close(): void {
    this.db.close();
  }

  async transaction<T>(fn: (tx: HistoryTransaction) => Promise<T>): Promise<T> {
    // Nested calls join the open transaction
    if (this.db.inTransaction) return fn(this);

    this.db.exec("BEGIN IMMEDIATE");
    try {
      const out = await fn(this);
      this.db.exec("COMMIT");
      return out;
    } catch (err) {
      this.rollback();
      throw err;
    }
  }

  private rollback(): void {
    if (!this.db.inTransaction) return;
    try {
      this.db.exec("ROLLBACK");
    } catch (rollbackErr) {
      this.logger.error("warehouse:rollback:failed", { err: rollbackErr });
    }
  }

  async selectCurrent(trackId: string): Promise<HistoryRow | null> {
    const rows = this.db
      .prepare(
        `SELECT ${COLUMNS}
         FROM track_dim
         WHERE track_id = ? AND is_current_flag = 1
         ORDER BY version_number`
      )
      .all(trackId)
      .map(toHistoryRow);

    if (rows.length > 1) {
      throw new ReconciliationIntegrityViolation(`track ${trackId} has ${rows.length} current rows`, {
        trackId,
        currentVersions: rows.map((r) => r.version),
      });
    }
    return rows[0] ?? null;
  }

  async latestVersion(trackId: string): Promise<number | null> {
    const raw = this.db.prepare(`SELECT MAX(version_number) AS latest FROM track_dim WHERE track_id = ?`).get(trackId);
    return latestVersionRecord.parse(raw).latest;
  }

  async listVersions(trackId: string): Promise<HistoryRow[]> {
    return this.db
      .prepare(
        `SELECT ${COLUMNS}
         FROM track_dim
         WHERE track_id = ?
         ORDER BY version_number`
      )
      .all(trackId)
      .map(toHistoryRow);
  }

  async expire(trackId: string, version: number, at: string): Promise<void> {
    const result = this.db
      .prepare(
        `UPDATE track_dim
         SET effective_end_timestamp = @at,
             is_current_flag = 0,
             updated_at = @updated_at
         WHERE track_id = @track_id
           AND version_number = @version
           AND is_current_flag = 1
           AND effective_end_timestamp IS NULL`
      )
      .run({ at, updated_at: this.clock().toISOString(), track_id: trackId, version });

    if (result.changes !== 1) {
      throw new ReconciliationIntegrityViolation(`track ${trackId} v${version} is not an open current row`, {
        trackId,
        version,
      });
    }
  }

  async clearStaleCurrent(trackId: string, version: number): Promise<void> {
    const result = this.db
      .prepare(
        `UPDATE track_dim
         SET is_current_flag = 0,
             updated_at = @updated_at
         WHERE track_id = @track_id
           AND version_number = @version
           AND is_current_flag = 1
           AND effective_end_timestamp IS NOT NULL`
      )
      .run({ updated_at: this.clock().toISOString(), track_id: trackId, version });

    if (result.changes !== 1) {
      throw new ReconciliationIntegrityViolation(`track ${trackId} v${version} is not a closed current row`, {
        trackId,
        version,
      });
    }
  }

  async insertVersion(row: HistoryRow): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO track_dim (${COLUMNS}, created_at)
         VALUES (
           @track_id, @track_name, @duration_ms, @is_explicit, @popularity, @preview_url,
           @album_id, @album_name, @album_release_date, @album_type,
           @primary_artist_id, @primary_artist_name, @all_artist_ids, @all_artist_names,
           @row_hash, @effective_start_timestamp, @effective_end_timestamp, @is_current_flag, @version_number,
           @created_at
         )`
      )
      .run({
        track_id: row.trackId,
        track_name: row.trackName,
        duration_ms: row.durationMs,
        is_explicit: row.isExplicit === null ? null : row.isExplicit ? 1 : 0,
        popularity: row.popularity,
        preview_url: row.previewUrl,
        album_id: row.albumId,
        album_name: row.albumName,
        album_release_date: row.albumReleaseDate,
        album_type: row.albumType,
        primary_artist_id: row.primaryArtistId,
        primary_artist_name: row.primaryArtistName,
        all_artist_ids: JSON.stringify(row.allArtistIds),
        all_artist_names: JSON.stringify(row.allArtistNames),
        row_hash: row.rowHash,
        effective_start_timestamp: row.effectiveStart,
        effective_end_timestamp: row.effectiveEnd,
        is_current_flag: row.isCurrent ? 1 : 0,
        version_number: row.version,
        created_at: this.clock().toISOString(),
      });
  }

  async findIntegrityIssues(): Promise<IntegrityIssue[]> {
    const raw = this.db
      .prepare(
        `SELECT track_id,
                MAX(version_number) AS latest_version,
                SUM(is_current_flag) AS current_count,
                MAX(CASE WHEN is_current_flag = 1 THEN version_number END) AS current_version,
                SUM(CASE WHEN is_current_flag = 1 AND effective_end_timestamp IS NOT NULL THEN 1 ELSE 0 END) AS closed_current
         FROM track_dim
         GROUP BY track_id
         HAVING current_count <> 1 OR current_version <> latest_version OR closed_current > 0
         ORDER BY track_id`
      )
      .all();

    return raw.map((r): IntegrityIssue => {
      const issue = issueRecord.parse(r);
      return {
        trackId: issue.track_id,
        kind:
          issue.current_count === 0
            ? "no_current"
            : issue.current_count > 1
              ? "multiple_current"
              : issue.closed_current > 0
                ? "expired_current"
                : "current_not_latest",
        currentCount: issue.current_count,
        latestVersion: issue.latest_version,
      };
    });
  }
}
