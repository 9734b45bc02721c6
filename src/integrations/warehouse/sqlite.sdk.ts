import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

export const TRACK_DIM_DDL = `
  CREATE TABLE IF NOT EXISTS track_dim (
    track_sk                  INTEGER PRIMARY KEY AUTOINCREMENT,
    track_id                  TEXT NOT NULL,

    track_name                TEXT,
    duration_ms               INTEGER,
    is_explicit               INTEGER,
    popularity                INTEGER NOT NULL DEFAULT 0,
    preview_url               TEXT,

    album_id                  TEXT,
    album_name                TEXT,
    album_release_date        TEXT,
    album_type                TEXT,

    primary_artist_id         TEXT,
    primary_artist_name       TEXT,
    all_artist_ids            TEXT NOT NULL DEFAULT '[]', -- JSON array
    all_artist_names          TEXT NOT NULL DEFAULT '[]', -- JSON array

    row_hash                  TEXT NOT NULL,
    effective_start_timestamp TEXT NOT NULL,
    effective_end_timestamp   TEXT,
    is_current_flag           INTEGER NOT NULL,
    version_number            INTEGER NOT NULL,

    created_at                TEXT NOT NULL,
    updated_at                TEXT,

    UNIQUE (track_id, version_number)
  );

  CREATE INDEX IF NOT EXISTS idx_track_dim_current
    ON track_dim(track_id, is_current_flag);
`;

export function migrate(db: Database.Database): void {
  db.exec(TRACK_DIM_DDL);
}

/** Open (or create) the warehouse file and apply the schema. `:memory:` is accepted. */
export function openWarehouse(filename: string): Database.Database {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  migrate(db);
  return db;
}
