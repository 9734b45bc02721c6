// Raw record as landed in staging: one JSON line per track
export interface StagedRecord {
  seq: number; // zero-based position in the batch, used as the dedup tiebreak
  arrivedAt: string; // ISO 8601, time the source page was fetched
  payload: unknown;
}

export interface FetchedRecord {
  fetchedAt: string; // ISO 8601
  payload: unknown;
}

export interface FetchFilter {
  albumLimit: number;
  market?: string;
}

// Mutable attributes of a track; every one of them feeds the fingerprint
export interface TrackAttributes {
  trackName: string | null;
  durationMs: number | null;
  isExplicit: boolean | null;
  popularity: number;
  previewUrl: string | null;
  albumId: string | null;
  albumName: string | null;
  albumReleaseDate: string | null; // YYYY-MM-DD
  albumType: string | null;
  primaryArtistId: string | null;
  primaryArtistName: string | null;
  allArtistIds: string[];
  allArtistNames: string[];
}

export interface TrackSnapshot extends TrackAttributes {
  trackId: string;
  arrivedAt: string;
  sequence: number;
}

export interface FingerprintedSnapshot {
  snapshot: TrackSnapshot;
  fingerprint: string;
}

// Dimensions
export interface HistoryRow extends TrackAttributes {
  trackId: string;
  rowHash: string;
  effectiveStart: string;
  effectiveEnd: string | null;
  isCurrent: boolean;
  version: number;
}

export type TrackTransition = "inserted" | "versioned" | "unchanged" | "stale";

// expired_current: a row still flagged current although its interval was closed
export type IntegrityIssueKind = "no_current" | "multiple_current" | "expired_current" | "current_not_latest";

export interface IntegrityIssue {
  trackId: string;
  kind: IntegrityIssueKind;
  currentCount: number;
  latestVersion: number;
}

export interface RejectedRecord {
  seq: number;
  reason: string;
}
