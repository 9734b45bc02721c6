import { z } from "zod";

import type { MalformedRecordPolicy } from "../config/config";
import { logger as defaultLogger, type Logger } from "../config/logger";
import { MalformedRecordError } from "../domain/errors";
import type { RejectedRecord, StagedRecord, TrackSnapshot } from "../domain/types";

export const MAX_ARTISTS = 3;

const artistSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
});

const albumSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  release_date: z
    .string()
    .regex(/^\d{4}(-\d{2}){0,2}$/, "expected YYYY, YYYY-MM or YYYY-MM-DD")
    .refine(isCalendarDate, "not a calendar date")
    .nullish(),
  album_type: z.string().nullish(),
});

// Track payload as the catalog returns it, enriched with its album
export const rawTrackSchema = z.object({
  id: z
    .string({ required_error: "missing track id", invalid_type_error: "track id must be a string" })
    .trim()
    .min(1, "missing track id"),
  name: z.string().nullish(),
  duration_ms: z.number().int().nonnegative().nullish(),
  explicit: z.boolean().nullish(),
  popularity: z.number().int().nullish(),
  preview_url: z.string().nullish(),
  album: albumSchema.nullish(),
  artists: z.array(artistSchema).nullish(),
});

export type RawTrackPayload = z.infer<typeof rawTrackSchema>;

// Year or month precision dates are anchored to the first day
function toDateKey(raw: string): string {
  const [year, month = "01", day = "01"] = raw.split("-");
  return `${year}-${month}-${day}`;
}

function isCalendarDate(raw: string): boolean {
  const key = toDateKey(raw);
  const date = new Date(`${key}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === key;
}

function compact(values: (string | null | undefined)[]): string[] {
  return values.filter((v): v is string => typeof v === "string" && v.length > 0);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Flatten one staged payload into a track snapshot.
 *
 * Every optional attribute has an explicit default: `null` for scalars, `[]` for the
 * artist lists and 0 for popularity. Present fields of the wrong type are rejected,
 * never coerced.
 */
export function normalizeTrack(record: StagedRecord, batchId?: string): TrackSnapshot {
  const parsed = rawTrackSchema.safeParse(record.payload ?? {});
  if (!parsed.success) {
    throw new MalformedRecordError(`record ${record.seq} rejected: ${describeIssues(parsed.error)}`, {
      batchId,
      seq: record.seq,
    });
  }

  const arrived = new Date(record.arrivedAt);
  if (Number.isNaN(arrived.getTime())) {
    throw new MalformedRecordError(`record ${record.seq} rejected: invalid arrival time "${record.arrivedAt}"`, {
      batchId,
      seq: record.seq,
      trackId: parsed.data.id,
    });
  }

  const track = parsed.data;
  const artists = (track.artists ?? []).slice(0, MAX_ARTISTS);
  const primary = artists[0];
  const releaseDate = track.album?.release_date;

  return {
    trackId: track.id,
    trackName: track.name ?? null,
    durationMs: track.duration_ms ?? null,
    isExplicit: track.explicit ?? null,
    popularity: track.popularity ?? 0,
    previewUrl: track.preview_url ?? null,
    albumId: track.album?.id ?? null,
    albumName: track.album?.name ?? null,
    albumReleaseDate: releaseDate ? toDateKey(releaseDate) : null,
    albumType: track.album?.album_type ?? null,
    primaryArtistId: primary?.id ?? null,
    primaryArtistName: primary?.name ?? null,
    allArtistIds: compact(artists.map((a) => a.id)),
    allArtistNames: compact(artists.map((a) => a.name)),
    arrivedAt: arrived.toISOString(),
    sequence: record.seq,
  };
}

export interface NormalizeOptions {
  policy: MalformedRecordPolicy;
  batchId?: string;
  logger?: Logger;
}

export interface NormalizeResult {
  snapshots: TrackSnapshot[];
  rejected: RejectedRecord[];
}

export function normalizeBatch(records: StagedRecord[], options: NormalizeOptions): NormalizeResult {
  const { policy, batchId, logger = defaultLogger } = options;
  const snapshots: TrackSnapshot[] = [];
  const rejected: RejectedRecord[] = [];

  for (const record of records) {
    try {
      snapshots.push(normalizeTrack(record, batchId));
    } catch (err) {
      if (!(err instanceof MalformedRecordError) || policy === "abort") throw err;
      logger.warn("normalize:rejected", { batchId, seq: record.seq, reason: err.message });
      rejected.push({ seq: record.seq, reason: err.message });
    }
  }

  logger.debug("normalize:done", { batchId, accepted: snapshots.length, rejected: rejected.length });
  return { snapshots, rejected };
}
