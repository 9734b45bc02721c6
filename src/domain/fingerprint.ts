import { createHash } from "node:crypto";

import type { TrackAttributes } from "./types";

/**
 * Column order of the fingerprint tuple. Identifiers and timestamps are excluded,
 * so two observations of the same track with equal attributes hash the same.
 */
export const FINGERPRINT_FIELDS = [
  "trackName",
  "durationMs",
  "isExplicit",
  "popularity",
  "previewUrl",
  "albumId",
  "albumName",
  "albumReleaseDate",
  "albumType",
  "primaryArtistId",
  "primaryArtistName",
  "allArtistIds",
  "allArtistNames",
] as const satisfies readonly (keyof TrackAttributes)[];

export function computeFingerprint(attributes: TrackAttributes): string {
  // JSON keeps null distinct from "" and arrays unambiguous
  const tuple = FINGERPRINT_FIELDS.map((field) => attributes[field]);
  return createHash("sha256").update(JSON.stringify(tuple)).digest("hex");
}

export function pickAttributes(source: TrackAttributes): TrackAttributes {
  return {
    trackName: source.trackName,
    durationMs: source.durationMs,
    isExplicit: source.isExplicit,
    popularity: source.popularity,
    previewUrl: source.previewUrl,
    albumId: source.albumId,
    albumName: source.albumName,
    albumReleaseDate: source.albumReleaseDate,
    albumType: source.albumType,
    primaryArtistId: source.primaryArtistId,
    primaryArtistName: source.primaryArtistName,
    allArtistIds: [...source.allArtistIds],
    allArtistNames: [...source.allArtistNames],
  };
}
