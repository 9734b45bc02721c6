import { z } from "zod";

import { logger as defaultLogger, type Logger } from "../../config/logger";
import { SourceUnavailableError, errorMessage } from "../../domain/errors";
import type { SourceDataProvider } from "../../domain/ports";
import type { FetchedRecord, FetchFilter } from "../../domain/types";
import type { SpotifyApiClient } from "./spotify.sdk";

const PAGE_SIZE = 50;

const newReleasesPage = z.object({
  albums: z.object({
    items: z.array(z.object({ id: z.string() })),
    next: z.string().nullable(),
  }),
});

const albumDetails = z.object({
  id: z.string(),
  name: z.string().nullish(),
  release_date: z.string().nullish(),
  album_type: z.string().nullish(),
  popularity: z.number().nullish(),
});

type AlbumDetails = z.infer<typeof albumDetails>;

// Track items are landed as-is; the normalizer owns their validation
const tracksPage = z.object({
  items: z.array(z.record(z.string(), z.unknown())),
  next: z.string().nullable(),
});

export interface SpotifyCatalogSourceOptions {
  logger?: Logger;
  clock?: () => Date;
}

/**
 * New releases with their tracks. Each track is denormalized with its album and the
 * album popularity, since the album-tracks endpoint carries neither.
 */
export class SpotifyCatalogSource implements SourceDataProvider {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly api: SpotifyApiClient, options: SpotifyCatalogSourceOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  async fetchEntities(filter: FetchFilter): Promise<FetchedRecord[]> {
    try {
      const albumIds = await this.listNewReleases(filter);
      this.logger.info("catalog:new-releases", { albums: albumIds.length });

      const records: FetchedRecord[] = [];
      for (const albumId of albumIds) {
        const album = await this.api.get(`/albums/${encodeURIComponent(albumId)}`, albumDetails);
        const tracks = await this.fetchAlbumTracks(album, filter.market);
        this.logger.debug("catalog:album", { albumId, tracks: tracks.length });
        records.push(...tracks);
      }
      return records;
    } catch (err) {
      throw new SourceUnavailableError(`catalog fetch failed: ${errorMessage(err)}`, {}, err);
    }
  }

  private async listNewReleases(filter: FetchFilter): Promise<string[]> {
    const ids: string[] = [];
    let offset = 0;
    while (ids.length < filter.albumLimit) {
      const params = new URLSearchParams({
        limit: String(Math.min(PAGE_SIZE, filter.albumLimit - ids.length)),
        offset: String(offset),
      });
      if (filter.market) params.set("country", filter.market);

      const page = await this.api.get(`/browse/new-releases?${params.toString()}`, newReleasesPage);
      ids.push(...page.albums.items.map((a) => a.id));
      offset += page.albums.items.length;
      if (!page.albums.next || page.albums.items.length === 0) break;
    }
    return ids.slice(0, filter.albumLimit);
  }

  private async fetchAlbumTracks(album: AlbumDetails, market?: string): Promise<FetchedRecord[]> {
    const params = new URLSearchParams({ limit: String(PAGE_SIZE) });
    if (market) params.set("market", market);

    const albumRef = {
      id: album.id,
      name: album.name ?? null,
      release_date: album.release_date ?? null,
      album_type: album.album_type ?? null,
    };
    const popularity = album.popularity ?? 0;

    const records: FetchedRecord[] = [];
    let next: string | null = `/albums/${encodeURIComponent(album.id)}/tracks?${params.toString()}`;
    while (next) {
      const page: z.infer<typeof tracksPage> = await this.api.get(next, tracksPage);
      const fetchedAt = this.clock().toISOString();
      for (const track of page.items) {
        records.push({ fetchedAt, payload: { ...track, album: albumRef, popularity } });
      }
      next = page.next;
    }
    return records;
  }
}
