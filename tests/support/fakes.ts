import { loadConfig, type AppConfig } from "../../src/config/config";
import type { Logger } from "../../src/config/logger";
import { computeFingerprint, pickAttributes } from "../../src/domain/fingerprint";
import type { RunLock, SourceDataProvider, StagingStore } from "../../src/domain/ports";
import type {
  FetchedRecord,
  FingerprintedSnapshot,
  HistoryRow,
  IntegrityIssue,
  StagedRecord,
  TrackSnapshot,
} from "../../src/domain/types";
import { SqliteHistoryTable } from "../../src/integrations/warehouse/history.repo";
import { openWarehouse } from "../../src/integrations/warehouse/sqlite.sdk";

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface LogEntry {
  level: string;
  msg: string;
  ctx?: Record<string, unknown>;
}

export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (msg, ctx) => entries.push({ level: "debug", msg, ctx }),
    info: (msg, ctx) => entries.push({ level: "info", msg, ctx }),
    warn: (msg, ctx) => entries.push({ level: "warn", msg, ctx }),
    error: (msg, ctx) => entries.push({ level: "error", msg, ctx }),
  };
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ S3_BUCKET_NAME: "test-bucket", ...env });
}

// Catalog-shaped track payload
export function trackPayload(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    name: `Track ${id}`,
    duration_ms: 200000,
    explicit: false,
    popularity: 50,
    preview_url: null,
    album: { id: "alb-1", name: "Album One", release_date: "2024-01-05", album_type: "album" },
    artists: [{ id: "art-1", name: "Artist One" }],
    ...overrides,
  };
}

export function staged(seq: number, arrivedAt: string, payload: unknown): StagedRecord {
  return { seq, arrivedAt, payload };
}

export function snapshot(trackId: string, arrivedAt: string, overrides: Partial<TrackSnapshot> = {}): TrackSnapshot {
  return {
    trackId,
    trackName: `Track ${trackId}`,
    durationMs: 200000,
    isExplicit: false,
    popularity: 50,
    previewUrl: null,
    albumId: "alb-1",
    albumName: "Album One",
    albumReleaseDate: "2024-01-05",
    albumType: "album",
    primaryArtistId: "art-1",
    primaryArtistName: "Artist One",
    allArtistIds: ["art-1"],
    allArtistNames: ["Artist One"],
    arrivedAt,
    sequence: 0,
    ...overrides,
  };
}

export function fingerprinted(s: TrackSnapshot): FingerprintedSnapshot {
  return { snapshot: s, fingerprint: computeFingerprint(s) };
}

export function memoryHistory(): SqliteHistoryTable {
  return SqliteHistoryTable.open(":memory:", { logger: noopLogger });
}

export class FakeSource implements SourceDataProvider {
  calls = 0;

  constructor(private readonly records: FetchedRecord[] | (() => Promise<FetchedRecord[]>)) {}

  async fetchEntities(): Promise<FetchedRecord[]> {
    this.calls++;
    return typeof this.records === "function" ? this.records() : this.records;
  }
}

export class InMemoryStagingStore implements StagingStore {
  readonly batches = new Map<string, StagedRecord[]>();
  clears = 0;
  failWrite = false;
  failRead = false;
  failClear = false;

  async writeBatch(batchId: string, records: StagedRecord[]): Promise<string> {
    if (this.failWrite) throw new Error("bucket unavailable");
    const location = `raw/tracks/${batchId}.jsonl`;
    if (this.batches.has(location)) throw new Error(`${location} already exists`);
    this.batches.set(location, structuredClone(records));
    return location;
  }

  async readBatch(location: string): Promise<StagedRecord[]> {
    if (this.failRead) throw new Error("read timed out");
    const records = this.batches.get(location);
    if (!records) throw new Error(`${location} not found`);
    return records;
  }

  async clearBatch(location: string): Promise<void> {
    this.clears++;
    if (this.failClear) throw new Error("access denied");
    this.batches.delete(location);
  }
}

export function historyRow(trackId: string, version: number, overrides: Partial<HistoryRow> = {}): HistoryRow {
  const s = snapshot(trackId, "2024-01-01T00:00:00.000Z");
  return {
    ...pickAttributes(s),
    trackId,
    rowHash: computeFingerprint(s),
    effectiveStart: `2024-01-0${version}T00:00:00.000Z`,
    effectiveEnd: null,
    isCurrent: true,
    version,
    ...overrides,
  };
}

// History table whose writes and reads fail on demand
export class FailingHistoryTable extends SqliteHistoryTable {
  readonly failInsertOn = new Set<string>();
  readonly failListOn = new Set<string>();
  failAudit = false;

  constructor() {
    super(openWarehouse(":memory:"), { logger: noopLogger });
  }

  override async insertVersion(row: HistoryRow): Promise<void> {
    if (this.failInsertOn.has(row.trackId)) throw new Error("disk full");
    return super.insertVersion(row);
  }

  override async listVersions(trackId: string): Promise<HistoryRow[]> {
    if (this.failListOn.has(trackId)) throw new Error("database is locked");
    return super.listVersions(trackId);
  }

  override async findIntegrityIssues(): Promise<IntegrityIssue[]> {
    if (this.failAudit) throw new Error("database is locked");
    return super.findIntegrityIssues();
  }
}

export class FakeRunLock implements RunLock {
  held = false;
  failRelease = false;
  readonly calls: string[] = [];
  private owner: string | null = null;

  async acquire(key: string, owner: string): Promise<boolean> {
    this.calls.push(`acquire:${key}`);
    if (this.held) return false;
    this.held = true;
    this.owner = owner;
    return true;
  }

  async release(key: string, owner: string): Promise<void> {
    this.calls.push(`release:${key}`);
    if (this.failRelease) throw new Error("lock table throttled");
    if (this.owner === owner) this.held = false;
  }
}
