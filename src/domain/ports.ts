import type { FetchedRecord, FetchFilter, HistoryRow, IntegrityIssue, StagedRecord } from "./types";

export interface SourceDataProvider {
  fetchEntities(filter: FetchFilter): Promise<FetchedRecord[]>;
}

/** Write-once landing area. `clearBatch` must succeed for an already-cleared location. */
export interface StagingStore {
  writeBatch(batchId: string, records: StagedRecord[]): Promise<string>;
  readBatch(location: string): Promise<StagedRecord[]>;
  clearBatch(location: string): Promise<void>;
}

export interface HistoryTransaction {
  /** Throws ReconciliationIntegrityViolation when more than one current row exists. */
  selectCurrent(trackId: string): Promise<HistoryRow | null>;
  latestVersion(trackId: string): Promise<number | null>;
  listVersions(trackId: string): Promise<HistoryRow[]>;
  /** Closes the given version; fails when it is not current or already has an end. */
  expire(trackId: string, version: number, at: string): Promise<void>;
  /** Clears the current flag of a row whose interval is already closed. */
  clearStaleCurrent(trackId: string, version: number): Promise<void>;
  insertVersion(row: HistoryRow): Promise<void>;
}

export interface HistoryTable extends HistoryTransaction {
  transaction<T>(fn: (tx: HistoryTransaction) => Promise<T>): Promise<T>;
  findIntegrityIssues(): Promise<IntegrityIssue[]>;
}

export interface CredentialProvider {
  getSecret(name: string): Promise<Record<string, string>>;
}

export interface RunLock {
  acquire(key: string, owner: string): Promise<boolean>;
  release(key: string, owner: string): Promise<void>;
}
