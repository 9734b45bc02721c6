import { promises as fs } from "node:fs";
import path from "node:path";

import type { StagingStore } from "../../domain/ports";
import type { StagedRecord } from "../../domain/types";
import { parseBatch, serializeBatch } from "../../ingest/staging";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Filesystem staging for local runs and the fixture harness. */
export class LocalStagingStore implements StagingStore {
  constructor(private readonly rootDir: string) {}

  async writeBatch(batchId: string, records: StagedRecord[]): Promise<string> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const location = path.join(this.rootDir, `${batchId}.jsonl`);
    // "wx" fails if the batch already exists
    await fs.writeFile(location, serializeBatch(records), { encoding: "utf8", flag: "wx" });
    return location;
  }

  async readBatch(location: string): Promise<StagedRecord[]> {
    return parseBatch(await fs.readFile(location, "utf8"));
  }

  async clearBatch(location: string): Promise<void> {
    try {
      await fs.unlink(location);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }
}
