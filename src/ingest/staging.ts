import { z } from "zod";

import type { FetchedRecord, StagedRecord } from "../domain/types";

const stagedRecordSchema = z.object({
  seq: z.number().int().nonnegative(),
  arrivedAt: z.string().min(1),
  payload: z.unknown(),
});

export function toStagedRecords(fetched: FetchedRecord[]): StagedRecord[] {
  return fetched.map((record, seq) => ({ seq, arrivedAt: record.fetchedAt, payload: record.payload }));
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

// tracks_YYYYMMDD_HHMMSS, in UTC
export function batchIdFor(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `tracks_${date}_${time}`;
}

export function serializeBatch(records: StagedRecord[]): string {
  return records.map((record) => JSON.stringify(record)).join("\n");
}

/** Parse a JSON-lines batch body. Throws on the first line that is not a staged record. */
export function parseBatch(body: string): StagedRecord[] {
  const records: StagedRecord[] = [];
  const lines = body.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      throw new Error(`line ${i + 1} is not valid JSON`, { cause: err });
    }
    const parsed = stagedRecordSchema.safeParse(json);
    if (!parsed.success) throw new Error(`line ${i + 1} is not a staged record: ${parsed.error.issues[0]?.message}`);
    records.push({ seq: parsed.data.seq, arrivedAt: parsed.data.arrivedAt, payload: parsed.data.payload });
  }
  return records;
}
