import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, type S3Client } from "@aws-sdk/client-s3";

import type { StagingStore } from "../../domain/ports";
import type { StagedRecord } from "../../domain/types";
import { parseBatch, serializeBatch } from "../../ingest/staging";

/**
 * Staging batches as JSON-lines objects under `<prefix>/<batchId>.jsonl`.
 * The returned location is the object key.
 */
export class S3StagingStore implements StagingStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly prefix = "raw/tracks"
  ) {}

  async writeBatch(batchId: string, records: StagedRecord[]): Promise<string> {
    const key = `${this.prefix}/${batchId}.jsonl`;
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: serializeBatch(records),
        ContentType: "application/jsonl",
        // Write-once: never replace a batch that is still awaiting replay
        IfNoneMatch: "*",
      })
    );
    return key;
  }

  async readBatch(location: string): Promise<StagedRecord[]> {
    const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: location }));
    if (!res.Body) throw new Error(`s3://${this.bucket}/${location} has no body`);
    return parseBatch(await res.Body.transformToString("utf-8"));
  }

  // S3 deletes of a missing key succeed, which keeps cleanup idempotent
  async clearBatch(location: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: location }));
  }
}
