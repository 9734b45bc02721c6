import { DeleteCommand, PutCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

import { logger as defaultLogger, type Logger } from "../../config/logger";
import type { RunLock } from "../../domain/ports";

function isConditionalCheckFailure(err: unknown): boolean {
  return err instanceof Error && err.name === "ConditionalCheckFailedException";
}

export interface DynamoRunLockOptions {
  ttlSeconds?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Lease-based lock on a DynamoDB item. A lease left behind by a crashed run
 * can be taken over once `expiresAt` has passed.
 */
export class DynamoRunLock implements RunLock {
  private readonly ttlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly doc: DynamoDBDocumentClient,
    private readonly tableName: string,
    options: DynamoRunLockOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? 900;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  async acquire(key: string, owner: string): Promise<boolean> {
    const nowSec = Math.floor(this.now() / 1000);
    try {
      await this.doc.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk: key,
            owner,
            acquiredAt: new Date(this.now()).toISOString(),
            expiresAt: nowSec + this.ttlSeconds,
          },
          ConditionExpression: "attribute_not_exists(pk) OR expiresAt < :now",
          ExpressionAttributeValues: { ":now": nowSec },
        })
      );
      return true;
    } catch (err) {
      if (isConditionalCheckFailure(err)) {
        this.logger.debug("lock:held", { key, owner });
        return false;
      }
      throw err;
    }
  }

  async release(key: string, owner: string): Promise<void> {
    try {
      await this.doc.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { pk: key },
          // "owner" is a DynamoDB reserved word
          ConditionExpression: "#owner = :owner",
          ExpressionAttributeNames: { "#owner": "owner" },
          ExpressionAttributeValues: { ":owner": owner },
        })
      );
    } catch (err) {
      if (!isConditionalCheckFailure(err)) throw err;
      this.logger.warn("lock:release:not-owner", { key, owner });
    }
  }
}
