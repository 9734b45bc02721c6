import { DynamoDBClient, type DynamoDBClientConfig } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

import type { AppConfig } from "../../config/config";

let cachedDoc: DynamoDBDocumentClient | null = null;

export function getDynamoDocClient(cfg: AppConfig): DynamoDBDocumentClient {
  if (cachedDoc) return cachedDoc;
  const clientConfig: DynamoDBClientConfig = { region: cfg.aws.region };
  if (cfg.lock.endpoint) {
    clientConfig.endpoint = cfg.lock.endpoint;
    clientConfig.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "fakeMyKeyId",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "fakeSecretAccessKey",
    };
  }
  cachedDoc = DynamoDBDocumentClient.from(new DynamoDBClient(clientConfig));
  return cachedDoc;
}
