import { S3Client, type S3ClientConfig } from "@aws-sdk/client-s3";

import type { AppConfig } from "../../config/config";

let cachedS3: S3Client | null = null;

export function getS3Client(cfg: AppConfig): S3Client {
  if (cachedS3) return cachedS3;
  const clientConfig: S3ClientConfig = { region: cfg.aws.region };
  if (cfg.staging.endpoint) {
    // Local S3-compatible endpoints (MinIO, LocalStack) need path-style URLs
    clientConfig.endpoint = cfg.staging.endpoint;
    clientConfig.forcePathStyle = true;
  }
  cachedS3 = new S3Client(clientConfig);
  return cachedS3;
}
