import { requireValue, type AppConfig } from "../../config/config";
import { logger as defaultLogger, type Logger } from "../../config/logger";
import type { CredentialProvider } from "../../domain/ports";
import { DynamoRunLock } from "../../integrations/lock/run-lock.repo";
import { getDynamoDocClient } from "../../integrations/lock/dynamo.sdk";
import { SecretsManagerCredentialProvider, getSpotifyCredentials } from "../../integrations/secrets/credentials.repo";
import { getSecretsClient } from "../../integrations/secrets/secrets.sdk";
import { SpotifyCatalogSource } from "../../integrations/spotify/catalog.repo";
import { SpotifyApiClient, type SpotifyCredentials } from "../../integrations/spotify/spotify.sdk";
import { S3StagingStore } from "../../integrations/staging/s3-staging.repo";
import { getS3Client } from "../../integrations/staging/s3.sdk";
import { SqliteHistoryTable } from "../../integrations/warehouse/history.repo";
import type { TrackDimSyncDependencies } from "./orchestrator";

export interface BuiltDependencies extends TrackDimSyncDependencies {
  close: () => void;
}

// Plain env credentials win over the secret for local runs
function credentialsFor(cfg: AppConfig, provider: () => CredentialProvider): () => Promise<SpotifyCredentials> {
  const { clientId, clientSecret, secretName } = cfg.spotify;
  if (clientId && clientSecret) return async () => ({ clientId, clientSecret });
  const name = requireValue(secretName, "SPOTIFY_SECRET_NAME (or SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET)");
  return () => getSpotifyCredentials(provider(), name);
}

export function buildDependencies(cfg: AppConfig, logger: Logger = defaultLogger): BuiltDependencies {
  let secrets: CredentialProvider | null = null;
  const provider = (): CredentialProvider => {
    secrets ??= new SecretsManagerCredentialProvider(getSecretsClient(cfg));
    return secrets;
  };

  const api = new SpotifyApiClient({
    credentials: credentialsFor(cfg, provider),
    baseUrl: cfg.spotify.baseUrl,
    authUrl: cfg.spotify.authUrl,
    maxRetries: cfg.spotify.maxRetries,
    retryDelayMs: cfg.spotify.retryDelayMs,
    logger,
  });

  const staging = new S3StagingStore(getS3Client(cfg), requireValue(cfg.staging.bucket, "S3_BUCKET_NAME"), cfg.staging.prefix);
  const history = SqliteHistoryTable.open(cfg.warehouse.path, { logger });
  const lock = cfg.lock.tableName
    ? new DynamoRunLock(getDynamoDocClient(cfg), cfg.lock.tableName, { ttlSeconds: cfg.lock.ttlSeconds, logger })
    : undefined;
  if (!lock) logger.warn("sync:lock:disabled", { reason: "LOCK_TABLE_NAME not set" });

  return {
    source: new SpotifyCatalogSource(api, { logger }),
    staging,
    history,
    lock,
    close: () => history.close(),
  };
}
