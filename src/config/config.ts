import { ConfigurationError } from "../domain/errors";
import { parseLogLevel, type LogLevel } from "./logger";

export type MalformedRecordPolicy = "skip" | "abort";

export interface AppConfig {
  aws: {
    region: string;
  };
  spotify: {
    secretName?: string;
    clientId?: string;
    clientSecret?: string;
    baseUrl: string;
    authUrl: string;
    albumLimit: number;
    market?: string;
    maxRetries: number;
    retryDelayMs: number;
  };
  staging: {
    bucket?: string;
    prefix: string;
    endpoint?: string;
  };
  warehouse: {
    path: string;
  };
  lock: {
    tableName?: string;
    ttlSeconds: number;
    endpoint?: string;
  };
  pipeline: {
    malformedRecordPolicy: MalformedRecordPolicy;
  };
  logLevel: LogLevel;
  logDir?: string;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = optional(env[name]);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`, { name });
  }
  return parsed;
}

function malformedPolicy(raw: string | undefined): MalformedRecordPolicy {
  const value = optional(raw)?.toLowerCase() ?? "skip";
  if (value === "skip" || value === "abort") return value;
  throw new ConfigurationError(`MALFORMED_RECORD_POLICY must be "skip" or "abort", got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    aws: {
      region: optional(env.AWS_REGION) ?? "us-east-1",
    },
    spotify: {
      secretName: optional(env.SPOTIFY_SECRET_NAME),
      clientId: optional(env.SPOTIFY_CLIENT_ID),
      clientSecret: optional(env.SPOTIFY_CLIENT_SECRET),
      baseUrl: optional(env.SPOTIFY_API_BASE_URL) ?? "https://api.spotify.com/v1",
      authUrl: optional(env.SPOTIFY_AUTH_URL) ?? "https://accounts.spotify.com/api/token",
      albumLimit: positiveInt(env, "NEW_RELEASES_LIMIT", 5),
      market: optional(env.SPOTIFY_MARKET),
      maxRetries: positiveInt(env, "SOURCE_MAX_RETRIES", 3),
      retryDelayMs: positiveInt(env, "SOURCE_RETRY_DELAY_MS", 500),
    },
    staging: {
      bucket: optional(env.S3_BUCKET_NAME),
      prefix: optional(env.STAGING_PREFIX) ?? "raw/tracks",
      endpoint: optional(env.S3_ENDPOINT),
    },
    warehouse: {
      path: optional(env.WAREHOUSE_PATH) ?? "./data/warehouse.db",
    },
    lock: {
      tableName: optional(env.LOCK_TABLE_NAME),
      ttlSeconds: positiveInt(env, "LOCK_TTL_SECONDS", 900),
      endpoint: optional(env.DYNAMO_ENDPOINT),
    },
    pipeline: {
      malformedRecordPolicy: malformedPolicy(env.MALFORMED_RECORD_POLICY),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logDir: optional(env.LOG_DIR),
  };
}

export function requireValue<T>(value: T | undefined, name: string): T {
  if (value === undefined) throw new ConfigurationError(`${name} is required`, { name });
  return value;
}
