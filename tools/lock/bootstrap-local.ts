/*
  DynamoDB Local bootstrap for the run lock
  - Optionally starts a local Docker container (if --start-docker)
  - Creates the lock table if missing, with a TTL on expiresAt
  Usage:
    npm run lock:bootstrap
    npm run lock:bootstrap -- --start-docker
*/

import "dotenv/config";

import { exec as _exec } from "child_process";
import fs from "fs";
import path from "path";
import { promisify } from "util";
import {
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  ListTablesCommand,
  ResourceNotFoundException,
  UpdateTimeToLiveCommand,
} from "@aws-sdk/client-dynamodb";

import { loadConfig, type AppConfig } from "../../src/config/config";

const exec = promisify(_exec);

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

function message(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function startDockerIfRequested(): Promise<void> {
  if (!hasFlag("--start-docker")) return;
  const volume = path.resolve(process.cwd(), "docker/dynamodb");
  fs.mkdirSync(volume, { recursive: true });
  const cmd = `docker run -d --rm --name dynamodb-local -p 8000:8000 -v "${volume}:/data" amazon/dynamodb-local -jar DynamoDBLocal.jar -sharedDb -dbPath /data`;
  console.log("[lock] starting Docker container:", cmd);
  try {
    const { stdout, stderr } = await exec(cmd);
    if (stdout) console.log(stdout.trim());
    if (stderr) console.log(stderr.trim());
  } catch (e) {
    console.log("[lock] docker run failed (is Docker installed/running?)", message(e));
  }
}

function buildClient(cfg: AppConfig): DynamoDBClient {
  return new DynamoDBClient({
    region: cfg.aws.region,
    endpoint: cfg.lock.endpoint ?? "http://localhost:8000",
    credentials: {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "fakeMyKeyId",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "fakeSecretAccessKey",
    },
  });
}

async function waitForReady(client: DynamoDBClient, timeoutMs = 15000): Promise<void> {
  const started = Date.now();
  let attempt = 0;
  while (Date.now() - started < timeoutMs) {
    attempt++;
    try {
      await client.send(new ListTablesCommand({ Limit: 1 }));
      console.log(`[lock] ready after ${attempt} attempt(s)`);
      return;
    } catch {
      await new Promise((r) => setTimeout(r, 500));
    }
  }
  throw new Error("DynamoDB Local did not become ready in time");
}

async function ensureTableExists(client: DynamoDBClient, tableName: string): Promise<void> {
  try {
    await client.send(new DescribeTableCommand({ TableName: tableName }));
    console.log(`[lock] table exists: ${tableName}`);
    return;
  } catch (err) {
    if (!(err instanceof ResourceNotFoundException)) throw err;
  }

  console.log(`[lock] creating table: ${tableName}`);
  await client.send(
    new CreateTableCommand({
      TableName: tableName,
      AttributeDefinitions: [{ AttributeName: "pk", AttributeType: "S" }],
      KeySchema: [{ AttributeName: "pk", KeyType: "HASH" }],
      BillingMode: "PAY_PER_REQUEST",
    })
  );
  // Expired leases are taken over by acquire(); TTL only tidies them up
  await client.send(
    new UpdateTimeToLiveCommand({
      TableName: tableName,
      TimeToLiveSpecification: { AttributeName: "expiresAt", Enabled: true },
    })
  );
  console.log("[lock] table created");
}

async function main() {
  const cfg = loadConfig();
  const tableName = cfg.lock.tableName ?? "TrackDimRunLock";
  const client = buildClient(cfg);
  console.log("[lock] endpoint:", cfg.lock.endpoint ?? "http://localhost:8000");

  await startDockerIfRequested();
  try {
    await waitForReady(client);
  } catch (e) {
    console.log("[lock] wait for ready failed:", message(e));
  }
  await ensureTableExists(client, tableName);
  console.log("[lock] done");
}

main().catch((e) => {
  console.error("[lock] error:", message(e));
  process.exitCode = 1;
});
