import "dotenv/config";

import { z } from "zod";

import { loadConfig, type AppConfig } from "../../../config/config";
import { createLogger, logger, type Logger, type LoggerOptions } from "../../../config/logger";
import { PipelineError, errorMessage } from "../../../domain/errors";
import { buildDependencies, type BuiltDependencies } from "../dependencies";
import { runTrackDimSync, type TrackDimSyncResult } from "../orchestrator";

// API Gateway proxy events carry a body; scheduled (EventBridge) events do not
export interface LambdaEventLike {
  body?: string | null;
}

export interface APIGatewayProxyResultLike {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
}

const requestBody = z.object({
  dryRun: z.boolean().optional(),
  replayLocation: z.string().min(1).optional(),
});

export type SyncRequest = z.infer<typeof requestBody>;

export type SyncRunner = (request: SyncRequest) => Promise<TrackDimSyncResult>;

function respond(statusCode: number, body: unknown): APIGatewayProxyResultLike {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

function parseRequest(body: string | null | undefined): SyncRequest | string {
  if (!body) return {};
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return "Invalid JSON body";
  }
  const parsed = requestBody.safeParse(json);
  return parsed.success ? parsed.data : `Invalid request: ${parsed.error.issues[0]?.message ?? "unknown"}`;
}

export interface RunFromConfigOptions {
  build?: (config: AppConfig, logger: Logger) => BuiltDependencies;
  sink?: LoggerOptions["sink"];
}

// Each run logs at the configured level, to LOG_DIR when one is set
export function runFromConfig(config: AppConfig, options: RunFromConfigOptions = {}): SyncRunner {
  const { build = buildDependencies, sink } = options;
  return async (request) => {
    const runLogger = createLogger(config.logLevel, { logDir: config.logDir, sink });
    const dependencies = build(config, runLogger);
    try {
      return await runTrackDimSync({ config, dependencies, logger: runLogger, ...request });
    } finally {
      dependencies.close();
    }
  };
}

const runFromEnv: SyncRunner = (request) => runFromConfig(loadConfig())(request);

export type SyncHandler = (event?: LambdaEventLike) => Promise<APIGatewayProxyResultLike>;

export function createHandler(run: SyncRunner = runFromEnv): SyncHandler {
  return async function handler(event: LambdaEventLike = {}): Promise<APIGatewayProxyResultLike> {
    const request = parseRequest(event.body);
    if (typeof request === "string") return respond(400, { ok: false, error: request });

    try {
      const result = await run(request);
      return respond(200, { ok: true, result });
    } catch (err) {
      if (err instanceof PipelineError) {
        logger.error("sync:failed", { code: err.code, message: err.message, ...err.context });
        return respond(500, { ok: false, error: err.message, code: err.code, context: err.context });
      }
      logger.error("sync:failed", { message: errorMessage(err) });
      return respond(500, { ok: false, error: errorMessage(err) });
    }
  };
}

export const handler = createHandler();

export default handler;
