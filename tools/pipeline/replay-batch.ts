/*
  Replay a staged batch
  - Re-runs normalize → dedup → reconcile → cleanup on a batch a failed run left in staging
  - Replays are idempotent: tracks already reconciled come back as unchanged
  Usage:
    npm run pipeline:replay -- --location raw/tracks/tracks_20240101_120000.jsonl
    npm run pipeline:replay -- --location raw/tracks/tracks_20240101_120000.jsonl --dry-run
*/

import "dotenv/config";

import { loadConfig } from "../../src/config/config";
import { PipelineError } from "../../src/domain/errors";
import { runFromConfig } from "../../src/workflows/track-dim-sync/entrypoints/lambda";

function getArg(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function main() {
  const location = getArg("--location");
  if (!location) {
    console.error("[replay] --location <staging key or path> is required");
    process.exitCode = 1;
    return;
  }
  const dryRun = process.argv.includes("--dry-run");
  const result = await runFromConfig(loadConfig())({ dryRun, replayLocation: location });
  console.log(`[replay] ${result.status}: ${JSON.stringify(result)}`);
}

main().catch((e) => {
  if (e instanceof PipelineError) {
    console.error(`[replay] ${e.code}: ${e.message}`, JSON.stringify(e.context));
  } else {
    console.error("[replay] error:", e instanceof Error ? e.message : e);
  }
  process.exitCode = 1;
});
