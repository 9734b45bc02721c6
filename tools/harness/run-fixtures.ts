/*
  Fixture harness
  - Runs each fixture file through the full sync as its own batch, in file-name order
  - Local staging directory and local SQLite warehouse; no AWS or catalog access
  - Very verbose console logging for inspection
  Usage:
    npm run harness:fixtures
    npm run harness:fixtures -- --dir fixtures/harness --db ./data/harness.db --limit 2
*/

import "dotenv/config";

import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";

import { loadConfig } from "../../src/config/config";
import { createLogger, parseLogLevel } from "../../src/config/logger";
import type { SourceDataProvider } from "../../src/domain/ports";
import type { FetchedRecord } from "../../src/domain/types";
import { LocalStagingStore } from "../../src/integrations/staging/local-staging.repo";
import { SqliteHistoryTable } from "../../src/integrations/warehouse/history.repo";
import { runTrackDimSync } from "../../src/workflows/track-dim-sync/orchestrator";

interface Args {
  dir: string;
  db: string;
  staging: string;
  limit?: number;
}

// One file = one fetch: every track observed at `fetchedAt`
const fixtureFile = z.object({
  fetchedAt: z.string().datetime(),
  tracks: z.array(z.unknown()),
});

function parseArgs(): Args {
  const out: Args = { dir: "fixtures/harness", db: "data/harness.db", staging: "data/staging" };
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const next = argv[i + 1];
    if (a === "--dir" && next) out.dir = argv[++i];
    else if (a === "--db" && next) out.db = argv[++i];
    else if (a === "--staging" && next) out.staging = argv[++i];
    else if (a === "--limit" && next) out.limit = Number(argv[++i]);
  }
  return out;
}

class FixtureSource implements SourceDataProvider {
  constructor(private readonly records: FetchedRecord[]) {}

  async fetchEntities(): Promise<FetchedRecord[]> {
    return this.records;
  }
}

async function loadFixture(file: string): Promise<{ fetchedAt: Date; records: FetchedRecord[] }> {
  const parsed = fixtureFile.parse(JSON.parse(await fs.readFile(file, "utf8")));
  return {
    fetchedAt: new Date(parsed.fetchedAt),
    records: parsed.tracks.map((payload) => ({ fetchedAt: parsed.fetchedAt, payload })),
  };
}

async function run() {
  const args = parseArgs();
  // Default to very verbose logging for harness runs unless user overrides
  const logger = createLogger(parseLogLevel(process.env.LOG_LEVEL, "debug"), {
    logDir: process.env.LOG_DIR || undefined,
  });
  const config = loadConfig();

  const dir = path.resolve(args.dir);
  const files = (await fs.readdir(dir)).filter((f) => f.toLowerCase().endsWith(".json")).sort();
  const limit = args.limit && args.limit > 0 ? args.limit : files.length;
  const chosen = files.slice(0, limit);
  console.log(`[harness] found ${files.length} fixtures in ${dir}; running ${chosen.length}`);

  const history = SqliteHistoryTable.open(path.resolve(args.db), { logger });
  const staging = new LocalStagingStore(path.resolve(args.staging));
  let errors = 0;

  try {
    for (const file of chosen) {
      console.log(`[harness] fixture: ${file}`);
      try {
        const { fetchedAt, records } = await loadFixture(path.join(dir, file));
        const result = await runTrackDimSync({
          config,
          dependencies: { source: new FixtureSource(records), staging, history },
          logger,
          now: () => fetchedAt,
        });
        console.log(
          `[harness] ${result.status} inserted=${result.inserted} versioned=${result.versioned} unchanged=${result.unchanged} stale=${result.stale} rejected=${result.rejected}`
        );
      } catch (err) {
        errors++;
        console.error(`[harness] error on ${file}:`, err instanceof Error ? err.message : err);
      }
    }
  } finally {
    history.close();
  }

  console.log(`[harness] done. fixtures=${chosen.length} errors=${errors}`);
  if (errors > 0) process.exitCode = 1;
}

run().catch((e) => {
  console.error("[harness] fatal:", e);
  process.exitCode = 1;
});
