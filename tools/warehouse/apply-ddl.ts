/*
  Warehouse schema setup
  - Creates the track_dim table and its indexes if missing
  Usage:
    npm run warehouse:migrate
    npm run warehouse:migrate -- --path ./data/other.db
*/

import "dotenv/config";

import { loadConfig } from "../../src/config/config";
import { logger } from "../../src/config/logger";
import { openWarehouse } from "../../src/integrations/warehouse/sqlite.sdk";

function getArg(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

function main() {
  const target = getArg("--path") ?? loadConfig().warehouse.path;
  logger.info("[warehouse] applying schema", { path: target });
  const db = openWarehouse(target);
  db.close();
  console.log(`[warehouse] track_dim ready at ${target}`);
}

try {
  main();
} catch (e) {
  console.error("[warehouse] error:", e instanceof Error ? e.message : e);
  process.exitCode = 1;
}
