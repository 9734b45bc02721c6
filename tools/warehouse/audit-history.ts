/*
  History audit
  - Lists tracks that break the single-current-row invariant
  - With --heal, repairs them in place
  Usage:
    npm run warehouse:audit
    npm run warehouse:audit -- --heal
*/

import "dotenv/config";

import { loadConfig } from "../../src/config/config";
import { logger } from "../../src/config/logger";
import { SqliteHistoryTable } from "../../src/integrations/warehouse/history.repo";
import { auditHistory } from "../../src/services/history-audit.service";

async function main() {
  const heal = process.argv.includes("--heal");
  const cfg = loadConfig();
  const table = SqliteHistoryTable.open(cfg.warehouse.path, { logger });
  try {
    const report = await auditHistory(table, { heal, logger });
    for (const issue of report.issues) {
      console.log(`[audit] ${issue.trackId}: ${issue.kind} (current=${issue.currentCount}, latest=v${issue.latestVersion})`);
    }
    for (const action of report.healed) {
      const inserted = action.insertedVersion === null ? "" : ` inserted=v${action.insertedVersion}`;
      console.log(`[audit] healed ${action.trackId}: expired=[${action.expiredVersions.join(",")}]${inserted}`);
    }
    console.log(`[audit] done. issues=${report.issues.length} healed=${report.healed.length}`);
    if (report.issues.length > 0 && !heal) process.exitCode = 2;
  } finally {
    table.close();
  }
}

main().catch((e) => {
  console.error("[audit] error:", e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
