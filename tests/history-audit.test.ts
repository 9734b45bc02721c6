import assert from "node:assert/strict";
import { test } from "node:test";

import { auditHistory, healTrack } from "../src/services/history-audit.service";
import { historyRow, memoryHistory, noopLogger, recordingLogger } from "./support/fakes";

test("a clean table reports no issues", async () => {
  const table = memoryHistory();
  await table.insertVersion(historyRow("t1", 1));
  assert.deepEqual(await auditHistory(table, { heal: true, logger: noopLogger }), { issues: [], healed: [] });
  table.close();
});

test("without heal the audit only reports", async () => {
  const table = memoryHistory();
  await table.insertVersion(historyRow("t1", 1, { isCurrent: false, effectiveEnd: "2024-01-02T00:00:00.000Z" }));
  const logger = recordingLogger();

  const report = await auditHistory(table, { logger });
  assert.equal(report.issues.length, 1);
  assert.deepEqual(report.healed, []);
  assert.equal((await table.listVersions("t1")).length, 1);
  assert.deepEqual(
    logger.entries.map((e) => e.msg),
    ["audit:issues"]
  );
  table.close();
});

test("a track left without a current row gets its latest version carried forward", async () => {
  const table = memoryHistory();
  await table.insertVersion(historyRow("t1", 1, { isCurrent: false, effectiveEnd: "2024-01-02T00:00:00.000Z" }));
  await table.insertVersion(
    historyRow("t1", 2, { popularity: 77, isCurrent: false, effectiveEnd: "2024-01-09T00:00:00.000Z" })
  );

  const action = await healTrack(table, "t1", { logger: noopLogger });
  assert.deepEqual(action, { trackId: "t1", expiredVersions: [], insertedVersion: 3 });

  const current = await table.selectCurrent("t1");
  assert.equal(current?.version, 3);
  assert.equal(current?.popularity, 77);
  assert.equal(current?.effectiveStart, "2024-01-09T00:00:00.000Z");
  assert.equal(current?.effectiveEnd, null);
  // expired rows are never reopened
  const [v1, v2] = await table.listVersions("t1");
  assert.equal(v1.isCurrent, false);
  assert.equal(v2.isCurrent, false);
  table.close();
});

test("extra current rows are closed where the next version starts", async () => {
  const table = memoryHistory();
  await table.insertVersion(historyRow("t1", 1));
  await table.insertVersion(historyRow("t1", 2));
  await table.insertVersion(historyRow("t1", 3));

  const report = await auditHistory(table, { heal: true, logger: noopLogger });
  assert.deepEqual(report.healed, [{ trackId: "t1", expiredVersions: [1, 2], insertedVersion: null }]);

  const rows = await table.listVersions("t1");
  assert.deepEqual(
    rows.map((r) => [r.version, r.isCurrent, r.effectiveEnd]),
    [
      [1, false, "2024-01-02T00:00:00.000Z"],
      [2, false, "2024-01-03T00:00:00.000Z"],
      [3, true, null],
    ]
  );
  assert.deepEqual(await table.findIntegrityIssues(), []);
  table.close();
});

test("a current row below the latest version is closed and the latest carried forward", async () => {
  const table = memoryHistory();
  await table.insertVersion(historyRow("t1", 1));
  await table.insertVersion(historyRow("t1", 2, { isCurrent: false, effectiveEnd: "2024-01-05T00:00:00.000Z" }));

  const action = await healTrack(table, "t1", { logger: noopLogger });
  assert.deepEqual(action, { trackId: "t1", expiredVersions: [1], insertedVersion: 3 });
  assert.deepEqual(await table.findIntegrityIssues(), []);
  table.close();
});

test("healing a healthy or unknown track does nothing", async () => {
  const table = memoryHistory();
  await table.insertVersion(historyRow("t1", 1));
  assert.equal(await healTrack(table, "t1", { logger: noopLogger }), null);
  assert.equal(await healTrack(table, "missing", { logger: noopLogger }), null);
  table.close();
});

test("a current row with an end is reported and carried forward as a fresh version", async () => {
  const table = memoryHistory();
  await table.insertVersion(historyRow("t1", 1, { effectiveEnd: "2024-01-05T00:00:00.000Z" }));

  assert.deepEqual(await table.findIntegrityIssues(), [
    { trackId: "t1", kind: "expired_current", currentCount: 1, latestVersion: 1 },
  ]);

  const report = await auditHistory(table, { heal: true, logger: noopLogger });
  assert.deepEqual(report.healed, [{ trackId: "t1", expiredVersions: [1], insertedVersion: 2 }]);

  const [v1, v2] = await table.listVersions("t1");
  assert.equal(v1.isCurrent, false);
  assert.equal(v1.effectiveEnd, "2024-01-05T00:00:00.000Z");
  assert.equal(v2.isCurrent, true);
  assert.equal(v2.effectiveStart, "2024-01-05T00:00:00.000Z");
  assert.equal(v2.effectiveEnd, null);
  assert.deepEqual(await table.findIntegrityIssues(), []);
  table.close();
});
