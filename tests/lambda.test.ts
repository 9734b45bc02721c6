import assert from "node:assert/strict";
import { test } from "node:test";

import type { LogLevel } from "../src/config/logger";
import { PartialBatchFailure } from "../src/domain/errors";
import type { BuiltDependencies } from "../src/workflows/track-dim-sync/dependencies";
import { createHandler, runFromConfig, type SyncRequest } from "../src/workflows/track-dim-sync/entrypoints/lambda";
import type { TrackDimSyncResult } from "../src/workflows/track-dim-sync/orchestrator";
import { FakeSource, InMemoryStagingStore, memoryHistory, testConfig } from "./support/fakes";

const RESULT: TrackDimSyncResult = {
  status: "succeeded",
  batchId: "tracks_20240301_090000",
  location: "raw/tracks/tracks_20240301_090000.jsonl",
  fetched: 3,
  rejected: 0,
  deduplicated: 3,
  inserted: 3,
  versioned: 0,
  unchanged: 0,
  stale: 0,
  healed: 0,
  processed: 3,
};

function recordingRunner() {
  const requests: SyncRequest[] = [];
  const handler = createHandler(async (request) => {
    requests.push(request);
    return RESULT;
  });
  return { handler, requests };
}

test("a scheduled event runs a full sync", async () => {
  const { handler, requests } = recordingRunner();
  const res = await handler({});
  assert.equal(res.statusCode, 200);
  assert.deepEqual(JSON.parse(res.body), { ok: true, result: RESULT });
  assert.deepEqual(requests, [{}]);
});

test("an API body selects dry run or replay", async () => {
  const { handler, requests } = recordingRunner();
  await handler({ body: JSON.stringify({ dryRun: true }) });
  await handler({ body: JSON.stringify({ replayLocation: "raw/tracks/x.jsonl" }) });
  assert.deepEqual(requests, [{ dryRun: true }, { replayLocation: "raw/tracks/x.jsonl" }]);
});

test("invalid bodies are rejected before running", async () => {
  const { handler, requests } = recordingRunner();

  const badJson = await handler({ body: "{nope" });
  assert.equal(badJson.statusCode, 400);
  assert.deepEqual(JSON.parse(badJson.body), { ok: false, error: "Invalid JSON body" });

  const badShape = await handler({ body: JSON.stringify({ dryRun: "yes" }) });
  assert.equal(badShape.statusCode, 400);
  assert.deepEqual(JSON.parse(badShape.body), { ok: false, error: "Invalid request: Expected boolean, received string" });
  assert.deepEqual(requests, []);
});

test("pipeline failures return their code and replay context", async () => {
  const handler = createHandler(async () => {
    throw new PartialBatchFailure("1 track(s) failed", { batchId: "b1", location: "raw/tracks/b1.jsonl", trackId: "T2" });
  });
  const res = await handler({});
  assert.equal(res.statusCode, 500);
  assert.deepEqual(JSON.parse(res.body), {
    ok: false,
    error: "1 track(s) failed",
    code: "PARTIAL_BATCH_FAILURE",
    context: { batchId: "b1", location: "raw/tracks/b1.jsonl", trackId: "T2" },
  });
});

test("unexpected failures return a plain error", async () => {
  const handler = createHandler(async () => {
    throw new Error("out of memory");
  });
  const res = await handler({});
  assert.equal(res.statusCode, 500);
  assert.deepEqual(JSON.parse(res.body), { ok: false, error: "out of memory" });
});

function emptyCatalogRun(logLevel: string) {
  const lines: { line: string; level: LogLevel }[] = [];
  let closed = 0;
  const run = runFromConfig(testConfig({ LOG_LEVEL: logLevel }), {
    build: (): BuiltDependencies => {
      const history = memoryHistory();
      return {
        source: new FakeSource([]),
        staging: new InMemoryStagingStore(),
        history,
        close: () => {
          closed++;
          history.close();
        },
      };
    },
    sink: (line, level) => lines.push({ line, level }),
  });
  return { run, lines, closed: () => closed };
}

test("runs log at the configured level and close their dependencies", async () => {
  const verbose = emptyCatalogRun("debug");
  const result = await verbose.run({});
  assert.equal(result.status, "no_data");
  assert.equal(verbose.closed(), 1);
  assert.ok(verbose.lines.some(({ line, level }) => level === "info" && line.includes("sync:extracted")));

  const quiet = emptyCatalogRun("warn");
  await quiet.run({});
  assert.equal(quiet.closed(), 1);
  assert.deepEqual(quiet.lines, []);
});
