import assert from "node:assert/strict";
import { test } from "node:test";

import { loadConfig, requireValue } from "../src/config/config";
import { ConfigurationError } from "../src/domain/errors";

test("loadConfig applies defaults for an empty environment", () => {
  const cfg = loadConfig({});
  assert.equal(cfg.aws.region, "us-east-1");
  assert.equal(cfg.spotify.albumLimit, 5);
  assert.equal(cfg.spotify.baseUrl, "https://api.spotify.com/v1");
  assert.equal(cfg.spotify.maxRetries, 3);
  assert.equal(cfg.staging.prefix, "raw/tracks");
  assert.equal(cfg.staging.bucket, undefined);
  assert.equal(cfg.warehouse.path, "./data/warehouse.db");
  assert.equal(cfg.lock.ttlSeconds, 900);
  assert.equal(cfg.pipeline.malformedRecordPolicy, "skip");
  assert.equal(cfg.logLevel, "info");
});

test("loadConfig reads overrides and treats blank values as unset", () => {
  const cfg = loadConfig({
    NEW_RELEASES_LIMIT: "12",
    S3_BUCKET_NAME: "  landing  ",
    SPOTIFY_MARKET: "   ",
    MALFORMED_RECORD_POLICY: "ABORT",
    LOG_LEVEL: "debug",
  });
  assert.equal(cfg.spotify.albumLimit, 12);
  assert.equal(cfg.staging.bucket, "landing");
  assert.equal(cfg.spotify.market, undefined);
  assert.equal(cfg.pipeline.malformedRecordPolicy, "abort");
  assert.equal(cfg.logLevel, "debug");
});

test("loadConfig rejects non-integer numbers", () => {
  assert.throws(() => loadConfig({ NEW_RELEASES_LIMIT: "five" }), (err: unknown) => {
    assert.ok(err instanceof ConfigurationError);
    assert.equal(err.message, 'NEW_RELEASES_LIMIT must be a non-negative integer, got "five"');
    return true;
  });
  assert.throws(() => loadConfig({ LOCK_TTL_SECONDS: "-1" }), ConfigurationError);
});

test("loadConfig rejects an unknown malformed-record policy", () => {
  assert.throws(() => loadConfig({ MALFORMED_RECORD_POLICY: "coerce" }), ConfigurationError);
});

test("requireValue returns present values and names missing ones", () => {
  assert.equal(requireValue("x", "NAME"), "x");
  assert.throws(() => requireValue(undefined, "S3_BUCKET_NAME"), { message: "S3_BUCKET_NAME is required" });
});
