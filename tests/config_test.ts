import { test } from "node:test";
import assert from "node:assert/strict";
import { DEFAULTS, resolveLoadConfig } from "../src/config.ts";

test("resolveLoadConfig: applies defaults", () => {
  const config = resolveLoadConfig("10.0.0.5");
  assert.deepEqual(config, {
    host: "10.0.0.5",
    path: "/",
    workers: 50,
    timeoutMs: 3000,
    reportIntervalMs: 1000,
    detailed: false,
    channelCapacity: 10_000,
    joinTimeoutMs: 1000,
    pollIntervalMs: 100,
    durationSec: undefined,
    attemptsPerWorker: undefined,
  });
  assert.equal(config.joinTimeoutMs < config.timeoutMs, true);
});

test("resolveLoadConfig: overrides win", () => {
  const config = resolveLoadConfig("localhost:8080", {
    path: "/health",
    workers: 4,
    detailed: true,
  });
  assert.equal(config.path, "/health");
  assert.equal(config.workers, 4);
  assert.equal(config.detailed, true);
  assert.equal(config.timeoutMs, DEFAULTS.timeoutMs);
});

test("resolveLoadConfig: rejects an empty host", () => {
  assert.throws(() => resolveLoadConfig("  "), /A target host is required/);
});

test("resolveLoadConfig: rejects bad worker counts", () => {
  assert.throws(
    () => resolveLoadConfig("h", { workers: 0 }),
    /workers must be an integer >= 1, got 0/,
  );
  assert.throws(
    () => resolveLoadConfig("h", { workers: 2.5 }),
    /workers must be an integer >= 1, got 2.5/,
  );
});

test("resolveLoadConfig: rejects non-positive timings", () => {
  assert.throws(
    () => resolveLoadConfig("h", { timeoutMs: -1 }),
    /timeout must be greater than 0, got -1/,
  );
  assert.throws(
    () => resolveLoadConfig("h", { reportIntervalMs: 0 }),
    /report interval must be greater than 0, got 0/,
  );
  assert.throws(
    () => resolveLoadConfig("h", { durationSec: 0 }),
    /duration must be greater than 0, got 0/,
  );
});

test("resolveLoadConfig: rejects a zero attempt limit", () => {
  assert.throws(
    () => resolveLoadConfig("h", { attemptsPerWorker: 0 }),
    /attempts must be an integer >= 1, got 0/,
  );
});
