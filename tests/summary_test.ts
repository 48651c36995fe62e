import { test } from "node:test";
import assert from "node:assert/strict";
import {
  computeSample,
  computeSummary,
  formatStatusLine,
  formatSummary,
  percentOf,
  ratePerSecond,
} from "../src/metrics/summary.ts";

test("ratePerSecond: guards zero and negative elapsed time", () => {
  assert.equal(ratePerSecond(100, 2000), 50);
  assert.equal(ratePerSecond(100, 0), 0);
  assert.equal(ratePerSecond(100, -5), 0);
});

test("percentOf: zero whole is zero, not NaN", () => {
  assert.equal(percentOf(3, 4), 75);
  assert.equal(percentOf(0, 0), 0);
});

test("computeSample: uses the previous sample for the instant rate", () => {
  const sample = computeSample(
    { total: 300, success: 270, fail: 30 },
    { total: 100, time: 1000 },
    3000,
    0,
    5,
  );
  assert.equal(sample.instantRate, 100);
  assert.equal(sample.averageRate, 100);
  assert.equal(sample.successRate, 90);
  assert.equal(sample.elapsedMs, 3000);
});

test("computeSummary: empty run reports zeros", () => {
  const summary = computeSummary({ total: 0, success: 0, fail: 0 }, 0);
  assert.deepEqual(summary, {
    total: 0,
    success: 0,
    fail: 0,
    successPercent: 0,
    failPercent: 0,
    elapsedMs: 0,
    averageRate: 0,
    abandonedWorkers: 0,
    eventsDropped: 0,
  });
});

test("formatStatusLine: renders one status line", () => {
  const line = formatStatusLine({
    total: 50,
    success: 45,
    fail: 5,
    instantRate: 25,
    averageRate: 12.5,
    successRate: 90,
    activeWorkers: 10,
    elapsedMs: 4000,
  });
  assert.equal(
    line,
    "[STATS] Requests: 50 | Rate: 25.00 req/s | Avg: 12.50 req/s | Success: 90.0% | Workers: 10",
  );
});

test("formatSummary: totals, percentages, time and rate", () => {
  const text = formatSummary(
    computeSummary({ total: 200, success: 150, fail: 50 }, 8000),
  );
  const lines = text.split("\n");
  assert.ok(lines.includes("  Total requests:  200"));
  assert.ok(lines.includes("  Successful:      150  (75.0%)"));
  assert.ok(lines.includes("  Failed:          50  (25.0%)"));
  assert.ok(lines.includes("  Total time:      8.00 seconds"));
  assert.ok(lines.includes("  Average rate:    25.00 requests/second"));
  assert.ok(!lines.some((l) => l.startsWith("  Abandoned:")));
});

test("formatSummary: zero-request run prints 0.0%", () => {
  const lines = formatSummary(
    computeSummary({ total: 0, success: 0, fail: 0 }, 10),
  ).split("\n");
  assert.ok(lines.includes("  Successful:      0  (0.0%)"));
  assert.ok(lines.includes("  Failed:          0  (0.0%)"));
  assert.ok(lines.includes("  Average rate:    0.00 requests/second"));
});

test("formatSummary: mentions abandoned workers and dropped events", () => {
  const lines = formatSummary(
    computeSummary({ total: 4, success: 4, fail: 0 }, 1000, {
      abandonedWorkers: 2,
      eventsDropped: 3,
    }),
  ).split("\n");
  assert.ok(lines.includes("  Abandoned:       2 worker(s) still in flight"));
  assert.ok(lines.includes("  Events dropped:  3"));
});
