/**
 * Rate and ratio math for live samples and the final summary, plus their
 * console renderings. Every division is guarded: an empty run reports 0.
 */

import type {
  CountersSnapshot,
  ReportSample,
  RunSummary,
} from "./events.ts";

export function ratePerSecond(count: number, elapsedMs: number): number {
  return elapsedMs > 0 ? count / (elapsedMs / 1000) : 0;
}

export function percentOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export interface PreviousSample {
  total: number;
  time: number;
}

export function computeSample(
  snap: CountersSnapshot,
  prev: PreviousSample,
  now: number,
  startTime: number,
  activeWorkers: number,
): ReportSample {
  return {
    ...snap,
    instantRate: ratePerSecond(snap.total - prev.total, now - prev.time),
    averageRate: ratePerSecond(snap.total, now - startTime),
    successRate: percentOf(snap.success, snap.total),
    activeWorkers,
    elapsedMs: now - startTime,
  };
}

export function computeSummary(
  snap: CountersSnapshot,
  elapsedMs: number,
  extra: { abandonedWorkers: number; eventsDropped: number } = {
    abandonedWorkers: 0,
    eventsDropped: 0,
  },
): RunSummary {
  return {
    ...snap,
    successPercent: percentOf(snap.success, snap.total),
    failPercent: percentOf(snap.fail, snap.total),
    elapsedMs,
    averageRate: ratePerSecond(snap.total, elapsedMs),
    ...extra,
  };
}

export function formatStatusLine(s: ReportSample): string {
  return `[STATS] Requests: ${s.total} | Rate: ${
    s.instantRate.toFixed(2)
  } req/s | Avg: ${s.averageRate.toFixed(2)} req/s | Success: ${
    s.successRate.toFixed(1)
  }% | Workers: ${s.activeWorkers}`;
}

export function formatSummary(s: RunSummary): string {
  const lines: string[] = [];
  lines.push("");
  lines.push("═══════════════════════════════════════════════════════════");
  lines.push("  RESULTS");
  lines.push("═══════════════════════════════════════════════════════════");
  lines.push("");
  lines.push(`  Total requests:  ${s.total}`);
  lines.push(`  Successful:      ${s.success}  (${s.successPercent.toFixed(1)}%)`);
  lines.push(`  Failed:          ${s.fail}  (${s.failPercent.toFixed(1)}%)`);
  lines.push(`  Total time:      ${(s.elapsedMs / 1000).toFixed(2)} seconds`);
  lines.push(`  Average rate:    ${s.averageRate.toFixed(2)} requests/second`);
  if (s.abandonedWorkers > 0) {
    lines.push(`  Abandoned:       ${s.abandonedWorkers} worker(s) still in flight`);
  }
  if (s.eventsDropped > 0) {
    lines.push(`  Events dropped:  ${s.eventsDropped}`);
  }
  lines.push("");
  lines.push("═══════════════════════════════════════════════════════════");
  return lines.join("\n");
}
