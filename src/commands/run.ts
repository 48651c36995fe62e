/**
 * `run` command: drive load against a target until interrupted.
 */

import { resolveLoadConfig } from "../config.ts";
import {
  evaluateAssertions,
  parseAssertions,
  summaryToAssertionMap,
} from "../engine/assertions.ts";
import {
  Coordinator,
  type ShutdownReason,
} from "../engine/coordinator.ts";
import { setVerbose } from "../log.ts";
import { writeEventLog } from "../metrics/event_log.ts";
import type { MetaEvent, RunSummary } from "../metrics/events.ts";
import { formatStatusLine, formatSummary } from "../metrics/summary.ts";
import { HttpTransport } from "../transport/http.ts";
import { buildTargetUrl } from "../transport/target.ts";

export interface RunCommandOptions {
  host: string;
  path?: string;
  workers?: number;
  timeoutMs?: number;
  reportIntervalMs?: number;
  detailed: boolean;
  outputPath?: string;
  durationSec?: number;
  attemptsPerWorker?: number;
  headers?: Record<string, string>;
  json: boolean;
  verbose: boolean;
  asserts: string[];
}

const SHUTDOWN_NOTICES: Record<ShutdownReason, string> = {
  interrupt: "Shutting down, please wait for workers to complete...",
  stop: "Stopping, please wait for workers to complete...",
  duration: "Duration elapsed, waiting for workers to complete...",
  exhausted: "All workers finished their attempts.",
};

export async function runCommand(opts: RunCommandOptions): Promise<number> {
  setVerbose(opts.verbose);

  // An output file only makes sense with per-request events.
  const detailed = opts.detailed || opts.outputPath !== undefined;
  const config = resolveLoadConfig(opts.host, {
    path: opts.path,
    workers: opts.workers,
    timeoutMs: opts.timeoutMs,
    reportIntervalMs: opts.reportIntervalMs,
    detailed,
    durationSec: opts.durationSec,
    attemptsPerWorker: opts.attemptsPerWorker,
  });
  const assertions = parseAssertions(opts.asserts);
  const url = buildTargetUrl(config.host, config.path);

  if (!opts.json) {
    console.log(`Starting load test against ${url}`);
    console.log(`Using ${config.workers} concurrent workers`);
    const parts = [
      `timeout=${config.timeoutMs / 1000}s`,
      `interval=${config.reportIntervalMs / 1000}s`,
    ];
    if (config.durationSec !== undefined) {
      parts.push(`duration=${config.durationSec}s`);
    }
    if (config.attemptsPerWorker !== undefined) {
      parts.push(`attempts=${config.attemptsPerWorker}/worker`);
    }
    if (config.detailed) parts.push("detailed");
    if (opts.outputPath) parts.push(`output=${opts.outputPath}`);
    console.log(`  ${parts.join("  ")}`);
    console.log("Press Ctrl+C to stop the test\n");
  }

  const meta: MetaEvent = {
    type: "meta",
    target: url,
    workers: config.workers,
    timeoutMs: config.timeoutMs,
    startedAt: new Date().toISOString(),
  };
  const outputPath = opts.outputPath;

  const coordinator = new Coordinator({
    config,
    createTransport: () => new HttpTransport({ headers: opts.headers }),
    onSample: opts.json
      ? undefined
      : (sample) => process.stdout.write(`\r${formatStatusLine(sample)}`),
    onShutdown: (reason) => {
      if (!opts.json) console.log(`\n\n${SHUTDOWN_NOTICES[reason]}`);
    },
    consumeEvents: outputPath
      ? async (events) => {
        await writeEventLog(outputPath, meta, events);
      }
      : undefined,
  });

  const summary = await coordinator.run();

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(formatSummary(summary));
  }

  return reportAssertions(opts, assertions, summary);
}

function reportAssertions(
  opts: RunCommandOptions,
  assertions: ReturnType<typeof parseAssertions>,
  summary: RunSummary,
): number {
  if (assertions.length === 0) return 0;

  const results = evaluateAssertions(assertions, summaryToAssertionMap(summary));
  const failures = results.filter((r) => !r.passed);

  if (!opts.json) {
    console.log("\n  Assertions:");
    for (const r of results) {
      const icon = r.passed ? "\x1b[32mPASS\x1b[0m" : "\x1b[31mFAIL\x1b[0m";
      console.log(
        `    [${icon}] ${r.assertion.raw}  (actual: ${
          isNaN(r.actual) ? "N/A" : r.actual.toFixed(1)
        })`,
      );
    }
  }

  if (failures.length > 0) {
    if (!opts.json) {
      console.error(`\n  ${failures.length} assertion(s) failed.`);
    }
    return 1;
  }

  return 0;
}
