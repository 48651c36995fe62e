/**
 * Periodic sampler. Wakes every interval, snapshots the counters and hands a
 * ReportSample to `onSample`. It never emits after shutdown; the final
 * summary belongs to the coordinator.
 */

import type { ReportSample } from "../metrics/events.ts";
import { computeSample } from "../metrics/summary.ts";
import type { Counters } from "./counters.ts";
import type { RunState } from "./run_state.ts";
import { sleep } from "./timing.ts";

export interface ReporterOptions {
  counters: Counters;
  runState: RunState;
  intervalMs: number;
  activeWorkers: () => number;
  onSample: (sample: ReportSample) => void;
  now?: () => number;
}

export class Reporter {
  private lastTotal = 0;
  private lastTime: number;
  private now: () => number;
  private _ticks = 0;

  constructor(private opts: ReporterOptions) {
    this.now = opts.now ?? (() => performance.now());
    this.lastTime = opts.runState.startTime;
  }

  get ticks(): number {
    return this._ticks;
  }

  /** Compute and emit one sample, then advance the remembered previous one. */
  tick(): ReportSample {
    const snap = this.opts.counters.snapshot();
    const now = this.now();
    const sample = computeSample(
      snap,
      { total: this.lastTotal, time: this.lastTime },
      now,
      this.opts.runState.startTime,
      this.opts.activeWorkers(),
    );
    this.opts.onSample(sample);
    this.lastTotal = snap.total;
    this.lastTime = now;
    this._ticks++;
    return sample;
  }

  async run(): Promise<void> {
    const { runState, intervalMs } = this.opts;
    while (runState.running) {
      await sleep(intervalMs, runState.signal);
      if (!runState.running) break;
      this.tick();
    }
  }
}
