/**
 * Run lifecycle: idle → running → draining → reported.
 *
 * The coordinator owns the counters, the run flag and the event channel,
 * spawns the reporter and N workers, waits for a shutdown trigger, joins the
 * workers with a bounded wait and returns the final summary. A worker that
 * fails while exiting is logged; the summary is still returned.
 *
 * Shutdown triggers: SIGINT, `stop()`, the optional duration timer, or every
 * worker reaching its attempt limit. Only the first one has any effect.
 */

import type { LoadConfig } from "../config.ts";
import { log } from "../log.ts";
import type {
  ReportSample,
  RequestEvent,
  RunSummary,
} from "../metrics/events.ts";
import { computeSummary } from "../metrics/summary.ts";
import { buildTargetUrl } from "../transport/target.ts";
import type { Transport } from "../transport/types.ts";
import { EventChannel } from "./channel.ts";
import { Counters } from "./counters.ts";
import { Reporter } from "./reporter.ts";
import { RunState } from "./run_state.ts";
import { sleep } from "./timing.ts";
import { runWorker, type WorkerResult } from "./worker.ts";

export type CoordinatorState = "idle" | "running" | "draining" | "reported";

export type ShutdownReason = "interrupt" | "stop" | "duration" | "exhausted";

export type SignalSource = Pick<NodeJS.EventEmitter, "on" | "off">;

export interface CoordinatorOptions {
  config: LoadConfig;
  createTransport: () => Transport;
  counters?: Counters;
  onSample?: (sample: ReportSample) => void;
  onShutdown?: (reason: ShutdownReason) => void;
  /** Reads the event channel in detailed mode. Runs until the channel closes. */
  consumeEvents?: (events: EventChannel<RequestEvent>) => Promise<void>;
  /** Where SIGINT is listened for. Defaults to the process. */
  signals?: SignalSource;
  now?: () => number;
}

type WorkerExit =
  | { ok: true; result: WorkerResult }
  | { ok: false; error: unknown };

interface TrackedWorker {
  workerId: number;
  done: Promise<WorkerExit>;
}

export class Coordinator {
  private _state: CoordinatorState = "idle";
  private _active = 0;
  private runState: RunState | null = null;
  private counters: Counters;
  private signals: SignalSource;
  private now: () => number;

  constructor(private opts: CoordinatorOptions) {
    this.counters = opts.counters ?? new Counters();
    this.signals = opts.signals ?? process;
    this.now = opts.now ?? (() => performance.now());
  }

  get state(): CoordinatorState {
    return this._state;
  }

  get activeWorkers(): number {
    return this._active;
  }

  /** Begin draining. Returns false when the run was not running. */
  stop(reason: ShutdownReason = "stop"): boolean {
    if (this._state !== "running" || !this.runState) return false;
    this._state = "draining";
    this.runState.stop();
    this.opts.onShutdown?.(reason);
    return true;
  }

  private onInterrupt = (): void => {
    this.stop("interrupt");
  };

  /**
   * Everything up to the first await runs synchronously, so a `stop()`
   * issued right after `run()` is observed before any worker's first attempt.
   */
  async run(): Promise<RunSummary> {
    if (this._state !== "idle") {
      throw new Error(`Coordinator cannot run from state '${this._state}'`);
    }
    const { config } = this.opts;
    const url = buildTargetUrl(config.host, config.path);

    // Every transport exists before the run starts; if one cannot be created
    // the ones already made are closed and the coordinator stays idle.
    const transports: Transport[] = [];
    try {
      for (let i = 0; i < config.workers; i++) {
        transports.push(this.opts.createTransport());
      }
    } catch (e) {
      await Promise.allSettled(transports.map((t) => t.close()));
      throw e;
    }

    this.counters.reset();
    const runState = new RunState(this.now());
    this.runState = runState;
    this._state = "running";
    this.signals.on("SIGINT", this.onInterrupt);
    let durationTimer: NodeJS.Timeout | null = null;

    try {
      const channel = config.detailed
        ? new EventChannel<RequestEvent>(config.channelCapacity)
        : null;
      const consumer = channel ? this.consume(channel) : null;

      const reporter = new Reporter({
        counters: this.counters,
        runState,
        intervalMs: config.reportIntervalMs,
        activeWorkers: () => this._active,
        onSample: (sample) => this.opts.onSample?.(sample),
        now: this.now,
      });
      const reporterDone = reporter.run();

      const workers = transports.map((transport, workerId) =>
        this.spawnWorker(workerId, url, transport, runState, channel)
      );

      if (config.durationSec !== undefined) {
        durationTimer = setTimeout(
          () => this.stop("duration"),
          config.durationSec * 1000,
        );
      }

      await this.waitForShutdown(runState);
      this.stop("exhausted");

      const abandoned = await this.joinWorkers(workers);
      await reporterDone;
      channel?.close();
      if (consumer) await consumer;

      return computeSummary(
        this.counters.snapshot(),
        this.now() - runState.startTime,
        { abandonedWorkers: abandoned, eventsDropped: channel?.dropped ?? 0 },
      );
    } finally {
      if (durationTimer) clearTimeout(durationTimer);
      runState.stop();
      this.signals.off("SIGINT", this.onInterrupt);
      this._state = "reported";
    }
  }

  /** A failing event sink is logged and never affects the run. */
  private async consume(channel: EventChannel<RequestEvent>): Promise<void> {
    if (!this.opts.consumeEvents) return;
    try {
      await this.opts.consumeEvents(channel);
    } catch (e) {
      log(`event consumer failed: ${describeError(e)}`);
    }
  }

  private spawnWorker(
    workerId: number,
    url: string,
    transport: Transport,
    runState: RunState,
    channel: EventChannel<RequestEvent> | null,
  ): TrackedWorker {
    const { config } = this.opts;
    this._active++;
    const done = runWorker({
      workerId,
      url,
      timeoutMs: config.timeoutMs,
      transport,
      counters: this.counters,
      runState,
      events: channel,
      maxAttempts: config.attemptsPerWorker,
    }).then(
      (result): WorkerExit => ({ ok: true, result }),
      (error: unknown): WorkerExit => ({ ok: false, error }),
    ).finally(() => {
      this._active--;
    });
    return { workerId, done };
  }

  private async waitForShutdown(runState: RunState): Promise<void> {
    while (runState.running && this._active > 0) {
      await sleep(this.opts.config.pollIntervalMs, runState.signal);
    }
  }

  /** Returns the number of workers abandoned after the join timeout. */
  private async joinWorkers(workers: TrackedWorker[]): Promise<number> {
    const { joinTimeoutMs } = this.opts.config;
    let abandoned = 0;

    await Promise.all(workers.map(async (w) => {
      const timer = new AbortController();
      const exit = await Promise.race([
        w.done,
        sleep(joinTimeoutMs, timer.signal).then(() => null),
      ]);
      timer.abort();

      if (exit === null) {
        abandoned++;
        log(
          `worker ${w.workerId} did not stop within ${joinTimeoutMs}ms; abandoning`,
        );
      } else if (!exit.ok) {
        log(`worker ${w.workerId} failed: ${describeError(exit.error)}`);
      }
    }));

    return abandoned;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
