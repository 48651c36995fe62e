/**
 * Request loop for one worker.
 *
 * Each iteration is one independent attempt: no backoff, no retry. The
 * running check at the top of the loop is the only cancellation point, so a
 * stop takes effect after at most one in-flight request.
 */

import { debug } from "../log.ts";
import type { RequestEvent } from "../metrics/events.ts";
import {
  classifyError,
  type GetOutcome,
  type Transport,
} from "../transport/types.ts";
import type { EventChannel } from "./channel.ts";
import type { Counters } from "./counters.ts";
import type { RunState } from "./run_state.ts";
import { yieldToEventLoop } from "./timing.ts";

export interface WorkerOptions {
  workerId: number;
  url: string;
  timeoutMs: number;
  transport: Transport;
  counters: Counters;
  runState: RunState;
  events?: EventChannel<RequestEvent> | null;
  maxAttempts?: number;
}

export interface WorkerResult {
  workerId: number;
  attempts: number;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

export function isSuccessfulOutcome(outcome: GetOutcome): boolean {
  return outcome.ok && isSuccessStatus(outcome.status);
}

/** A transport that throws is treated like one that reported a failure. */
async function attempt(
  transport: Transport,
  url: string,
  timeoutMs: number,
): Promise<GetOutcome> {
  const start = performance.now();
  try {
    return await transport.get(url, timeoutMs);
  } catch (e) {
    return {
      ok: false,
      failure: classifyError(e),
      latencyMs: performance.now() - start,
    };
  }
}

export async function runWorker(opts: WorkerOptions): Promise<WorkerResult> {
  const { workerId, url, timeoutMs, transport, counters, runState } = opts;
  let attempts = 0;

  try {
    while (true) {
      await yieldToEventLoop();
      if (!runState.running) break;
      if (opts.maxAttempts !== undefined && attempts >= opts.maxAttempts) {
        break;
      }

      const outcome = await attempt(transport, url, timeoutMs);
      const success = isSuccessfulOutcome(outcome);
      counters.recordAttempt(success);
      attempts++;

      if (outcome.ok) {
        debug(
          `worker ${workerId}: ${outcome.status} ${outcome.latencyMs.toFixed(1)}ms`,
        );
        opts.events?.trySend({
          workerId,
          statusCode: outcome.status,
          timestamp: Date.now(),
        });
      } else {
        debug(
          `worker ${workerId}: ${outcome.failure.category} ${outcome.failure.code} ${outcome.failure.message}`,
        );
      }
    }
  } finally {
    await transport.close();
  }

  return { workerId, attempts };
}
