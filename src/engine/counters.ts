/**
 * Aggregate attempt counters shared by every worker and the reporter.
 *
 * Each method runs to completion without awaiting, so on the event loop a
 * call is one critical section: updates are totally ordered and a snapshot
 * can never observe `total` ahead of `success + fail`.
 */

import type { CountersSnapshot } from "../metrics/events.ts";

export class Counters {
  private _total = 0;
  private _success = 0;
  private _fail = 0;

  recordAttempt(success: boolean): void {
    this._total++;
    if (success) this._success++;
    else this._fail++;
  }

  snapshot(): CountersSnapshot {
    return {
      total: this._total,
      success: this._success,
      fail: this._fail,
    };
  }

  reset(): void {
    this._total = 0;
    this._success = 0;
    this._fail = 0;
  }
}
