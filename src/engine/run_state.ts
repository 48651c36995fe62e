/**
 * Per-run lifecycle flag. The abort signal doubles as the cancellation token
 * handed to workers and the reporter.
 */

export class RunState {
  private controller = new AbortController();
  private _startTime: number;

  constructor(startTime: number) {
    this._startTime = startTime;
  }

  get running(): boolean {
    return !this.controller.signal.aborted;
  }

  get startTime(): number {
    return this._startTime;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Returns true only for the call that actually stopped the run. */
  stop(): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort();
    return true;
  }
}
