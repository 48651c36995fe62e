/**
 * Record types shared between the engine, the CLI and the event log.
 */

export interface CountersSnapshot {
  total: number;
  success: number;
  fail: number;
}

/** Per-request detail, emitted only in detailed mode. */
export interface RequestEvent {
  workerId: number;
  statusCode: number;
  timestamp: number;
}

export interface ReportSample extends CountersSnapshot {
  /** Requests per second since the previous sample. */
  instantRate: number;
  /** Requests per second since the run started. */
  averageRate: number;
  /** Percentage of attempts that succeeded, 0-100. */
  successRate: number;
  activeWorkers: number;
  elapsedMs: number;
}

export interface RunSummary extends CountersSnapshot {
  successPercent: number;
  failPercent: number;
  elapsedMs: number;
  averageRate: number;
  abandonedWorkers: number;
  eventsDropped: number;
}

/** First line of an NDJSON event log. */
export interface MetaEvent {
  type: "meta";
  target: string;
  workers: number;
  timeoutMs: number;
  startedAt: string;
}
