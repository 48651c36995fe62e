/**
 * Load test configuration: defaults and validation.
 */

export interface LoadConfig {
  host: string;
  path: string;
  workers: number;
  timeoutMs: number;
  reportIntervalMs: number;
  detailed: boolean;
  channelCapacity: number;
  joinTimeoutMs: number;
  pollIntervalMs: number;
  /** Stop the run after this many seconds. */
  durationSec?: number;
  /** Stop each worker after this many attempts. */
  attemptsPerWorker?: number;
}

export const DEFAULTS = {
  path: "/",
  workers: 50,
  timeoutMs: 3_000,
  reportIntervalMs: 1_000,
  detailed: false,
  channelCapacity: 10_000,
  joinTimeoutMs: 1_000,
  pollIntervalMs: 100,
} as const;

export const DEFAULT_SERVE_PORT = 8080;

export type LoadConfigOverrides = Partial<Omit<LoadConfig, "host">>;

export function resolveLoadConfig(
  host: string,
  overrides: LoadConfigOverrides = {},
): LoadConfig {
  const config: LoadConfig = {
    host,
    path: overrides.path ?? DEFAULTS.path,
    workers: overrides.workers ?? DEFAULTS.workers,
    timeoutMs: overrides.timeoutMs ?? DEFAULTS.timeoutMs,
    reportIntervalMs: overrides.reportIntervalMs ?? DEFAULTS.reportIntervalMs,
    detailed: overrides.detailed ?? DEFAULTS.detailed,
    channelCapacity: overrides.channelCapacity ?? DEFAULTS.channelCapacity,
    joinTimeoutMs: overrides.joinTimeoutMs ?? DEFAULTS.joinTimeoutMs,
    pollIntervalMs: overrides.pollIntervalMs ?? DEFAULTS.pollIntervalMs,
    durationSec: overrides.durationSec,
    attemptsPerWorker: overrides.attemptsPerWorker,
  };

  validateLoadConfig(config);
  return config;
}

export function validateLoadConfig(config: LoadConfig): void {
  if (!config.host.trim()) {
    throw new Error("A target host is required");
  }
  requireInteger("workers", config.workers, 1);
  requirePositive("timeout", config.timeoutMs);
  requirePositive("report interval", config.reportIntervalMs);
  requireInteger("channel capacity", config.channelCapacity, 1);
  requirePositive("join timeout", config.joinTimeoutMs);
  requirePositive("poll interval", config.pollIntervalMs);
  if (config.durationSec !== undefined) {
    requirePositive("duration", config.durationSec);
  }
  if (config.attemptsPerWorker !== undefined) {
    requireInteger("attempts", config.attemptsPerWorker, 1);
  }
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${field} must be greater than 0, got ${value}`);
  }
}

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${field} must be an integer >= ${min}, got ${value}`);
  }
}
