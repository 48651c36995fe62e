/**
 * Command-line argument parsing.
 */

export interface ParsedArgs {
  command: string;
  positionalArgs: string[];
  opts: {
    path: string | undefined;
    workers: number | undefined;
    timeoutMs: number | undefined;
    reportIntervalMs: number | undefined;
    detailed: boolean;
    outputPath: string | undefined;
    durationSec: number | undefined;
    attemptsPerWorker: number | undefined;
    json: boolean;
    verbose: boolean;
    asserts: string[];
    headers: Record<string, string>;
    port: number | undefined;
    host: string | undefined;
  };
}

function parseNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new Error(`Option ${flag} requires a value`);
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new Error(`Option ${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined) {
    throw new Error(`Option ${flag} requires a value`);
  }
  return raw;
}

export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0] ?? "";
  let path: string | undefined;
  let workers: number | undefined;
  let timeoutMs: number | undefined;
  let reportIntervalMs: number | undefined;
  let detailed = false;
  let outputPath: string | undefined;
  let durationSec: number | undefined;
  let attemptsPerWorker: number | undefined;
  let json = false;
  let verbose = false;
  let port: number | undefined;
  let host: string | undefined;
  const asserts: string[] = [];
  const headers: Record<string, string> = {};
  const positionalArgs: string[] = [];

  let i = 1;
  while (i < args.length) {
    const arg = args[i];
    switch (arg) {
      case "--path":
        path = requireValue(arg, args[++i]);
        break;
      case "--concurrency":
      case "--workers":
      case "--threads":
      case "-c":
        workers = parseNumber(arg, args[++i]);
        break;
      case "--timeout":
      case "-t":
        timeoutMs = parseNumber(arg, args[++i]) * 1000;
        break;
      case "--report-interval":
      case "-i":
        reportIntervalMs = parseNumber(arg, args[++i]) * 1000;
        break;
      case "--detailed":
        detailed = true;
        break;
      case "--output":
      case "-o":
        outputPath = requireValue(arg, args[++i]);
        break;
      case "--duration":
      case "-d":
        durationSec = parseNumber(arg, args[++i]);
        break;
      case "--attempts":
      case "-n":
        attemptsPerWorker = parseNumber(arg, args[++i]);
        break;
      case "--json":
        json = true;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--assert":
        asserts.push(requireValue(arg, args[++i]));
        break;
      case "--port":
      case "-p":
        port = parseNumber(arg, args[++i]);
        break;
      case "--host":
        host = requireValue(arg, args[++i]);
        break;
      case "--header":
      case "-H": {
        const h = requireValue(arg, args[++i]);
        const colonIdx = h.indexOf(":");
        if (colonIdx > 0) {
          headers[h.slice(0, colonIdx).trim()] = h.slice(colonIdx + 1).trim();
        }
        break;
      }
      default: {
        if (arg.startsWith("-")) {
          throw new Error(`Unknown option: ${arg}`);
        }
        positionalArgs.push(arg);
      }
    }
    i++;
  }

  return {
    command,
    positionalArgs,
    opts: {
      path,
      workers,
      timeoutMs,
      reportIntervalMs,
      detailed,
      outputPath,
      durationSec,
      attemptsPerWorker,
      json,
      verbose,
      asserts,
      headers,
      port,
      host,
    },
  };
}
