/**
 * http-flood — concurrent HTTP load generator.
 */

import { parseArgs } from "./args.ts";
import { runCommand } from "./commands/run.ts";
import { serveCommand } from "./commands/serve.ts";
import { DEFAULT_SERVE_PORT, DEFAULTS } from "./config.ts";

function usage(): void {
  console.log(`
http-flood - Concurrent HTTP load generator

USAGE:
  http-flood run <host> [options]
  http-flood serve [--port <port>] [--host <addr>]

COMMANDS:
  run               Send GET requests to <host> until Ctrl+C
  serve             Start the companion responder for manual testing

RUN OPTIONS:
  --path            HTTP path to request (default: ${DEFAULTS.path})
  -c, --concurrency Number of concurrent workers (default: ${DEFAULTS.workers})
  -t, --timeout     Request timeout in seconds (default: ${DEFAULTS.timeoutMs / 1000})
  -i, --report-interval
                    Stats reporting interval in seconds (default: ${
    DEFAULTS.reportIntervalMs / 1000
  })
  --detailed        Collect per-request events
  -o, --output      Write per-request events to an NDJSON file (implies --detailed)
  -d, --duration    Stop after this many seconds
  -n, --attempts    Stop each worker after this many requests
  -H, --header      Extra HTTP header (Key: Value), repeatable
  --json            Output JSON summary to stdout
  --assert          Threshold check, repeatable (e.g. "success_rate >= 99%")
  -v, --verbose     Log every request to stderr

SERVE OPTIONS:
  -p, --port        Port to listen on (default: ${DEFAULT_SERVE_PORT})
  --host            Address to bind (default: all interfaces)

EXAMPLES:
  http-flood run 10.0.0.5 -c 100
  http-flood run localhost:8080 --path /health -t 1 -i 0.5
  http-flood run http://localhost:8080 -d 30 --json --assert "error_rate < 1%"
  http-flood run localhost:8080 -o events.ndjson
  http-flood serve --port 8080
`);
}

async function main(): Promise<number> {
  const raw = process.argv.slice(2);

  if (raw.length === 0 || raw[0] === "--help" || raw[0] === "-h") {
    usage();
    return 0;
  }

  const parsed = parseArgs(raw);

  switch (parsed.command) {
    case "run": {
      const host = parsed.positionalArgs[0];
      if (!host) {
        console.error("Error: run requires a target host");
        return 1;
      }
      return await runCommand({
        host,
        path: parsed.opts.path,
        workers: parsed.opts.workers,
        timeoutMs: parsed.opts.timeoutMs,
        reportIntervalMs: parsed.opts.reportIntervalMs,
        detailed: parsed.opts.detailed,
        outputPath: parsed.opts.outputPath,
        durationSec: parsed.opts.durationSec,
        attemptsPerWorker: parsed.opts.attemptsPerWorker,
        headers: Object.keys(parsed.opts.headers).length > 0
          ? parsed.opts.headers
          : undefined,
        json: parsed.opts.json,
        verbose: parsed.opts.verbose,
        asserts: parsed.opts.asserts,
      });
    }

    case "serve":
      return await serveCommand({
        port: parsed.opts.port,
        host: parsed.opts.host,
      });

    default:
      console.error(`Unknown command: ${parsed.command}`);
      usage();
      return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    console.error(`Fatal: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  },
);
