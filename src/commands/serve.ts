/**
 * `serve` command: run the companion responder until interrupted.
 */

import { hostname } from "node:os";
import { once } from "node:events";
import { DEFAULT_SERVE_PORT } from "../config.ts";
import { createResponder } from "../server/responder.ts";

export interface ServeCommandOptions {
  port?: number;
  host?: string;
}

export async function serveCommand(opts: ServeCommandOptions): Promise<number> {
  const port = opts.port ?? DEFAULT_SERVE_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`port must be an integer between 0 and 65535, got ${port}`);
  }

  const responder = createResponder({ port, host: opts.host });
  await responder.start();
  console.log(`Starting server on port ${responder.port}...`);
  console.log(`Server hostname: ${hostname()}`);

  await once(process, "SIGINT");

  console.log("\nShutting down server...");
  await responder.stop();
  console.log("Server shutdown complete.");
  return 0;
}
