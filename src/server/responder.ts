/**
 * Companion responder for manual load tests.
 *
 * Answers every GET with 200 and a small HTML page describing the request;
 * logs one line per request. Other methods get 501.
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { hostname } from "node:os";

export interface ResponderOptions {
  port: number;
  host?: string;
  /** Per-request log sink. Defaults to console.log. */
  onRequest?: (line: string) => void;
  now?: () => Date;
}

export interface Responder {
  start(): Promise<string>;
  stop(): Promise<void>;
  readonly port: number;
}

/** Local time as "YYYY-MM-DD HH:MM:SS". */
export function formatServerTime(d: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${
    pad(d.getHours())
  }:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function renderResponderPage(info: {
  clientIp: string;
  path: string;
  serverTime: string;
  hostname: string;
}): string {
  return `<html>
<head>
    <title>Simple HTTP Server</title>
</head>
<body>
    <h1>Hello from the Server!</h1>
    <p>Your IP: ${escapeHtml(info.clientIp)}</p>
    <p>Requested path: ${escapeHtml(info.path)}</p>
    <p>Server time: ${escapeHtml(info.serverTime)}</p>
    <p>Server hostname: ${escapeHtml(info.hostname)}</p>
</body>
</html>
`;
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function clientAddress(req: IncomingMessage): string {
  return req.socket.remoteAddress ?? "unknown";
}

export function createResponder(opts: ResponderOptions): Responder {
  const emit = opts.onRequest ?? ((line: string) => console.log(line));
  const now = opts.now ?? (() => new Date());
  const serverHostname = hostname();
  let server: Server | null = null;
  let boundPort = opts.port;

  function handle(req: IncomingMessage, res: ServerResponse): void {
    const path = req.url ?? "/";
    if (req.method !== "GET") {
      res.writeHead(501, { "Content-Type": "text/plain" });
      res.end(`Unsupported method (${req.method})\n`);
      return;
    }

    const clientIp = clientAddress(req);
    const serverTime = formatServerTime(now());
    emit(`[${serverTime}] Received request from ${clientIp} - Path: ${path}`);

    const body = renderResponderPage({
      clientIp,
      path,
      serverTime,
      hostname: serverHostname,
    });
    res.writeHead(200, {
      "Content-Type": "text/html",
      "Content-Length": Buffer.byteLength(body),
    });
    res.end(body);
  }

  return {
    get port() {
      return boundPort;
    },

    start(): Promise<string> {
      if (server) throw new Error("Responder already started");
      const srv = createServer(handle);
      server = srv;
      return new Promise((resolve, reject) => {
        srv.once("error", reject);
        srv.listen(opts.port, opts.host, () => {
          srv.off("error", reject);
          const addr = srv.address();
          if (addr && typeof addr === "object") {
            boundPort = addr.port;
          }
          resolve(`http://${opts.host ?? "localhost"}:${boundPort}`);
        });
      });
    },

    async stop(): Promise<void> {
      const srv = server;
      if (!srv) return;
      server = null;
      srv.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        srv.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
