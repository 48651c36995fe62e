/**
 * HTTP transport backed by undici. Each instance owns its own keep-alive
 * pool, so one transport per worker gives every worker its own connections.
 */

import { Agent, fetch } from "undici";
import {
  classifyError,
  type GetOutcome,
  type HttpTransportOptions,
  type Transport,
} from "./types.ts";

export class HttpTransport implements Transport {
  private agent: Agent;
  private headers: Record<string, string>;
  private _closed = false;

  constructor(opts: HttpTransportOptions = {}) {
    this.agent = new Agent({
      connections: opts.connections ?? 1,
      keepAliveTimeout: 10_000,
    });
    this.headers = opts.headers ?? {};
  }

  get closed(): boolean {
    return this._closed;
  }

  async get(url: string, timeoutMs: number): Promise<GetOutcome> {
    if (this._closed) throw new Error("Transport is closed");

    const startTime = performance.now();
    try {
      const resp = await fetch(url, {
        method: "GET",
        headers: this.headers,
        dispatcher: this.agent,
        signal: AbortSignal.timeout(timeoutMs),
      });
      // Drain the body so the socket goes back to the pool.
      await resp.arrayBuffer();
      return {
        ok: true,
        status: resp.status,
        latencyMs: performance.now() - startTime,
      };
    } catch (e) {
      return {
        ok: false,
        failure: classifyError(e),
        latencyMs: performance.now() - startTime,
      };
    }
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    await this.agent.close();
  }
}
