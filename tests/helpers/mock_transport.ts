import type { GetOutcome, Transport } from "../../src/transport/types.ts";

export function ok(status = 200): GetOutcome {
  return { ok: true, status, latencyMs: 1 };
}

export function refused(): GetOutcome {
  return {
    ok: false,
    failure: {
      category: "network",
      code: "ECONNREFUSED",
      message: "connect ECONNREFUSED 127.0.0.1:9",
    },
    latencyMs: 1,
  };
}

/** Transport whose answers are scripted by call index. */
export class ScriptedTransport implements Transport {
  calls = 0;
  closed = false;

  constructor(
    private respond: (call: number) => GetOutcome | Promise<GetOutcome>,
  ) {}

  async get(_url: string, _timeoutMs: number): Promise<GetOutcome> {
    const call = this.calls++;
    return await this.respond(call);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Transport whose requests never complete. */
export class HangingTransport implements Transport {
  calls = 0;

  get(_url: string, _timeoutMs: number): Promise<GetOutcome> {
    this.calls++;
    return new Promise(() => {});
  }

  async close(): Promise<void> {}
}
