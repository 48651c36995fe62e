import { test } from "node:test";
import assert from "node:assert/strict";
import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { createResponder } from "../src/server/responder.ts";
import { HttpTransport } from "../src/transport/http.ts";

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const addr: AddressInfo | string | null = server.address();
      resolve(addr && typeof addr === "object" ? addr.port : 0);
    });
  });
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

test("HttpTransport: 200 from the companion responder", async () => {
  const responder = createResponder({
    port: 0,
    host: "127.0.0.1",
    onRequest: () => {},
  });
  const url = await responder.start();
  const transport = new HttpTransport();
  try {
    const first = await transport.get(`${url}/`, 1000);
    const second = await transport.get(`${url}/again`, 1000);
    assert.equal(first.ok && first.status, 200);
    assert.equal(second.ok && second.status, 200);
  } finally {
    await transport.close();
    await responder.stop();
  }
});

test("HttpTransport: error status is a response, not a failure", async () => {
  const server = createServer((_req, res) => {
    res.writeHead(503);
    res.end("busy");
  });
  const port = await listen(server);
  const transport = new HttpTransport({ headers: { "x-test": "1" } });
  try {
    const outcome = await transport.get(`http://127.0.0.1:${port}/`, 1000);
    assert.equal(outcome.ok, true);
    assert.equal(outcome.ok && outcome.status, 503);
  } finally {
    await transport.close();
    await close(server);
  }
});

test("HttpTransport: sends configured headers", async () => {
  let seen: string | undefined;
  const server = createServer((req, res) => {
    const value = req.headers["x-test"];
    seen = typeof value === "string" ? value : undefined;
    res.end("ok");
  });
  const port = await listen(server);
  const transport = new HttpTransport({ headers: { "x-test": "placeholder" } });
  try {
    await transport.get(`http://127.0.0.1:${port}/`, 1000);
    assert.equal(seen, "placeholder");
  } finally {
    await transport.close();
    await close(server);
  }
});

test("HttpTransport: connection refused is a network failure", async () => {
  const server = createServer();
  const port = await listen(server);
  await close(server);

  const transport = new HttpTransport();
  try {
    const outcome = await transport.get(`http://127.0.0.1:${port}/`, 1000);
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.failure.category, "network");
      assert.equal(outcome.failure.code, "ECONNREFUSED");
    }
  } finally {
    await transport.close();
  }
});

test("HttpTransport: a silent server times out", async () => {
  const server = createServer(() => {
    // never respond
  });
  const port = await listen(server);
  const transport = new HttpTransport();
  try {
    const outcome = await transport.get(`http://127.0.0.1:${port}/`, 100);
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.failure.category, "timeout");
      assert.ok(outcome.latencyMs >= 90);
    }
  } finally {
    await close(server);
    await transport.close();
  }
});

test("HttpTransport: get after close throws", async () => {
  const transport = new HttpTransport();
  await transport.close();
  assert.equal(transport.closed, true);
  await assert.rejects(
    transport.get("http://127.0.0.1:9/", 100),
    /Transport is closed/,
  );
});
