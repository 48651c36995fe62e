import { test } from "node:test";
import assert from "node:assert/strict";
import { Counters } from "../src/engine/counters.ts";
import { yieldToEventLoop } from "../src/engine/timing.ts";

test("Counters: starts at zero", () => {
  assert.deepEqual(new Counters().snapshot(), { total: 0, success: 0, fail: 0 });
});

test("Counters: recordAttempt increments total and one outcome", () => {
  const counters = new Counters();
  counters.recordAttempt(true);
  counters.recordAttempt(true);
  counters.recordAttempt(false);
  assert.deepEqual(counters.snapshot(), { total: 3, success: 2, fail: 1 });
});

test("Counters: snapshot is a copy", () => {
  const counters = new Counters();
  const before = counters.snapshot();
  counters.recordAttempt(true);
  assert.deepEqual(before, { total: 0, success: 0, fail: 0 });
});

test("Counters: reset zeroes everything", () => {
  const counters = new Counters();
  counters.recordAttempt(false);
  counters.reset();
  assert.deepEqual(counters.snapshot(), { total: 0, success: 0, fail: 0 });
});

test("Counters: interleaved writers never produce a torn or decreasing snapshot", async () => {
  const counters = new Counters();
  const writers = 8;
  const perWriter = 250;
  let done = false;
  const observed: Array<{ total: number; success: number; fail: number }> = [];

  const sampler = (async () => {
    while (!done) {
      observed.push(counters.snapshot());
      await yieldToEventLoop();
    }
  })();

  await Promise.all(
    Array.from({ length: writers }, async (_, w) => {
      for (let i = 0; i < perWriter; i++) {
        counters.recordAttempt((i + w) % 3 !== 0);
        await yieldToEventLoop();
      }
    }),
  );
  done = true;
  await sampler;

  const final = counters.snapshot();
  assert.equal(final.total, writers * perWriter);
  assert.equal(final.total, final.success + final.fail);

  for (let i = 0; i < observed.length; i++) {
    const s = observed[i];
    assert.equal(s.total, s.success + s.fail);
    if (i > 0) {
      const prev = observed[i - 1];
      assert.ok(s.total >= prev.total);
      assert.ok(s.success >= prev.success);
      assert.ok(s.fail >= prev.fail);
    }
  }
});
