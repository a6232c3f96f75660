import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { StoreUnavailableError } from "../errors";
import { Retriever, windowBounds } from "../sim/retriever";
import { topicForUser } from "../store";
import { MemoryStore } from "../store/memory_store";
import { BASE_TS, BrokenStore, encodedAt, silentLogger } from "./helpers";

const log = silentLogger();

describe("windowBounds", () => {
  it("selects the half-open index range", () => {
    assert.deepEqual(windowBounds(10, 0.2, 0.5), { start: 2, end: 5 });
    assert.deepEqual(windowBounds(10, 0, 1), { start: 0, end: 10 });
    assert.deepEqual(windowBounds(3, 0.5, 1), { start: 1, end: 3 });
  });

  it("yields an empty range for equal fractions", () => {
    assert.deepEqual(windowBounds(10, 0.5, 0.5), { start: 5, end: 5 });
    assert.deepEqual(windowBounds(7, 0.5, 0.5), { start: 3, end: 3 });
  });

  it("clamps out-of-range and inverted fractions", () => {
    assert.deepEqual(windowBounds(10, -1, 2), { start: 0, end: 10 });
    assert.deepEqual(windowBounds(10, 0.7, 0.3), { start: 3, end: 3 });
    assert.deepEqual(windowBounds(10, Number.NaN, 1), { start: 0, end: 10 });
    assert.deepEqual(windowBounds(0, 0, 1), { start: 0, end: 0 });
  });

  it("returns floor(max*n) - floor(min*n) elements for every valid window", () => {
    for (let n = 0; n <= 20; n++) {
      for (let i = 0; i <= 8; i++) {
        for (let j = i; j <= 8; j++) {
          const min = i / 8;
          const max = j / 8;
          const { start, end } = windowBounds(n, min, max);
          assert.equal(end - start, Math.floor(max * n) - Math.floor(min * n), `n=${n} min=${min} max=${max}`);
        }
      }
    }
  });
});

async function seededStore(): Promise<MemoryStore> {
  const store = new MemoryStore();
  const topic = topicForUser("u1");
  // out of order across three batches, as racing flush triggers would leave it
  await store.appendBatch(topic, encodedAt(7, 2, 9));
  await store.appendBatch(topic, [...encodedAt(0, 5), "not json", '{"dx":1}']);
  await store.appendBatch(topic, encodedAt(3, 8, 1, 6, 4));
  return store;
}

function offsets(samples: { timestamp: Date }[]): number[] {
  return samples.map((s) => (s.timestamp.getTime() - BASE_TS) / 1000);
}

describe("Retriever.fetch", () => {
  it("returns sorted indices [2, 5) for the 0.2..0.5 window", async () => {
    const retriever = new Retriever({ store: await seededStore(), log });
    assert.deepEqual(offsets(await retriever.fetch("u1", 0.2, 0.5)), [2, 3, 4]);
  });

  it("returns every decodable sample in chronological order", async () => {
    const retriever = new Retriever({ store: await seededStore(), log });
    assert.deepEqual(offsets(await retriever.fetch("u1", 0, 1)), [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("defaults to the full range", async () => {
    const retriever = new Retriever({ store: await seededStore(), log });
    assert.equal((await retriever.fetch("u1")).length, 10);
  });

  it("returns nothing for an empty window", async () => {
    const retriever = new Retriever({ store: await seededStore(), log });
    assert.deepEqual(await retriever.fetch("u1", 0.5, 0.5), []);
  });

  it("clamps out-of-range fractions instead of failing", async () => {
    const retriever = new Retriever({ store: await seededStore(), log });
    assert.equal((await retriever.fetch("u1", -3, 7)).length, 10);
    assert.deepEqual(offsets(await retriever.fetch("u1", 0.9, 0.2)), []);
  });

  it("returns nothing for an unknown user", async () => {
    const retriever = new Retriever({ store: await seededStore(), log });
    assert.deepEqual(await retriever.fetch("ghost", 0, 1), []);
  });

  it("returns nothing when no record decodes", async () => {
    const store = new MemoryStore();
    await store.appendBatch(topicForUser("u2"), ["{}", "[]"]);
    const retriever = new Retriever({ store, log });
    assert.deepEqual(await retriever.fetch("u2", 0, 1), []);
  });

  it("surfaces a closed store as StoreUnavailableError", async () => {
    const store = await seededStore();
    await store.close();
    const retriever = new Retriever({ store, log });
    await assert.rejects(retriever.fetch("u1", 0, 1), StoreUnavailableError);
  });

  it("wraps other read failures in StoreUnavailableError", async () => {
    const retriever = new Retriever({ store: new BrokenStore(), log });
    await assert.rejects(
      retriever.fetch("u1", 0, 1),
      (e: unknown) => e instanceof StoreUnavailableError && /connection reset/.test(e.message)
    );
  });
});
