import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { EmptyInputError } from "../errors";
import { decodeSample } from "../sim/codec";
import { SessionSupervisor, filterUserIds } from "../sim/supervisor";
import { topicForUser } from "../store";
import { MemoryStore } from "../store/memory_store";
import { silentLogger, sleep, testConfig, waitFor } from "./helpers";

const log = silentLogger();

function makeSupervisor(overrides: Parameters<typeof testConfig>[0] = {}) {
  const store = new MemoryStore();
  const supervisor = new SessionSupervisor({ store, log, config: testConfig(overrides) });
  const count = (userId: string): number => store.count(topicForUser(userId));
  return { store, supervisor, count };
}

describe("filterUserIds", () => {
  it("drops empty ids and duplicates but keeps whitespace ids", () => {
    assert.deepEqual(filterUserIds(["a", "", " ", "b", "a"], log), ["a", " ", "b"]);
  });
});

describe("SessionSupervisor", () => {
  it("spawns one generator per valid id", async () => {
    const { supervisor } = makeSupervisor();
    const ack = await supervisor.start(["a", "", " ", "b"]);

    assert.equal(ack.user_count, 3);
    assert.deepEqual(ack.user_ids, ["a", " ", "b"]);
    assert.equal(ack.duration_ms, 60_000);
    assert.deepEqual(supervisor.state.activeUserIds(), ["a", " ", "b"]);
    assert.equal(supervisor.status().active, true);

    await supervisor.stop();
  });

  it("stop clears the table and nothing is appended afterwards", async () => {
    const { supervisor, count } = makeSupervisor();
    await supervisor.start(["a", "b"]);
    await sleep(30);

    const ack = await supervisor.stop();
    assert.deepEqual(ack, { stopped: 2 });
    assert.deepEqual(supervisor.state.activeUserIds(), []);
    assert.equal(supervisor.state.session, null);

    const a = count("a");
    const b = count("b");
    assert.ok(a > 0 && b > 0);
    await sleep(60);
    assert.equal(count("a"), a);
    assert.equal(count("b"), b);
  });

  it("stop without a session is a no-op", async () => {
    const { supervisor } = makeSupervisor();
    assert.deepEqual(await supervisor.stop(), { stopped: 0 });
    assert.deepEqual(await supervisor.stop(), { stopped: 0 });
    assert.equal(supervisor.status().active, false);
  });

  it("collapses duplicate ids into one generator", async () => {
    const { supervisor } = makeSupervisor();
    const ack = await supervisor.start(["a", "a"]);
    assert.equal(ack.user_count, 1);
    assert.deepEqual(await supervisor.stop(), { stopped: 1 });
  });

  it("rejects an id list with nothing valid and keeps the running session", async () => {
    const { supervisor } = makeSupervisor();
    await supervisor.start(["keep"]);

    await assert.rejects(supervisor.start(["", ""]), EmptyInputError);
    assert.deepEqual(supervisor.status().user_ids, ["keep"]);

    await supervisor.stop();
  });

  it("a new start tears down the previous session first", async () => {
    const { supervisor, count } = makeSupervisor();
    const first = await supervisor.start(["old"]);
    await sleep(30);

    const second = await supervisor.start(["new"]);
    assert.notEqual(second.session_id, first.session_id);
    assert.deepEqual(supervisor.state.activeUserIds(), ["new"]);

    const frozen = count("old");
    await sleep(60);
    assert.equal(count("old"), frozen);
    assert.ok(count("new") > 0);

    await supervisor.stop();
  });

  it("expires the session at its deadline without a stop", async () => {
    const { supervisor, count } = makeSupervisor({ session_duration_ms: 40 });
    await supervisor.start(["d"]);

    await waitFor(() => !supervisor.status().active, 1000);
    assert.deepEqual(supervisor.state.activeUserIds(), []);

    // drains the expired session's last flush
    await supervisor.shutdown();
    const settled = count("d");
    assert.ok(settled > 0);
    await sleep(50);
    assert.equal(count("d"), settled);
  });

  it("reports the live session in status", async () => {
    const { supervisor } = makeSupervisor();
    const ack = await supervisor.start(["s1", "s2"]);
    const status = supervisor.status();

    assert.equal(status.session_id, ack.session_id);
    assert.deepEqual(status.user_ids, ["s1", "s2"]);
    assert.equal(status.started_at, ack.started_at);
    assert.equal(Date.parse(ack.deadline_at) - Date.parse(ack.started_at), 60_000);

    await supervisor.shutdown();
    assert.equal(supervisor.status().active, false);
  });

  it("seeds every generator independently", async () => {
    const { supervisor, store } = makeSupervisor();
    await supervisor.start(["p", "q"]);
    await supervisor.stop();

    const [p] = (await store.readAll(topicForUser("p"))).map(decodeSample);
    const [q] = (await store.readAll(topicForUser("q"))).map(decodeSample);
    assert.notEqual(p.deltaX, q.deltaX);
  });
});
