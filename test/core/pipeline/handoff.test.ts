/**
 * Tests for the inter-stage hand-off channels
 */

import { describe, expect, it } from "vitest";
import { InMemoryHandoff, RedisHandoff } from "../../../src/core/pipeline/handoff";
import { MemoryStore } from "../../helpers/memoryStore";

describe("InMemoryHandoff", () => {
  it("returns what was pushed under the same key", async () => {
    const handoff = new InMemoryHandoff();
    const value = [{ index: "goblin", name: "Goblin", url: "/api/2014/monsters/goblin" }];

    await handoff.push("fetch_monsters", value);

    expect(await handoff.pull("fetch_monsters")).toBe(value);
  });

  it("resolves undefined for a key nothing was pushed under", async () => {
    expect(await new InMemoryHandoff().pull("fetch_monsters")).toBeUndefined();
  });

  it("forgets everything on clear", async () => {
    const handoff = new InMemoryHandoff();
    await handoff.push("a", 1);
    await handoff.clear();
    expect(await handoff.pull("a")).toBeUndefined();
  });
});

describe("RedisHandoff", () => {
  it("stores JSON under a run-scoped key with a TTL", async () => {
    const store = new MemoryStore();
    const handoff = new RedisHandoff(store, { runId: "job-7", ttlSeconds: 60 });

    await handoff.push("select_random_monsters", [{ name: "Orc" }]);

    expect(store.data.get("handoff:job-7:select_random_monsters")).toBe('[{"name":"Orc"}]');
    expect(store.ttls.get("handoff:job-7:select_random_monsters")).toBe(60);
  });

  it("reads values pushed by another instance of the same run", async () => {
    const store = new MemoryStore();
    await new RedisHandoff(store, { runId: "r1" }).push("fetch_monsters", [1, 2]);

    expect(await new RedisHandoff(store, { runId: "r1" }).pull("fetch_monsters")).toEqual([1, 2]);
    expect(await new RedisHandoff(store, { runId: "r2" }).pull("fetch_monsters")).toBeUndefined();
  });

  it("defaults the TTL to one day", async () => {
    const store = new MemoryStore();
    await new RedisHandoff(store, { runId: "r1" }).push("k", null);
    expect(store.ttls.get("handoff:r1:k")).toBe(86400);
  });

  it("deletes the keys it pushed on clear", async () => {
    const store = new MemoryStore();
    const handoff = new RedisHandoff(store, { runId: "r1", prefix: "test" });
    await handoff.push("a", 1);
    await handoff.push("b", 2);
    await store.set("test:r1:other", "3", "EX", 10);

    await handoff.clear();

    expect([...store.data.keys()]).toEqual(["test:r1:other"]);
  });
});
