import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InMemoryCheckpointStore } from "../../src/orchestrator/checkpoint.js";
import { createInitialState } from "../../src/orchestrator/state.js";
import { invoiceApproval } from "../helpers/process-fixtures.js";

function state(threadId: string) {
  return createInitialState({ threadId, process: invoiceApproval(), maxCycles: 3 });
}

describe("InMemoryCheckpointStore", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns undefined for an unknown thread", async () => {
    const store = new InMemoryCheckpointStore();
    expect(await store.get("missing")).toBeUndefined();
  });

  it("copies state on put and on get", async () => {
    const store = new InMemoryCheckpointStore();
    const original = state("thread-1");
    await store.put("thread-1", original);

    original.reasoningTrace.push("mutated after put");
    const first = await store.get("thread-1");
    expect(first?.reasoningTrace).toEqual([]);

    first?.reasoningTrace.push("mutated after get");
    const second = await store.get("thread-1");
    expect(second?.reasoningTrace).toEqual([]);
    expect(second).not.toBe(first);
  });

  it("expires entries after the ttl", async () => {
    const store = new InMemoryCheckpointStore({ ttlMs: 1_000 });
    await store.put("thread-1", state("thread-1"));

    vi.advanceTimersByTime(999);
    expect((await store.get("thread-1"))?.threadId).toBe("thread-1");

    vi.advanceTimersByTime(1);
    expect(await store.get("thread-1")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("evicts the oldest write when full", async () => {
    const store = new InMemoryCheckpointStore({ maxEntries: 2 });
    await store.put("a", state("a"));
    await store.put("b", state("b"));
    await store.put("a", state("a"));
    await store.put("c", state("c"));

    expect(store.size).toBe(2);
    expect(await store.get("b")).toBeUndefined();
    expect((await store.get("a"))?.threadId).toBe("a");
    expect((await store.get("c"))?.threadId).toBe("c");
  });

  it("evicts expired entries before live ones", async () => {
    const store = new InMemoryCheckpointStore({ maxEntries: 2, ttlMs: 1_000 });
    await store.put("old", state("old"));
    vi.advanceTimersByTime(500);
    await store.put("live", state("live"));
    vi.advanceTimersByTime(600);
    await store.put("new", state("new"));

    expect(store.size).toBe(2);
    expect((await store.get("live"))?.threadId).toBe("live");
    expect((await store.get("new"))?.threadId).toBe("new");
  });

  it("deletes entries", async () => {
    const store = new InMemoryCheckpointStore();
    await store.put("thread-1", state("thread-1"));
    expect(await store.delete("thread-1")).toBe(true);
    expect(await store.delete("thread-1")).toBe(false);
  });
});
