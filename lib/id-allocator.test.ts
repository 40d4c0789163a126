import { describe, expect, it } from "vitest";
import { OperationError } from "./errors.ts";
import { IdAllocator, LOCK_FREE, LOCK_HELD } from "./id-allocator.ts";
import { MemoryStore } from "./stores/memory-store.ts";
import type { KVStore } from "./types.ts";

/**
 * A store without atomic increment that records every write
 */
class RecordingStore implements KVStore {
  readonly writes: [string, string][] = [];
  private readonly inner = new MemoryStore();

  async get(key: string): Promise<string | null> {
    // yield so concurrent callers interleave
    await new Promise((resolve) => setTimeout(resolve, 0));
    return await this.inner.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.writes.push([key, value]);
    await this.inner.set(key, value);
  }

  multiGet(keys: string[]): Promise<(string | null)[]> {
    return this.inner.multiGet(keys);
  }

  multiSet(entries: Record<string, string>): Promise<void> {
    return this.inner.multiSet(entries);
  }

  delete(...keys: string[]): Promise<number> {
    return this.inner.delete(...keys);
  }

  listKeys(pattern: string): Promise<string[]> {
    return this.inner.listKeys(pattern);
  }
}

describe("IdAllocator", () => {
  it("should start every model at 1", async () => {
    const allocator = new IdAllocator(new MemoryStore(), "app");

    expect(await allocator.next("Tag")).toBe(1);
    expect(await allocator.next("Tag")).toBe(2);
    expect(await allocator.next("Task")).toBe(1);
    expect(await allocator.current("Tag")).toBe(2);
    expect(await allocator.current("Other")).toBe(0);
  });

  it("should keep counters under max_id:<prefix>:<model>", async () => {
    const store = new MemoryStore();
    const allocator = new IdAllocator(store, "app");

    await allocator.next("Tag");
    expect(await store.get("max_id:app:Tag")).toBe("1");
  });

  it("should reset the lock flag on initialize", async () => {
    const store = new MemoryStore({ "__lock__:app": LOCK_HELD });

    await new IdAllocator(store, "app").initialize();
    expect(await store.get("__lock__:app")).toBe(LOCK_FREE);
  });

  it("should hand out distinct increasing ids to concurrent callers", async () => {
    const allocator = new IdAllocator(new MemoryStore(), "app");

    const ids = await Promise.all(
      Array.from({ length: 60 }, () => allocator.next("Tag")),
    );
    expect(new Set(ids).size).toBe(60);
    expect([...ids].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 60 }, (_, index) => index + 1),
    );
  });

  it("should raise the lock flag around the fallback increment", async () => {
    const store = new RecordingStore();
    const allocator = new IdAllocator(store, "app");

    expect(await allocator.next("Tag")).toBe(1);
    expect(store.writes).toEqual([
      ["__lock__:app", LOCK_HELD],
      ["max_id:app:Tag", "1"],
      ["__lock__:app", LOCK_FREE],
    ]);
  });

  it("should serialize concurrent fallback increments", async () => {
    const allocator = new IdAllocator(new RecordingStore(), "app");

    const ids = await Promise.all(
      Array.from({ length: 50 }, () => allocator.next("Tag")),
    );
    expect([...ids].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 50 }, (_, index) => index + 1),
    );
    expect(allocator.isLocked()).toBe(false);
  });

  it("should fail on a corrupted counter and release the lock flag", async () => {
    const store = new RecordingStore();
    await store.set("max_id:app:Tag", "twelve");
    const allocator = new IdAllocator(store, "app");

    await expect(allocator.next("Tag")).rejects.toThrow(OperationError);
    expect(await store.get("__lock__:app")).toBe(LOCK_FREE);
  });
});
