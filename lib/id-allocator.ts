import { Mutex } from "async-mutex";
import { MapperErrorUtils, OperationError } from "./errors.ts";
import type { KVStore } from "./types.ts";
import { buildCounterKey, buildLockKey } from "./utils.ts";

export const LOCK_FREE = "0";
export const LOCK_HELD = "1";

/**
 * Hands out per-model ids from counters kept in the store.
 *
 * One mutex covers every model of a mapper. Stores with an atomic
 * `increment` are incremented directly; for the others the lock flag is
 * raised around a read-increment-write of the counter.
 */
export class IdAllocator {
  private readonly mutex = new Mutex();
  private readonly lockKey: string;

  constructor(
    private readonly store: KVStore,
    private readonly prefix: string,
  ) {
    this.lockKey = buildLockKey(prefix);
  }

  /**
   * Reset the lock flag; called once when the mapper starts
   */
  async initialize(): Promise<void> {
    try {
      await this.store.set(this.lockKey, LOCK_FREE);
    } catch (error) {
      throw MapperErrorUtils.wrap(error, "allocate");
    }
  }

  isLocked(): boolean {
    return this.mutex.isLocked();
  }

  /**
   * The next id of `modelName`
   */
  async next(modelName: string): Promise<number> {
    const counterKey = buildCounterKey(this.prefix, modelName);
    return await this.mutex.runExclusive(async () => {
      try {
        if (this.store.increment) {
          return await this.store.increment(counterKey);
        }
        return await this.incrementUnderLock(counterKey);
      } catch (error) {
        throw MapperErrorUtils.wrap(error, "allocate", modelName);
      }
    });
  }

  /**
   * The last id handed out for `modelName` (0 when none)
   */
  async current(modelName: string): Promise<number> {
    const counterKey = buildCounterKey(this.prefix, modelName);
    try {
      return parseCounter(await this.store.get(counterKey), modelName);
    } catch (error) {
      throw MapperErrorUtils.wrap(error, "allocate", modelName);
    }
  }

  private async incrementUnderLock(counterKey: string): Promise<number> {
    await this.store.set(this.lockKey, LOCK_HELD);
    try {
      const next = parseCounter(await this.store.get(counterKey)) + 1;
      await this.store.set(counterKey, String(next));
      return next;
    } finally {
      await this.store.set(this.lockKey, LOCK_FREE);
    }
  }
}

const parseCounter = (raw: string | null, modelName?: string): number => {
  if (raw === null) {
    return 0;
  }
  if (!/^[0-9]+$/.test(raw)) {
    throw new OperationError(
      "allocate",
      `counter holds a non-integer value: ${raw}`,
      modelName,
    );
  }
  return Number(raw);
};
