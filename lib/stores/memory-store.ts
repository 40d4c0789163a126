import type { KVStore } from "../types.ts";
import { globToRegExp } from "../utils.ts";

/**
 * In-process KVStore, the equivalent of opening a store in memory.
 * Used by tests and for throwaway mappers.
 */
export class MemoryStore implements KVStore {
  private readonly data = new Map<string, string>();

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.data.set(key, value);
    }
  }

  get size(): number {
    return this.data.size;
  }

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async multiGet(keys: string[]): Promise<(string | null)[]> {
    return keys.map((key) => this.data.get(key) ?? null);
  }

  async multiSet(entries: Record<string, string>): Promise<void> {
    for (const [key, value] of Object.entries(entries)) {
      this.data.set(key, value);
    }
  }

  async delete(...keys: string[]): Promise<number> {
    let deleted = 0;
    for (const key of keys) {
      if (this.data.delete(key)) {
        deleted++;
      }
    }
    return deleted;
  }

  async listKeys(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    return [...this.data.keys()].filter((key) => matcher.test(key));
  }

  async *scanKeys(pattern: string): AsyncIterable<string> {
    for (const key of await this.listKeys(pattern)) {
      yield key;
    }
  }

  async increment(key: string): Promise<number> {
    const current = this.data.get(key) ?? "0";
    if (!/^-?[0-9]+$/.test(current)) {
      throw new Error(`value at ${key} is not an integer`);
    }
    const next = Number(current) + 1;
    this.data.set(key, String(next));
    return next;
  }

  /**
   * Snapshot of every stored entry
   */
  entries(): Record<string, string> {
    return Object.fromEntries(this.data);
  }

  clear(): void {
    this.data.clear();
  }

  async close(): Promise<void> {}
}
