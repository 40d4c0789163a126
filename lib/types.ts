/**
 * The key-value store contract the mapper needs. Keys and values are UTF-8
 * text; patterns are glob-style (`*`, `?`, `[...]`) as understood by Redis.
 */
export interface KVStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  multiGet(keys: string[]): Promise<(string | null)[]>;
  multiSet(entries: Record<string, string>): Promise<void>;
  /** Returns the number of keys that existed */
  delete(...keys: string[]): Promise<number>;
  listKeys(pattern: string): Promise<string[]>;
  /** Incremental enumeration, used instead of `listKeys` when `useKeys` is off */
  scanKeys?(pattern: string): AsyncIterable<string>;
  /**
   * Atomically add one to the integer stored at `key` (0 when absent) and
   * return the new value.
   */
  increment?(key: string): Promise<number>;
  close?(): Promise<void>;
}

/**
 * JSON-compatible value stored by JSON-backed fields.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonArray = JsonValue[];

/**
 * A parsed record key: `<prefix>:<model_name>:<id>`
 */
export type RecordKey = {
  prefix: string;
  modelName: string;
  id: number;
};
