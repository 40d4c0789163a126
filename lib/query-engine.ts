import { MapperErrorUtils, ValidationError } from "./errors.ts";
import type { RelationResolver, ResolveContext } from "./fields.ts";
import { evaluatePredicate, validatePredicates } from "./filters.ts";
import type { SchemaLookup } from "./filters.ts";
import type { Logger } from "./logger.ts";
import { ModelInstance } from "./model.ts";
import type { ModelBinding } from "./model.ts";
import type { Predicate } from "./query-types.ts";
import type { FieldMap, ModelSchema } from "./schema.ts";
import type { KVStore } from "./types.ts";
import { buildModelPattern, buildRecordKey, parseRecordKey } from "./utils.ts";

/**
 * Registered schemas plus the managers their instances are bound to
 */
export interface ModelRegistry extends SchemaLookup {
  getBinding(modelName: string): ModelBinding | undefined;
}

export interface QueryEngineOptions {
  prefix: string;
  lenient: boolean;
  useKeys: boolean;
  logger: Logger;
}

interface StoredEntry {
  key: string;
  id: number;
}

/**
 * Scans the records of a model, resolves their fields and keeps those that
 * satisfy every predicate. Filtering happens in process; nothing is indexed.
 */
export class QueryEngine implements RelationResolver {
  constructor(
    private readonly store: KVStore,
    private readonly registry: ModelRegistry,
    private readonly options: QueryEngineOptions,
  ) {}

  /**
   * Every record key of a model. Keys under another prefix or model are
   * dropped; malformed keys are kept for the caller to report.
   */
  async listKeys(modelName: string): Promise<string[]> {
    const keys = await this.listMatching(modelName);
    return keys.filter((key) => {
      const parsed = parseRecordKey(key);
      return parsed === null ||
        (parsed.prefix === this.options.prefix &&
          parsed.modelName === modelName);
    });
  }

  private async listMatching(modelName: string): Promise<string[]> {
    const pattern = buildModelPattern(this.options.prefix, modelName);
    try {
      if (this.options.useKeys || !this.store.scanKeys) {
        return await this.store.listKeys(pattern);
      }
      const keys: string[] = [];
      for await (const key of this.store.scanKeys(pattern)) {
        keys.push(key);
      }
      return keys;
    } catch (error) {
      throw MapperErrorUtils.wrap(error, "read", modelName);
    }
  }

  /**
   * Records of `schema` matching every predicate, in ascending id order
   */
  async execute<F extends FieldMap>(
    schema: ModelSchema<F>,
    predicates: readonly Predicate[],
    binding?: ModelBinding<F>,
  ): Promise<ModelInstance<F>[]> {
    validatePredicates(schema, predicates, this.registry);
    const keys = await this.listKeys(schema.name);
    const entries = keys
      .map((key) => this.parseKey(key))
      .filter((entry): entry is StoredEntry => entry !== null)
      .sort((a, b) => a.id - b.id);
    return await this.load(schema, entries, predicates, binding);
  }

  /**
   * Records of `schema` with the given ids; missing ones are left out
   */
  async executeByIds<F extends FieldMap>(
    schema: ModelSchema<F>,
    ids: readonly number[],
    binding?: ModelBinding<F>,
  ): Promise<ModelInstance<F>[]> {
    const entries = [...new Set(ids)]
      .sort((a, b) => a - b)
      .map((id) => ({
        id,
        key: buildRecordKey(this.options.prefix, schema.name, id),
      }));
    return await this.load(schema, entries, [], binding);
  }

  async findByIds(
    modelName: string,
    ids: number[],
  ): Promise<ModelInstance[] | null> {
    const schema = this.registry.getSchema(modelName);
    if (!schema) {
      this.unresolved(
        "model",
        modelName,
        `${modelName} not found in registered models`,
      );
      return null;
    }
    if (ids.length === 0) {
      return [];
    }
    return await this.executeByIds(
      schema,
      ids,
      this.registry.getBinding(modelName),
    );
  }

  /**
   * Decode one stored JSON record
   */
  decodeRecord(key: string, raw: string): Record<string, unknown> | null {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      this.unresolved(
        "record",
        key,
        `record ${key} is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return null;
    }
    if (!isRecord(decoded)) {
      this.unresolved("record", key, `record ${key} is not a JSON object`);
      return null;
    }
    return decoded;
  }

  private parseKey(key: string): StoredEntry | null {
    const parsed = parseRecordKey(key);
    if (!parsed) {
      this.unresolved("key", key, `malformed record key ${key}, skipping`);
      return null;
    }
    if (!this.registry.getSchema(parsed.modelName)) {
      this.unresolved(
        "model",
        parsed.modelName,
        `${parsed.modelName} not found in registered models, skipping ${key}`,
      );
      return null;
    }
    return { key, id: parsed.id };
  }

  private async load<F extends FieldMap>(
    schema: ModelSchema<F>,
    entries: readonly StoredEntry[],
    predicates: readonly Predicate[],
    binding?: ModelBinding<F>,
  ): Promise<ModelInstance<F>[]> {
    if (entries.length === 0) {
      return [];
    }
    let raws: (string | null)[];
    try {
      raws = await this.store.multiGet(entries.map((entry) => entry.key));
    } catch (error) {
      throw MapperErrorUtils.wrap(error, "read", schema.name);
    }

    const byField = groupByField(predicates);
    const results: ModelInstance<F>[] = [];
    for (const [index, entry] of entries.entries()) {
      const raw = raws[index];
      // deleted since it was listed
      if (raw === null || raw === undefined) {
        continue;
      }
      const record = this.decodeRecord(entry.key, raw);
      if (!record) {
        continue;
      }
      const data = await this.materialize(schema, record, byField);
      if (data) {
        results.push(new ModelInstance(schema, data, binding));
      }
    }
    return results;
  }

  /**
   * Resolve fields in schema order, giving up at the first failed predicate
   */
  private async materialize(
    schema: ModelSchema,
    record: Record<string, unknown>,
    byField: ReadonlyMap<string, Predicate[]>,
  ): Promise<Record<string, unknown> | null> {
    const context: ResolveContext = {
      lenient: this.options.lenient,
      logger: this.options.logger,
      resolver: this,
    };
    const data: Record<string, unknown> = {};
    for (const [name, field] of schema.entries()) {
      let value: unknown;
      try {
        value = await field.resolve(record[name] ?? null, context);
      } catch (error) {
        if (error instanceof ValidationError) {
          throw error.inContext(name, schema.name);
        }
        throw error;
      }
      const predicates = byField.get(name) ?? [];
      if (!predicates.every((predicate) => evaluatePredicate(predicate, value))) {
        return null;
      }
      data[name] = value;
    }
    return data;
  }

  /**
   * Lenient mode logs and moves on; strict mode raises
   */
  private unresolved(field: string, value: unknown, message: string): void {
    if (!this.options.lenient) {
      throw new ValidationError(field, value, message);
    }
    this.options.logger.warn?.(message);
  }
}

const groupByField = (
  predicates: readonly Predicate[],
): Map<string, Predicate[]> => {
  const grouped = new Map<string, Predicate[]>();
  for (const predicate of predicates) {
    const [name] = predicate.path;
    grouped.set(name, [...(grouped.get(name) ?? []), predicate]);
  }
  return grouped;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
