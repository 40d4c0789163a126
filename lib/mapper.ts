import { Mutex } from "async-mutex";
import { resolveOptions } from "./config.ts";
import type { MapperOptions, ResolvedOptions } from "./config.ts";
import { ConfigurationError } from "./errors.ts";
import { IdAllocator } from "./id-allocator.ts";
import type { ModelBinding } from "./model.ts";
import { ModelManager } from "./model-manager.ts";
import type { ManagerContext } from "./model-manager.ts";
import { QueryEngine } from "./query-engine.ts";
import type { ModelRegistry } from "./query-engine.ts";
import { defineModel } from "./schema.ts";
import type { FieldMap, ModelSchema, WithId } from "./schema.ts";
import { RedisStore } from "./stores/redis-store.ts";
import type { RedisOptions } from "ioredis";
import type { KVStore } from "./types.ts";

/**
 * Binds a store to a set of registered models
 */
export class Mapper implements ManagerContext, ModelRegistry {
  private models = new Map<string, ModelManager>();
  private readonly operations = new Mutex();
  readonly options: ResolvedOptions;
  readonly allocator: IdAllocator;
  readonly engine: QueryEngine;

  constructor(
    private readonly store: KVStore,
    options: MapperOptions = {},
  ) {
    this.options = resolveOptions(options);
    this.allocator = new IdAllocator(store, this.options.prefix);
    this.engine = new QueryEngine(store, this, {
      prefix: this.options.prefix,
      lenient: this.options.lenient,
      useKeys: this.options.useKeys,
      logger: this.options.logger,
    });
  }

  /**
   * Reset the allocator's lock flag
   */
  async initialize(): Promise<void> {
    await this.allocator.initialize();
  }

  /**
   * Register a model and get its manager. Registering the same schema again
   * is a no-op; another schema under a taken name is rejected.
   */
  register<F extends FieldMap>(schema: ModelSchema<F>): ModelManager<F> {
    const existing = this.models.get(schema.name);
    if (existing && existing.schema !== schema) {
      throw new ConfigurationError(
        `a different model is already registered as ${schema.name}`,
        "models",
      );
    }
    const manager = new ModelManager(this, schema);
    this.models.set(schema.name, manager);
    return manager;
  }

  /**
   * Define and register a model
   */
  model<F extends FieldMap>(
    name: string,
    fields: F,
  ): ModelManager<WithId<F>> {
    return this.register(defineModel(name, fields));
  }

  /**
   * Get an existing model by name
   */
  getModel(name: string): ModelManager | undefined {
    return this.models.get(name);
  }

  getSchema(name: string): ModelSchema | undefined {
    return this.models.get(name)?.schema;
  }

  getBinding(name: string): ModelBinding | undefined {
    return this.models.get(name);
  }

  /**
   * List all registered model names
   */
  getModelNames(): string[] {
    return Array.from(this.models.keys());
  }

  /**
   * Check if a model exists
   */
  hasModel(name: string): boolean {
    return this.models.has(name);
  }

  /**
   * Remove a model (useful for testing)
   */
  removeModel(name: string): boolean {
    return this.models.delete(name);
  }

  /**
   * Clear all models (useful for testing)
   */
  clearModels(): void {
    this.models.clear();
  }

  getStore(): KVStore {
    return this.store;
  }

  run<T>(operation: () => Promise<T>): Promise<T> {
    if (this.options.nonBlocking) {
      return operation();
    }
    return this.operations.runExclusive(operation);
  }

  /**
   * Close the store connection
   */
  async close(): Promise<void> {
    await this.store.close?.();
  }
}

export interface CreateMapperOptions extends MapperOptions {
  /** Use this store instead of connecting to Redis */
  store?: KVStore;
  redisUrl?: string;
  redis?: RedisOptions;
}

/**
 * Create a mapper over the given store, or over a Redis connection
 * (`redis://localhost:6379/0` when nothing is given)
 */
export async function createMapper(
  init: CreateMapperOptions = {},
): Promise<Mapper> {
  const { store, redisUrl, redis, ...options } = init;
  const kv = store ?? await RedisStore.connect({
    url: redisUrl,
    redis,
    logger: options.logger,
  });
  const mapper = new Mapper(kv, options);
  await mapper.initialize();
  return mapper;
}
