import type { ResolvedOptions } from "./config.ts";
import {
  MapperErrorUtils,
  NotFoundError,
  OperationError,
  ValidationError,
} from "./errors.ts";
import { ScalarField } from "./fields.ts";
import { parseFilters } from "./filters.ts";
import type { IdAllocator } from "./id-allocator.ts";
import { collectIds, ModelInstance } from "./model.ts";
import type { ModelBinding } from "./model.ts";
import { MapperQueryBuilder } from "./query-builder.ts";
import type { QueryExecutor } from "./query-builder.ts";
import type { QueryEngine } from "./query-engine.ts";
import { QuerySet } from "./query-set.ts";
import type {
  FilterInput,
  QueryBuilder,
  WhereClause,
} from "./query-types.ts";
import type {
  AnyField,
  FieldMap,
  FieldName,
  ModelInput,
  ModelSchema,
} from "./schema.ts";
import type { KVStore } from "./types.ts";
import { buildRecordKey, parseRecordKey } from "./utils.ts";

/**
 * What a model manager needs from its mapper
 */
export interface ManagerContext {
  readonly options: ResolvedOptions;
  readonly allocator: IdAllocator;
  readonly engine: QueryEngine;
  getStore(): KVStore;
  /** Runs a public operation, one at a time unless the mapper is non-blocking */
  run<T>(operation: () => Promise<T>): Promise<T>;
}

/**
 * Records an update applies to
 */
export type UpdateTarget<F extends FieldMap = FieldMap> =
  | ModelInstance<F>
  | readonly ModelInstance<F>[]
  | { where: FilterInput };

export type DeleteTarget<F extends FieldMap = FieldMap> =
  | ModelInstance<F>
  | readonly ModelInstance<F>[];

const isWhereTarget = (
  target: UpdateTarget,
): target is { where: FilterInput } =>
  !(target instanceof ModelInstance) && !Array.isArray(target) &&
  typeof target === "object" && "where" in target;

/**
 * Create, query, update and delete the records of one model
 */
export class ModelManager<F extends FieldMap = FieldMap>
  implements ModelBinding<F>, QueryExecutor<F> {
  /** The latest save of each instance; a new save starts after it settles */
  private readonly pendingSaves = new WeakMap<
    ModelInstance<F>,
    Promise<ModelInstance<F>>
  >();

  constructor(
    private readonly context: ManagerContext,
    readonly schema: ModelSchema<F>,
  ) {}

  get modelName(): string {
    return this.schema.name;
  }

  /**
   * An unsaved instance bound to this manager
   */
  build(data: ModelInput<F> = {}): ModelInstance<F> {
    return new ModelInstance(this.schema, data, this);
  }

  /**
   * Build and save. Names that are not fields of the model are dropped.
   */
  async create(data: ModelInput<F> = {}): Promise<ModelInstance<F>> {
    const known: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(data)) {
      if (this.schema.hasField(name)) {
        known[name] = value;
      } else {
        this.context.options.logger.warn?.(
          `${this.modelName} has no field ${name}, dropping it`,
        );
      }
    }
    const instance = new ModelInstance(this.schema, known, this);
    return await this.context.run(() => this.persist(instance));
  }

  async save(instance: ModelInstance<F>): Promise<ModelInstance<F>> {
    this.assertOwn(instance);
    return await this.context.run(() => this.persistInOrder(instance));
  }

  /**
   * Every matching record; all records when no filters are given
   */
  async query(filters: FilterInput = {}): Promise<QuerySet<F>> {
    const predicates = parseFilters(filters);
    return await this.context.run(async () =>
      new QuerySet(
        this.schema,
        await this.context.engine.execute(this.schema, predicates, this),
      )
    );
  }

  where(field: FieldName<F>): WhereClause<F>;
  where(field: string): WhereClause<F>;
  where(conditions: Readonly<Record<string, unknown>>): QueryBuilder<F>;
  where(
    fieldOrConditions: string | Readonly<Record<string, unknown>>,
  ): WhereClause<F> | QueryBuilder<F> {
    const builder = new MapperQueryBuilder(this);
    return typeof fieldOrConditions === "string"
      ? builder.where(fieldOrConditions)
      : builder.where(fieldOrConditions);
  }

  queryBuilder(): QueryBuilder<F> {
    return new MapperQueryBuilder(this);
  }

  async get(id: number): Promise<ModelInstance<F> | null> {
    const [found] = await this.context.run(() =>
      this.context.engine.executeByIds(this.schema, [id], this)
    );
    return found ?? null;
  }

  async getOrThrow(id: number): Promise<ModelInstance<F>> {
    const found = await this.get(id);
    if (!found) {
      throw new NotFoundError(this.modelName, id);
    }
    return found;
  }

  /**
   * Re-clean and write `fields` on every target record; the other stored
   * values are kept. All records are written at once.
   */
  async update(
    fields: ModelInput<F>,
    target?: UpdateTarget<F>,
  ): Promise<QuerySet<F>> {
    const changes = this.checkChanges(fields);
    return await this.context.run(async () => {
      const ids = await this.resolveTargets(target);
      if (ids.length === 0) {
        return new QuerySet(this.schema, []);
      }
      const keys = ids.map((id) => this.recordKey(id));
      const raws = await this.withStore(
        "update",
        () => this.context.getStore().multiGet(keys),
      );

      const writes: Record<string, string> = {};
      for (const [index, id] of ids.entries()) {
        const raw = raws[index];
        if (raw === null || raw === undefined) {
          throw new NotFoundError(this.modelName, id);
        }
        const stored = this.context.engine.decodeRecord(keys[index], raw);
        if (!stored) {
          throw new OperationError(
            "update",
            `record ${keys[index]} can not be decoded`,
            this.modelName,
          );
        }
        const record: Record<string, unknown> = {};
        for (const [name, field] of this.schema.entries()) {
          record[name] = changes.has(name)
            ? this.cleanField(name, field, changes.get(name))
            : stored[name] ?? null;
        }
        record.id = id;
        writes[keys[index]] = JSON.stringify(record);
      }

      await this.withStore(
        "update",
        () => this.context.getStore().multiSet(writes),
      );
      return new QuerySet(
        this.schema,
        await this.context.engine.executeByIds(this.schema, ids, this),
      );
    });
  }

  /**
   * Delete the given instances, or every record of the model when none are
   * given. Returns how many records existed. Records that reference the
   * deleted ones are left as they are.
   */
  async delete(target?: DeleteTarget<F>): Promise<number> {
    return await this.context.run(async () => {
      const keys = target === undefined
        ? await this.context.engine.listKeys(this.modelName)
        : collectIds(target, this.modelName).map((id) => this.recordKey(id));
      if (keys.length === 0) {
        return 0;
      }
      return await this.withStore(
        "delete",
        () => this.context.getStore().delete(...keys),
      );
    });
  }

  /**
   * Overwrite the instance's values with the stored ones
   */
  async reload(instance: ModelInstance<F>): Promise<ModelInstance<F>> {
    this.assertOwn(instance);
    const id = instance.id;
    if (id === null) {
      throw new ValidationError(
        "id",
        null,
        "instance has not been saved",
        this.modelName,
      );
    }
    const fresh = await this.getOrThrow(id);
    for (const name of this.schema.fieldNames) {
      instance.write(name, fresh.read(name));
    }
    return instance;
  }

  /**
   * Allocate the next id without creating a record
   */
  async nextId(): Promise<number> {
    return await this.context.allocator.next(this.modelName);
  }

  /**
   * Saves of one instance never overlap, so an unsaved instance gets exactly
   * one id even when non-blocking callers save it concurrently
   */
  private async persistInOrder(
    instance: ModelInstance<F>,
  ): Promise<ModelInstance<F>> {
    const persist = () => this.persist(instance);
    const previous = this.pendingSaves.get(instance);
    const current = previous ? previous.then(persist, persist) : persist();
    this.pendingSaves.set(instance, current);
    try {
      return await current;
    } finally {
      if (this.pendingSaves.get(instance) === current) {
        this.pendingSaves.delete(instance);
      }
    }
  }

  private async persist(instance: ModelInstance<F>): Promise<ModelInstance<F>> {
    const cleaned = new Map<string, unknown>();
    for (const [name, field] of this.schema.entries()) {
      if (name !== "id") {
        cleaned.set(name, this.cleanField(name, field, instance.read(name)));
      }
    }

    // only allocated once every other field is valid
    const id = instance.id ??
      await this.context.allocator.next(this.modelName);
    const record: Record<string, unknown> = {};
    for (const [name, field] of this.schema.entries()) {
      record[name] = name === "id"
        ? this.cleanField(name, field, id)
        : cleaned.get(name);
    }

    await this.withStore(
      instance.id === null ? "create" : "update",
      () =>
        this.context.getStore().set(
          this.recordKey(id),
          JSON.stringify(record),
        ),
    );

    instance.write("id", id);
    for (const [name, field] of this.schema.entries()) {
      if (field instanceof ScalarField) {
        instance.write(
          name,
          field.deserialize(record[name], true, this.context.options.logger),
        );
      }
    }
    return instance;
  }

  private checkChanges(fields: ModelInput<F>): Map<string, unknown> {
    const changes = new Map<string, unknown>();
    for (const [name, value] of Object.entries(fields)) {
      if (!this.schema.hasField(name)) {
        throw new ValidationError(
          name,
          value,
          `${this.modelName} has no field ${name}`,
          this.modelName,
        );
      }
      if (name === "id") {
        throw new ValidationError(
          "id",
          value,
          "id can not be updated",
          this.modelName,
        );
      }
      changes.set(name, value);
    }
    return changes;
  }

  private async resolveTargets(
    target: UpdateTarget<F> | undefined,
  ): Promise<number[]> {
    if (target === undefined) {
      const keys = await this.context.engine.listKeys(this.modelName);
      return keys
        .map((key) => parseRecordKey(key)?.id ?? null)
        .filter((id): id is number => id !== null)
        .sort((a, b) => a - b);
    }
    if (isWhereTarget(target)) {
      const matched = await this.context.engine.execute(
        this.schema,
        parseFilters(target.where),
        this,
      );
      return matched
        .map((instance) => instance.id)
        .filter((id): id is number => id !== null);
    }
    return collectIds(target, this.modelName);
  }

  private cleanField(name: string, field: AnyField, value: unknown): unknown {
    try {
      return field.clean(value);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error.inContext(name, this.modelName);
      }
      throw error;
    }
  }

  private async withStore<T>(
    operation: OperationError["operation"],
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw MapperErrorUtils.wrap(error, operation, this.modelName);
    }
  }

  private recordKey(id: number): string {
    return buildRecordKey(this.context.options.prefix, this.modelName, id);
  }

  private assertOwn(instance: ModelInstance): void {
    if (instance.modelName !== this.modelName) {
      throw new ValidationError(
        "instance",
        instance.modelName,
        `expected a ${this.modelName} instance, got ${instance.modelName}`,
        this.modelName,
      );
    }
  }
}
