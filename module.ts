/**
 * @module
 *
 * record-mapper - typed models over a key-value store. Declare fields, save
 * instances as JSON records and read them back through a filter language
 * that follows references between models.
 *
 * @example
 * ```ts
 * import {
 *   createMapper,
 *   DateTimeField,
 *   MapperErrorUtils,
 *   MemoryStore,
 *   ReferenceField,
 *   StringField,
 * } from "record-mapper";
 *
 * const mapper = await createMapper({ store: new MemoryStore() });
 *
 * const User = mapper.model("User", {
 *   name: new StringField({ nullable: false }),
 * });
 * const Post = mapper.model("Post", {
 *   author: new ReferenceField(User.schema),
 *   title: new StringField(),
 *   published: new DateTimeField({ default: () => new Date() }),
 * });
 *
 * const ada = await User.create({ name: "Ada" });
 * await Post.create({ author: ada, title: "Notes" });
 *
 * // keyword filters, `__` walks through references
 * const posts = await Post.query({ author__name__iexact: "ada" });
 *
 * // or the fluent builder
 * const recent = await Post
 *   .where("published").gte(new Date("2024-01-01"))
 *   .orderBy("-published")
 *   .limit(10)
 *   .find();
 *
 * try {
 *   await User.update({ name: null }, ada);
 * } catch (error) {
 *   if (MapperErrorUtils.isValidationError(error)) {
 *     console.log(`Validation failed: ${error.field} - ${error.rule}`);
 *   }
 * }
 * ```
 */

// Mapper
export { createMapper, Mapper } from "./lib/mapper.ts";
export type { CreateMapperOptions } from "./lib/mapper.ts";
export { ModelManager } from "./lib/model-manager.ts";
export type {
  DeleteTarget,
  ManagerContext,
  UpdateTarget,
} from "./lib/model-manager.ts";

// Models
export { defineModel, ModelSchema } from "./lib/schema.ts";
export type {
  AnyField,
  FieldMap,
  FieldName,
  FieldValue,
  InferModel,
  ModelInput,
  WithId,
} from "./lib/schema.ts";
export {
  collectIds,
  compareValues,
  ModelInstance,
  valuesEqual,
} from "./lib/model.ts";
export type { ModelBinding } from "./lib/model.ts";

// Fields
export {
  BooleanField,
  DATE_FORMAT,
  DateField,
  DATETIME_FORMAT,
  DateTimeField,
  DecimalField,
  DictField,
  Field,
  IdField,
  JsonField,
  ListField,
  NumberField,
  ScalarField,
  StringField,
} from "./lib/fields.ts";
export type {
  ChoicesInput,
  FieldKind,
  FieldOptions,
  RelationResolver,
  ResolveContext,
} from "./lib/fields.ts";
export { ManyToManyField, ReferenceField } from "./lib/relations.ts";

// Queries
export { FILTER_OPERATORS, LOOKUP_SEPARATOR } from "./lib/query-types.ts";
export type {
  FilterInput,
  FilterOperator,
  Predicate,
  QueryBuilder,
  QueryConfig,
  SortConfig,
  SortDirection,
  WhereClause,
} from "./lib/query-types.ts";
export {
  applyOperator,
  evaluatePredicate,
  isFilterOperator,
  parseFilters,
  parseLookup,
  validatePredicates,
} from "./lib/filters.ts";
export type { SchemaLookup } from "./lib/filters.ts";
export { QueryEngine } from "./lib/query-engine.ts";
export type {
  ModelRegistry,
  QueryEngineOptions,
} from "./lib/query-engine.ts";
export { QuerySet } from "./lib/query-set.ts";
export type { Projection } from "./lib/query-set.ts";
export { MapperQueryBuilder } from "./lib/query-builder.ts";
export type { QueryExecutor } from "./lib/query-builder.ts";

// Ids
export { IdAllocator } from "./lib/id-allocator.ts";

// Stores
export type { JsonArray, JsonObject, JsonValue, KVStore } from "./lib/types.ts";
export { MemoryStore } from "./lib/stores/memory-store.ts";
export { DEFAULT_REDIS_URL, RedisStore } from "./lib/stores/redis-store.ts";
export type {
  RedisClientLike,
  RedisConnectOptions,
} from "./lib/stores/redis-store.ts";
export {
  buildCounterKey,
  buildLockKey,
  buildModelPattern,
  buildRecordKey,
  parseRecordKey,
} from "./lib/utils.ts";

// Configuration
export {
  DEFAULT_PREFIX,
  loadOptionsFromEnv,
  resolveOptions,
  sanitizePrefix,
} from "./lib/config.ts";
export type {
  EnvOptions,
  MapperOptions,
  Resolvable,
  ResolvedOptions,
} from "./lib/config.ts";

// Logging
export { consoleLogger, silentLogger } from "./lib/logger.ts";
export type { Logger } from "./lib/logger.ts";

// Error Handling
export {
  ConfigurationError,
  MapperError,
  MapperErrorUtils,
  NotFoundError,
  OperationError,
  ValidationError,
} from "./lib/errors.ts";
