import { isDeepStrictEqual } from "node:util";
import { Decimal } from "decimal.js";
import { OperationError, ValidationError } from "./errors.ts";
import type {
  FieldMap,
  FieldName,
  FieldValue,
  InferModel,
  ModelSchema,
} from "./schema.ts";

/**
 * What a bound instance delegates its persistence to
 */
export interface ModelBinding<F extends FieldMap = FieldMap> {
  save(instance: ModelInstance<F>): Promise<ModelInstance<F>>;
  delete(instance: ModelInstance<F>): Promise<number>;
  reload(instance: ModelInstance<F>): Promise<ModelInstance<F>>;
}

/**
 * One record of a model. Values live in a per-instance map; the schema's
 * fields only describe them.
 */
export class ModelInstance<F extends FieldMap = FieldMap> {
  readonly modelName: string;
  private readonly values = new Map<string, unknown>();

  constructor(
    readonly schema: ModelSchema<F>,
    data: Readonly<Record<string, unknown>> = {},
    private readonly binding?: ModelBinding<F>,
  ) {
    this.modelName = schema.name;
    for (const name of schema.fieldNames) {
      this.values.set(name, null);
    }
    for (const [name, value] of Object.entries(data)) {
      this.assertField(name, value);
      this.values.set(name, value ?? null);
    }
  }

  get id(): number | null {
    const id = this.values.get("id");
    return typeof id === "number" ? id : null;
  }

  get<K extends FieldName<F>>(name: K): FieldValue<F[K]> {
    this.assertField(name);
    return this.values.get(name) as FieldValue<F[K]>;
  }

  set<K extends FieldName<F>>(name: K, value: FieldValue<F[K]>): this {
    this.assertField(name, value);
    if (name === "id" && this.id !== null && value !== this.id) {
      throw new ValidationError(
        "id",
        value,
        "id can not be changed once assigned",
        this.modelName,
      );
    }
    this.values.set(name, value ?? null);
    return this;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /**
   * Untyped read, for dynamic field paths
   */
  read(name: string): unknown {
    this.assertField(name);
    return this.values.get(name);
  }

  /**
   * Untyped write used by the model manager once a value has been persisted
   * @internal
   */
  write(name: string, value: unknown): void {
    this.assertField(name, value);
    this.values.set(name, value);
  }

  /**
   * Same model and the same value in every field
   */
  equals(other: ModelInstance): boolean {
    if (other.modelName !== this.modelName) {
      return false;
    }
    return this.schema.fieldNames.every((name) =>
      valuesEqual(this.values.get(name), other.read(name))
    );
  }

  toObject(): InferModel<F> {
    return Object.fromEntries(this.values) as InferModel<F>;
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(
      [...this.values].map(([name, value]) => [name, toPlain(value)]),
    );
  }

  toString(): string {
    return `${this.modelName}(${this.id ?? "unsaved"})`;
  }

  /**
   * Persist this instance, allocating an id when it has none
   */
  async save(): Promise<ModelInstance<F>> {
    return await this.requireBinding("create").save(this);
  }

  async delete(): Promise<number> {
    return await this.requireBinding("delete").delete(this);
  }

  /**
   * Re-read every value from the store
   */
  async reload(): Promise<ModelInstance<F>> {
    return await this.requireBinding("read").reload(this);
  }

  private requireBinding(
    operation: OperationError["operation"],
  ): ModelBinding<F> {
    if (!this.binding) {
      throw new OperationError(
        operation,
        "instance is not bound to a model manager",
        this.modelName,
      );
    }
    return this.binding;
  }

  private assertField(name: string, value?: unknown): void {
    if (!this.values.has(name)) {
      throw new ValidationError(
        name,
        value,
        `${this.modelName} has no field ${name}`,
        this.modelName,
      );
    }
  }
}

const toPlain = (value: unknown): unknown => {
  if (value instanceof ModelInstance) {
    return value.id;
  }
  if (Decimal.isDecimal(value)) {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  return value;
};

/**
 * Ids of a saved instance or a list of saved instances of `modelName`
 */
export const collectIds = (target: unknown, modelName: string): number[] => {
  if (!(target instanceof ModelInstance) && !Array.isArray(target)) {
    throw new ValidationError(
      "instances",
      target,
      `Can't get ${modelName} ids from ${String(target)}`,
      modelName,
    );
  }
  const items: unknown[] = target instanceof ModelInstance ? [target] : target;
  const ids: number[] = [];
  for (const item of items) {
    if (!(item instanceof ModelInstance) || item.modelName !== modelName) {
      throw new ValidationError(
        "instances",
        item,
        `Can't get ${modelName} ids from ${String(item)}`,
        modelName,
      );
    }
    if (item.id === null) {
      throw new ValidationError(
        "id",
        null,
        "instance has not been saved",
        modelName,
      );
    }
    ids.push(item.id);
  }
  return ids;
};

/**
 * Equality used by filters and `ModelInstance.equals`.
 * Instances compare by model and id, and an instance equals its bare id.
 */
export const valuesEqual = (a: unknown, b: unknown): boolean => {
  if (a === b) {
    return true;
  }
  if (a === null || a === undefined || b === null || b === undefined) {
    return (a ?? null) === (b ?? null);
  }
  if (a instanceof ModelInstance || b instanceof ModelInstance) {
    return instancesEqual(a, b);
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Decimal.isDecimal(a)) {
    return isNumeric(b) && a.equals(b);
  }
  if (Decimal.isDecimal(b)) {
    return isNumeric(a) && b.equals(a);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length &&
      a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (typeof a === "object" && typeof b === "object") {
    return isDeepStrictEqual(a, b);
  }
  return false;
};

const instancesEqual = (a: unknown, b: unknown): boolean => {
  if (a instanceof ModelInstance && b instanceof ModelInstance) {
    if (a.modelName !== b.modelName) {
      return false;
    }
    return a.id !== null && b.id !== null ? a.id === b.id : a.equals(b);
  }
  if (a instanceof ModelInstance) {
    return typeof b === "number" && a.id === b;
  }
  return b instanceof ModelInstance && typeof a === "number" && b.id === a;
};

const isNumeric = (value: unknown): value is number | Decimal =>
  typeof value === "number" || Decimal.isDecimal(value);

/**
 * Order two values of the same kind. Returns null when they can not be
 * ordered (a null on either side, or unrelated types).
 */
export const compareValues = (a: unknown, b: unknown): number | null => {
  if (a === null || a === undefined || b === null || b === undefined) {
    return null;
  }
  if (isNumeric(a) && isNumeric(b)) {
    return new Decimal(a).comparedTo(b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Date && b instanceof Date) {
    return Math.sign(a.getTime() - b.getTime());
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  if (a instanceof ModelInstance && b instanceof ModelInstance) {
    return a.id !== null && b.id !== null ? Math.sign(a.id - b.id) : null;
  }
  return null;
};
