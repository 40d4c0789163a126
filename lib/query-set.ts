import { ValidationError } from "./errors.ts";
import { compareValues } from "./model.ts";
import type { ModelInstance } from "./model.ts";
import type { FieldMap, FieldName, FieldValue, ModelSchema } from "./schema.ts";

export type Projection<F extends FieldMap, K extends FieldName<F>> = {
  [P in K]: FieldValue<F[P]>;
};

/**
 * Nulls sort first; values that can not be ordered keep their relative order
 */
export const compareForSort = (a: unknown, b: unknown): number => {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) {
    return Number(bMissing) - Number(aMissing);
  }
  return compareValues(a, b) ?? 0;
};

/**
 * The materialized result of a query
 */
export class QuerySet<F extends FieldMap = FieldMap>
  implements Iterable<ModelInstance<F>> {
  private readonly results: ModelInstance<F>[];

  constructor(
    readonly schema: ModelSchema<F>,
    results: readonly ModelInstance<F>[] = [],
  ) {
    this.results = [...results];
  }

  /**
   * Sort in place by a field; a leading `-` sorts descending
   */
  orderBy(field: string): this {
    const descending = field.startsWith("-");
    const name = descending ? field.slice(1) : field;
    this.assertField(name);
    this.results.sort((a, b) => {
      const order = compareForSort(a.read(name), b.read(name));
      return descending ? -order : order;
    });
    return this;
  }

  count(): number {
    return this.results.length;
  }

  get length(): number {
    return this.results.length;
  }

  at(index: number): ModelInstance<F> | undefined {
    return this.results.at(index);
  }

  first(): ModelInstance<F> | null {
    return this.results[0] ?? null;
  }

  [Symbol.iterator](): Iterator<ModelInstance<F>> {
    return this.results[Symbol.iterator]();
  }

  asList(): ModelInstance<F>[] {
    return [...this.results];
  }

  /**
   * Instances keyed by id
   */
  asMap(): Map<number, ModelInstance<F>> {
    const grouped = new Map<number, ModelInstance<F>>();
    for (const instance of this.results) {
      if (instance.id !== null) {
        grouped.set(instance.id, instance);
      }
    }
    return grouped;
  }

  /**
   * Project every instance onto the given fields (all fields when none given)
   */
  values<K extends FieldName<F>>(...fields: K[]): Projection<F, K>[];
  values(...fields: string[]): Record<string, unknown>[];
  values(...fields: string[]): Record<string, unknown>[] {
    const names = fields.length > 0 ? fields : this.schema.fieldNames;
    for (const name of names) {
      this.assertField(name);
    }
    return this.results.map((instance) =>
      Object.fromEntries(names.map((name) => [name, instance.read(name)]))
    );
  }

  private assertField(name: string): void {
    if (!this.schema.hasField(name)) {
      throw new ValidationError(
        name,
        name,
        `${this.schema.name} has no field ${name}`,
        this.schema.name,
      );
    }
  }
}
