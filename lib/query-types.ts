import type { ModelInstance } from "./model.ts";
import type { FieldMap, FieldName } from "./schema.ts";

/**
 * Filter operators, written after a `__` in keyword filters
 * (`created__gte`, `owner__name__iexact`)
 */
export const FILTER_OPERATORS = [
  "exact",
  "iexact",
  "contains",
  "in",
  "gt",
  "gte",
  "lt",
  "lte",
  "startswith",
  "endswith",
  "istartswith",
  "iendswith",
  "range",
  "isnull",
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

/**
 * Separator between path segments and the operator in keyword filters
 */
export const LOOKUP_SEPARATOR = "__";

/**
 * One filter condition. `path` starts at a field of the queried model and
 * walks through reference fields (`["owner", "name"]`).
 */
export interface Predicate {
  path: readonly string[];
  operator: FilterOperator;
  value: unknown;
}

/**
 * Keyword filters (`{ status: "done", created__gte: date }`) or predicates
 */
export type FilterInput =
  | Readonly<Record<string, unknown>>
  | readonly Predicate[];

/**
 * Sort direction
 */
export type SortDirection = "asc" | "desc";

/**
 * Sort configuration
 */
export interface SortConfig {
  field: string;
  direction: SortDirection;
}

/**
 * Query builder configuration
 */
export interface QueryConfig {
  where: Predicate[];
  sort: SortConfig[];
  limit?: number;
  offset?: number;
}

/**
 * Query builder interface for chaining
 */
export interface QueryBuilder<F extends FieldMap = FieldMap> {
  // Where methods
  where(field: FieldName<F>): WhereClause<F>;
  where(field: string): WhereClause<F>;
  where(conditions: Readonly<Record<string, unknown>>): QueryBuilder<F>;

  // Sorting
  orderBy(field: FieldName<F>, direction?: SortDirection): QueryBuilder<F>;
  orderBy(field: string, direction?: SortDirection): QueryBuilder<F>;

  // Pagination
  limit(count: number): QueryBuilder<F>;
  offset(count: number): QueryBuilder<F>;

  // Execution
  find(): Promise<ModelInstance<F>[]>;
  findOne(): Promise<ModelInstance<F> | null>;
  findOneOrThrow(): Promise<ModelInstance<F>>;
  count(): Promise<number>;
  exists(): Promise<boolean>;
  values(...fields: string[]): Promise<Record<string, unknown>[]>;

  // Advanced
  clone(): QueryBuilder<F>;
  toConfig(): QueryConfig;
}

/**
 * Where clause builder for individual fields (or `__` separated paths)
 */
export interface WhereClause<F extends FieldMap = FieldMap> {
  exact(value: unknown): QueryBuilder<F>;
  equals(value: unknown): QueryBuilder<F>;
  iexact(value: string): QueryBuilder<F>;

  contains(value: unknown): QueryBuilder<F>;
  in(values: readonly unknown[]): QueryBuilder<F>;

  gt(value: unknown): QueryBuilder<F>;
  gte(value: unknown): QueryBuilder<F>;
  lt(value: unknown): QueryBuilder<F>;
  lte(value: unknown): QueryBuilder<F>;

  startsWith(value: string): QueryBuilder<F>;
  endsWith(value: string): QueryBuilder<F>;
  iStartsWith(value: string): QueryBuilder<F>;
  iEndsWith(value: string): QueryBuilder<F>;

  range(end: number): QueryBuilder<F>;
  range(start: number, end: number): QueryBuilder<F>;

  isNull(expected?: boolean): QueryBuilder<F>;
  between(min: unknown, max: unknown): QueryBuilder<F>;
}
