import type {
  FilterOperator,
  Predicate,
  QueryBuilder,
  QueryConfig,
  SortDirection,
  WhereClause,
} from "./query-types.ts";
import { LOOKUP_SEPARATOR } from "./query-types.ts";
import { parseFilters } from "./filters.ts";
import { NotFoundError } from "./errors.ts";
import type { ModelInstance } from "./model.ts";
import { QuerySet } from "./query-set.ts";
import type { FieldMap, FieldName } from "./schema.ts";

/**
 * What the builder runs its predicates against
 */
export interface QueryExecutor<F extends FieldMap = FieldMap> {
  readonly modelName: string;
  query(filters: readonly Predicate[]): Promise<QuerySet<F>>;
}

/**
 * WhereClause implementation for building field-specific conditions
 */
class WhereClauseImpl<F extends FieldMap> implements WhereClause<F> {
  constructor(
    private field: string,
    private queryBuilder: MapperQueryBuilder<F>,
  ) {}

  private addCondition(
    operator: FilterOperator,
    value: unknown,
  ): QueryBuilder<F> {
    this.queryBuilder.addWhereCondition({
      path: this.field.split(LOOKUP_SEPARATOR),
      operator,
      value,
    });
    return this.queryBuilder;
  }

  exact(value: unknown): QueryBuilder<F> {
    return this.addCondition("exact", value);
  }

  equals(value: unknown): QueryBuilder<F> {
    return this.addCondition("exact", value);
  }

  iexact(value: string): QueryBuilder<F> {
    return this.addCondition("iexact", value);
  }

  contains(value: unknown): QueryBuilder<F> {
    return this.addCondition("contains", value);
  }

  in(values: readonly unknown[]): QueryBuilder<F> {
    return this.addCondition("in", [...values]);
  }

  gt(value: unknown): QueryBuilder<F> {
    return this.addCondition("gt", value);
  }

  gte(value: unknown): QueryBuilder<F> {
    return this.addCondition("gte", value);
  }

  lt(value: unknown): QueryBuilder<F> {
    return this.addCondition("lt", value);
  }

  lte(value: unknown): QueryBuilder<F> {
    return this.addCondition("lte", value);
  }

  startsWith(value: string): QueryBuilder<F> {
    return this.addCondition("startswith", value);
  }

  endsWith(value: string): QueryBuilder<F> {
    return this.addCondition("endswith", value);
  }

  iStartsWith(value: string): QueryBuilder<F> {
    return this.addCondition("istartswith", value);
  }

  iEndsWith(value: string): QueryBuilder<F> {
    return this.addCondition("iendswith", value);
  }

  range(startOrEnd: number, end?: number): QueryBuilder<F> {
    return this.addCondition(
      "range",
      end === undefined ? startOrEnd : [startOrEnd, end],
    );
  }

  isNull(expected = true): QueryBuilder<F> {
    return this.addCondition("isnull", expected);
  }

  between(min: unknown, max: unknown): QueryBuilder<F> {
    return this.queryBuilder
      .where(this.field).gte(min)
      .where(this.field).lte(max);
  }
}

/**
 * Main QueryBuilder implementation
 */
export class MapperQueryBuilder<F extends FieldMap = FieldMap>
  implements QueryBuilder<F> {
  private config: QueryConfig = {
    where: [],
    sort: [],
  };

  constructor(private executor: QueryExecutor<F>) {}

  /**
   * Add a where condition (internal method)
   */
  addWhereCondition(condition: Predicate): void {
    this.config.where.push(condition);
  }

  /**
   * Where clause methods
   */
  where(field: FieldName<F>): WhereClause<F>;
  where(field: string): WhereClause<F>;
  where(conditions: Readonly<Record<string, unknown>>): QueryBuilder<F>;
  where(
    fieldOrConditions: string | Readonly<Record<string, unknown>>,
  ): WhereClause<F> | QueryBuilder<F> {
    if (typeof fieldOrConditions === "string") {
      // where("name").exact("John")
      return new WhereClauseImpl(fieldOrConditions, this);
    }
    // where({ name: "John", age__gte: 30 })
    this.config.where.push(...parseFilters(fieldOrConditions));
    return this;
  }

  /**
   * Sorting methods
   */
  orderBy(field: FieldName<F>, direction?: SortDirection): QueryBuilder<F>;
  orderBy(field: string, direction?: SortDirection): QueryBuilder<F>;
  orderBy(field: string, direction?: SortDirection): QueryBuilder<F> {
    // "-created" is shorthand for ("created", "desc")
    const descending = field.startsWith("-");
    this.config.sort.push({
      field: descending ? field.slice(1) : field,
      direction: direction ?? (descending ? "desc" : "asc"),
    });
    return this;
  }

  /**
   * Pagination methods
   */
  limit(count: number): QueryBuilder<F> {
    this.config.limit = count;
    return this;
  }

  offset(count: number): QueryBuilder<F> {
    this.config.offset = count;
    return this;
  }

  /**
   * Execution methods
   */
  async find(): Promise<ModelInstance<F>[]> {
    return this.paginate(await this.execute());
  }

  async findOne(): Promise<ModelInstance<F> | null> {
    const originalLimit = this.config.limit;
    this.config.limit = 1;
    try {
      const results = await this.find();
      return results[0] ?? null;
    } finally {
      this.config.limit = originalLimit;
    }
  }

  async findOneOrThrow(): Promise<ModelInstance<F>> {
    const result = await this.findOne();
    if (!result) {
      throw new NotFoundError(this.executor.modelName, {
        where: this.config.where.map(describePredicate),
      });
    }
    return result;
  }

  async count(): Promise<number> {
    const results = await this.find();
    return results.length;
  }

  async exists(): Promise<boolean> {
    const count = await this.count();
    return count > 0;
  }

  /**
   * Project the matching instances onto `fields` (all fields when none given)
   */
  async values(...fields: string[]): Promise<Record<string, unknown>[]> {
    const results = await this.execute();
    return new QuerySet(results.schema, this.paginate(results)).values(
      ...fields,
    );
  }

  /**
   * Utility methods
   */
  clone(): QueryBuilder<F> {
    const cloned = new MapperQueryBuilder(this.executor);
    cloned.config = {
      where: [...this.config.where],
      sort: [...this.config.sort],
      limit: this.config.limit,
      offset: this.config.offset,
    };
    return cloned;
  }

  toConfig(): QueryConfig {
    return {
      ...this.config,
      where: [...this.config.where],
      sort: [...this.config.sort],
    };
  }

  private async execute(): Promise<QuerySet<F>> {
    const results = await this.executor.query(this.config.where);
    // stable sorts, least significant key first
    for (const { field, direction } of [...this.config.sort].reverse()) {
      results.orderBy(direction === "desc" ? `-${field}` : field);
    }
    return results;
  }

  private paginate(results: QuerySet<F>): ModelInstance<F>[] {
    const start = this.config.offset ?? 0;
    const end = this.config.limit === undefined
      ? undefined
      : start + this.config.limit;
    return results.asList().slice(start, end);
  }
}

const describePredicate = ({ path, operator }: Predicate): string =>
  [...path, operator].join(LOOKUP_SEPARATOR);
