import { z } from "zod";
import { MapperErrorUtils, ValidationError } from "./errors.ts";
import { compareValues, ModelInstance, valuesEqual } from "./model.ts";
import { ReferenceField } from "./relations.ts";
import type { ModelSchema } from "./schema.ts";
import { FILTER_OPERATORS, LOOKUP_SEPARATOR } from "./query-types.ts";
import type { FilterInput, FilterOperator, Predicate } from "./query-types.ts";

/**
 * Finds the schema registered under a model name
 */
export interface SchemaLookup {
  getSchema(modelName: string): ModelSchema | undefined;
}

const filterOperatorSchema = z.enum(FILTER_OPERATORS);

const predicateSchema = z.object({
  path: z.array(z.string().min(1)).min(1),
  operator: filterOperatorSchema,
  value: z.unknown(),
});

const stringOperand = z.string();

const rangeOperand = z.union([
  z.number().int(),
  z.tuple([z.number().int(), z.number().int()]),
]);

const operandSchemas: Partial<Record<FilterOperator, z.ZodTypeAny>> = {
  in: z.union([z.array(z.unknown()), z.instanceof(Set)]),
  iexact: stringOperand,
  startswith: stringOperand,
  endswith: stringOperand,
  istartswith: stringOperand,
  iendswith: stringOperand,
  range: rangeOperand,
  isnull: z.boolean(),
};

export const isFilterOperator = (value: string): value is FilterOperator =>
  filterOperatorSchema.safeParse(value).success;

const isPredicateList = (input: FilterInput): input is readonly Predicate[] =>
  Array.isArray(input);

/**
 * Split a keyword filter key into a path and an operator. When the last
 * segment is not an operator the whole key is the path and the operator is
 * `exact`.
 */
export const parseLookup = (
  key: string,
): { path: string[]; operator: FilterOperator } => {
  const segments = key.split(LOOKUP_SEPARATOR);
  if (segments.some((segment) => segment.length === 0)) {
    throw new ValidationError(key, key, "malformed filter");
  }
  const last = segments[segments.length - 1];
  if (segments.length > 1 && isFilterOperator(last)) {
    return { path: segments.slice(0, -1), operator: last };
  }
  return { path: segments, operator: "exact" };
};

/**
 * Normalize keyword filters or structured predicates into predicates
 */
export const parseFilters = (input: FilterInput = {}): Predicate[] => {
  if (isPredicateList(input)) {
    return input.map((predicate) => {
      const result = predicateSchema.safeParse(predicate);
      if (!result.success) {
        throw MapperErrorUtils.fromZodError(result.error, "filter", predicate);
      }
      const { path, operator } = result.data;
      return { path, operator, value: predicate.value };
    });
  }
  return Object.entries(input).map(([key, value]) => ({
    ...parseLookup(key),
    value,
  }));
};

/**
 * Check every predicate against the schema graph before anything is read
 */
export const validatePredicates = (
  schema: ModelSchema,
  predicates: readonly Predicate[],
  registry: SchemaLookup,
): void => {
  for (const predicate of predicates) {
    validatePath(schema, predicate, registry);
    validateOperand(predicate);
  }
};

const validatePath = (
  schema: ModelSchema,
  { path, operator, value }: Predicate,
  registry: SchemaLookup,
): void => {
  let current: ModelSchema | undefined = schema;
  for (let index = 0; index < path.length && current; index++) {
    const segment = path[index];
    const field = current.getField(segment);
    if (!field) {
      throw new ValidationError(
        segment,
        value,
        `${current.name} has no field ${segment}`,
        current.name,
      );
    }
    if (index === path.length - 1) {
      return;
    }
    if (!(field instanceof ReferenceField)) {
      const next = path[index + 1];
      const rule = index + 1 === path.length - 1 && operator === "exact"
        ? `Filter ${next} not supported`
        : `${segment} is not a reference field, can not look up ${next}`;
      throw new ValidationError(path.join(LOOKUP_SEPARATOR), value, rule);
    }
    // an unregistered target is handled while resolving
    current = registry.getSchema(field.targetName);
  }
};

const validateOperand = (predicate: Predicate): void => {
  const schema = operandSchemas[predicate.operator];
  if (!schema) {
    return;
  }
  const result = schema.safeParse(predicate.value);
  if (!result.success) {
    throw MapperErrorUtils.fromZodError(
      result.error,
      [...predicate.path, predicate.operator].join(LOOKUP_SEPARATOR),
      predicate.value,
    );
  }
};

/**
 * Evaluate a predicate against the value of its first path segment
 */
export const evaluatePredicate = (
  predicate: Predicate,
  fieldValue: unknown,
): boolean => {
  let value: unknown = fieldValue;
  for (const segment of predicate.path.slice(1)) {
    if (value === null || value === undefined) {
      // broken link
      return predicate.operator === "isnull" &&
        applyOperator("isnull", null, predicate.value);
    }
    if (!(value instanceof ModelInstance) || !value.has(segment)) {
      throw new ValidationError(
        predicate.path.join(LOOKUP_SEPARATOR),
        predicate.value,
        `can not look up ${segment} on ${String(value)}`,
      );
    }
    value = value.read(segment);
  }
  return applyOperator(predicate.operator, value, predicate.value);
};

export const applyOperator = (
  operator: FilterOperator,
  value: unknown,
  operand: unknown,
): boolean => {
  switch (operator) {
    case "exact":
      return valuesEqual(value, operand);
    case "iexact":
      return typeof value === "string" && typeof operand === "string" &&
        value.toLowerCase() === operand.toLowerCase();
    case "contains":
      return contains(value, operand);
    case "in":
      return toList(operand).some((item) => valuesEqual(value, item));
    case "gt":
      return compareWith(value, operand, (order) => order > 0);
    case "gte":
      return compareWith(value, operand, (order) => order >= 0);
    case "lt":
      return compareWith(value, operand, (order) => order < 0);
    case "lte":
      return compareWith(value, operand, (order) => order <= 0);
    case "startswith":
      return typeof value === "string" && typeof operand === "string" &&
        value.startsWith(operand);
    case "endswith":
      return typeof value === "string" && typeof operand === "string" &&
        value.endsWith(operand);
    case "istartswith":
      return typeof value === "string" && typeof operand === "string" &&
        value.toLowerCase().startsWith(operand.toLowerCase());
    case "iendswith":
      return typeof value === "string" && typeof operand === "string" &&
        value.toLowerCase().endsWith(operand.toLowerCase());
    case "range":
      return inRange(value, operand);
    case "isnull":
      return (value === null || value === undefined) === operand;
    default: {
      const unknownOperator: never = operator;
      throw new ValidationError(
        "operator",
        unknownOperator,
        `Filter ${String(unknownOperator)} not supported`,
      );
    }
  }
};

const contains = (value: unknown, operand: unknown): boolean => {
  if (typeof value === "string") {
    return typeof operand === "string" && value.includes(operand);
  }
  if (Array.isArray(value)) {
    return value.some((item) => valuesEqual(item, operand));
  }
  return false;
};

const toList = (operand: unknown): unknown[] => {
  if (Array.isArray(operand)) {
    return operand;
  }
  return operand instanceof Set ? [...operand] : [];
};

const compareWith = (
  value: unknown,
  operand: unknown,
  holds: (order: number) => boolean,
): boolean => {
  const order = compareValues(value, operand);
  return order !== null && holds(order);
};

/**
 * `n` is the half-open range [0, n); `[start, end]` is [start, end)
 */
const inRange = (value: unknown, operand: unknown): boolean => {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    return false;
  }
  const parsed = rangeOperand.safeParse(operand);
  if (!parsed.success) {
    return false;
  }
  const [start, end] = typeof parsed.data === "number"
    ? [0, parsed.data]
    : parsed.data;
  return value >= start && value < end;
};
