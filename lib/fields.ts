import { z } from "zod";
import { Decimal } from "decimal.js";
import { format, isValid, parseISO } from "date-fns";
import { UTCDate } from "@date-fns/utc";
import { MapperErrorUtils, ValidationError } from "./errors.ts";
import { consoleLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";
import type { JsonArray, JsonObject, JsonValue } from "./types.ts";
import type { ModelInstance } from "./model.ts";

export type FieldKind =
  | "string"
  | "number"
  | "id"
  | "boolean"
  | "decimal"
  | "json"
  | "dict"
  | "list"
  | "datetime"
  | "date"
  | "reference"
  | "manyToMany";

/**
 * Allowed values mapped to a display label. Plain objects only work for
 * string values; use a Map for anything else.
 */
export type ChoicesInput<TValue> =
  | ReadonlyMap<TValue, string>
  | Readonly<Record<string, string>>;

export interface FieldOptions<TValue> {
  /** Static value or a generator called every time a default is needed */
  default?: TValue | (() => TValue);
  choices?: ChoicesInput<TValue>;
  /** Defaults to true */
  nullable?: boolean;
}

/**
 * Loads related instances for reference fields. Returns null when the target
 * model is unknown and the mapper is lenient.
 */
export interface RelationResolver {
  findByIds(modelName: string, ids: number[]): Promise<ModelInstance[] | null>;
}

export interface ResolveContext {
  lenient: boolean;
  logger: Logger;
  resolver: RelationResolver;
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const jsonObjectSchema = z.record(jsonValueSchema);

export const jsonArraySchema = z.array(jsonValueSchema);

const numericString = z.string().regex(
  /^[+-]?\d+(\.\d+)?$/,
  "Expected a numeric string",
);

const isGenerator = <TValue>(
  value: TValue | (() => TValue),
): value is () => TValue => typeof value === "function";

/**
 * Dates and decimals are choices by value, everything else by identity
 */
const sameChoice = (choice: unknown, value: unknown): boolean => {
  if (choice instanceof Date && value instanceof Date) {
    return choice.getTime() === value.getTime();
  }
  if (Decimal.isDecimal(choice) && Decimal.isDecimal(value)) {
    return choice.equals(value);
  }
  return false;
};

const isChoice = (
  choices: ReadonlyMap<unknown, string>,
  value: unknown,
): boolean =>
  choices.has(value) ||
  [...choices.keys()].some((choice) => sameChoice(choice, value));

const isChoiceMap = <TValue>(
  choices: ChoicesInput<TValue>,
): choices is ReadonlyMap<TValue, string> => choices instanceof Map;

/**
 * A typed contract for one attribute: default resolution, validation,
 * serialization (`clean`) and deserialization. Fields hold no per-instance
 * state, so one field object is shared by every instance of a model.
 *
 * - `TValue` is the in-memory value
 * - `TWire` is what goes into the stored JSON record
 * - `TDecoded` is what `deserialize` reads back before relation resolution
 */
export abstract class Field<TValue, TWire = TValue, TDecoded = TValue> {
  abstract readonly kind: FieldKind;
  readonly nullable: boolean;
  readonly choices: ReadonlyMap<unknown, string> | null;
  private readonly defaultFactory: () => TValue | null;

  constructor(options: FieldOptions<TValue> = {}) {
    this.nullable = options.nullable ?? true;
    this.choices = options.choices ? Field.toChoiceMap(options.choices) : null;

    const fallback = options.default;
    if (fallback === undefined) {
      this.defaultFactory = () => null;
    } else if (isGenerator(fallback)) {
      this.defaultFactory = fallback;
    } else {
      this.defaultFactory = () => fallback;
    }
  }

  private static toChoiceMap<TValue>(
    choices: ChoicesInput<TValue>,
  ): ReadonlyMap<unknown, string> {
    if (isChoiceMap(choices)) {
      return choices;
    }
    return new Map(Object.entries(choices));
  }

  /**
   * Evaluate the default (generators run on every call)
   */
  resolveDefault(): TValue | null {
    return this.defaultFactory();
  }

  /**
   * Resolve the default for a missing value, then enforce null and choices
   */
  check(value: TValue | null | undefined): TValue | null {
    const resolved = value ?? this.resolveDefault();
    if (resolved === null) {
      if (!this.nullable) {
        throw new ValidationError(this.kind, resolved, "null is not allowed");
      }
      return null;
    }
    if (this.choices && !isChoice(this.choices, resolved)) {
      const allowed = [...this.choices.keys()].map(String).join(", ");
      throw new ValidationError(
        this.kind,
        resolved,
        `${String(resolved)} is not allowed. Allowed values: ${allowed}`,
      );
    }
    return resolved;
  }

  /**
   * Produce the value written into the stored record
   */
  clean(value: TValue | null | undefined): TWire | null {
    const checked = this.check(value);
    return checked === null ? null : this.serialize(checked);
  }

  /**
   * Read a stored value back. A null in a non-nullable field is logged and
   * returned as null when lenient, rejected otherwise.
   */
  deserialize(
    raw: unknown,
    lenient: boolean,
    logger: Logger = consoleLogger,
  ): TDecoded | null {
    if (raw === null || raw === undefined) {
      if (!this.nullable) {
        if (!lenient) {
          throw new ValidationError(this.kind, raw, "null is not allowed");
        }
        logger.warn?.(
          `null can not be deserialized as a ${this.kind} field, ignoring`,
        );
      }
      return null;
    }
    return this.parse(raw);
  }

  /**
   * Deserialize and, for relations, load the related instances
   */
  abstract resolve(
    raw: unknown,
    context: ResolveContext,
  ): Promise<TValue | null>;

  protected abstract serialize(value: TValue): TWire;

  protected abstract parse(raw: unknown): TDecoded;

  protected expect<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    value: unknown,
  ): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw MapperErrorUtils.fromZodError(result.error, this.kind, value);
    }
    return result.data;
  }
}

/**
 * A field whose stored form decodes straight to its value
 */
export abstract class ScalarField<TValue, TWire = TValue>
  extends Field<TValue, TWire, TValue> {
  async resolve(
    raw: unknown,
    context: ResolveContext,
  ): Promise<TValue | null> {
    return this.deserialize(raw, context.lenient, context.logger);
  }
}

const stringLike = z.union([z.string(), z.number(), z.boolean()]).transform(
  String,
);

export class StringField extends ScalarField<string, string> {
  readonly kind: FieldKind = "string";

  protected serialize(value: string): string {
    return this.expect(stringLike, value);
  }

  protected parse(raw: unknown): string {
    return this.expect(stringLike, raw);
  }
}

const finiteNumber = z.number().finite();

export class NumberField extends ScalarField<number, number> {
  readonly kind: FieldKind = "number";

  protected serialize(value: number): number {
    return this.expect(finiteNumber, value);
  }

  protected parse(raw: unknown): number {
    if (typeof raw === "string") {
      const text = this.expect(numericString, raw);
      const parsed = text.includes(".")
        ? Number.parseFloat(text)
        : Number.parseInt(text, 10);
      return this.expect(finiteNumber, parsed);
    }
    return this.expect(finiteNumber, raw);
  }
}

const positiveInteger = z.number().int().positive();

/**
 * The implicit primary key of every model
 */
export class IdField extends NumberField {
  readonly kind: FieldKind = "id";

  constructor(options: Omit<FieldOptions<number>, "nullable" | "choices"> = {}) {
    super({ ...options, nullable: false });
  }

  protected serialize(value: number): number {
    return this.expect(positiveInteger, value);
  }

  protected parse(raw: unknown): number {
    return this.expect(positiveInteger, super.parse(raw));
  }
}

const BOOLEAN_CHOICES: ReadonlyMap<boolean, string> = new Map([
  [true, "Yes"],
  [false, "No"],
]);

const storedBoolean = z.union([
  z.boolean(),
  z.number().int(),
  z.string().regex(/^[+-]?\d+$/, "Expected an integer string").transform(
    Number,
  ),
]).transform((value) => typeof value === "boolean" ? value : value !== 0);

/**
 * Stored as 0/1
 */
export class BooleanField extends ScalarField<boolean, number> {
  readonly kind: FieldKind = "boolean";

  constructor(options: Omit<FieldOptions<boolean>, "choices"> = {}) {
    super({ ...options, choices: BOOLEAN_CHOICES });
  }

  protected serialize(value: boolean): number {
    return this.expect(z.boolean(), value) ? 1 : 0;
  }

  protected parse(raw: unknown): boolean {
    return this.expect(storedBoolean, raw);
  }
}

const decimalInput = z.union([finiteNumber, z.instanceof(Decimal)]);

const storedDecimal = z.union([finiteNumber, numericString]);

/**
 * Stored as a float, read back as an arbitrary-precision Decimal
 */
export class DecimalField extends ScalarField<Decimal, number> {
  readonly kind: FieldKind = "decimal";

  protected serialize(value: Decimal): number {
    const checked = this.expect(decimalInput, value);
    return typeof checked === "number" ? checked : checked.toNumber();
  }

  protected parse(raw: unknown): Decimal {
    return new Decimal(this.expect(storedDecimal, raw));
  }
}

abstract class JsonBackedField<TValue extends JsonValue>
  extends ScalarField<TValue, string> {
  protected abstract readonly allowed: z.ZodType<TValue>;

  protected serialize(value: TValue): string {
    return JSON.stringify(this.expect(this.allowed, value));
  }

  protected parse(raw: unknown): TValue {
    const text = this.expect(z.string(), raw);
    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(
        this.kind,
        raw,
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return this.expect(this.allowed, decoded);
  }
}

/**
 * A JSON object or array, stored as a JSON string
 */
export class JsonField extends JsonBackedField<JsonObject | JsonArray> {
  readonly kind: FieldKind = "json";
  protected readonly allowed = z.union([jsonObjectSchema, jsonArraySchema]);
}

export class DictField extends JsonBackedField<JsonObject> {
  readonly kind: FieldKind = "dict";
  protected readonly allowed = jsonObjectSchema;
}

export class ListField extends JsonBackedField<JsonArray> {
  readonly kind: FieldKind = "list";
  protected readonly allowed = jsonArraySchema;
}

export const DATETIME_FORMAT = "yyyy.MM.dd-HH:mm:ss'+UTC'";
export const DATE_FORMAT = "yyyy.MM.dd";

const STORED_DATETIME = /^(\d{4})\.(\d{2})\.(\d{2})-(\d{2}:\d{2}:\d{2})\+UTC$/;
const STORED_DATE = /^(\d{4})\.(\d{2})\.(\d{2})$/;

const validDate = z.date();

/**
 * Stored as `YYYY.MM.DD-HH:MM:SS+UTC`; sub-second precision is dropped
 */
export class DateTimeField extends ScalarField<Date, string> {
  readonly kind: FieldKind = "datetime";

  protected serialize(value: Date): string {
    const date = this.expect(validDate, value);
    return format(new UTCDate(date.getTime()), DATETIME_FORMAT);
  }

  protected parse(raw: unknown): Date {
    return parseUtc(
      this.kind,
      this.expect(z.string(), raw),
      STORED_DATETIME,
      DATETIME_FORMAT,
    );
  }
}

/**
 * Stored as `YYYY.MM.DD` (the UTC calendar day), read back as UTC midnight
 */
export class DateField extends ScalarField<Date, string> {
  readonly kind: FieldKind = "date";

  protected serialize(value: Date): string {
    const date = this.expect(validDate, value);
    return format(new UTCDate(date.getTime()), DATE_FORMAT);
  }

  protected parse(raw: unknown): Date {
    return parseUtc(
      this.kind,
      this.expect(z.string(), raw),
      STORED_DATE,
      DATE_FORMAT,
    );
  }
}

/**
 * Read a stored UTC string as an ISO instant with an explicit `Z`, so the
 * host time zone never takes part
 */
const parseUtc = (
  kind: FieldKind,
  text: string,
  stored: RegExp,
  pattern: string,
): Date => {
  const match = stored.exec(text);
  const parsed = match
    ? parseISO(`${match[1]}-${match[2]}-${match[3]}T${match[4] ?? "00:00:00"}Z`)
    : null;
  if (!parsed || !isValid(parsed)) {
    throw new ValidationError(
      kind,
      text,
      `expected a date formatted as ${pattern.replaceAll("'", "")}`,
    );
  }
  return parsed;
};
