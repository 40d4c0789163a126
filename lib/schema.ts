import { IdField } from "./fields.ts";
import type { Field, FieldOptions } from "./fields.ts";
import { ConfigurationError } from "./errors.ts";

/**
 * Any field, whatever its value and wire types
 */
export type AnyField = Field<unknown, unknown, unknown>;

/**
 * Field name -> field, in declaration order
 */
export type FieldMap = { readonly [name: string]: AnyField };

export type FieldName<F extends FieldMap> = Extract<keyof F, string>;

/**
 * The in-memory value type of a field (always nullable)
 */
export type FieldValue<TField extends AnyField> = Awaited<
  ReturnType<TField["resolve"]>
>;

/**
 * Plain object view of a model: every field with its value
 */
export type InferModel<F extends FieldMap> = {
  [K in FieldName<F>]: FieldValue<F[K]>;
};

/**
 * Values accepted when building an instance; all optional
 */
export type ModelInput<F extends FieldMap> = {
  [K in FieldName<F>]?: FieldValue<F[K]>;
};

export type WithId<F extends FieldMap> = { id: IdField } & F;

const MODEL_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * The frozen, ordered field map of one model. `id` always comes first.
 */
export class ModelSchema<F extends FieldMap = FieldMap> {
  readonly fields: F;
  readonly fieldNames: readonly string[];

  constructor(
    readonly name: string,
    fields: F,
  ) {
    if (!MODEL_NAME.test(name)) {
      throw new ConfigurationError(
        `model name '${name}' must start with a letter or underscore and contain only letters, digits and underscores`,
        "model",
      );
    }
    if (!(fields.id instanceof IdField)) {
      throw new ConfigurationError(
        `model ${name} must declare 'id' as an IdField`,
        "model",
      );
    }
    const copy = { ...fields };
    Object.freeze(copy);
    this.fields = copy;
    this.fieldNames = Object.freeze(Object.keys(copy));
    Object.freeze(this);
  }

  hasField(name: string): boolean {
    return Object.hasOwn(this.fields, name);
  }

  getField(name: string): AnyField | undefined {
    return this.hasField(name) ? this.fields[name] : undefined;
  }

  /**
   * Fields in schema order
   */
  entries(): [string, AnyField][] {
    return this.fieldNames.map((name) => [name, this.fields[name]]);
  }

  /**
   * Derive a new model that has every field of this one, followed by `fields`
   * (a redeclared name replaces the inherited field in place)
   */
  extend<G extends FieldMap>(name: string, fields: G): ModelSchema<F & G> {
    assertNoId(name, fields);
    return new ModelSchema(name, { ...this.fields, ...fields });
  }
}

const assertNoId = (modelName: string, fields: FieldMap): void => {
  if (Object.hasOwn(fields, "id")) {
    throw new ConfigurationError(
      `model ${modelName} can not redeclare the reserved 'id' field`,
      "model",
    );
  }
};

/**
 * Declare a model. An `id` field is added in front of the declared fields.
 *
 * @example
 * ```ts
 * const Session = defineModel("Session", {
 *   token: new StringField({ default: () => randomUUID() }),
 *   created: new DateTimeField({ default: () => new Date() }),
 * });
 * ```
 */
export const defineModel = <F extends FieldMap>(
  name: string,
  fields: F,
  idOptions?: Omit<FieldOptions<number>, "nullable" | "choices">,
): ModelSchema<WithId<F>> => {
  assertNoId(name, fields);
  return new ModelSchema(name, { id: new IdField(idOptions), ...fields });
};
