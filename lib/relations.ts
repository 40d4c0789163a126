import { z } from "zod";
import { Field } from "./fields.ts";
import type { FieldKind, FieldOptions, ResolveContext } from "./fields.ts";
import { ConfigurationError, ValidationError } from "./errors.ts";
import { ModelInstance } from "./model.ts";
import type { FieldMap, ModelSchema } from "./schema.ts";

const storedId = z.number().int().positive();

const storedIdList = z.array(storedId);

type RelationTarget<TF extends FieldMap> = string | ModelSchema<TF>;

const targetNameOf = <TF extends FieldMap>(
  target: RelationTarget<TF>,
): string => {
  const name = typeof target === "string" ? target : target.name;
  if (name.length === 0) {
    throw new ConfigurationError(
      "a relation needs a target model name",
      "relation",
    );
  }
  return name;
};

/**
 * Points at exactly one instance of the target model; stored as its id
 */
export class ReferenceField<TF extends FieldMap = FieldMap>
  extends Field<ModelInstance<TF>, number, number> {
  readonly kind: FieldKind = "reference";
  readonly targetName: string;

  constructor(
    target: RelationTarget<TF>,
    options: FieldOptions<ModelInstance<TF>> = {},
  ) {
    super(options);
    this.targetName = targetNameOf(target);
  }

  async resolve(
    raw: unknown,
    context: ResolveContext,
  ): Promise<ModelInstance<TF> | null> {
    const id = this.deserialize(raw, context.lenient, context.logger);
    if (id === null) {
      return null;
    }
    const found = await context.resolver.findByIds(this.targetName, [id]);
    if (found === null) {
      return null;
    }
    const [match] = found.filter((instance) => this.owns(instance));
    if (found.length !== 1 || !match) {
      throw new ValidationError(
        this.kind,
        id,
        `expected exactly one ${this.targetName} with id ${id}, found ${found.length}`,
      );
    }
    return match;
  }

  protected serialize(value: ModelInstance<TF>): number {
    return idOfRelated(this.kind, this.targetName, value);
  }

  protected parse(raw: unknown): number {
    return this.expect(storedId, raw);
  }

  private owns(instance: ModelInstance): instance is ModelInstance<TF> {
    return instance.modelName === this.targetName;
  }
}

/**
 * Points at any number of instances of the target model; stored as a JSON
 * array of ids. Resolved instances come back in id order.
 */
export class ManyToManyField<TF extends FieldMap = FieldMap>
  extends Field<ModelInstance<TF>[], string, number[]> {
  readonly kind: FieldKind = "manyToMany";
  readonly targetName: string;

  constructor(
    target: RelationTarget<TF>,
    options: Omit<FieldOptions<ModelInstance<TF>[]>, "choices"> = {},
  ) {
    super(options);
    this.targetName = targetNameOf(target);
  }

  async resolve(
    raw: unknown,
    context: ResolveContext,
  ): Promise<ModelInstance<TF>[] | null> {
    const ids = this.deserialize(raw, context.lenient, context.logger);
    if (ids === null) {
      return null;
    }
    const found = await context.resolver.findByIds(this.targetName, ids);
    if (found === null) {
      return null;
    }
    return found.filter((instance) => this.owns(instance));
  }

  protected serialize(value: ModelInstance<TF>[]): string {
    const items = this.expect(z.array(z.unknown()), value);
    const ids = items.map((item) =>
      idOfRelated(this.kind, this.targetName, item)
    );
    return JSON.stringify(ids);
  }

  protected parse(raw: unknown): number[] {
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
    return this.expect(storedIdList, decoded);
  }

  private owns(instance: ModelInstance): instance is ModelInstance<TF> {
    return instance.modelName === this.targetName;
  }
}

/**
 * A saved instance of the target model, or a bare id
 */
const idOfRelated = (
  kind: FieldKind,
  targetName: string,
  value: unknown,
): number => {
  if (value instanceof ModelInstance) {
    if (value.modelName !== targetName) {
      throw new ValidationError(
        kind,
        value.modelName,
        `expected a ${targetName} instance, got ${value.modelName}`,
      );
    }
    if (value.id === null) {
      throw new ValidationError(
        kind,
        null,
        `the ${targetName} instance has not been saved`,
      );
    }
    return value.id;
  }
  const result = storedId.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      kind,
      value,
      `expected a ${targetName} instance or id`,
    );
  }
  return result.data;
};
