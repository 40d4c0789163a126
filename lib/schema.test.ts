import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors.ts";
import { IdField, NumberField, StringField } from "./fields.ts";
import { defineModel, ModelSchema } from "./schema.ts";

describe("ModelSchema", () => {
  it("should put id first, then the declared fields in order", () => {
    const schema = defineModel("Tag", {
      label: new StringField(),
      weight: new NumberField(),
    });

    expect(schema.name).toBe("Tag");
    expect(schema.fieldNames).toEqual(["id", "label", "weight"]);
    expect(schema.fields.id).toBeInstanceOf(IdField);
    expect(schema.entries().map(([name]) => name)).toEqual([
      "id",
      "label",
      "weight",
    ]);
  });

  it("should look fields up by name", () => {
    const schema = defineModel("Tag", { label: new StringField() });

    expect(schema.hasField("label")).toBe(true);
    expect(schema.hasField("missing")).toBe(false);
    expect(schema.hasField("toString")).toBe(false);
    expect(schema.getField("label")).toBe(schema.fields.label);
    expect(schema.getField("missing")).toBeUndefined();
  });

  it("should be frozen", () => {
    const schema = defineModel("Tag", { label: new StringField() });

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.fields)).toBe(true);
    expect(Object.isFrozen(schema.fieldNames)).toBe(true);
  });

  it("should reject model names that would break keys", () => {
    expect(() => defineModel("Bad:Name", {})).toThrow(ConfigurationError);
    expect(() => defineModel("", {})).toThrow(ConfigurationError);
    expect(() => defineModel("Has Space", {})).toThrow(ConfigurationError);
  });

  it("should reserve the id field", () => {
    expect(() => defineModel("Tag", { id: new NumberField() })).toThrow(
      "model Tag can not redeclare the reserved 'id' field",
    );
  });

  it("should require an IdField when built directly", () => {
    expect(() => new ModelSchema("Tag", { label: new StringField() })).toThrow(
      "model Tag must declare 'id' as an IdField",
    );
  });

  it("should derive a model from another one", () => {
    const base = defineModel("Named", {
      name: new StringField(),
      rank: new NumberField(),
    });
    const derived = base.extend("Employee", {
      team: new StringField(),
      rank: new NumberField({ default: 1 }),
    });

    expect(derived.name).toBe("Employee");
    expect(derived.fieldNames).toEqual(["id", "name", "rank", "team"]);
    expect(derived.fields.rank.clean(null)).toBe(1);
    expect(base.fields.rank.clean(null)).toBeNull();
  });
});
