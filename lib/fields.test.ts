import { afterEach, describe, expect, it } from "vitest";
import { Decimal } from "decimal.js";
import {
  BooleanField,
  DateField,
  DateTimeField,
  DecimalField,
  DictField,
  IdField,
  JsonField,
  ListField,
  NumberField,
  StringField,
} from "./fields.ts";
import { ValidationError } from "./errors.ts";
import { createRecordingLogger } from "./fixtures.ts";
import { silentLogger } from "./logger.ts";

describe("fields", () => {
  describe("defaults, null and choices", () => {
    it("should use a static default for a missing value", () => {
      const field = new StringField({ default: "PENDING" });

      expect(field.clean(undefined)).toBe("PENDING");
      expect(field.clean(null)).toBe("PENDING");
      expect(field.clean("DONE")).toBe("DONE");
    });

    it("should call a default generator every time", () => {
      let calls = 0;
      const field = new NumberField({ default: () => ++calls });

      expect(field.clean(null)).toBe(1);
      expect(field.clean(null)).toBe(2);
      expect(field.resolveDefault()).toBe(3);
    });

    it("should allow null unless the field is non-nullable", () => {
      expect(new StringField().clean(null)).toBeNull();

      const required = new StringField({ nullable: false });
      expect(() => required.clean(null)).toThrow(ValidationError);
      expect(() => required.clean(null)).toThrow("null is not allowed");
    });

    it("should reject values outside the choices", () => {
      const field = new StringField({
        choices: { REVOKED: "Revoked", SUCCESS: "Success" },
      });

      expect(field.clean("SUCCESS")).toBe("SUCCESS");
      expect(() => field.clean("bogus")).toThrow(
        "bogus is not allowed. Allowed values: REVOKED, SUCCESS",
      );
    });

    it("should accept Map choices for non-string values", () => {
      const field = new NumberField({
        choices: new Map([[1, "one"], [2, "two"]]),
      });

      expect(field.clean(2)).toBe(2);
      expect(() => field.clean(3)).toThrow(ValidationError);
    });

    it("should match date and decimal choices by value", () => {
      const launch = new DateField({
        choices: new Map([[new Date(Date.UTC(2024, 5, 1)), "launch"]]),
      });
      const price = new DecimalField({
        choices: new Map([[new Decimal("9.99"), "standard"]]),
      });

      expect(launch.clean(new Date(Date.UTC(2024, 5, 1)))).toBe("2024.06.01");
      expect(() => launch.clean(new Date(Date.UTC(2024, 5, 2)))).toThrow(
        ValidationError,
      );
      expect(price.clean(new Decimal("9.990"))).toBe(9.99);
      expect(() => price.clean(new Decimal("10"))).toThrow(ValidationError);
    });

    it("should return null for a stored null in a non-nullable field when lenient", () => {
      const logger = createRecordingLogger();
      const field = new NumberField({ nullable: false });

      expect(field.deserialize(null, true, logger)).toBeNull();
      expect(logger.messages).toEqual([{
        level: "warn",
        message: "null can not be deserialized as a number field, ignoring",
      }]);
    });

    it("should reject a stored null in a non-nullable field when strict", () => {
      const field = new NumberField({ nullable: false });

      expect(() => field.deserialize(null, false)).toThrow(ValidationError);
    });
  });

  describe("StringField", () => {
    it("should coerce stored primitives to strings", () => {
      const field = new StringField();

      expect(field.deserialize("abc", false)).toBe("abc");
      expect(field.deserialize(12, false)).toBe("12");
      expect(field.deserialize(true, false)).toBe("true");
    });

    it("should reject stored objects", () => {
      expect(() => new StringField().deserialize({ a: 1 }, false)).toThrow(
        ValidationError,
      );
    });
  });

  describe("NumberField", () => {
    it("should round trip integers and floats", () => {
      const field = new NumberField();

      expect(field.deserialize(field.clean(42), false)).toBe(42);
      expect(field.deserialize(field.clean(2.5), false)).toBe(2.5);
    });

    it("should read numeric strings", () => {
      const field = new NumberField();

      expect(field.deserialize("17", false)).toBe(17);
      expect(field.deserialize("1.25", false)).toBe(1.25);
      expect(() => field.deserialize("12abc", false)).toThrow(ValidationError);
    });

    it("should reject non-finite numbers", () => {
      const field = new NumberField();

      expect(() => field.clean(Number.NaN)).toThrow(ValidationError);
      expect(() => field.clean(Number.POSITIVE_INFINITY)).toThrow(
        ValidationError,
      );
    });

    it("should report errors under the field kind", () => {
      try {
        new NumberField().deserialize([], false);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.field).toBe("number");
        }
      }
    });
  });

  describe("IdField", () => {
    it("should never be nullable", () => {
      const field = new IdField();

      expect(field.nullable).toBe(false);
      expect(() => field.clean(null)).toThrow("null is not allowed");
    });

    it("should accept positive integers only", () => {
      const field = new IdField();

      expect(field.clean(3)).toBe(3);
      expect(() => field.clean(0)).toThrow(ValidationError);
      expect(() => field.clean(1.5)).toThrow(ValidationError);
      expect(field.deserialize("8", false)).toBe(8);
    });
  });

  describe("BooleanField", () => {
    it("should store booleans as 0/1", () => {
      const field = new BooleanField();

      expect(field.clean(true)).toBe(1);
      expect(field.clean(false)).toBe(0);
    });

    it("should read 0/1, numeric strings and booleans", () => {
      const field = new BooleanField();

      expect(field.deserialize(1, false)).toBe(true);
      expect(field.deserialize(0, false)).toBe(false);
      expect(field.deserialize("0", false)).toBe(false);
      expect(field.deserialize("1", false)).toBe(true);
      expect(field.deserialize(true, false)).toBe(true);
      expect(() => field.deserialize("yes", false)).toThrow(ValidationError);
    });

    it("should have fixed Yes/No choices", () => {
      const field = new BooleanField({ default: true });

      expect(field.choices?.get(true)).toBe("Yes");
      expect(field.choices?.get(false)).toBe("No");
      expect(field.clean(undefined)).toBe(1);
    });
  });

  describe("DecimalField", () => {
    it("should store a number and read back a Decimal", () => {
      const field = new DecimalField();

      const stored = field.clean(new Decimal("19.99"));
      expect(stored).toBe(19.99);

      const read = field.deserialize(stored, false);
      expect(read).toBeInstanceOf(Decimal);
      expect(read?.equals(new Decimal("19.99"))).toBe(true);
    });

    it("should read numeric strings", () => {
      const read = new DecimalField().deserialize("2.50", false);

      expect(read?.toString()).toBe("2.5");
    });

    it("should reject other stored values", () => {
      expect(() => new DecimalField().deserialize(false, false)).toThrow(
        ValidationError,
      );
    });
  });

  describe("JSON fields", () => {
    it("should store JSON text and parse it back", () => {
      const field = new JsonField();

      const stored = field.clean({ a: [1, 2], b: null });
      expect(stored).toBe('{"a":[1,2],"b":null}');
      expect(field.deserialize(stored, false)).toEqual({ a: [1, 2], b: null });
      expect(field.deserialize("[1,2]", false)).toEqual([1, 2]);
    });

    it("should restrict DictField to objects and ListField to arrays", () => {
      expect(new DictField().deserialize('{"k":"v"}', false)).toEqual({
        k: "v",
      });
      expect(() => new DictField().deserialize("[1]", false)).toThrow(
        ValidationError,
      );
      expect(new ListField().deserialize('["s","m"]', false)).toEqual([
        "s",
        "m",
      ]);
      expect(() => new ListField().deserialize('{"k":1}', false)).toThrow(
        ValidationError,
      );
    });

    it("should report unparsable JSON", () => {
      try {
        new JsonField().deserialize("{oops", false);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.rule.startsWith("invalid JSON: ")).toBe(true);
        }
      }
    });
  });

  describe("DateTimeField", () => {
    it("should format UTC components and drop sub-second precision", () => {
      const field = new DateTimeField();
      const moment = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678));

      const stored = field.clean(moment);
      expect(stored).toBe("2024.01.02-03:04:05+UTC");

      const read = field.deserialize(stored, false);
      expect(read?.getTime()).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
    });

    it("should reject malformed stored values", () => {
      const field = new DateTimeField();

      expect(() => field.deserialize("2024-01-02T03:04:05Z", false)).toThrow(
        "expected a date formatted as yyyy.MM.dd-HH:mm:ss+UTC",
      );
      expect(() => field.deserialize(1700000000, false)).toThrow(
        ValidationError,
      );
    });

    it("should reject invalid dates", () => {
      expect(() => new DateTimeField().clean(new Date("nope"))).toThrow(
        ValidationError,
      );
    });
  });

  describe("DateField", () => {
    it("should store the UTC calendar day and read back UTC midnight", () => {
      const field = new DateField();

      const stored = field.clean(new Date(Date.UTC(2024, 1, 29, 23, 30)));
      expect(stored).toBe("2024.02.29");
      expect(field.deserialize(stored, false)?.getTime()).toBe(
        Date.UTC(2024, 1, 29),
      );
    });

    it("should use the logger it is given", () => {
      expect(new DateField().deserialize(undefined, true, silentLogger))
        .toBeNull();
    });
  });

  describe("dates under other host time zones", () => {
    const hostZone = process.env.TZ;

    afterEach(() => {
      if (hostZone === undefined) {
        delete process.env.TZ;
      } else {
        process.env.TZ = hostZone;
      }
    });

    for (const zone of ["Asia/Kolkata", "America/Los_Angeles", "Europe/Berlin"]) {
      it(`should round-trip datetimes in ${zone}`, () => {
        process.env.TZ = zone;
        const field = new DateTimeField();
        // 02:30 local time does not exist in Berlin that day
        const moment = new Date(Date.UTC(2024, 2, 31, 2, 30, 15));

        const stored = field.clean(moment);
        expect(stored).toBe("2024.03.31-02:30:15+UTC");
        expect(field.deserialize(stored, false)?.getTime()).toBe(
          Date.UTC(2024, 2, 31, 2, 30, 15),
        );
      });

      it(`should round-trip dates in ${zone}`, () => {
        process.env.TZ = zone;
        const field = new DateField();

        const stored = field.clean(new Date(Date.UTC(2024, 0, 1, 23, 0)));
        expect(stored).toBe("2024.01.01");
        expect(field.deserialize(stored, false)?.getTime()).toBe(
          Date.UTC(2024, 0, 1),
        );
      });
    }

    it("should reject impossible calendar days", () => {
      expect(() => new DateField().deserialize("2023.02.29", false)).toThrow(
        "expected a date formatted as yyyy.MM.dd",
      );
    });
  });
});
