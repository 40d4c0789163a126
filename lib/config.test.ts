import { describe, expect, it } from "vitest";
import {
  DEFAULT_PREFIX,
  loadOptionsFromEnv,
  resolveOptions,
  sanitizePrefix,
} from "./config.ts";
import type { MapperOptions } from "./config.ts";
import { ConfigurationError } from "./errors.ts";
import { createRecordingLogger } from "./fixtures.ts";

describe("sanitizePrefix", () => {
  it("should keep a plain prefix", () => {
    const logger = createRecordingLogger();

    expect(sanitizePrefix("app", logger)).toBe("app");
    expect(logger.messages).toEqual([]);
  });

  it("should remove colons with a warning", () => {
    const logger = createRecordingLogger();

    expect(sanitizePrefix("my:app:", logger)).toBe("myapp");
    expect(logger.messages).toEqual([
      {
        level: "warn",
        message: "prefix can not contain colon (:), removing it",
      },
    ]);
  });

  it("should fall back to the default prefix", () => {
    const logger = createRecordingLogger();

    expect(sanitizePrefix(42, logger)).toBe(DEFAULT_PREFIX);
    expect(sanitizePrefix(":", logger)).toBe(DEFAULT_PREFIX);
    expect(logger.messages.map((entry) => entry.level)).toEqual([
      "warn",
      "warn",
      "warn",
    ]);
  });
});

describe("resolveOptions", () => {
  it("should apply defaults", () => {
    const logger = createRecordingLogger();

    expect(resolveOptions({ logger })).toEqual({
      prefix: DEFAULT_PREFIX,
      lenient: true,
      useKeys: true,
      nonBlocking: false,
      logger,
    });
  });

  it("should evaluate option thunks", () => {
    const resolved = resolveOptions({
      prefix: () => "tasks",
      lenient: () => false,
      nonBlocking: true,
      logger: createRecordingLogger(),
    });

    expect(resolved.prefix).toBe("tasks");
    expect(resolved.lenient).toBe(false);
    expect(resolved.nonBlocking).toBe(true);
  });

  it("should reject flags that are not booleans", () => {
    const options: MapperOptions = {};
    Object.assign(options, { lenient: "yes" });

    expect(() => resolveOptions(options)).toThrow(ConfigurationError);
    expect(() => resolveOptions(options)).toThrow(
      "Configuration error in options: lenient:",
    );
  });
});

describe("loadOptionsFromEnv", () => {
  it("should read only the variables that are set", () => {
    expect(
      loadOptionsFromEnv({
        MAPPER_PREFIX: "tasks",
        MAPPER_LENIENT: "0",
        MAPPER_NON_BLOCKING: "true",
        REDIS_URL: "redis://cache.test:6379/2",
        HOME: "/home/test",
      }),
    ).toEqual({
      prefix: "tasks",
      lenient: false,
      nonBlocking: true,
      redisUrl: "redis://cache.test:6379/2",
    });
    expect(loadOptionsFromEnv({})).toEqual({});
  });

  it("should reject malformed flags", () => {
    expect(() => loadOptionsFromEnv({ MAPPER_USE_KEYS: "yes" })).toThrow(
      "Configuration error in environment: MAPPER_USE_KEYS:",
    );
  });
});
