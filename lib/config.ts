import { z } from "zod";
import { ConfigurationError, MapperErrorUtils } from "./errors.ts";
import { consoleLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";
import { KEY_SEPARATOR } from "./utils.ts";

export const DEFAULT_PREFIX = "kv_models";

/**
 * A value, or a function evaluated once when the mapper is created
 */
export type Resolvable<T> = T | (() => T);

export interface MapperOptions {
  /** Namespace of every key; must not contain `:` */
  prefix?: Resolvable<string>;
  /** Log and skip what can not be deserialized instead of failing */
  lenient?: Resolvable<boolean>;
  /** List keys with KEYS; when false, SCAN incrementally */
  useKeys?: Resolvable<boolean>;
  /** Let operations interleave instead of running one at a time */
  nonBlocking?: Resolvable<boolean>;
  logger?: Logger;
}

export interface ResolvedOptions {
  prefix: string;
  lenient: boolean;
  useKeys: boolean;
  nonBlocking: boolean;
  logger: Logger;
}

const flagsSchema = z.object({
  lenient: z.boolean().default(true),
  useKeys: z.boolean().default(true),
  nonBlocking: z.boolean().default(false),
});

const isThunk = <T>(value: Resolvable<T>): value is () => T =>
  typeof value === "function";

const evaluate = <T>(value: Resolvable<T> | undefined): T | undefined => {
  if (value === undefined) {
    return undefined;
  }
  return isThunk(value) ? value() : value;
};

/**
 * Keys are split on `:`, so the prefix can not contain one
 */
export const sanitizePrefix = (
  prefix: unknown,
  logger: Logger = consoleLogger,
): string => {
  if (typeof prefix !== "string" || prefix.length === 0) {
    logger.warn?.(
      `prefix must be a non-empty string, using default prefix ${DEFAULT_PREFIX}`,
    );
    return DEFAULT_PREFIX;
  }
  if (!prefix.includes(KEY_SEPARATOR)) {
    return prefix;
  }
  logger.warn?.(`prefix can not contain colon (${KEY_SEPARATOR}), removing it`);
  return sanitizePrefix(prefix.replaceAll(KEY_SEPARATOR, ""), logger);
};

/**
 * Apply defaults and validate mapper options
 */
export const resolveOptions = (options: MapperOptions = {}): ResolvedOptions => {
  const logger = options.logger ?? consoleLogger;
  const result = flagsSchema.safeParse({
    lenient: evaluate(options.lenient),
    useKeys: evaluate(options.useKeys),
    nonBlocking: evaluate(options.nonBlocking),
  });
  if (!result.success) {
    throw toConfigurationError(result.error, "options");
  }
  const prefix = evaluate(options.prefix);
  return {
    ...result.data,
    prefix: prefix === undefined ? DEFAULT_PREFIX : sanitizePrefix(prefix, logger),
    logger,
  };
};

const booleanFlag = z.enum(["true", "false", "1", "0"]).transform((value) =>
  value === "true" || value === "1"
);

const envSchema = z.object({
  MAPPER_PREFIX: z.string().min(1).optional(),
  MAPPER_LENIENT: booleanFlag.optional(),
  MAPPER_USE_KEYS: booleanFlag.optional(),
  MAPPER_NON_BLOCKING: booleanFlag.optional(),
  REDIS_URL: z.string().url().optional(),
});

export interface EnvOptions {
  prefix?: string;
  lenient?: boolean;
  useKeys?: boolean;
  nonBlocking?: boolean;
  redisUrl?: string;
}

/**
 * Read mapper options from environment variables. Unset variables are left
 * out so they can be merged over other defaults.
 */
export const loadOptionsFromEnv = (
  env: Readonly<Record<string, string | undefined>> = process.env,
): EnvOptions => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw toConfigurationError(result.error, "environment");
  }
  const parsed = result.data;
  const options: EnvOptions = {};
  if (parsed.MAPPER_PREFIX !== undefined) {
    options.prefix = parsed.MAPPER_PREFIX;
  }
  if (parsed.MAPPER_LENIENT !== undefined) {
    options.lenient = parsed.MAPPER_LENIENT;
  }
  if (parsed.MAPPER_USE_KEYS !== undefined) {
    options.useKeys = parsed.MAPPER_USE_KEYS;
  }
  if (parsed.MAPPER_NON_BLOCKING !== undefined) {
    options.nonBlocking = parsed.MAPPER_NON_BLOCKING;
  }
  if (parsed.REDIS_URL !== undefined) {
    options.redisUrl = parsed.REDIS_URL;
  }
  return options;
};

const toConfigurationError = (
  error: z.ZodError,
  configPath: string,
): ConfigurationError => {
  const issue = MapperErrorUtils.fromZodError(error, configPath, undefined);
  return new ConfigurationError(issue.rule, configPath);
};
