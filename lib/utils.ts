import type { RecordKey } from "./types.ts";

export const KEY_SEPARATOR = ":";

/**
 * Key of one stored record, ex. `app:Session:12`
 */
export const buildRecordKey = (
  prefix: string,
  modelName: string,
  id: number,
): string => [prefix, modelName, id].join(KEY_SEPARATOR);

/**
 * Escape glob metacharacters so they match literally
 */
export const escapeGlob = (value: string): string =>
  value.replace(/[*?[\]\\]/g, "\\$&");

/**
 * Glob matching every record of a model, ex. `app:Session:*`
 */
export const buildModelPattern = (prefix: string, modelName: string): string =>
  [escapeGlob(prefix), escapeGlob(modelName), "*"].join(KEY_SEPARATOR);

export const buildCounterKey = (prefix: string, modelName: string): string =>
  ["max_id", prefix, modelName].join(KEY_SEPARATOR);

export const buildLockKey = (prefix: string): string =>
  ["__lock__", prefix].join(KEY_SEPARATOR);

/**
 * Split a record key into its parts. Returns null when the key does not have
 * exactly three segments or the id is not a positive integer.
 */
export const parseRecordKey = (key: string): RecordKey | null => {
  const parts = key.split(KEY_SEPARATOR);
  if (parts.length !== 3) {
    return null;
  }
  const [prefix, modelName, rawId] = parts;
  if (!/^[0-9]+$/.test(rawId)) {
    return null;
  }
  const id = Number(rawId);
  if (!Number.isSafeInteger(id) || id <= 0) {
    return null;
  }
  return { prefix, modelName, id };
};

/**
 * Translate a Redis-style glob into an anchored RegExp.
 * Supports `*`, `?`, `[...]` classes (with `^` negation) and `\` escapes.
 */
export const globToRegExp = (pattern: string): RegExp => {
  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === "\\" && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[++i]);
    } else if (char === "*") {
      source += "[\\s\\S]*";
    } else if (char === "?") {
      source += "[\\s\\S]";
    } else if (char === "[") {
      const end = pattern.indexOf("]", i + 1);
      if (end === -1) {
        source += "\\[";
        continue;
      }
      let body = pattern.slice(i + 1, end);
      const negated = body.startsWith("^");
      if (negated) {
        body = body.slice(1);
      }
      source += `[${negated ? "^" : ""}${body.replace(/[\\\]]/g, "\\$&")}]`;
      i = end;
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`);
};

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
