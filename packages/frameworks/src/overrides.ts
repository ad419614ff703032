/**
 * Framework parameter overrides, e.g. from `-Xf.n_estimators=3000`
 * on the command line.
 */

import { type FrameworkDefinition, type FrameworkParams, isPlainRecord } from "@benchdef/core";
import { ValidationError } from "@benchdef/errors";
import { parse as parseYaml } from "yaml";

import { deepFreeze } from "./freeze.js";

/** Key segments that would reach an object's prototype chain */
const RESERVED_SEGMENTS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

/**
 * Turns `key=value` strings into a params record.
 *
 * - Values are read as YAML scalars: `true` → true, `3000` → 3000, `rbf` → "rbf"
 * - An empty value is null
 * - Dotted keys nest: `search.max_evals=10` → `{ search: { max_evals: 10 } }`
 * - Later arguments win over earlier ones
 *
 * @throws {ValidationError} for arguments without `=`, empty or reserved
 *   key segments (`__proto__`, `constructor`, `prototype`), or values that
 *   are not valid YAML
 */
export function parseParamOverrides(args: readonly string[]): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  for (const arg of args) {
    const eq = arg.indexOf("=");
    const path = eq > 0 ? arg.slice(0, eq).split(".") : [];
    if (path.length === 0 || path.some((segment) => segment.trim() === "")) {
      throw new ValidationError({
        code: "VALIDATION_FAILED",
        message: `Invalid parameter override '${arg}': expected key=value`,
        issues: [{ field: arg, message: "expected key=value", code: "OVERRIDE_FORMAT", value: arg }],
      });
    }
    const reserved = path.find((segment) => RESERVED_SEGMENTS.has(segment));
    if (reserved !== undefined) {
      throw new ValidationError({
        code: "VALIDATION_FAILED",
        message: `Invalid parameter override '${arg}': key segment '${reserved}' is reserved`,
        issues: [{ field: arg, message: "reserved key segment", code: "OVERRIDE_KEY", value: arg }],
      });
    }
    setPath(overrides, path, decodeValue(arg, arg.slice(eq + 1)));
  }

  return overrides;
}

/**
 * New frozen definition whose params are the definition's params updated
 * by `overrides`. Nested mappings merge key by key; anything else replaces.
 */
export function withParamOverrides(
  definition: FrameworkDefinition,
  overrides: FrameworkParams,
): FrameworkDefinition {
  return deepFreeze({
    ...definition,
    params: mergeParams(definition.params, overrides),
  });
}

function mergeParams(base: FrameworkParams, patch: FrameworkParams): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const existing = result[key];
    result[key] =
      isPlainRecord(existing) && isPlainRecord(value)
        ? mergeParams(existing, value)
        : structuredClone(value);
  }
  return result;
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const child = target[head];
  const next: Record<string, unknown> = isPlainRecord(child) ? child : {};
  target[head] = next;
  setPath(next, rest, value);
}

function decodeValue(arg: string, raw: string): unknown {
  try {
    return parseYaml(raw);
  } catch (error: unknown) {
    throw new ValidationError({
      code: "VALIDATION_FAILED",
      message: `Invalid parameter override '${arg}': value is not valid YAML`,
      ...(error instanceof Error ? { cause: error } : {}),
    });
  }
}
