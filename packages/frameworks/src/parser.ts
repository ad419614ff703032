/**
 * Synchronous YAML framework document parser.
 * Parses YAML, resolves inheritance and defaults, and wraps the frozen
 * result in a registry.
 */

import { isPlainRecord } from "@benchdef/core";
import { FrameworksParseError } from "@benchdef/errors";
import { isMap, isScalar, parseDocument } from "yaml";

import { FrameworkRegistry } from "./registry.js";
import { resolveFrameworkDefinitions } from "./resolver.js";
import { consoleWarningSink, type WarningSink } from "./warnings.js";

export interface ParseFrameworksOptions {
  /** Reported in parse errors; not read */
  readonly filePath?: string;
  /** Receives YAML warnings and registry lookup warnings. Default: console */
  readonly onWarning?: WarningSink;
}

/**
 * Parses a YAML framework document into a registry of resolved definitions.
 *
 * Pipeline:
 * 1. Parse YAML (duplicate framework names are a parse error)
 * 2. Forward YAML warnings
 * 3. Resolve inheritance, defaults, validation
 *
 * @throws {FrameworksParseError} for YAML syntax errors
 * @throws {ConfigError} for documents that parse but do not resolve
 */
export function parseFrameworksYaml(
  yamlString: string,
  options?: ParseFrameworksOptions,
): FrameworkRegistry {
  const onWarning = options?.onWarning ?? consoleWarningSink;

  const doc = parseDocument(yamlString, { uniqueKeys: true, prettyErrors: true });
  const [firstError] = doc.errors;
  if (firstError !== undefined) {
    const pos = firstError.linePos?.[0];
    throw new FrameworksParseError(
      options?.filePath,
      firstError.message,
      pos?.line,
      pos?.col,
      firstError,
    );
  }

  for (const warning of doc.warnings) {
    onWarning(warning.message);
  }

  const definitions = resolveFrameworkDefinitions(inDocumentOrder(doc.contents, doc.toJS()));
  return new FrameworkRegistry(definitions, { onWarning });
}

/**
 * Re-keys the decoded top level into a Map following the YAML source order.
 * A plain object would move integer-like framework names (`'2024'`) first.
 */
function inDocumentOrder(contents: unknown, decoded: unknown): unknown {
  if (!isMap(contents) || !isPlainRecord(decoded)) {
    return decoded;
  }

  const ordered = new Map<string, unknown>();
  for (const pair of contents.items) {
    const key = isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
    if (Object.hasOwn(decoded, key)) {
      ordered.set(key, decoded[key]);
    }
  }
  // keys decoded differently from their source (merge keys, null keys)
  for (const [key, value] of Object.entries(decoded)) {
    if (!ordered.has(key)) {
      ordered.set(key, value);
    }
  }
  return ordered;
}
