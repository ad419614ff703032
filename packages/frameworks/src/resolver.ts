/**
 * Framework definition resolver.
 *
 * Turns a decoded document (mapping of framework name → raw entry) into a
 * read-only mapping of fully-resolved, frozen definitions.
 *
 * Pipeline:
 * 1. Collect every top-level entry verbatim and check its shape
 * 2. Merge each entry over its `extends` parent (memoized, cycle-checked)
 * 3. Apply defaults and check the version, skipping template entries
 *
 * Every problem in the document is collected and thrown as one ConfigError;
 * there is no partial output.
 */

import {
  DEFAULT_DOCKER_AUTHOR,
  type FrameworkDefinition,
  isPlainRecord,
  isTemplateName,
} from "@benchdef/core";
import { ConfigError, type ConfigProblem } from "@benchdef/errors";
import type { ZodError } from "zod";

import { deepFreeze } from "./freeze.js";
import { type FrameworkEntry, FrameworkEntrySchema } from "./schema.js";

/** Entry name used for problems with the document as a whole */
export const DOCUMENT_ENTRY = "<document>";

/**
 * Entry fields after inheritance, before defaults. `undefined` means
 * neither the entry nor any ancestor gave a value.
 */
interface MergedEntry {
  readonly version: string | undefined;
  readonly module: string | undefined;
  readonly setupArgs: string | undefined;
  readonly setupCmd: string | undefined;
  readonly project: string | undefined;
  readonly params: Readonly<Record<string, unknown>>;
  readonly dockerImage: {
    readonly author: string | undefined;
    readonly image: string | undefined;
    readonly tag: string | undefined;
  };
}

const EMPTY_MERGED: MergedEntry = {
  version: undefined,
  module: undefined,
  setupArgs: undefined,
  setupCmd: undefined,
  project: undefined,
  params: {},
  dockerImage: { author: undefined, image: undefined, tag: undefined },
};

/**
 * Resolves every framework in a decoded document.
 *
 * @param document — the decoded document: a record, or a Map when the
 *   caller needs names in document order (integer-like keys included)
 * @returns definitions keyed by name, in document order, templates excluded
 * @throws {ConfigError} listing every unknown parent, cyclic extends chain,
 *   missing version and malformed entry
 */
export function resolveFrameworkDefinitions(
  document: unknown,
): ReadonlyMap<string, FrameworkDefinition> {
  const raw = documentEntries(document);
  if (raw === undefined) {
    throw new ConfigError([
      {
        entry: DOCUMENT_ENTRY,
        kind: "MALFORMED_ENTRY",
        message: `expected a mapping of framework names to definitions, got ${describeValue(document)}`,
      },
    ]);
  }

  const problems: ConfigProblem[] = [];
  const names = [...raw.keys()];

  // Pass 1: raw entries, shape-checked, no inheritance
  const entries = new Map<string, FrameworkEntry>();
  for (const [name, value] of raw) {
    if (!isPlainRecord(value)) {
      problems.push({
        entry: name,
        kind: "MALFORMED_ENTRY",
        message: `expected a mapping, got ${describeValue(value)}`,
      });
      continue;
    }
    const parsed = FrameworkEntrySchema.safeParse(value);
    if (!parsed.success) {
      problems.push({ entry: name, kind: "MALFORMED_ENTRY", message: formatZodError(parsed.error) });
      continue;
    }
    entries.set(name, parsed.data);
  }

  // Pass 2: inheritance. null marks an entry that failed (already reported).
  const merged = new Map<string, MergedEntry | null>();
  const inProgress: string[] = [];

  const resolveMerged = (name: string): MergedEntry | undefined => {
    if (merged.has(name)) {
      return merged.get(name) ?? undefined;
    }

    const chainStart = inProgress.indexOf(name);
    if (chainStart >= 0) {
      const chain = [...inProgress.slice(chainStart), name].join(" -> ");
      problems.push({
        entry: name,
        kind: "CYCLIC_EXTENDS",
        message: `cyclic extends chain: ${chain}`,
      });
      return undefined;
    }

    const entry = entries.get(name);
    if (entry === undefined) {
      // malformed in pass 1
      return undefined;
    }

    inProgress.push(name);
    try {
      let base = EMPTY_MERGED;
      const parentName = entry.extends;
      if (parentName !== undefined && parentName !== null) {
        if (!raw.has(parentName)) {
          problems.push({
            entry: name,
            kind: "UNKNOWN_PARENT",
            message: `extends unknown framework '${parentName}'`,
          });
          merged.set(name, null);
          return undefined;
        }
        const parent = resolveMerged(parentName);
        if (parent === undefined) {
          merged.set(name, null);
          return undefined;
        }
        base = parent;
      }

      const result = overlay(base, entry);
      merged.set(name, result);
      return result;
    } finally {
      inProgress.pop();
    }
  };

  for (const name of names) {
    resolveMerged(name);
  }

  // Pass 3: defaults + version check
  const definitions = new Map<string, FrameworkDefinition>();
  for (const name of names) {
    if (isTemplateName(name)) {
      continue;
    }
    const entry = merged.get(name);
    if (entry === undefined || entry === null) {
      continue;
    }
    const version = nonBlank(entry.version);
    if (version === undefined) {
      problems.push({
        entry: name,
        kind: "MISSING_VERSION",
        message: "no version given and none inherited",
      });
      continue;
    }
    definitions.set(name, applyDefaults(name, version, entry));
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return deepFreeze(definitions);
}

/**
 * Top-level entries in order. Plain records list integer-like keys first,
 * so ordered input comes as a Map.
 */
function documentEntries(document: unknown): ReadonlyMap<string, unknown> | undefined {
  if (document instanceof Map) {
    const entries = new Map<string, unknown>();
    for (const [key, value] of document) {
      entries.set(String(key), value);
    }
    return entries;
  }
  return isPlainRecord(document) ? new Map(Object.entries(document)) : undefined;
}

/**
 * Child-over-parent merge: scalars replace when the child gives them,
 * `params` and `docker_image` merge key by key.
 */
function overlay(parent: MergedEntry, entry: FrameworkEntry): MergedEntry {
  const docker = entry.docker_image;
  return {
    version: entry.version ?? parent.version,
    module: entry.module ?? parent.module,
    setupArgs: entry.setup_args ?? parent.setupArgs,
    setupCmd: entry.setup_cmd ?? parent.setupCmd,
    project: entry.project ?? parent.project,
    params: { ...parent.params, ...entry.params },
    dockerImage: {
      author: docker?.author ?? parent.dockerImage.author,
      image: docker?.image ?? parent.dockerImage.image,
      tag: docker?.tag ?? parent.dockerImage.tag,
    },
  };
}

function applyDefaults(name: string, version: string, entry: MergedEntry): FrameworkDefinition {
  return {
    name,
    version,
    module: nonBlank(entry.module) ?? name,
    setupArgs: entry.setupArgs ?? "",
    ...(entry.setupCmd !== undefined ? { setupCmd: entry.setupCmd } : {}),
    // clone: freezing the result must not reach the caller's document
    params: structuredClone(entry.params),
    ...(entry.project !== undefined ? { project: entry.project } : {}),
    dockerImage: {
      author: nonBlank(entry.dockerImage.author) ?? DEFAULT_DOCKER_AUTHOR,
      image: nonBlank(entry.dockerImage.image) ?? name.toLowerCase(),
      tag: nonBlank(entry.dockerImage.tag) ?? version,
    },
  };
}

function nonBlank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "nothing";
  }
  if (Array.isArray(value)) {
    return "a list";
  }
  return `a ${typeof value}`;
}
