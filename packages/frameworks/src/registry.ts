/**
 * Read-only lookup over resolved framework definitions.
 */

import type { FrameworkDefinition } from "@benchdef/core";
import { FrameworkNotFoundError } from "@benchdef/errors";

import { consoleWarningSink, type WarningSink } from "./warnings.js";

export interface FrameworkRegistryOptions {
  /** Receives a message when a name only matches case-insensitively */
  readonly onWarning?: WarningSink;
}

/**
 * Query-by-name access to a resolved definitions mapping.
 *
 * Lookups try the exact (case-sensitive) name first, then fall back to a
 * unique case-insensitive match, so `randomforest` finds `RandomForest`.
 */
export class FrameworkRegistry {
  private readonly definitions: ReadonlyMap<string, FrameworkDefinition>;
  private readonly onWarning: WarningSink;

  constructor(
    definitions: ReadonlyMap<string, FrameworkDefinition>,
    options?: FrameworkRegistryOptions,
  ) {
    this.definitions = definitions;
    this.onWarning = options?.onWarning ?? consoleWarningSink;
  }

  get size(): number {
    return this.definitions.size;
  }

  /** The definition registered under `name`, or undefined */
  get(name: string): FrameworkDefinition | undefined {
    const match = this.matchName(name);
    if (match === undefined) {
      return undefined;
    }
    if (match !== name) {
      this.onWarning(`Framework '${name}' matched '${match}' case-insensitively`);
    }
    return this.definitions.get(match);
  }

  /**
   * Like `get`, but throws when nothing matches.
   *
   * @throws {FrameworkNotFoundError}
   */
  require(name: string): FrameworkDefinition {
    const definition = this.get(name);
    if (definition === undefined) {
      throw new FrameworkNotFoundError(name, this.names());
    }
    return definition;
  }

  /** Whether `get(name)` would find a definition; never warns */
  has(name: string): boolean {
    return this.matchName(name) !== undefined;
  }

  /** Framework names in document order */
  names(): string[] {
    return [...this.definitions.keys()];
  }

  list(): FrameworkDefinition[] {
    return [...this.definitions.values()];
  }

  toMap(): ReadonlyMap<string, FrameworkDefinition> {
    return this.definitions;
  }

  /** Registered name for `name`: exact, else the unique case-insensitive match */
  private matchName(name: string): string | undefined {
    if (this.definitions.has(name)) {
      return name;
    }
    const lowered = name.toLowerCase();
    const matches = this.names().filter((candidate) => candidate.toLowerCase() === lowered);
    const [match] = matches;
    return matches.length === 1 ? match : undefined;
  }
}
