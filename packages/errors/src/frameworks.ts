/**
 * Errors raised while reading, resolving and querying framework definitions.
 */

import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";

// ============================================================================
// CONFIG ERROR (aggregated resolution failure)
// ============================================================================

/** Kinds of problem a framework entry can have during resolution */
export const CONFIG_ERROR_KINDS = [
  "UNKNOWN_PARENT",
  "CYCLIC_EXTENDS",
  "MISSING_VERSION",
  "MALFORMED_ENTRY",
] as const;

export type ConfigErrorKind = (typeof CONFIG_ERROR_KINDS)[number];

/**
 * A single offending entry. `entry` is the framework name, or
 * `<document>` when the document itself has the wrong shape.
 */
export interface ConfigProblem {
  readonly entry: string;
  readonly kind: ConfigErrorKind;
  readonly message: string;
}

/**
 * Thrown when a framework document cannot be fully resolved.
 *
 * Carries every problem found across the document; resolution never
 * returns partial output.
 */
export class ConfigError extends ValidationError<"FRAMEWORKS_CONFIG_INVALID"> {
  readonly problems: readonly ConfigProblem[];

  constructor(problems: readonly ConfigProblem[], metadata?: Record<string, string>) {
    super({
      code: "FRAMEWORKS_CONFIG_INVALID",
      message: `Invalid framework definitions:\n${problems
        .map((p) => `  - ${p.entry} [${p.kind}]: ${p.message}`)
        .join("\n")}`,
      ...(metadata ? { metadata } : {}),
      issues: problems.map((p) => ({ field: p.entry, message: p.message, code: p.kind })),
    });
    this.problems = problems;
  }

  /** Problems of one kind, in the order they were found */
  problemsOfKind(kind: ConfigErrorKind): readonly ConfigProblem[] {
    return this.problems.filter((p) => p.kind === kind);
  }
}

// ============================================================================
// DOCUMENT ERRORS
// ============================================================================

/**
 * Thrown when the framework document text cannot be decoded.
 */
export class FrameworksParseError extends ValidationError<"FRAMEWORKS_PARSE_FAILED"> {
  constructor(
    public readonly filePath: string | undefined,
    message: string,
    public readonly line?: number | undefined,
    public readonly column?: number | undefined,
    cause?: Error | undefined,
  ) {
    const location =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super({
      code: "FRAMEWORKS_PARSE_FAILED",
      message: `Framework document parse failed${filePath ? ` (${filePath})` : ""}${location}: ${message}`,
      ...(cause ? { cause } : {}),
    });
  }
}

/**
 * Thrown when the framework document file does not exist.
 */
export class FrameworksFileNotFoundError extends NotFoundError<"FRAMEWORKS_FILE_NOT_FOUND"> {
  constructor(public readonly filePath: string) {
    super({
      code: "FRAMEWORKS_FILE_NOT_FOUND",
      message: `Framework document not found: ${filePath}`,
    });
  }
}

// ============================================================================
// LOOKUP ERRORS
// ============================================================================

/**
 * Thrown when a framework is requested by a name the registry does not hold.
 */
export class FrameworkNotFoundError extends NotFoundError<"FRAMEWORK_NOT_FOUND"> {
  constructor(
    public readonly frameworkName: string,
    public readonly available: readonly string[],
  ) {
    super({
      code: "FRAMEWORK_NOT_FOUND",
      message: `Framework '${frameworkName}' not found. Available: ${
        available.length > 0 ? available.join(", ") : "(none)"
      }`,
    });
  }
}
