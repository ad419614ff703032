/**
 * `benchdef-frameworks` command: argument parsing and output.
 * Kept apart from the bin entry so it runs in-process under test.
 */

import type { FrameworkDefinition } from "@benchdef/core";
import { ValidationError, wrapError } from "@benchdef/errors";

import { dockerImageReference } from "./docker.js";
import { loadFrameworks } from "./loader.js";
import { parseParamOverrides, withParamOverrides } from "./overrides.js";
import { LOG_TAG } from "./warnings.js";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export type OutputFormat = "text" | "json";

export interface CommandArgs {
  readonly command: "list" | "show" | "help";
  readonly name?: string;
  readonly file?: string;
  readonly format: OutputFormat;
  /** `key=value` strings collected from `-Xf.key=value` */
  readonly overrides: readonly string[];
}

const OVERRIDE_PREFIX = "-Xf.";

/**
 * Parses command arguments (without the node and script entries).
 *
 * @throws {ValidationError} for unknown commands or options
 */
export function parseArgs(argv: readonly string[]): CommandArgs {
  let command: CommandArgs["command"] | undefined;
  let name: string | undefined;
  let file: string | undefined;
  let format: OutputFormat = "text";
  const overrides: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === undefined) {
      continue;
    }

    if (arg.startsWith(OVERRIDE_PREFIX)) {
      overrides.push(arg.slice(OVERRIDE_PREFIX.length));
      continue;
    }

    switch (arg) {
      case "--file":
        if (next === undefined) {
          throw usageError("--file needs a path");
        }
        file = next;
        i++;
        break;
      case "--format":
        if (next !== "text" && next !== "json") {
          throw usageError("--format must be text or json");
        }
        format = next;
        i++;
        break;
      case "--help":
        command = "help";
        break;
      default:
        if (arg.startsWith("-")) {
          throw usageError(`unknown option '${arg}'`);
        }
        if (command === undefined) {
          if (arg !== "list" && arg !== "show") {
            throw usageError(`unknown command '${arg}'`);
          }
          command = arg;
        } else if (command === "show" && name === undefined) {
          name = arg;
        } else {
          throw usageError(`unexpected argument '${arg}'`);
        }
    }
  }

  if (command === "show" && name === undefined) {
    throw usageError("show needs a framework name");
  }

  return {
    command: command ?? "help",
    format,
    overrides,
    ...(name !== undefined ? { name } : {}),
    ...(file !== undefined ? { file } : {}),
  };
}

function usageError(message: string): ValidationError {
  return new ValidationError({ code: "VALIDATION_FAILED", message: `Usage error: ${message}` });
}

export const HELP_TEXT = `
benchdef-frameworks — Inspect resolved AutoML framework definitions

Usage: benchdef-frameworks <command> [options]

Commands:
  list                     List every framework with its version and docker image
  show <name>              Show one resolved framework definition

Options:
  --file <path>            Framework document (default: $BENCHDEF_FRAMEWORKS_FILE
                           or resources/frameworks.yaml)
  --format text|json       Output format (default: text)
  -Xf.<param>=<value>      Override a framework param (show only, repeatable)
  --help                   Show this help message
`;

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface CommandIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface CommandOptions {
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export function formatList(definitions: readonly FrameworkDefinition[]): string {
  const nameWidth = Math.max(0, ...definitions.map((d) => d.name.length));
  const versionWidth = Math.max(0, ...definitions.map((d) => d.version.length));
  return definitions
    .map(
      (d) =>
        `${d.name.padEnd(nameWidth)}  ${d.version.padEnd(versionWidth)}  ${dockerImageReference(d)}`,
    )
    .join("\n");
}

export function formatDefinition(definition: FrameworkDefinition): string {
  const lines = [
    `name: ${definition.name}`,
    `version: ${definition.version}`,
    `module: ${definition.module}`,
  ];
  if (definition.setupArgs !== "") {
    lines.push(`setup_args: ${definition.setupArgs}`);
  }
  if (definition.setupCmd !== undefined) {
    lines.push(`setup_cmd: ${definition.setupCmd}`);
  }
  if (definition.project !== undefined) {
    lines.push(`project: ${definition.project}`);
  }
  lines.push(`docker_image: ${dockerImageReference(definition)}`);
  lines.push(`params: ${JSON.stringify(definition.params)}`);
  return lines.join("\n");
}

/**
 * Runs the command and returns the process exit code (0 ok, 1 error).
 * Errors are written to stderr with their catalog code.
 */
export async function runFrameworksCommand(
  argv: readonly string[],
  io: CommandIO,
  options?: CommandOptions,
): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.command === "help") {
      io.stdout(HELP_TEXT);
      return 0;
    }

    const registry = await loadFrameworks({
      ...(args.file !== undefined ? { filePath: args.file } : {}),
      ...(options?.cwd !== undefined ? { cwd: options.cwd } : {}),
      ...(options?.env !== undefined ? { env: options.env } : {}),
      onWarning: (message) => io.stderr(`[${LOG_TAG}] ${message}`),
    });

    if (args.command === "list") {
      const definitions = registry.list();
      io.stdout(args.format === "json" ? JSON.stringify(definitions, null, 2) : formatList(definitions));
      return 0;
    }

    const found = registry.require(args.name ?? "");
    const definition =
      args.overrides.length > 0
        ? withParamOverrides(found, parseParamOverrides(args.overrides))
        : found;
    io.stdout(args.format === "json" ? JSON.stringify(definition, null, 2) : formatDefinition(definition));
    return 0;
  } catch (error: unknown) {
    const wrapped = wrapError(error);
    io.stderr(`Error [${wrapped.code}]: ${wrapped.message}`);
    return 1;
  }
}
