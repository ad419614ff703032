/**
 * Async file-based framework document loader.
 * Locates the document, reads it, and delegates to parseFrameworksYaml().
 */

import { resolve } from "node:path";

import { readTextFile } from "./fs-utils.js";
import { type ParseFrameworksOptions, parseFrameworksYaml } from "./parser.js";
import type { FrameworkRegistry } from "./registry.js";

/** Environment variable naming the framework document */
export const FRAMEWORKS_FILE_ENV = "BENCHDEF_FRAMEWORKS_FILE";

/** Document path used when neither the options nor the environment name one */
export const DEFAULT_FRAMEWORKS_FILE = "resources/frameworks.yaml";

export interface LoadFrameworksOptions extends Omit<ParseFrameworksOptions, "filePath"> {
  /** Document path; relative paths resolve against `cwd` */
  readonly filePath?: string;
  /** Base directory for relative paths. Default: process.cwd() */
  readonly cwd?: string;
  /** Environment consulted for BENCHDEF_FRAMEWORKS_FILE. Default: process.env */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly encoding?: BufferEncoding;
}

/**
 * Absolute path of the framework document:
 * `filePath` option, else BENCHDEF_FRAMEWORKS_FILE, else resources/frameworks.yaml.
 */
export function resolveFrameworksPath(options?: LoadFrameworksOptions): string {
  const env = options?.env ?? process.env;
  const fromEnv = env[FRAMEWORKS_FILE_ENV];
  const filePath =
    options?.filePath ??
    (fromEnv !== undefined && fromEnv !== "" ? fromEnv : DEFAULT_FRAMEWORKS_FILE);
  return resolve(options?.cwd ?? process.cwd(), filePath);
}

/**
 * Reads a framework document and returns a registry of resolved definitions.
 *
 * @throws {FrameworksFileNotFoundError} when the document is missing
 * @throws {FrameworksParseError} for binary content or YAML syntax errors
 * @throws {ConfigError} when definitions do not resolve
 */
export async function loadFrameworks(options?: LoadFrameworksOptions): Promise<FrameworkRegistry> {
  const absolutePath = resolveFrameworksPath(options);
  const content = await readTextFile(absolutePath, options?.encoding);

  return parseFrameworksYaml(content, {
    filePath: absolutePath,
    ...(options?.onWarning ? { onWarning: options.onWarning } : {}),
  });
}
