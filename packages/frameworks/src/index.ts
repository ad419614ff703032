/**
 * @benchdef/frameworks
 *
 * AutoML framework definition resolver.
 * Reads the framework YAML document, resolves `extends` inheritance and
 * defaults, and returns frozen definitions behind a query-by-name registry.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export {
  DEFAULT_FRAMEWORKS_FILE,
  FRAMEWORKS_FILE_ENV,
  type LoadFrameworksOptions,
  loadFrameworks,
  resolveFrameworksPath,
} from "./loader.js";
export { type ParseFrameworksOptions, parseFrameworksYaml } from "./parser.js";
export { DOCUMENT_ENTRY, resolveFrameworkDefinitions } from "./resolver.js";
export { FrameworkRegistry, type FrameworkRegistryOptions } from "./registry.js";

// ============================================================================
// CONSUMER HELPERS
// ============================================================================

export { dockerImageReference } from "./docker.js";
export { parseParamOverrides, withParamOverrides } from "./overrides.js";
export {
  type CommandArgs,
  type CommandIO,
  type CommandOptions,
  runFrameworksCommand,
} from "./command.js";

// ============================================================================
// SCHEMA
// ============================================================================

export {
  type DockerImageEntry,
  DockerImageEntrySchema,
  type FrameworkEntry,
  FrameworkEntrySchema,
  FrameworkParamsSchema,
} from "./schema.js";

// ============================================================================
// UTILITIES
// ============================================================================

export { deepFreeze } from "./freeze.js";
export { readTextFile } from "./fs-utils.js";
export { consoleWarningSink, type WarningSink } from "./warnings.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@benchdef/frameworks";
export const PACKAGE_VERSION = "0.1.0";
