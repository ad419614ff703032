/**
 * @benchdef/errors
 *
 * Shared error taxonomy for the benchdef packages.
 *
 * Every error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { BenchdefError, type ErrorJSON, isBenchdefError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError } from "./bases/internal-error.js";
export { NotFoundError } from "./bases/not-found-error.js";
export { ValidationError } from "./bases/validation-error.js";

export type {
  BenchdefErrorOptions,
  InternalCodes,
  NotFoundCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isInternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// FRAMEWORK DEFINITION ERRORS
// ============================================================================

export {
  CONFIG_ERROR_KINDS,
  ConfigError,
  type ConfigErrorKind,
  type ConfigProblem,
  FrameworkNotFoundError,
  FrameworksFileNotFoundError,
  FrameworksParseError,
} from "./frameworks.js";
