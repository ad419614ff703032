/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the benchdef packages is declared here.
 * Each code maps to a domain, a base error type, and whether the condition
 * is expected (caused by the caller's input) or a bug.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, resource, frameworks
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // GENERIC ERRORS
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The provided input failed validation",
  },
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },

  // ============================================================================
  // FRAMEWORK DEFINITION ERRORS
  // ============================================================================
  FRAMEWORKS_PARSE_FAILED: {
    domain: "frameworks",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Framework document parse failed",
    description: "The framework definitions document is not valid YAML text",
  },
  FRAMEWORKS_CONFIG_INVALID: {
    domain: "frameworks",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid framework definitions",
    description:
      "One or more framework definitions could not be resolved (unknown parent, cyclic extends, missing version or malformed entry)",
  },
  FRAMEWORKS_FILE_NOT_FOUND: {
    domain: "frameworks",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Framework document not found",
    description: "The framework definitions file does not exist",
  },
  FRAMEWORK_NOT_FOUND: {
    domain: "frameworks",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Framework not found",
    description: "No framework definition is registered under the requested name",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
