import { BenchdefError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";

/**
 * Errors caused by bugs or unexpected failures.
 */
export class InternalError extends BenchdefError {
  readonly _tag = "InternalError" as const;
  override readonly code = "INTERNAL_ERROR" as const;
  override readonly domain: ErrorDomain = ERROR_CATALOG.INTERNAL_ERROR.domain;
  override readonly isExpected: boolean = ERROR_CATALOG.INTERNAL_ERROR.isExpected;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, metadata, traceId, options);
  }
}
