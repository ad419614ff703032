import type { ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Plain-object form of an error, as produced by `toJSON()`.
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  stack?: string | undefined;
  cause?: string | undefined;
}

/**
 * Root of the error hierarchy.
 *
 * Subclasses supply `_tag`, `code`, `domain` and `isExpected` (looked up from
 * the catalog). `name` always matches the concrete class name.
 */
export abstract class BenchdefError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/** Check if a value is an Error instance */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/** Check if a value belongs to the benchdef error hierarchy */
export function isBenchdefError(value: unknown): value is BenchdefError {
  return value instanceof BenchdefError;
}
