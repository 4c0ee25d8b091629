// backend/services/catalog/src/errors.ts
import type { Result } from "@catalog/shared/result";

export type CatalogErrorCode =
  | "FILTER_TOO_BROAD"
  | "PRECONDITION_VIOLATED"
  | "STORE_FAILURE";

export abstract class CatalogError extends Error {
  public abstract readonly code: CatalogErrorCode;
  public readonly original?: unknown;

  constructor(message: string, original?: unknown) {
    super(message);
    this.name = new.target.name;
    this.original = original;
  }
}

/** The facet aggregation hit the server's resource limits. Narrow the filter. */
export class FilterTooBroadError extends CatalogError {
  public readonly code = "FILTER_TOO_BROAD";

  constructor(original?: unknown) {
    super("Results too large to sort, be more restrictive in filter", original);
  }
}

/**
 * Caller broke an operation's contract. Thrown, never returned as a result.
 */
export class PreconditionViolatedError extends CatalogError {
  public readonly code = "PRECONDITION_VIOLATED";
}

/** Any other driver or network failure. Not retried here. */
export class StoreFailureError extends CatalogError {
  public readonly code = "STORE_FAILURE";
  public readonly operation: string;

  constructor(operation: string, original: unknown) {
    super(
      `${operation} failed: ${
        original instanceof Error ? original.message : String(original)
      }`,
      original
    );
    this.operation = operation;
  }
}

export type CatalogFailure = FilterTooBroadError | StoreFailureError;

export type CatalogResult<T> = Result<T, CatalogFailure>;

export function requirePaging(page: number, pageSize: number): void {
  if (!Number.isInteger(page) || page < 0) {
    throw new PreconditionViolatedError(
      `page must be an integer >= 0, got ${page}`
    );
  }
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new PreconditionViolatedError(
      `pageSize must be an integer > 0, got ${pageSize}`
    );
  }
}
