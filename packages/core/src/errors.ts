/**
 * packages/core/src/errors.ts — Error type shared by core and backends.
 */

// =============================================================================
// DashboardErrorCode Union
// =============================================================================

/**
 * Error codes surfaced as DashboardError instances.
 *
 * Only STARTUP_FAILED is fatal; the other codes describe failures that are
 * logged and degraded around while the dashboard keeps running.
 */
export type DashboardErrorCode =
  | "STARTUP_FAILED"
  | "IO_FAILED"
  | "FETCH_FAILED";

export class DashboardError extends Error {
  override readonly name = "DashboardError";
  readonly code: DashboardErrorCode;

  constructor(code: DashboardErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DashboardError);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
