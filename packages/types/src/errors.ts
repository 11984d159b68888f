/**
 * Error taxonomy shared by all packages.
 *
 * Every package throws its own error class carrying a `code` and one of
 * these categories. Callers (the HTTP layer in particular) map the category
 * to a response without knowing each package's codes.
 */

export type ErrorCategory =
  | "validation"
  | "authorization"
  | "insufficient-resource"
  | "invariant-violation"
  | "operational-state";

/**
 * Shape implemented by every structured domain error.
 */
export interface CategorizedError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly message: string;
}
