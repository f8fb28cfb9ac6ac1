/**
 * Errors raised for invalid queries.
 *
 * @packageDocumentation
 */

/**
 * Error codes for programmatic handling of query errors.
 */
export type QueryErrorCode = 'UNKNOWN_ARGUMENT' | 'ARITY' | 'UNKNOWN_PROBLEM';

/**
 * Base class for errors in a query. The framework itself stays usable.
 */
export class QueryError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: QueryErrorCode;

  /**
   * Creates a new QueryError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   */
  constructor(message: string, code: QueryErrorCode) {
    super(message);
    this.name = 'QueryError';
    this.code = code;
  }
}

/**
 * Raised when a query target names arguments absent from the framework.
 */
export class UnknownArgumentError extends QueryError {
  /** The target arguments missing from the framework. */
  public readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(`Argument(s) not in the framework: ${missing.join(', ')}`, 'UNKNOWN_ARGUMENT');
    this.name = 'UnknownArgumentError';
    this.missing = missing;
  }
}

/**
 * Raised when a DC-* or DS-* query does not have exactly one target argument.
 */
export class ArityError extends QueryError {
  /** The problem code of the query. */
  public readonly problem: string;
  /** Number of distinct target arguments received. */
  public readonly received: number;

  constructor(problem: string, received: number) {
    super(`Problem ${problem} takes exactly one argument, got ${String(received)}`, 'ARITY');
    this.name = 'ArityError';
    this.problem = problem;
    this.received = received;
  }
}
