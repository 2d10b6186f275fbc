/**
 * Error taxonomy for lookup filters.
 *
 * Every failure a filter reports is a ResolutionError, so the automation
 * engine can fail the enclosing task with a single check.
 */

/**
 * Base exception for resolution errors.
 */
export class ResolutionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResolutionError";
  }
}

/**
 * Raised when a query is malformed: missing scope, empty tag constraints,
 * bad filter arguments.
 */
export class InvalidQueryError extends ResolutionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidQueryError";
  }
}

/**
 * Raised when a single value is required and nothing matched.
 */
export class NoMatchError extends ResolutionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NoMatchError";
  }
}

/**
 * Raised when a single value is required and several resources matched.
 */
export class AmbiguousMatchError extends ResolutionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AmbiguousMatchError";
  }
}

/**
 * Raised when the AWS API call itself failed (network, auth, throttling).
 */
export class RemoteCallError extends ResolutionError {
  readonly operation: string;
  readonly code: string;

  constructor(operation: string, code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RemoteCallError";
    this.operation = operation;
    this.code = code;
  }
}

/**
 * Extracts the SDK error name (e.g. "UnauthorizedOperation") from an unknown error.
 */
export function errorCode(error: unknown): string {
  if (
    error &&
    typeof error === "object" &&
    "name" in error &&
    typeof error.name === "string"
  ) {
    return error.name;
  }
  return "UnknownError";
}

/**
 * Runs a single AWS SDK call and maps its failure into the taxonomy.
 *
 * @param operation - API operation name, used in messages (e.g. "DescribeInstances")
 * @param call - The SDK call
 * @param notFoundCodes - Provider fault names that mean "no such resource"
 *
 * @throws {NoMatchError} If the SDK error name is one of `notFoundCodes`
 * @throws {RemoteCallError} For any other SDK failure
 */
export async function callAws<T>(
  operation: string,
  call: () => Promise<T>,
  notFoundCodes: readonly string[] = []
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof ResolutionError) {
      throw error;
    }
    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    if (notFoundCodes.includes(code)) {
      throw new NoMatchError(`${operation}: ${detail}`, { cause: error });
    }
    throw new RemoteCallError(operation, code, `${operation} failed (${code}): ${detail}`, {
      cause: error,
    });
  }
}
