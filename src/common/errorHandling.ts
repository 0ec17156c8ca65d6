import { type Result, ok, err } from "neverthrow";

export type UtilError = {
  error: string;
  details?: unknown;
};

export type UtilResult<T> = Result<T, UtilError>;

/**
 * Create a success result
 */
export function utilOk<T>(value: T): UtilResult<T> {
  return ok(value);
}

/**
 * Create an error result
 */
export function utilErr(error: string, details?: unknown): UtilResult<never> {
  return err({ error, details });
}

/**
 * Run a synchronous operation, turning a thrown error into an error result
 */
export function tryCatchSync<T>(
  operation: () => T,
  errorMessage: string
): UtilResult<T> {
  try {
    return utilOk(operation());
  } catch (error) {
    return utilErr(errorMessage, error);
  }
}

/**
 * Format error for user display
 */
export function formatError(error: UtilError): string {
  if (error.details && error.details instanceof Error) {
    return `${error.error}: ${error.details.message}`;
  }
  return error.error;
}
