/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (error)` blocks, where the caught value is
 * `unknown` and may come from child processes, the file system or axios.
 */

/**
 * Type guard to check if value is an Error object
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
export function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Type guard to check if error has a string code property (ENOENT, ECONNRESET, ...)
 */
export function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 * Handles Error objects, objects with message, strings, and unknown values
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

/**
 * Safely extract error code from unknown error
 * Common for file system, process and network errors
 */
export function getErrorCode(error: unknown): string | undefined {
  if (hasCode(error)) {
    return error.code;
  }

  // Numeric exit codes from child_process rejections
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'number'
  ) {
    return String(error.code);
  }

  return undefined;
}

/**
 * Captured stderr attached to a failed execFile() call, if any
 */
export function getErrorStderr(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'stderr' in error
  ) {
    const { stderr } = error;
    if (typeof stderr === 'string') {
      return stderr;
    }
    if (Buffer.isBuffer(stderr)) {
      return stderr.toString('utf8');
    }
  }
  return '';
}

/**
 * Convert unknown error to Error object
 * Useful when you need to attach a cause or rethrow
 */
export function toError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }
  return new Error(getErrorMessage(error));
}

/**
 * Node system error for a path that does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}
