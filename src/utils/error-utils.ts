/**
 * Utility functions for safe error handling with proper TypeScript types
 */

// Helper type for error-like objects
export interface ErrorLike {
  message?: unknown;
  code?: unknown;
  errno?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Node system errors carry their errno name (`ENOENT`, `EACCES`, ...) in `code`
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isErrorLike(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
