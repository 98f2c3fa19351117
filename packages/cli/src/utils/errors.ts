/**
 * Error types shared by commands and services.
 */

/**
 * Invalid input or configuration that should stop the whole run.
 * Commands turn it into an `[error]` line and exit code 1.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

/**
 * Best-effort message extraction for warnings.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
