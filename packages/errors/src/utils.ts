import { InternalError, isZoneLockError, type ZoneLockError } from "./base.js";

/**
 * Wrap an unknown error into a ZoneLockError.
 * If the error is already a ZoneLockError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): ZoneLockError {
  if (isZoneLockError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, { cause: error });
  }

  return new InternalError(getErrorMessage(error));
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Check if an HTTP status code is a success (2xx)
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
