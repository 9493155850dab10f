import { serializeError } from 'serialize-error-cjs';

/**
 * Turns whatever was thrown into an `Error`. Plain objects keep their content as JSON in the
 * message; values that cannot be stringified fall back to `String(value)`.
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'object' && error !== null) {
    try {
      return new Error(JSON.stringify(error));
    } catch {
      return new Error(String(error));
    }
  }

  return new Error(String(error));
}

/**
 * Structured, log-safe representation of an error (name, message, stack, cause).
 */
export function sanitizeError(error: unknown) {
  return serializeError(normalizeError(error));
}
