/**
 * Error handler middleware.
 * Catches errors thrown by handlers and turns them into "Error: <message>" lines.
 * AppError subclasses keep their message; unknown errors get a generic one.
 */

import { AppError } from '../errors.js';
import type { Handler } from './pipeline.js';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred';

export function errorHandler(next: Handler): Handler {
  return (input, ctx) => {
    try {
      return next(input, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        return { status: 'error', output: `Error: ${err.message}` };
      }

      // Unknown error — don't leak internals
      return { status: 'error', output: `Error: ${UNEXPECTED_ERROR_MESSAGE}` };
    }
  };
}
