/**
 * Argument count middleware.
 * Rejects a command whose token count falls outside the declared range.
 */

import { ParseError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';

export interface ArgsSchema {
  min: number;
  /** Defaults to `min`. */
  max?: number;
  /** Shown to the user on mismatch, e.g. "add <name> <phone> [birthday]". */
  usage: string;
}

export function validateArgs(schema: ArgsSchema): Middleware {
  const max = schema.max ?? schema.min;

  return (next: Handler): Handler => {
    return (input, ctx) => {
      const count = input.args.length;
      if (count < schema.min || count > max) {
        throw new ParseError(`Usage: ${schema.usage}`, {
          command: input.command,
          received: count,
        });
      }
      return next(input, ctx);
    };
  };
}
