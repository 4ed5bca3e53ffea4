/**
 * Composable middleware pipeline for command handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

/** One parsed command line. */
export interface CommandInput {
  /** Matched keyword, lowercased (e.g. "add", "show all"). */
  command: string;
  /** Remaining tokens, case preserved. */
  args: string[];
}

export interface HandlerContext {
  /** Clock reading for the command; birthday math uses it. */
  now: Date;
}

export interface CommandResult {
  status: 'ok' | 'error' | 'exit';
  /** Text to print; may be empty. */
  output: string;
}

export type Handler = (input: CommandInput, ctx: HandlerContext) => CommandResult;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler)(handler)
 *   → logging wraps (errorHandler wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}

export function ok(output: string): CommandResult {
  return { status: 'ok', output };
}
