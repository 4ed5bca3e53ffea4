/**
 * Command logging middleware.
 * Captures keyword, outcome and duration for every dispatched command.
 *
 * Level mapping:
 *   ok, exit → info
 *   error    → warn
 *   handler exception → error (re-thrown)
 */

import type { CommandLogEvent, ILogProvider, LogLevel } from '../providers/ILogProvider.js';
import type { CommandResult, Handler, Middleware } from './pipeline.js';

function levelForStatus(status: CommandResult['status']): LogLevel {
  return status === 'error' ? 'warn' : 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return (input, ctx) => {
      const start = performance.now();

      try {
        const result = next(input, ctx);
        const durationMs = Math.round(performance.now() - start);

        const event: CommandLogEvent = {
          level: levelForStatus(result.status),
          message: `${input.command} → ${result.status} (${durationMs}ms)`,
          command: input.command,
          status: result.status,
          durationMs,
          ...(result.status === 'error' && { fields: { output: result.output } }),
        };

        logProvider.log(event);
        return result;
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: CommandLogEvent = {
          level: 'error',
          message: `${input.command} → error (${durationMs}ms)`,
          command: input.command,
          status: 'error',
          durationMs,
          fields: {
            error: err instanceof Error ? err.message : String(err),
          },
        };

        logProvider.log(event);
        throw err;
      }
    };
  };
}
