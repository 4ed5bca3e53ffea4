import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { ok } from '../../src/middleware/pipeline.js';
import type { CommandInput, Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { CommandLogEvent } from '../../src/providers/ILogProvider.js';

function makeInput(command: string, ...args: string[]): CommandInput {
  return { command, args };
}

const ctx: HandlerContext = { now: new Date() };

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  // --- basic command logging ---

  it('should log a successful command', () => {
    const handler: Handler = () => ok('Contact Bob added with phone 1234567890');

    const result = middleware(handler)(makeInput('add', 'Bob', '1234567890'), ctx);

    expect(result.output).toBe('Contact Bob added with phone 1234567890');
    expect(logProvider.events).toHaveLength(1);

    const event = logProvider.events[0] as CommandLogEvent;
    expect(event.level).toBe('info');
    expect(event.command).toBe('add');
    expect(event.status).toBe('ok');
    expect(event.durationMs).toBeGreaterThanOrEqual(0);
    expect(event.message).toMatch(/^add → ok \(\d+ms\)$/);
    expect(event.fields).toBeUndefined();
  });

  it('should not log arguments', () => {
    const handler: Handler = () => ok('');
    middleware(handler)(makeInput('add', 'Bob', '1234567890'), ctx);

    expect(JSON.stringify(logProvider.events[0])).not.toContain('1234567890');
  });

  // --- outcome levels ---

  it('should log error results at warn level with the output', () => {
    const handler: Handler = () => ({ status: 'error', output: 'Error: Contact Bob not found' });
    middleware(handler)(makeInput('delete', 'Bob'), ctx);

    const event = logProvider.events[0] as CommandLogEvent;
    expect(event.level).toBe('warn');
    expect(event.status).toBe('error');
    expect(event.fields).toEqual({ output: 'Error: Contact Bob not found' });
  });

  it('should log exit at info level', () => {
    const handler: Handler = () => ({ status: 'exit', output: 'Good bye!' });
    middleware(handler)(makeInput('exit'), ctx);

    const event = logProvider.events[0] as CommandLogEvent;
    expect(event.level).toBe('info');
    expect(event.status).toBe('exit');
  });

  // --- handler exceptions ---

  it('should log and re-throw if the handler throws', () => {
    const handler: Handler = () => {
      throw new Error('boom');
    };

    expect(() => middleware(handler)(makeInput('show all'), ctx)).toThrow('boom');

    // Should still have logged the error
    expect(logProvider.events).toHaveLength(1);
    const event = logProvider.events[0] as CommandLogEvent;
    expect(event.level).toBe('error');
    expect(event.status).toBe('error');
    expect(event.message).toContain('show all');
    expect(event.fields?.error).toBe('boom');
  });
});
