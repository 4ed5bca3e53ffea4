/**
 * Session commands: greeting, help, leaving the loop, and the fallback for
 * unrecognized keywords.
 */

import { pipeline, errorHandler, ok } from '../middleware/index.js';
import { ParseError } from '../errors.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';

export const UNKNOWN_COMMAND_MESSAGE = 'Unknown command. Please try again.';

export const HELP_TEXT = [
  'Commands:',
  '  hello',
  '  add <name> <phone> [YYYY-MM-DD]',
  '  delete <name>',
  '  change <name> <old phone> <new phone>',
  '  phone <name>',
  '  remove-phone <name> <phone>',
  '  birthday <name> [YYYY-MM-DD]',
  '  show all',
  '  page <number>',
  '  show <n>',
  '  exit | close | good bye',
].join('\n');

export function createSessionHandlers(container: Container) {
  const hello: Handler = pipeline(container.logging)(() => ok('How can I help you?'));

  const help: Handler = pipeline(container.logging)(() => ok(HELP_TEXT));

  const exit: Handler = pipeline(container.logging)(() => ({
    status: 'exit',
    output: 'Good bye!',
  }));

  const unknown: Handler = pipeline(container.logging, errorHandler)(({ command }) => {
    throw new ParseError(UNKNOWN_COMMAND_MESSAGE, { command });
  });

  return { hello, help, exit, unknown };
}
