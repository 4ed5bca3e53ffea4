/**
 * Command router.
 * Maps the leading keyword(s) of a line to a handler. The longest matching
 * keyword wins, so "show all" is routed before "show <n>". Anything else
 * goes to the session fallback, which reports a ParseError.
 */

import type { Container } from '../container.js';
import type { CommandResult, Handler, HandlerContext } from '../middleware/pipeline.js';
import { createContactHandlers } from './contacts.js';
import { createListingHandlers } from './listing.js';
import { createSessionHandlers } from './session.js';
import { matchKeyword, tokenize } from './parser.js';

export type Dispatch = (line: string, ctx: HandlerContext) => CommandResult;

export function createRouter(container: Container): Dispatch {
  const contacts = createContactHandlers(container);
  const listing = createListingHandlers(container);
  const session = createSessionHandlers(container);

  const routes = new Map<string, Handler>([
    // Session
    ['hello', session.hello],
    ['help', session.help],
    ['exit', session.exit],
    ['close', session.exit],
    ['good bye', session.exit],

    // Contacts
    ['add', contacts.add],
    ['delete', contacts.remove],
    ['change', contacts.change],
    ['phone', contacts.phones],
    ['remove-phone', contacts.removePhone],
    ['birthday', contacts.birthday],

    // Listing
    ['show all', listing.showAll],
    ['page', listing.page],
    ['show', listing.showFirst],
    ['show n records', listing.showFirst],
  ]);

  return (line, ctx) => {
    const tokens = tokenize(line);
    if (tokens.length === 0) {
      return { status: 'ok', output: '' };
    }

    const match = matchKeyword(tokens, routes.keys());
    const handler = match ? routes.get(match.keyword) : undefined;

    if (!match || !handler) {
      const [command, ...args] = tokens;
      return session.unknown({ command: command.toLowerCase(), args }, ctx);
    }

    return handler({ command: match.keyword, args: match.args }, ctx);
  };
}
