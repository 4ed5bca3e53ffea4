/**
 * Listing commands.
 * show all                 — Current page
 * page <n>                 — Switch page, then show it
 * show <n>, show n records <n> — First n records
 */

import { pipeline, errorHandler, validateArgs, ok } from '../middleware/index.js';
import type { CommandResult, Handler } from '../middleware/pipeline.js';
import type { PageView } from '../services/ContactService.js';
import type { Container } from '../container.js';
import { parseInteger } from './parser.js';

export function createListingHandlers(container: Container) {
  const service = container.contactService;

  const showAll: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 0, usage: 'show all' })
  )(() => renderPage(service.showAll()));

  const page: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 1, usage: 'page <number>' })
  )(({ args: [raw] }) => renderPage(service.showPage(parseInteger(raw, 'Page number'))));

  const showFirst: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 1, usage: 'show <n>' })
  )(({ args: [raw] }) => {
    const n = parseInteger(raw, 'Record count');
    const lines = service.showFirstN(n);
    return ok([`${n} records:`, ...lines].join('\n'));
  });

  return { showAll, page, showFirst };
}

function renderPage(view: PageView): CommandResult {
  if (view.records.length === 0) {
    return ok(`Page ${view.page}: no contacts`);
  }
  return ok([`Page ${view.page}:`, ...view.records].join('\n'));
}
