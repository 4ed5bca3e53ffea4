/**
 * Dependency wiring.
 * Constructs the address book, service and middleware from configuration.
 * Tests pass their own log provider to inspect events.
 */

import type { AppConfig } from './config.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import { AddressBook } from './models/AddressBook.js';
import { ContactService } from './services/ContactService.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  config: AppConfig;
  addressBook: AddressBook;
  contactService: ContactService;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(config: AppConfig, logProvider?: ILogProvider): Container {
  const provider =
    logProvider ??
    new ConsoleLogProvider({
      outputToConsole: config.logToConsole,
      minLevel: config.logLevel,
    });

  const addressBook = new AddressBook({
    pageSize: config.pageSize,
    dedupePhones: config.dedupePhones,
  });
  const contactService = new ContactService(addressBook, provider);
  const logging = createLoggingMiddleware(provider);

  return {
    config,
    addressBook,
    contactService,
    logProvider: provider,
    logging,
  };
}
