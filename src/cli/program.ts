/**
 * Command-line entry definition.
 * Flags override the environment configuration.
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, parseLogLevel, parsePositiveInt, type AppConfig } from '../config.js';
import { ValidationError } from '../errors.js';
import type { LogLevel } from '../providers/ILogProvider.js';

export interface ProgramOptions {
  pageSize?: number;
  dedupePhones?: boolean;
  logLevel?: LogLevel;
  verbose?: boolean;
}

export function createProgram(
  start: (config: AppConfig) => Promise<void>,
  env: NodeJS.ProcessEnv = process.env
): Command {
  const program = new Command();

  program
    .name('contact-book')
    .description('In-memory contact book with a line-oriented command prompt')
    .version('1.0.0')
    .option('--page-size <n>', 'Records per "show all" page', optionParser(parsePositiveInt))
    .option('--dedupe-phones', 'Skip phone numbers a contact already has when merging')
    .option('--log-level <level>', 'debug, info, warn or error', optionParser(parseLogLevel))
    .option('-v, --verbose', 'Write log events to stderr')
    .action(async (options: ProgramOptions) => {
      await start(resolveConfig(loadConfig(env), options));
    });

  return program;
}

export function resolveConfig(base: AppConfig, options: ProgramOptions): AppConfig {
  return {
    pageSize: options.pageSize ?? base.pageSize,
    dedupePhones: options.dedupePhones ?? base.dedupePhones,
    logLevel: options.logLevel ?? base.logLevel,
    logToConsole: options.verbose ?? base.logToConsole,
  };
}

/** Adapt a config parser to commander, which expects InvalidArgumentError. */
function optionParser<T>(parse: (raw: string, label: string) => T) {
  return (raw: string): T => {
    try {
      return parse(raw, 'Value');
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new InvalidArgumentError(err.message);
      }
      throw err;
    }
  };
}
