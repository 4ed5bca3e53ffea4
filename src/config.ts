/**
 * Runtime configuration read from environment variables.
 *
 *   CONTACTS_PAGE_SIZE        records per "show all" page (default 5)
 *   CONTACTS_DEDUPE_PHONES    skip duplicate phones when merging (default false)
 *   CONTACTS_LOG_LEVEL        debug | info | warn | error (default warn)
 *   CONTACTS_LOG_TO_CONSOLE   write log events to stderr (default false)
 */

import { ValidationError } from './errors.js';
import { DEFAULT_PAGE_SIZE } from './models/AddressBook.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';

export interface AppConfig {
  pageSize: number;
  dedupePhones: boolean;
  logLevel: LogLevel;
  logToConsole: boolean;
}

export const DEFAULT_CONFIG: AppConfig = {
  pageSize: DEFAULT_PAGE_SIZE,
  dedupePhones: false,
  logLevel: 'warn',
  logToConsole: false,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    pageSize: readPositiveInt(env, 'CONTACTS_PAGE_SIZE', DEFAULT_CONFIG.pageSize),
    dedupePhones: readBoolean(env, 'CONTACTS_DEDUPE_PHONES', DEFAULT_CONFIG.dedupePhones),
    logLevel: readLogLevel(env, 'CONTACTS_LOG_LEVEL', DEFAULT_CONFIG.logLevel),
    logToConsole: readBoolean(env, 'CONTACTS_LOG_TO_CONSOLE', DEFAULT_CONFIG.logToConsole),
  };
}

export function parsePositiveInt(raw: string, label: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || value < 1) {
    throw new ValidationError(`${label} must be a positive integer`, { value: raw });
  }
  return value;
}

export function parseLogLevel(raw: string, label: string): LogLevel {
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ValidationError(`${label} must be one of: debug, info, warn, error`, {
      value: raw,
    });
  }
  return level;
}

// ── Private ──

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return parsePositiveInt(raw, name);
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ValidationError(`${name} must be true or false`, { value: raw });
  }
}

function readLogLevel(env: NodeJS.ProcessEnv, name: string, fallback: LogLevel): LogLevel {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return parseLogLevel(raw, name);
}
