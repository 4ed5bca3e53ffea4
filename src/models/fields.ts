/**
 * Validated value holders.
 * A ValidatedField runs its rule on construction and on every assignment,
 * so the stored value is always one the rule accepted.
 */

import { ValidationError } from '../errors.js';

export interface FieldRule<T> {
  /** Validate and convert raw input. Throws ValidationError on bad input. */
  parse(raw: string): T;
  format(value: T): string;
}

export class ValidatedField<T> {
  private value: T;

  constructor(
    raw: string,
    private readonly rule: FieldRule<T>
  ) {
    this.value = rule.parse(raw);
  }

  get(): T {
    return this.value;
  }

  /** Replace the value. On failure the old value is kept. */
  set(raw: string): void {
    this.value = this.rule.parse(raw);
  }

  toString(): string {
    return this.rule.format(this.value);
  }
}

export type Name = ValidatedField<string>;
export type PhoneNumber = ValidatedField<string>;
export type Birthday = ValidatedField<Date>;

// ── Rules ──

const PHONE_PATTERN = /^[0-9]{10}$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseName(raw: string): string {
  return raw;
}

export function parsePhone(raw: string): string {
  if (!PHONE_PATTERN.test(raw)) {
    throw new ValidationError('Invalid phone number format', { phone: raw });
  }
  return raw;
}

export function parseBirthday(raw: string): Date {
  const match = DATE_PATTERN.exec(raw);
  if (!match) {
    throw invalidBirthday(raw);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw invalidBirthday(raw);
  }

  // Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

export function formatBirthday(value: Date): string {
  const year = String(value.getUTCFullYear()).padStart(4, '0');
  const month = String(value.getUTCMonth() + 1).padStart(2, '0');
  const day = String(value.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Number of days in a 1-based month. */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function invalidBirthday(raw: string): ValidationError {
  return new ValidationError('Invalid birthday format. Please use YYYY-MM-DD', {
    birthday: raw,
  });
}

const identity = (value: string): string => value;

export const NAME_RULE: FieldRule<string> = { parse: parseName, format: identity };
export const PHONE_RULE: FieldRule<string> = { parse: parsePhone, format: identity };
export const BIRTHDAY_RULE: FieldRule<Date> = {
  parse: parseBirthday,
  format: formatBirthday,
};

// ── Factories ──

export function createName(raw: string): Name {
  return new ValidatedField(raw, NAME_RULE);
}

export function createPhone(raw: string): PhoneNumber {
  return new ValidatedField(raw, PHONE_RULE);
}

export function createBirthday(raw: string): Birthday {
  return new ValidatedField(raw, BIRTHDAY_RULE);
}
