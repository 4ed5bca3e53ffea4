/**
 * One contact: a name, an optional birthday and an ordered list of phones.
 * Duplicate phone numbers are allowed.
 */

import { NotFoundError } from '../errors.js';
import {
  createBirthday,
  createName,
  createPhone,
  daysInMonth,
  type Birthday,
  type Name,
  type PhoneNumber,
} from './fields.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export class ContactRecord {
  private readonly nameField: Name;
  private birthdayField: Birthday | null;
  private phoneList: PhoneNumber[] = [];

  constructor(name: string, birthday?: string) {
    this.nameField = createName(name);
    this.birthdayField = birthday ? createBirthday(birthday) : null;
  }

  /** Fixed at construction; the address book keys the record by it. */
  get name(): string {
    return this.nameField.get();
  }

  get phones(): readonly PhoneNumber[] {
    return this.phoneList;
  }

  get birthday(): Birthday | null {
    return this.birthdayField;
  }

  addPhone(raw: string): PhoneNumber {
    const phone = createPhone(raw);
    this.phoneList.push(phone);
    return phone;
  }

  /** Remove every phone equal to `raw`. Returns how many were removed. */
  removePhone(raw: string): number {
    const before = this.phoneList.length;
    this.phoneList = this.phoneList.filter((p) => p.toString() !== raw);
    return before - this.phoneList.length;
  }

  findPhone(raw: string): PhoneNumber | null {
    return this.phoneList.find((p) => p.toString() === raw) ?? null;
  }

  /** Replace the first phone equal to `oldRaw`, keeping its position. */
  editPhone(oldRaw: string, newRaw: string): void {
    const phone = this.findPhone(oldRaw);
    if (!phone) {
      throw new NotFoundError('Phone number does not exist in the record', {
        name: this.name,
        phone: oldRaw,
      });
    }
    phone.set(newRaw);
  }

  getPhones(): string[] {
    return this.phoneList.map((p) => p.toString());
  }

  hasPhone(raw: string): boolean {
    return this.findPhone(raw) !== null;
  }

  setBirthday(raw: string): void {
    if (this.birthdayField) {
      this.birthdayField.set(raw);
    } else {
      this.birthdayField = createBirthday(raw);
    }
  }

  /**
   * Whole days from `now`'s calendar date to the next occurrence of the birthday.
   * Today counts as 0. Feb 29 falls on Feb 28 in non-leap years.
   */
  daysToBirthday(now: Date): number | null {
    if (!this.birthdayField) return null;

    const born = this.birthdayField.get();
    const month = born.getUTCMonth() + 1;
    const day = born.getUTCDate();
    const today = Date.UTC(now.getFullYear(), now.getMonth(), now.getDate());

    let candidate = occurrence(now.getFullYear(), month, day);
    if (candidate < today) {
      candidate = occurrence(now.getFullYear() + 1, month, day);
    }

    return Math.floor((candidate - today) / MS_PER_DAY);
  }

  format(): string {
    const phones = this.getPhones().join(', ');
    const birthday = this.birthdayField ? `, birthday: ${this.birthdayField.toString()}` : '';
    return `Contact name: ${this.name}, phones: ${phones}${birthday}`;
  }

  toString(): string {
    return this.format();
  }
}

/** UTC timestamp of month/day in `year`, clamped to the month's last day. */
function occurrence(year: number, month: number, day: number): number {
  return Date.UTC(year, month - 1, Math.min(day, daysInMonth(year, month)));
}

