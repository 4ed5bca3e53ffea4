/**
 * Contact book operations exposed to the command layer.
 * Inputs arrive already split into arguments; results are returned, never printed.
 */

import type { AddressBook } from '../models/AddressBook.js';
import { ContactRecord } from '../models/ContactRecord.js';
import { parseBirthday, parsePhone } from '../models/fields.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { NotFoundError } from '../errors.js';

export interface PageView {
  page: number;
  records: string[];
}

export class ContactService {
  constructor(
    private readonly book: AddressBook,
    private readonly logProvider: ILogProvider
  ) {}

  /**
   * Add a contact, or append the phone to the contact with the same name.
   * Both values are validated before anything is stored.
   */
  addContact(name: string, phone: string, birthday?: string): ContactRecord {
    parsePhone(phone);
    if (birthday !== undefined) parseBirthday(birthday);

    const record = new ContactRecord(name, birthday);
    record.addPhone(phone);

    const stored = this.book.add(record);
    this.logProvider.debug('Contact added', {
      name: stored.name,
      merged: stored !== record,
    });
    return stored;
  }

  deleteContact(name: string): ContactRecord {
    const removed = this.book.delete(name);
    if (!removed) {
      throw notFound(name);
    }
    this.logProvider.debug('Contact deleted', { name: removed.name });
    return removed;
  }

  getPhones(name: string): string[] {
    return this.require(name).getPhones();
  }

  changePhone(name: string, oldPhone: string, newPhone: string): ContactRecord {
    const record = this.book.changePhone(name, oldPhone, newPhone);
    this.logProvider.debug('Phone changed', { name: record.name });
    return record;
  }

  removePhone(name: string, phone: string): number {
    const removed = this.require(name).removePhone(phone);
    this.logProvider.debug('Phone removed', { name, removed });
    return removed;
  }

  setBirthday(name: string, birthday: string): ContactRecord {
    const record = this.require(name);
    record.setBirthday(birthday);
    this.logProvider.debug('Birthday set', { name: record.name });
    return record;
  }

  /** Days until the contact's next birthday, or null when none is set. */
  daysToBirthday(name: string, now: Date = new Date()): number | null {
    return this.require(name).daysToBirthday(now);
  }

  showAll(): PageView {
    const page = this.book.currentPage;
    return {
      page,
      records: this.book.getPage(page).map((r) => r.format()),
    };
  }

  showPage(page: number): PageView {
    this.book.currentPage = page;
    return this.showAll();
  }

  showFirstN(n: number): string[] {
    return this.book.getFirstN(n);
  }

  // ── Private ──

  private require(name: string): ContactRecord {
    const record = this.book.find(name);
    if (!record) {
      throw notFound(name);
    }
    return record;
  }
}

function notFound(name: string): NotFoundError {
  return new NotFoundError(`Contact ${name} not found`, { name });
}
