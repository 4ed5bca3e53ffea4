/**
 * In-memory contact store.
 * Records are keyed by case-folded name and keep their original spelling.
 * Listing order is insertion order; adding a name that already exists merges
 * the incoming phones into the stored record instead of creating a second entry.
 */

import { NotFoundError, ValidationError } from '../errors.js';
import type { ContactRecord } from './ContactRecord.js';

export const DEFAULT_PAGE_SIZE = 5;

export interface AddressBookOptions {
  /** Records per page. Default: 5. */
  pageSize?: number;
  /** Skip phones the stored record already has when merging. Default: false. */
  dedupePhones?: boolean;
}

export class AddressBook implements Iterable<string> {
  private readonly entries = new Map<string, ContactRecord>();
  private readonly dedupePhones: boolean;
  private pageSize_ = DEFAULT_PAGE_SIZE;
  private currentPage_ = 1;

  constructor(options?: AddressBookOptions) {
    this.dedupePhones = options?.dedupePhones ?? false;
    if (options?.pageSize !== undefined) {
      this.pageSize = options.pageSize;
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get pageSize(): number {
    return this.pageSize_;
  }

  set pageSize(value: number) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ValidationError('Page size must be a positive integer', { pageSize: value });
    }
    this.pageSize_ = value;
  }

  get currentPage(): number {
    return this.currentPage_;
  }

  set currentPage(value: number) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ValidationError('Page number must be a positive integer', { page: value });
    }
    this.currentPage_ = value;
  }

  /**
   * Insert a record, or merge it into the stored record with the same name.
   * Returns the record that ends up in the book.
   */
  add(record: ContactRecord): ContactRecord {
    const existing = this.find(record.name);
    if (!existing) {
      this.entries.set(keyOf(record.name), record);
      return record;
    }

    for (const phone of record.getPhones()) {
      if (this.dedupePhones && existing.hasPhone(phone)) continue;
      existing.addPhone(phone);
    }

    const birthday = record.birthday;
    if (!existing.birthday && birthday) {
      existing.setBirthday(birthday.toString());
    }

    return existing;
  }

  find(name: string): ContactRecord | null {
    return this.entries.get(keyOf(name)) ?? null;
  }

  /** Remove the contact and return it, or null when no such contact exists. */
  delete(name: string): ContactRecord | null {
    const record = this.find(name);
    if (!record) return null;

    this.entries.delete(keyOf(record.name));
    return record;
  }

  changePhone(name: string, oldPhone: string, newPhone: string): ContactRecord {
    const record = this.find(name);
    if (!record) {
      throw new NotFoundError(`Contact ${name} not found`, { name });
    }
    record.editPhone(oldPhone, newPhone);
    return record;
  }

  records(): ContactRecord[] {
    return [...this.entries.values()];
  }

  *[Symbol.iterator](): Iterator<string> {
    for (const record of this.entries.values()) {
      yield record.format();
    }
  }

  getPage(pageNumber: number): ContactRecord[] {
    if (!Number.isInteger(pageNumber) || pageNumber < 1) return [];

    const start = (pageNumber - 1) * this.pageSize_;
    return this.records().slice(start, start + this.pageSize_);
  }

  getFirstN(n: number): string[] {
    const result: string[] = [];
    if (n <= 0) return result;

    for (const line of this) {
      result.push(line);
      if (result.length >= n) break;
    }
    return result;
  }
}

function keyOf(name: string): string {
  return name.toLowerCase();
}
