/**
 * Contact commands.
 * add <name> <phone> [birthday]   — Add a contact or another phone for it
 * delete <name>                   — Remove a contact
 * change <name> <old> <new>       — Replace one phone number
 * phone <name>                    — List a contact's phones
 * remove-phone <name> <phone>     — Drop every copy of a phone number
 * birthday <name> [date]          — Days to birthday, or set it
 */

import { pipeline, errorHandler, validateArgs, ok } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';

export function createContactHandlers(container: Container) {
  const service = container.contactService;

  const add: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 2, max: 3, usage: 'add <name> <phone> [birthday]' })
  )(({ args: [name, phone, birthday] }) => {
    service.addContact(name, phone, birthday);
    return ok(`Contact ${name} added with phone ${phone}`);
  });

  const remove: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 1, usage: 'delete <name>' })
  )(({ args: [name] }) => {
    service.deleteContact(name);
    return ok(`Contact ${name} deleted`);
  });

  const change: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 3, usage: 'change <name> <old phone> <new phone>' })
  )(({ args: [name, oldPhone, newPhone] }) => {
    service.changePhone(name, oldPhone, newPhone);
    return ok(`Contact ${name}: phone ${oldPhone} changed to ${newPhone}`);
  });

  const phones: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 1, usage: 'phone <name>' })
  )(({ args: [name] }) => {
    const list = service.getPhones(name);
    if (list.length === 0) {
      return ok(`Contact ${name} has no phone numbers`);
    }
    return ok(`Phone numbers for ${name}: ${list.join(', ')}`);
  });

  const removePhone: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 2, usage: 'remove-phone <name> <phone>' })
  )(({ args: [name, phone] }) => {
    const removed = service.removePhone(name, phone);
    return ok(`Removed ${removed} phone number(s) from ${name}`);
  });

  const birthday: Handler = pipeline(
    container.logging,
    errorHandler,
    validateArgs({ min: 1, max: 2, usage: 'birthday <name> [YYYY-MM-DD]' })
  )(({ args: [name, date] }, ctx) => {
    if (date !== undefined) {
      service.setBirthday(name, date);
      return ok(`Birthday for ${name} set to ${date}`);
    }

    const days = service.daysToBirthday(name, ctx.now);
    if (days === null) {
      return ok(`Contact ${name} has no birthday set`);
    }
    return ok(`${days} days until ${name}'s birthday`);
  });

  return { add, remove, change, phones, removePhone, birthday };
}
