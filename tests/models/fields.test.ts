import { describe, it, expect } from 'vitest';
import {
  ValidatedField,
  createBirthday,
  createName,
  createPhone,
  daysInMonth,
  formatBirthday,
  isLeapYear,
  parseBirthday,
  parsePhone,
  type FieldRule,
} from '../../src/models/fields.js';
import { ValidationError } from '../../src/errors.js';

describe('ValidatedField', () => {
  const upperRule: FieldRule<string> = {
    parse(raw) {
      if (raw !== raw.toUpperCase()) throw new ValidationError('must be upper case');
      return raw;
    },
    format: (value) => `<${value}>`,
  };

  it('should validate on construction', () => {
    expect(() => new ValidatedField('abc', upperRule)).toThrow(ValidationError);
  });

  it('should store the parsed value', () => {
    const field = new ValidatedField('ABC', upperRule);
    expect(field.get()).toBe('ABC');
    expect(field.toString()).toBe('<ABC>');
  });

  it('should replace the value on a valid set()', () => {
    const field = new ValidatedField('ABC', upperRule);
    field.set('XYZ');
    expect(field.get()).toBe('XYZ');
  });

  it('should keep the old value when set() fails', () => {
    const field = new ValidatedField('ABC', upperRule);
    expect(() => field.set('nope')).toThrow('must be upper case');
    expect(field.get()).toBe('ABC');
  });
});

describe('phone numbers', () => {
  it.each(['1234567890', '0000000000', '0987654321'])('should accept %s', (raw) => {
    expect(parsePhone(raw)).toBe(raw);
    expect(createPhone(raw).toString()).toBe(raw);
  });

  it.each(['123', '12345678901', '123456789a', '', ' 123456789', '123-456-78', '١٢٣٤٥٦٧٨٩٠'])(
    'should reject %j',
    (raw) => {
      expect(() => createPhone(raw)).toThrow(ValidationError);
    }
  );

  it('should report the phone format in the message', () => {
    expect(() => parsePhone('123')).toThrow('Invalid phone number format');
  });

  it('should leave the phone unchanged after a rejected edit', () => {
    const phone = createPhone('1234567890');
    expect(() => phone.set('12')).toThrow(ValidationError);
    expect(phone.get()).toBe('1234567890');
  });
});

describe('birthdays', () => {
  it('should parse YYYY-MM-DD into a UTC date', () => {
    const date = parseBirthday('1990-05-20');
    expect(date.getUTCFullYear()).toBe(1990);
    expect(date.getUTCMonth()).toBe(4);
    expect(date.getUTCDate()).toBe(20);
  });

  it('should render back as YYYY-MM-DD', () => {
    expect(createBirthday('1990-05-20').toString()).toBe('1990-05-20');
    expect(formatBirthday(new Date(Date.UTC(2001, 0, 9)))).toBe('2001-01-09');
  });

  it('should keep years below 100 as written', () => {
    const date = parseBirthday('0050-05-20');
    expect(date.getUTCFullYear()).toBe(50);
    expect(createBirthday('0050-05-20').toString()).toBe('0050-05-20');
    expect(createBirthday('0004-02-29').toString()).toBe('0004-02-29');
  });

  it('should accept Feb 29 in a leap year', () => {
    expect(createBirthday('2000-02-29').toString()).toBe('2000-02-29');
  });

  it.each([
    '1990-5-20',
    '20-05-1990',
    '1990/05/20',
    '1990-13-01',
    '1990-00-10',
    '1990-04-31',
    '1900-02-29',
    '2023-02-29',
    '0000-02-29',
    '0000-01-01',
    '1990-05-20T00:00',
    'tomorrow',
    '',
  ])('should reject %j', (raw) => {
    expect(() => createBirthday(raw)).toThrow(
      'Invalid birthday format. Please use YYYY-MM-DD'
    );
  });
});

describe('names', () => {
  it('should accept any string unchanged', () => {
    expect(createName('Alice Smith').get()).toBe('Alice Smith');
    expect(createName('').get()).toBe('');
  });
});

describe('calendar helpers', () => {
  it('should follow Gregorian leap rules', () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
  });

  it('should count days per month', () => {
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2024, 4)).toBe(30);
    expect(daysInMonth(2024, 12)).toBe(31);
  });
});
