import { describe, it, expect } from 'vitest';
import { InsensitiveMap } from '../../src/models/insensitive-map.js';
import { Cell } from '../../src/models/cell.js';

describe('InsensitiveMap', () => {
  it.each(['Phone Number', 'phone_number', 'PHONENUMBER', 'phone-number', ' phone number '])(
    'normalises %s to phonenumber',
    (key) => {
      expect(InsensitiveMap.makeKey(key)).toBe('phonenumber');
    }
  );

  it('looks up values regardless of key formatting', () => {
    const map = new InsensitiveMap([['Email Address', 'test@example.com']]);

    expect(map.get('email_address')).toBe('test@example.com');
    expect(map.has('EMAILADDRESS')).toBe(true);
    expect(map.get('email')).toBeUndefined();
  });

  it('keeps the last value written under equivalent keys', () => {
    const map = new InsensitiveMap([
      ['name', 'first'],
      ['Name', 'second'],
    ]);

    expect(map.size).toBe(1);
    expect(map.get('NAME')).toBe('second');
  });

  it('preserves insertion order', () => {
    const map = new InsensitiveMap([
      ['Zebra', 1],
      ['apple', 2],
      ['Mango', 3],
    ]);

    expect([...map.keys()]).toEqual(['zebra', 'apple', 'mango']);
    expect([...map.values()]).toEqual([1, 2, 3]);
  });

  it('builds a key set from headers', () => {
    const map = InsensitiveMap.fromKeys(['Phone number', 'Date of birth']);

    expect(map.toRecord()).toEqual({ phonenumber: null, dateofbirth: null });
  });
});

describe('Cell', () => {
  const placeholders = new Set(['name']);
  const errorFn = (key: string, value: unknown) => (value === null ? Cell.MISSING_FIELD_ERROR : key === 'phonenumber' ? 'Too many digits' : null);

  it('defaults to an empty ignored cell', () => {
    const cell = new Cell();

    expect(cell.data).toBeNull();
    expect(cell.error).toBeNull();
    expect(cell.ignore).toBe(true);
  });

  it('is not ignored when its column is a placeholder', () => {
    expect(new Cell('Name', 'Ada', errorFn, placeholders).ignore).toBe(false);
    expect(new Cell('Shoe size', '9', errorFn, placeholders).ignore).toBe(true);
  });

  it('distinguishes recipient errors from missing values', () => {
    const missing = new Cell('name', null, errorFn, placeholders);
    const badRecipient = new Cell('phonenumber', '0770090012345', errorFn, placeholders);

    expect(missing.error).toBe('Missing');
    expect(missing.recipientError).toBe(false);
    expect(badRecipient.error).toBe('Too many digits');
    expect(badRecipient.recipientError).toBe(true);
  });

  it('compares data, error and ignore', () => {
    expect(new Cell('name', ['A', 'B']).equals(new Cell('name', ['A', 'B']))).toBe(true);
    expect(new Cell('name', ['A', 'B']).equals(new Cell('name', ['A', null]))).toBe(false);
    expect(new Cell('name', 'A', null, placeholders).equals(new Cell('name', 'A'))).toBe(false);
  });
});
