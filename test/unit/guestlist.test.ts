import { describe, it, expect, vi } from 'vitest';
import { GuestlistMatcher, RecentCache } from '../../src/services/guestlist.service.js';

const UUID = '9F2B7C3E-1A4D-4E8B-9C6F-0D1E2F3A4B5C';

describe('GuestlistMatcher.formatRecipient', () => {
  const matcher = new GuestlistMatcher(8);

  it.each([
    ['+44 7700 900123', '447700900123'],
    ['07700900123', '447700900123'],
    ['+33 1 23 45 67 89', '33123456789'],
    ['Foo@Example.com', 'foo@example.com'],
    [UUID, UUID.toLowerCase()],
    ['Team Lead', 'Team Lead'],
  ])('%s -> %s', (recipient, expected) => {
    expect(matcher.formatRecipient(recipient)).toBe(expected);
  });

  it('formats non-strings as an empty string', () => {
    expect(matcher.formatRecipient(null)).toBe('');
    expect(matcher.formatRecipient(['07700900123'])).toBe('');
  });
});

describe('GuestlistMatcher.isAllowed', () => {
  const matcher = new GuestlistMatcher(8);

  it('matches phone numbers in any format', () => {
    expect(matcher.isAllowed('07700 900 123', ['+447700900123'])).toBe(true);
    expect(matcher.isAllowed('07700 900 456', ['+447700900123'])).toBe(false);
  });

  it('matches email addresses case-insensitively', () => {
    expect(matcher.isAllowed('TEST@example.com', ['test@EXAMPLE.com'])).toBe(true);
  });

  it('matches UUIDs case-insensitively', () => {
    expect(matcher.isAllowed(UUID, [UUID.toLowerCase()])).toBe(true);
  });

  it('compares unrecognised text exactly', () => {
    expect(matcher.isAllowed('Bob', ['bob'])).toBe(false);
    expect(matcher.isAllowed('Bob', ['Bob'])).toBe(true);
  });

  it('allows nobody with an empty guestlist', () => {
    expect(matcher.isAllowed('07700900123', [])).toBe(false);
  });

  it('bounds the canonicalisation cache', () => {
    const small = new GuestlistMatcher(2);

    small.formatRecipient('a');
    small.formatRecipient('b');
    small.formatRecipient('c');

    expect(small.cachedRecipients).toBe(2);
  });
});

describe('RecentCache', () => {
  it('computes each key once while cached', () => {
    const cache = new RecentCache<string, number>(2);
    const compute = vi.fn((key: string) => key.length);

    expect(cache.getOrCompute('abc', compute)).toBe(3);
    expect(cache.getOrCompute('abc', compute)).toBe(3);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('evicts the least recently used entry', () => {
    const cache = new RecentCache<string, string>(2);
    const upper = (key: string) => key.toUpperCase();

    cache.getOrCompute('a', upper);
    cache.getOrCompute('b', upper);
    cache.getOrCompute('a', upper);
    cache.getOrCompute('c', upper);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.size).toBe(2);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new RecentCache(0)).toThrow(RangeError);
  });

  it('can be cleared', () => {
    const cache = new RecentCache<string, string>(2);
    cache.getOrCompute('a', (key) => key);
    cache.clear();

    expect(cache.size).toBe(0);
  });
});
