import { z } from 'zod';
import { config } from '../config/env.js';
import { emailValidationService } from './email-validation.service.js';
import { validatePhoneNumber } from './phone-validation.service.js';

/**
 * Fixed-capacity cache that evicts the least recently used entry
 */
export class RecentCache<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  getOrCompute(key: K, compute: (key: K) => V): V {
    if (this.entries.has(key)) {
      const cached = this.entries.get(key);
      if (cached !== undefined) {
        // Re-insert so Map order tracks recency
        this.entries.delete(key);
        this.entries.set(key, cached);
        return cached;
      }
    }

    const value = compute(key);
    this.entries.set(key, value);

    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    return value;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Guestlist Matcher
 *
 * Services in trial mode can only send to their team and guestlist. Recipients
 * are compared in canonical form, so `07700 900123` on the guestlist allows
 * `+44 7700 900123` in a spreadsheet.
 */
export class GuestlistMatcher {
  private readonly cache: RecentCache<string, string>;

  constructor(cacheSize: number = config.recipientCacheSize) {
    this.cache = new RecentCache(cacheSize);
  }

  /**
   * Canonical form: phone number, then email address, then lower-cased UUID,
   * otherwise the input unchanged
   */
  formatRecipient(recipient: unknown): string {
    if (typeof recipient !== 'string') {
      return '';
    }
    return this.cache.getOrCompute(recipient, canonicalise);
  }

  isAllowed(recipient: unknown, guestlist: Iterable<string>): boolean {
    const allowed = new Set<string>();
    for (const entry of guestlist) {
      allowed.add(this.formatRecipient(entry));
    }
    return allowed.has(this.formatRecipient(recipient));
  }

  get cachedRecipients(): number {
    return this.cache.size;
  }
}

const UuidSchema = z.string().uuid();

function canonicalise(recipient: string): string {
  const phone = validatePhoneNumber(recipient, { allowInternational: true });
  if (phone.isValid) {
    return phone.value;
  }

  const email = emailValidationService.validateEmail(recipient);
  if (email.isValid) {
    return email.value;
  }

  if (UuidSchema.safeParse(recipient).success) {
    return recipient.toLowerCase();
  }

  return recipient;
}

export const guestlistMatcher = new GuestlistMatcher();

export function allowedToSendTo(recipient: unknown, guestlist: Iterable<string>): boolean {
  return guestlistMatcher.isAllowed(recipient, guestlist);
}
