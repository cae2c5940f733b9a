import { describe, it, expect } from 'vitest';
import {
  INVALID_EMAIL_MESSAGE,
  emailValidationService,
  validateEmailAddress,
} from '../../src/services/email-validation.service.js';
import { EmailInvalidReason } from '../../src/types/validation.types.js';

describe('validateEmailAddress', () => {
  it('lower-cases and trims a valid address', () => {
    expect(validateEmailAddress(' FOO@EXAMPLE.COM ')).toEqual({ isValid: true, value: 'foo@example.com' });
  });

  it('removes zero-width spaces pasted from spreadsheets', () => {
    expect(validateEmailAddress('foo\u200B@example.com\u00A0')).toEqual({
      isValid: true,
      value: 'foo@example.com',
    });
  });

  it('is idempotent', () => {
    expect(validateEmailAddress('foo@example.com')).toEqual({ isValid: true, value: 'foo@example.com' });
  });

  it.each([
    'first.last@example.com',
    "o'reilly@example.co.uk",
    'user+tag@sub.example.org',
    'test@xn--r8jz45g.xn--zckzah',
  ])('accepts %s', (address) => {
    expect(emailValidationService.isValid(address)).toBe(true);
  });

  it('keeps an internationalised domain in its original form', () => {
    expect(validateEmailAddress('info@例え.テスト')).toEqual({ isValid: true, value: 'info@例え.テスト' });
  });

  it.each([
    ['a..b@example.com', EmailInvalidReason.SYNTAX],
    ['foo bar@example.com', EmailInvalidReason.SYNTAX],
    ['foo;bar@example.com', EmailInvalidReason.SYNTAX],
    ['"foo"@example.com', EmailInvalidReason.SYNTAX],
    ['foo@bar@example.com', EmailInvalidReason.SYNTAX],
    ['foo@.example.com', EmailInvalidReason.SYNTAX],
    ['example.com', EmailInvalidReason.SYNTAX],
    ['foo@localhost', EmailInvalidReason.DOMAIN],
    ['foo@example.c', EmailInvalidReason.DOMAIN],
    ['foo@example.com.', EmailInvalidReason.DOMAIN],
    ['foo@-example.com', EmailInvalidReason.DOMAIN],
    ['foo@exa_mple.com', EmailInvalidReason.DOMAIN],
  ])('rejects %s (%s)', (address, reason) => {
    expect(validateEmailAddress(address)).toEqual({
      isValid: false,
      reason,
      details: INVALID_EMAIL_MESSAGE,
    });
  });

  it('rejects a domain label longer than 63 characters', () => {
    const result = validateEmailAddress(`x@${'a'.repeat(64)}.com`);

    expect(result.isValid).toBe(false);
  });

  it('accepts a domain label of exactly 63 characters', () => {
    expect(validateEmailAddress(`x@${'a'.repeat(63)}.com`).isValid).toBe(true);
  });

  it('rejects addresses longer than 320 characters', () => {
    const result = validateEmailAddress(`${'a'.repeat(310)}@example.com`);

    expect(result).toEqual({ isValid: false, reason: EmailInvalidReason.LENGTH, details: INVALID_EMAIL_MESSAGE });
  });
});

describe('emailValidationService helpers', () => {
  it('normalizes case and whitespace', () => {
    expect(emailValidationService.normalizeEmail('  Foo@Example.COM\u200B ')).toBe('foo@example.com');
  });
});
