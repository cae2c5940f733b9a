/**
 * Validation types and enums
 */

/**
 * Reasons why an email is invalid
 */
export enum EmailInvalidReason {
  SYNTAX = 'syntax',
  LENGTH = 'length',
  DOMAIN = 'domain',
}

/**
 * Reasons why a phone number is invalid
 */
export enum PhoneErrorCode {
  UNKNOWN_CHARACTER = 'unknown-character',
  NOT_A_UK_MOBILE = 'not-a-uk-mobile',
  TOO_SHORT = 'too-short',
  TOO_LONG = 'too-long',
  UNSUPPORTED_COUNTRY_CODE = 'unsupported-country-code',
  INVALID_NUMBER = 'invalid-number',
}

export interface ValidationSuccess<T> {
  isValid: true;
  value: T;
}

export interface ValidationFailure<R> {
  isValid: false;
  reason: R;
  details: string;
}

/**
 * Result of validating a recipient: the normalised value, or why it was rejected
 */
export type ValidationResult<T, R> = ValidationSuccess<T> | ValidationFailure<R>;

export function valid<T>(value: T): ValidationSuccess<T> {
  return { isValid: true, value };
}

export function invalid<R>(reason: R, details: string): ValidationFailure<R> {
  return { isValid: false, reason, details };
}
