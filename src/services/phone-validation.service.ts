/**
 * Phone Number Validation Service
 *
 * Normalises user-supplied numbers to digits with a country code, as sent to
 * SMS providers: `07700 900123` becomes `447700900123`.
 *
 * UK numbers must be mobiles. International numbers must start with a prefix
 * from the billing table. Numbers on the crown dependency mobile ranges share
 * the UK country code but are billed as international.
 *
 * `PhoneNumber.parse` also checks numbers against each country's numbering
 * plan, using the full libphonenumber metadata.
 */

import { parsePhoneNumberFromString, validatePhoneNumberLength } from 'libphonenumber-js/max';
import { getBillingRatesService, type BillingRatesService } from './billing-rates.service.js';
import { logger } from './logger.service.js';
import { ALL_WHITESPACE, removeCharacters } from './whitespace.service.js';
import {
  PhoneErrorCode,
  invalid,
  valid,
  type ValidationFailure,
  type ValidationResult,
} from '../types/validation.types.js';
import type { InternationalPhoneInfo, PhoneValidationOptions } from '../types/phone.types.js';

export const UK_PREFIX = '44';

export const PHONE_ERROR_MESSAGES: Record<PhoneErrorCode, string> = {
  [PhoneErrorCode.UNKNOWN_CHARACTER]: 'Mobile numbers can only include: 0 1 2 3 4 5 6 7 8 9 ( ) + -',
  [PhoneErrorCode.NOT_A_UK_MOBILE]: 'Not a UK mobile number',
  [PhoneErrorCode.TOO_SHORT]: 'Not enough digits',
  [PhoneErrorCode.TOO_LONG]: 'Too many digits',
  [PhoneErrorCode.UNSUPPORTED_COUNTRY_CODE]:
    'Country code not found - double check the mobile number you entered',
  [PhoneErrorCode.INVALID_NUMBER]: 'Not a valid phone number',
};

/**
 * Mobile ranges issued in Jersey, Guernsey and the Isle of Man
 */
export const CROWN_DEPENDENCY_RANGES = [
  '7781', '7839', '7911', '7509', '7797', '7937', '7700', '7829', '7624', '7524', '7924',
];

// Ofcom reserves 07700 900000 to 07700 900999 for TV and film
const TV_NUMBER_RANGE = '7700900';

const FORMATTING_CHARACTERS = ALL_WHITESPACE + '()-+';

type PhoneResult = ValidationResult<string, PhoneErrorCode>;

function phoneError(code: PhoneErrorCode): ValidationFailure<PhoneErrorCode> {
  return invalid(code, PHONE_ERROR_MESSAGES[code]);
}

function stripLeadingZeros(number: string): string {
  return number.replace(/^0+/, '');
}

/**
 * Removes formatting characters and leading zeros, leaving only digits
 */
export function normalisePhoneNumber(number: string): PhoneResult {
  const digits = removeCharacters(number, FORMATTING_CHARACTERS);

  if (!/^\d*$/.test(digits)) {
    return phoneError(PhoneErrorCode.UNKNOWN_CHARACTER);
  }
  if (digits === '') {
    return phoneError(PhoneErrorCode.INVALID_NUMBER);
  }

  return valid(stripLeadingZeros(digits));
}

export function isUkPhoneNumber(number: string): boolean {
  if (number.startsWith('0') && !number.startsWith('00')) {
    return true;
  }

  const normalised = normalisePhoneNumber(number);
  if (!normalised.isValid) {
    return false;
  }

  const digits = normalised.value;
  return digits.startsWith(UK_PREFIX) || (digits.startsWith('7') && digits.length < 11);
}

export function validateUkPhoneNumber(number: string): PhoneResult {
  const normalised = normalisePhoneNumber(number);
  if (!normalised.isValid) {
    return normalised;
  }

  let national = normalised.value;
  if (national.startsWith(UK_PREFIX)) {
    national = national.slice(UK_PREFIX.length);
  }
  national = stripLeadingZeros(national);

  if (!national.startsWith('7')) {
    return phoneError(PhoneErrorCode.NOT_A_UK_MOBILE);
  }
  if (national.length > 10) {
    return phoneError(PhoneErrorCode.TOO_LONG);
  }
  if (national.length < 10) {
    return phoneError(PhoneErrorCode.TOO_SHORT);
  }

  return valid(`${UK_PREFIX}${national}`);
}

/**
 * Validates a number and returns it as digits with a country code
 *
 * When international numbers are not allowed every number is validated as a
 * UK mobile.
 */
export function validatePhoneNumber(
  number: string,
  { allowInternational }: PhoneValidationOptions,
  billingRates: BillingRatesService = getBillingRatesService()
): PhoneResult {
  if (!allowInternational || isUkPhoneNumber(number)) {
    return validateUkPhoneNumber(number);
  }

  const normalised = normalisePhoneNumber(number);
  if (!normalised.isValid) {
    return normalised;
  }

  const digits = normalised.value;
  if (digits.length < 8) {
    return phoneError(PhoneErrorCode.TOO_SHORT);
  }
  if (digits.length > 15) {
    return phoneError(PhoneErrorCode.TOO_LONG);
  }
  if (billingRates.getInternationalPrefix(digits) === null) {
    return phoneError(PhoneErrorCode.UNSUPPORTED_COUNTRY_CODE);
  }

  return valid(digits);
}

/**
 * Checks a validated number against the TV and film drama range
 */
export function isTvNumber(number: string): boolean {
  return number.startsWith(UK_PREFIX + TV_NUMBER_RANGE);
}

/**
 * Checks a validated number against the crown dependency mobile ranges
 */
export function isCrownDependencyNumber(number: string): boolean {
  const inCrownDependencyRange = CROWN_DEPENDENCY_RANGES.includes(number.slice(2, 6));
  const inTvRange = number.slice(2, 9) === TV_NUMBER_RANGE;

  return inCrownDependencyRange && !inTvRange;
}

function resolvePhoneInfo(number: string, billingRates: BillingRatesService): InternationalPhoneInfo {
  const prefix = billingRates.getInternationalPrefix(number);
  if (prefix === null) {
    // validatePhoneNumber only accepts numbers with a known prefix
    throw new Error(`No billing prefix for validated number ${number}`);
  }
  const crownDependency = isCrownDependencyNumber(number);

  return {
    international: prefix !== UK_PREFIX || crownDependency,
    crownDependency,
    countryPrefix: prefix,
    billableUnits: billingRates.getBillableUnits(prefix),
  };
}

/**
 * Resolves billing metadata for a number, validating it with international numbers allowed
 */
export function getInternationalPhoneInfo(
  number: string,
  billingRates: BillingRatesService = getBillingRatesService()
): ValidationResult<InternationalPhoneInfo, PhoneErrorCode> {
  const result = validatePhoneNumber(number, { allowInternational: true }, billingRates);
  if (!result.isValid) {
    return result;
  }
  return valid(resolvePhoneInfo(result.value, billingRates));
}

/**
 * Whether the destination network needs a numeric sender instead of the service name
 */
export function usesNumericSender(
  number: string,
  billingRates: BillingRatesService = getBillingRatesService()
): ValidationResult<boolean, PhoneErrorCode> {
  const info = getInternationalPhoneInfo(number, billingRates);
  if (!info.isValid) {
    return info;
  }
  return valid(billingRates.usesNumericSender(info.value.countryPrefix));
}

function formatForDisplay(number: string, international: boolean): string {
  const parsed = parsePhoneNumberFromString(`+${number}`);
  if (!parsed) {
    return number;
  }
  return international ? parsed.formatInternational() : parsed.formatNational();
}

/**
 * Formats a number for people to read, or returns it untouched if it does not validate
 */
export function formatPhoneNumberHumanReadable(
  number: string,
  billingRates: BillingRatesService = getBillingRatesService()
): string {
  const result = validatePhoneNumber(number, { allowInternational: true }, billingRates);
  if (!result.isValid) {
    return number;
  }
  const info = resolvePhoneInfo(result.value, billingRates);
  return formatForDisplay(result.value, info.international);
}

/**
 * For inputs that must not fail, such as numbers reported back by a provider
 */
export function tryValidateAndFormatPhoneNumber(
  number: string,
  options: PhoneValidationOptions & { logMessage?: string }
): string {
  const result = validatePhoneNumber(number, options);
  if (result.isValid) {
    return result.value;
  }
  if (options.logMessage) {
    logger.phoneNumberRejected({ reason: result.reason, logMessage: options.logMessage });
  }
  return number;
}

/**
 * Spreadsheet exports add stray leading zeros or a `+` with no country code,
 * for example `0+447700900100` or `+07700900100`. Only used after strict
 * validation fails: stripping `+` from a real international number could
 * make it look like a UK one.
 */
export function thoroughlyNormalisePhoneNumber(number: string): string {
  return stripLeadingZeros(number.replaceAll('+', ''));
}

const LENGTH_ERRORS: Partial<Record<string, PhoneErrorCode>> = {
  TOO_SHORT: PhoneErrorCode.TOO_SHORT,
  TOO_LONG: PhoneErrorCode.TOO_LONG,
  INVALID_COUNTRY: PhoneErrorCode.UNSUPPORTED_COUNTRY_CODE,
};

/**
 * Checks normalised digits against the numbering plan of their country
 *
 * The digits already carry a country code, so they are always read as an
 * international number: a `+` or `00` dropped by a spreadsheet makes no
 * difference. TV drama numbers are unallocated and fail the plan, but are
 * accepted.
 */
export function validateNumberingPlan(number: string): PhoneResult {
  const international = `+${number}`;

  const lengthError = validatePhoneNumberLength(international);
  if (lengthError !== undefined) {
    return phoneError(LENGTH_ERRORS[lengthError] ?? PhoneErrorCode.INVALID_NUMBER);
  }

  const parsed = parsePhoneNumberFromString(international);
  if (!parsed) {
    return phoneError(PhoneErrorCode.INVALID_NUMBER);
  }
  if (!parsed.isValid() && !isTvNumber(number)) {
    return phoneError(PhoneErrorCode.INVALID_NUMBER);
  }

  return valid(number);
}

function validateThoroughly(
  number: string,
  options: PhoneValidationOptions,
  billingRates: BillingRatesService
): PhoneResult {
  const result = validatePhoneNumber(number, options, billingRates);
  return result.isValid ? validateNumberingPlan(result.value) : result;
}

/**
 * A validated phone number with its billing classification
 */
export class PhoneNumber {
  readonly prefix: string;
  readonly isCrownDependency: boolean;
  readonly isInternational: boolean;
  readonly billableUnits: number;

  private constructor(
    readonly rawInput: string,
    readonly number: string,
    private readonly billingRates: BillingRatesService
  ) {
    const info = resolvePhoneInfo(number, billingRates);
    this.prefix = info.countryPrefix;
    this.isCrownDependency = info.crownDependency;
    this.isInternational = info.international;
    this.billableUnits = info.billableUnits;
  }

  /**
   * Validates strictly first, then retries once with thorough normalisation.
   * Both attempts check the numbering plan as well as the digit rules. The
   * strict failure is reported when both attempts fail.
   */
  static parse(
    raw: string,
    options: PhoneValidationOptions,
    billingRates: BillingRatesService = getBillingRatesService()
  ): ValidationResult<PhoneNumber, PhoneErrorCode> {
    const strict = validateThoroughly(raw, options, billingRates);
    if (strict.isValid) {
      return valid(new PhoneNumber(raw, strict.value, billingRates));
    }

    const rescued = validateThoroughly(thoroughlyNormalisePhoneNumber(raw), options, billingRates);
    if (!rescued.isValid) {
      return strict;
    }

    logger.phoneNumberRescued({ reason: strict.reason, normalised: rescued.value });
    return valid(new PhoneNumber(raw, rescued.value, billingRates));
  }

  get billingInfo(): InternationalPhoneInfo {
    return {
      international: this.isInternational,
      crownDependency: this.isCrownDependency,
      countryPrefix: this.prefix,
      billableUnits: this.billableUnits,
    };
  }

  isUkPhoneNumber(): boolean {
    return this.prefix === UK_PREFIX;
  }

  isTvNumber(): boolean {
    return isTvNumber(this.number);
  }

  shouldUseNumericSender(): boolean {
    return this.billingRates.usesNumericSender(this.prefix);
  }

  toHumanReadable(): string {
    return formatForDisplay(this.number, this.isInternational);
  }

  /**
   * Digits with country code and no `+`, as providers expect
   */
  toString(): string {
    return this.number;
  }
}
