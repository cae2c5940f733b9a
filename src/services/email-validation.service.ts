import { domainToASCII } from 'url';
import { stripAndRemoveObscureWhitespace } from './whitespace.service.js';
import {
  EmailInvalidReason,
  invalid,
  valid,
  type ValidationFailure,
  type ValidationResult,
} from '../types/validation.types.js';

export const INVALID_EMAIL_MESSAGE = 'Not a valid email address';

// Stricter than RFC 5322: no double quotes or semicolons, which mail
// transports reject further down the line
const VALID_LOCAL_CHARS = "a-zA-Z0-9.!#$%&'*+/=?^_`{|}~\\-";
const EMAIL_REGEX = new RegExp(`^[${VALID_LOCAL_CHARS}]+@([^.@][^@\\s]+)$`);
const HOSTNAME_PART = /^(xn|[a-z0-9]+)(-?-[a-z0-9]+)*$/i;
const TLD_PART = /^([a-z]{2,63}|xn--([a-z0-9]+-)*[a-z0-9]+)$/i;

const MAX_EMAIL_LENGTH = 320;
const MAX_HOSTNAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;

type EmailResult = ValidationResult<string, EmailInvalidReason>;

function emailError(reason: EmailInvalidReason): ValidationFailure<EmailInvalidReason> {
  return invalid(reason, INVALID_EMAIL_MESSAGE);
}

/**
 * Email validation service
 *
 * Layers, each short-circuiting:
 * 1. Syntax: local part and domain split by a single `@`
 * 2. Length and consecutive dots
 * 3. Domain: IDNA encoding, label and TLD grammar
 *
 * Validation does not look up the domain. It only checks the address could
 * be delivered to.
 */
class EmailValidationService {
  /**
   * Validates an address and returns it lower-cased with whitespace removed
   */
  validateEmail(email: string): EmailResult {
    const address = stripAndRemoveObscureWhitespace(email);

    const syntaxResult = this.validateSyntax(address);
    if (!syntaxResult.isValid) {
      return syntaxResult;
    }

    const domainResult = this.validateDomain(syntaxResult.value);
    if (!domainResult.isValid) {
      return domainResult;
    }

    return valid(this.normalizeEmail(address));
  }

  isValid(email: string): boolean {
    return this.validateEmail(email).isValid;
  }

  /**
   * Layers 1 and 2: returns the domain part on success
   */
  private validateSyntax(address: string): EmailResult {
    const match = EMAIL_REGEX.exec(address);
    if (!match) {
      return emailError(EmailInvalidReason.SYNTAX);
    }

    if (address.length > MAX_EMAIL_LENGTH) {
      return emailError(EmailInvalidReason.LENGTH);
    }

    if (address.includes('..')) {
      return emailError(EmailInvalidReason.SYNTAX);
    }

    return valid(match[1]);
  }

  /**
   * Layer 3: internationalised domains are checked in their ASCII form,
   * `例え.テスト` as `xn--r8jz45g.xn--zckzah`
   */
  private validateDomain(domain: string): EmailResult {
    const hostname = domainToASCII(domain);
    if (!hostname) {
      return emailError(EmailInvalidReason.DOMAIN);
    }

    const labels = hostname.split('.');

    if (hostname.length > MAX_HOSTNAME_LENGTH || labels.length < 2) {
      return emailError(EmailInvalidReason.DOMAIN);
    }

    for (const label of labels) {
      if (!label || label.length > MAX_LABEL_LENGTH || !HOSTNAME_PART.test(label)) {
        return emailError(EmailInvalidReason.DOMAIN);
      }
    }

    if (!TLD_PART.test(labels[labels.length - 1])) {
      return emailError(EmailInvalidReason.DOMAIN);
    }

    return valid(hostname);
  }

  /**
   * Lower-cases an address and drops invisible whitespace around it
   */
  normalizeEmail(email: string): string {
    return stripAndRemoveObscureWhitespace(email.toLowerCase());
  }
}

export const emailValidationService = new EmailValidationService();

export function validateEmailAddress(email: string): EmailResult {
  return emailValidationService.validateEmail(email);
}
