import type { PostalAddressValidator } from '../providers/postal-address.provider.interface.js';
import type { GuestlistMatcher } from '../services/guestlist.service.js';

export const TEMPLATE_TYPES = ['email', 'sms', 'letter'] as const;

export type TemplateType = (typeof TEMPLATE_TYPES)[number];

/**
 * A spreadsheet value: empty cells are `null`, and repeated personalisation
 * columns collect their values in order
 */
export type CellValue = string | Array<string | null> | null;

export interface RecipientCsvOptions {
  /** Recipients a restricted service may send to */
  guestlist?: Iterable<string> | null;
  /** Messages the service may still send today */
  remainingMessages?: number;
  allowInternationalSms?: boolean;
  allowInternationalLetters?: boolean;
  /** Set false for a cheap pass that only needs the raw values */
  shouldValidate?: boolean;
  maxErrorsShown?: number;
  maxInitialRowsShown?: number;
  maxRows?: number;
  /** Required for letter templates */
  postalAddressValidator?: PostalAddressValidator;
  guestlistMatcher?: GuestlistMatcher;
}
