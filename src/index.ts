export { config, type Config } from './config/env.js';

export { Cell, type CellErrorFn } from './models/cell.js';
export { InsensitiveMap } from './models/insensitive-map.js';
export { Row, type RowOptions } from './models/row.js';

export {
  isMessageTemplate,
  type MessageTemplate,
  type QrCodeTooLong,
} from './providers/template.provider.interface.js';
export type {
  PostalAddressOptions,
  PostalAddressValidator,
} from './providers/postal-address.provider.interface.js';

export {
  BillingRatesService,
  getBillingRatesService,
  parseBillingRates,
} from './services/billing-rates.service.js';
export {
  INVALID_EMAIL_MESSAGE,
  emailValidationService,
  validateEmailAddress,
} from './services/email-validation.service.js';
export { decodeBuffer, detectEncoding, removeBom, type Encoding } from './services/encoding.service.js';
export {
  GuestlistMatcher,
  RecentCache,
  allowedToSendTo,
  guestlistMatcher,
} from './services/guestlist.service.js';
export { StructuredLogger, logger } from './services/logger.service.js';
export {
  CROWN_DEPENDENCY_RANGES,
  PHONE_ERROR_MESSAGES,
  PhoneNumber,
  UK_PREFIX,
  formatPhoneNumberHumanReadable,
  getInternationalPhoneInfo,
  isCrownDependencyNumber,
  isTvNumber,
  isUkPhoneNumber,
  normalisePhoneNumber,
  thoroughlyNormalisePhoneNumber,
  tryValidateAndFormatPhoneNumber,
  usesNumericSender,
  validatePhoneNumber,
  validateNumberingPlan,
  validateUkPhoneNumber,
} from './services/phone-validation.service.js';
export {
  ADDRESS_LINES_1_TO_6_AND_POSTCODE_KEYS,
  ADDRESS_LINES_1_TO_7_KEYS,
  ADDRESS_LINE_7_KEY,
  FIRST_COLUMN_HEADINGS,
  MalformedCsvError,
  RecipientCsv,
  UNCLOSED_QUOTE_PROBLEM,
} from './services/recipient-csv.service.js';
export {
  ALL_WHITESPACE,
  stripAllWhitespace,
  stripAndRemoveObscureWhitespace,
} from './services/whitespace.service.js';

export { TEMPLATE_TYPES, type CellValue, type RecipientCsvOptions, type TemplateType } from './types/csv.types.js';
export type {
  AlphanumericSender,
  BillingRate,
  BillingRates,
  InternationalPhoneInfo,
  PhoneValidationOptions,
} from './types/phone.types.js';
export {
  EmailInvalidReason,
  PhoneErrorCode,
  type ValidationFailure,
  type ValidationResult,
  type ValidationSuccess,
} from './types/validation.types.js';
