/**
 * Phone number and billing types
 */

export type AlphanumericSender = 'YES' | 'NO';

/**
 * One entry of the international billing table
 */
export interface BillingRate {
  attributes: {
    alpha: AlphanumericSender;
    dlr?: string | null;
  };
  billable_units: number;
  names: string[];
}

export type BillingRates = Record<string, BillingRate>;

/**
 * Billing metadata resolved for a validated number
 */
export interface InternationalPhoneInfo {
  international: boolean;
  crownDependency: boolean;
  countryPrefix: string;
  billableUnits: number;
}

export interface PhoneValidationOptions {
  allowInternational: boolean;
}
