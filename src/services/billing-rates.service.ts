import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { config } from '../config/env.js';
import { logger } from './logger.service.js';
import type { BillingRate, BillingRates } from '../types/phone.types.js';

const BillingRateSchema = z.object({
  attributes: z.object({
    alpha: z.enum(['YES', 'NO']),
    dlr: z.string().nullable().optional(),
  }),
  billable_units: z.number().int().min(1),
  names: z.array(z.string()),
});

const BillingRatesSchema = z.record(z.string().regex(/^\d+$/), BillingRateSchema);

/**
 * Parses and validates a billing rates YAML document
 * @throws Error listing every schema violation
 */
export function parseBillingRates(content: string): BillingRates {
  const result = BillingRatesSchema.safeParse(parseYaml(content));

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid billing rates: ${issues}`);
  }

  return result.data;
}

/**
 * Longest-prefix lookup over the international billing table
 */
export class BillingRatesService {
  private readonly rates: Map<string, BillingRate>;

  /** Every known prefix, longest first so the first match is the most specific */
  readonly countryPrefixes: readonly string[];

  constructor(rates: BillingRates) {
    this.rates = new Map(Object.entries(rates));
    this.countryPrefixes = [...this.rates.keys()].sort(
      (a, b) => b.length - a.length || a.localeCompare(b)
    );
  }

  static fromFile(path: string): BillingRatesService {
    const service = new BillingRatesService(parseBillingRates(readFileSync(path, 'utf-8')));
    logger.billingRatesLoaded({ prefixes: service.countryPrefixes.length, source: path });
    return service;
  }

  getInternationalPrefix(number: string): string | null {
    return this.countryPrefixes.find((prefix) => number.startsWith(prefix)) ?? null;
  }

  hasPrefix(prefix: string): boolean {
    return this.rates.has(prefix);
  }

  getRate(prefix: string): BillingRate {
    const rate = this.rates.get(prefix);
    if (!rate) {
      throw new Error(`No billing rate for prefix ${prefix}`);
    }
    return rate;
  }

  getBillableUnits(prefix: string): number {
    return this.getRate(prefix).billable_units;
  }

  /**
   * Some destinations reject alphanumeric sender IDs
   */
  usesNumericSender(prefix: string): boolean {
    return this.getRate(prefix).attributes.alpha === 'NO';
  }
}

let defaultService: BillingRatesService | null = null;

/**
 * Billing table loaded from the configured YAML file on first use
 */
export function getBillingRatesService(): BillingRatesService {
  defaultService ??= BillingRatesService.fromFile(config.billingRatesPath);
  return defaultService;
}
