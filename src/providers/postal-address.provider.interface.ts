import type { InsensitiveMap } from '../models/insensitive-map.js';
import type { CellValue } from '../types/csv.types.js';

export interface PostalAddressOptions {
  allowInternationalLetters: boolean;
}

/**
 * Postal address validator interface
 * Decides whether the address columns of a letter row make a deliverable address
 */
export interface PostalAddressValidator {
  /**
   * @param values - Every value in the row, keyed by column
   */
  isValid(values: InsensitiveMap<CellValue>, options: PostalAddressOptions): boolean;
}
