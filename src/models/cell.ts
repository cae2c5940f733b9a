import type { CellValue } from '../types/csv.types.js';
import { InsensitiveMap } from './insensitive-map.js';

export type CellErrorFn = (key: string, value: CellValue) => string | null;

/**
 * One spreadsheet value and the first problem found with it
 */
export class Cell {
  static readonly MISSING_FIELD_ERROR = 'Missing';

  readonly data: CellValue;
  readonly error: string | null;
  /** Neither a recipient column nor a placeholder in the template */
  readonly ignore: boolean;

  constructor(
    key: string | null = null,
    value: CellValue = null,
    errorFn: CellErrorFn | null = null,
    placeholders: ReadonlySet<string> = new Set()
  ) {
    this.data = value;
    this.error = errorFn && key !== null ? errorFn(key, value) : null;
    this.ignore = key === null || !placeholders.has(InsensitiveMap.makeKey(key));
  }

  /**
   * An error from validating the recipient, as opposed to the value being absent
   */
  get recipientError(): boolean {
    return this.error !== null && this.error !== Cell.MISSING_FIELD_ERROR;
  }

  equals(other: Cell): boolean {
    const mine = this.data;
    const theirs = other.data;
    const sameData = Array.isArray(mine) && Array.isArray(theirs)
      ? mine.length === theirs.length && mine.every((item, i) => item === theirs[i])
      : mine === theirs;

    return sameData && this.error === other.error && this.ignore === other.ignore;
  }
}
