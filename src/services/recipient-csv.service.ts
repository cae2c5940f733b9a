import { parse } from 'csv-parse/sync';
import { config } from '../config/env.js';
import { Cell } from '../models/cell.js';
import { InsensitiveMap } from '../models/insensitive-map.js';
import { Row } from '../models/row.js';
import { isMessageTemplate, type MessageTemplate } from '../providers/template.provider.interface.js';
import type { PostalAddressValidator } from '../providers/postal-address.provider.interface.js';
import type { CellValue, RecipientCsvOptions, TemplateType } from '../types/csv.types.js';
import { decodeBuffer, detectEncoding } from './encoding.service.js';
import { validateEmailAddress } from './email-validation.service.js';
import { guestlistMatcher as defaultGuestlistMatcher, type GuestlistMatcher } from './guestlist.service.js';
import { logger } from './logger.service.js';
import { validatePhoneNumber } from './phone-validation.service.js';
import { stripAllWhitespace, stripAndRemoveObscureWhitespace } from './whitespace.service.js';

export const ADDRESS_LINES_1_TO_6_AND_POSTCODE_KEYS = [
  'address_line_1',
  'address_line_2',
  'address_line_3',
  'address_line_4',
  'address_line_5',
  'address_line_6',
  'postcode',
];

export const ADDRESS_LINE_7_KEY = 'address_line_7';

export const ADDRESS_LINES_1_TO_7_KEYS = [
  ...ADDRESS_LINES_1_TO_6_AND_POSTCODE_KEYS.slice(0, 6),
  ADDRESS_LINE_7_KEY,
];

export const FIRST_COLUMN_HEADINGS: Record<TemplateType, readonly string[]> = {
  email: ['email address'],
  sms: ['phone number'],
  letter: [...ADDRESS_LINES_1_TO_6_AND_POSTCODE_KEYS, ADDRESS_LINE_7_KEY].map((line) => line.replaceAll('_', ' ')),
};

const ADDRESS_COLUMNS = InsensitiveMap.fromKeys(FIRST_COLUMN_HEADINGS.letter);

/**
 * Raised when the parser fails in a way that neither closing a dangling quote
 * nor skipping broken records recovers from
 */
export class MalformedCsvError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedCsvError';
  }
}

export const UNCLOSED_QUOTE_PROBLEM = 'A quote is not closed, so everything after it was read as one value';

const PARSE_OPTIONS = {
  delimiter: ',',
  relax_column_count: true,
  relax_quotes: true,
  skip_empty_lines: false,
  trim: true,
  bom: true,
};

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

function isStringMatrix(records: unknown): records is string[][] {
  return (
    Array.isArray(records) &&
    records.every((record) => Array.isArray(record) && record.every((field) => typeof field === 'string'))
  );
}

/**
 * Repeated personalisation columns collect their values instead of overwriting
 */
function insertOrAppend(values: Map<string, CellValue>, key: string, value: string | null): void {
  // Completely empty entries carry nothing worth storing
  if (!key && !value) {
    return;
  }

  const existing = values.get(key);
  if (existing) {
    values.set(key, Array.isArray(existing) ? [...existing, value] : [existing, value]);
  } else {
    values.set(key, value);
  }
}

/**
 * Recipient CSV
 *
 * Reads a spreadsheet of recipients for one template and reports every problem
 * with it at once: missing or duplicated columns, too many rows, recipients
 * outside the guestlist, and per-cell errors.
 *
 * Rows are validated on first access and cached for the lifetime of the object.
 */
export class RecipientCsv implements Iterable<Row | null> {
  readonly fileData: string;
  readonly template: MessageTemplate;
  readonly templateType: TemplateType;
  readonly recipientColumnHeaders: readonly string[];
  /** Template placeholders followed by the recipient columns */
  readonly placeholders: readonly string[];
  readonly guestlist: readonly string[];
  readonly remainingMessages: number;
  readonly allowInternationalSms: boolean;
  readonly allowInternationalLetters: boolean;
  readonly shouldValidate: boolean;
  readonly maxErrorsShown: number;
  readonly maxInitialRowsShown: number;
  readonly maxRows: number;

  private readonly placeholderKeys: ReadonlySet<string>;
  private readonly recipientColumnKeys: ReadonlySet<string>;
  private readonly postalAddressValidator: PostalAddressValidator | null;
  private readonly guestlistMatcher: GuestlistMatcher;

  private records: string[][] | null = null;
  private readonly problems: string[] = [];
  private readonly views = new Map<string, Row[]>();
  private rowsAsList: Array<Row | null> | null = null;
  private cachedMissingColumnHeaders: Set<string> | null = null;
  private cachedDuplicateRecipientColumnHeaders: string[] | null = null;
  private cachedAllowedToSendTo: boolean | null = null;

  constructor(fileData: string, template: MessageTemplate, options: RecipientCsvOptions = {}) {
    if (!isMessageTemplate(template)) {
      throw new TypeError('template must implement MessageTemplate with a type of email, sms or letter');
    }
    if (template.templateType === 'letter' && !options.postalAddressValidator) {
      throw new TypeError('letter templates need a postalAddressValidator');
    }

    this.fileData = stripAllWhitespace(fileData, ',');
    this.template = template;
    this.templateType = template.templateType;
    this.recipientColumnHeaders = FIRST_COLUMN_HEADINGS[this.templateType];
    this.placeholders = [...template.placeholders, ...this.recipientColumnHeaders];
    this.placeholderKeys = new Set(this.placeholders.map(InsensitiveMap.makeKey));
    this.recipientColumnKeys = new Set(this.recipientColumnHeaders.map(InsensitiveMap.makeKey));

    this.guestlist = options.guestlist ? [...options.guestlist] : [];
    this.remainingMessages = options.remainingMessages ?? Number.MAX_SAFE_INTEGER;
    this.allowInternationalSms = options.allowInternationalSms ?? false;
    this.allowInternationalLetters = options.allowInternationalLetters ?? false;
    this.shouldValidate = options.shouldValidate ?? true;
    this.maxErrorsShown = options.maxErrorsShown ?? config.csvMaxErrorsShown;
    this.maxInitialRowsShown = options.maxInitialRowsShown ?? config.csvMaxInitialRowsShown;
    this.maxRows = options.maxRows ?? config.csvMaxRows;
    this.postalAddressValidator = options.postalAddressValidator ?? null;
    this.guestlistMatcher = options.guestlistMatcher ?? defaultGuestlistMatcher;
  }

  /**
   * Builds from uploaded file bytes, detecting UTF-8 or Latin-1
   */
  static fromBuffer(buffer: Buffer, template: MessageTemplate, options: RecipientCsvOptions = {}): RecipientCsv {
    const { encoding } = detectEncoding(buffer);
    return new RecipientCsv(decodeBuffer(buffer, encoding), template, options);
  }

  private get parsedRecords(): string[][] {
    if (this.records === null) {
      this.records = this.parseFile();
      if (this.problems.length > 0) {
        logger.recipientsMalformed({ templateType: this.templateType, problems: this.problems });
      }
    }
    return this.records;
  }

  /**
   * A dangling quote swallows the rest of the file into one value, and other
   * broken records are skipped. Either way the problem is kept in `problems`.
   */
  private parseFile(): string[][] {
    const data = this.fileData.trim();

    try {
      return this.checkRecords(parse(data, PARSE_OPTIONS));
    } catch (error) {
      if (errorCode(error) === 'CSV_QUOTE_NOT_CLOSED') {
        this.problems.push(UNCLOSED_QUOTE_PROBLEM);
        return this.parseFileSkippingErrors(`${data}"`);
      }
      return this.parseFileSkippingErrors(data);
    }
  }

  private parseFileSkippingErrors(data: string): string[][] {
    try {
      return this.checkRecords(
        parse(data, {
          ...PARSE_OPTIONS,
          skip_records_with_error: true,
          on_skip: (error) => {
            this.problems.push(error?.message ?? 'A record could not be read and was skipped');
          },
        })
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedCsvError(`Could not read the file: ${reason}`, { cause: error });
    }
  }

  private checkRecords(records: unknown): string[][] {
    if (!isStringMatrix(records)) {
      throw new MalformedCsvError('Could not read the file: unexpected parser output');
    }
    return records;
  }

  /**
   * Problems found while splitting the file into records
   */
  get parseProblems(): readonly string[] {
    return this.parsedRecords && this.problems;
  }

  /**
   * Realises and caches every row; rows past `maxRows` are `null`
   */
  get rows(): Array<Row | null> {
    if (this.rowsAsList === null) {
      this.rowsAsList = [...this.getRows()];
      logger.recipientsIngested({
        templateType: this.templateType,
        totalRows: this.rowsAsList.length,
        columns: this.rawColumnHeaders.length,
      });
    }
    return this.rowsAsList;
  }

  get length(): number {
    return this.rows.length;
  }

  at(index: number): Row | null | undefined {
    return this.rows.at(index);
  }

  [Symbol.iterator](): Iterator<Row | null> {
    return this.rows[Symbol.iterator]();
  }

  /**
   * Yields rows one at a time without caching them
   */
  *getRows(): Generator<Row | null> {
    const columnHeaders = this.rawColumnHeaders;
    const dataRows = this.parsedRecords.slice(1);

    for (const [index, row] of dataRows.entries()) {
      if (index >= this.maxRows) {
        yield null;
        continue;
      }

      const values = new Map<string, CellValue>();

      columnHeaders.slice(0, row.length).forEach((columnName, column) => {
        const value = stripAndRemoveObscureWhitespace(row[column]) || null;

        if (this.recipientColumnKeys.has(InsensitiveMap.makeKey(columnName))) {
          values.set(columnName, value);
        } else {
          insertOrAppend(values, columnName, value);
        }
      });

      for (const columnName of columnHeaders.slice(row.length)) {
        insertOrAppend(values, columnName, null);
      }

      yield new Row(new InsensitiveMap(values), {
        index,
        templateType: this.templateType,
        recipientColumnHeaders: this.recipientColumnHeaders,
        placeholders: this.placeholderKeys,
        errorFn: this.shouldValidate ? (key, value) => this.getErrorForField(key, value) : null,
        template: this.shouldValidate ? this.template : null,
        postalAddressValidator: this.postalAddressValidator,
        allowInternationalLetters: this.allowInternationalLetters,
        extraValues: row.slice(columnHeaders.length),
      });
    }
  }

  get moreRowsThanCanSend(): boolean {
    return this.length > this.remainingMessages;
  }

  get tooManyRows(): boolean {
    return this.length > this.maxRows;
  }

  get allowedToSendTo(): boolean {
    if (this.cachedAllowedToSendTo === null) {
      this.cachedAllowedToSendTo =
        this.templateType === 'letter' ||
        this.guestlist.length === 0 ||
        this.rows.every((row) => row === null || this.guestlistMatcher.isAllowed(row.recipient, this.guestlist));
    }
    return this.cachedAllowedToSendTo;
  }

  /**
   * Cheapest checks first: row validation only runs when the columns are right
   */
  get hasErrors(): boolean {
    return (
      this.parseProblems.length > 0 ||
      this.missingColumnHeaders.size > 0 ||
      this.duplicateRecipientColumnHeaders.length > 0 ||
      this.moreRowsThanCanSend ||
      this.tooManyRows ||
      !this.allowedToSendTo ||
      this.rowsWithErrors.length > 0
    );
  }

  /**
   * Rows matching a predicate, computed once per view
   */
  private filterRows(view: string, predicate: (row: Row) => boolean): Row[] {
    let rows = this.views.get(view);
    if (rows === undefined) {
      rows = this.rows.filter((row): row is Row => row !== null && predicate(row));
      this.views.set(view, rows);
    }
    return rows;
  }

  get rowsWithErrors(): Row[] {
    return this.filterRows('errors', (row) => row.hasError);
  }

  get rowsWithBadRecipients(): Row[] {
    return this.filterRows('badRecipients', (row) => row.hasBadRecipient);
  }

  get rowsWithMissingData(): Row[] {
    return this.filterRows('missingData', (row) => row.hasMissingData);
  }

  get rowsWithMessageTooLong(): Row[] {
    return this.filterRows('messageTooLong', (row) => row.messageTooLong);
  }

  get rowsWithEmptyMessage(): Row[] {
    return this.filterRows('emptyMessage', (row) => row.messageEmpty);
  }

  get rowsWithBadQrCodes(): Row[] {
    return this.filterRows('badQrCodes', (row) => row.qrCodeTooLong !== null);
  }

  get initialRows(): Array<Row | null> {
    return this.rows.slice(0, this.maxInitialRowsShown);
  }

  get initialRowsWithErrors(): Row[] {
    return this.rowsWithErrors.slice(0, this.maxErrorsShown);
  }

  /**
   * Rows to preview: the first errors, or the first rows if there are none
   * or the columns themselves are wrong
   */
  get displayedRows(): Array<Row | null> {
    if (this.rowsWithErrors.length > 0 && this.missingColumnHeaders.size === 0) {
      return this.initialRowsWithErrors;
    }
    return this.initialRows;
  }

  get rawColumnHeaders(): string[] {
    return this.parsedRecords[0] ?? [];
  }

  get columnHeaders(): string[] {
    return [...new Set(this.rawColumnHeaders)];
  }

  get columnHeadersAsColumnKeys(): Set<string> {
    return new Set(this.columnHeaders.map(InsensitiveMap.makeKey));
  }

  get missingColumnHeaders(): Set<string> {
    if (this.cachedMissingColumnHeaders === null) {
      const present = this.columnHeadersAsColumnKeys;
      this.cachedMissingColumnHeaders = new Set(
        this.placeholders.filter(
          (key) => !present.has(InsensitiveMap.makeKey(key)) && !this.isAddressColumn(key)
        )
      );
    }
    return this.cachedMissingColumnHeaders;
  }

  /**
   * Every header naming a recipient column more than once, in file order
   */
  get duplicateRecipientColumnHeaders(): string[] {
    if (this.cachedDuplicateRecipientColumnHeaders === null) {
      const counts = new Map<string, number>();
      for (const header of this.rawColumnHeaders) {
        const key = InsensitiveMap.makeKey(header);
        if (this.recipientColumnKeys.has(key)) {
          counts.set(key, (counts.get(key) ?? 0) + 1);
        }
      }

      this.cachedDuplicateRecipientColumnHeaders = [
        ...new Set(
          this.rawColumnHeaders.filter((header) => (counts.get(InsensitiveMap.makeKey(header)) ?? 0) > 1)
        ),
      ];
    }
    return this.cachedDuplicateRecipientColumnHeaders;
  }

  isAddressColumn(key: string): boolean {
    return this.templateType === 'letter' && ADDRESS_COLUMNS.has(key);
  }

  get countOfRequiredRecipientColumns(): number {
    return this.templateType === 'letter' ? 3 : 1;
  }

  /**
   * Letters need at least three address lines, counting the postcode
   */
  get hasRecipientColumns(): boolean {
    const setsToCheck: ReadonlySet<string>[] =
      this.templateType === 'letter'
        ? [ADDRESS_LINES_1_TO_6_AND_POSTCODE_KEYS, ADDRESS_LINES_1_TO_7_KEYS].map(
            (keys) => new Set(keys.map(InsensitiveMap.makeKey))
          )
        : [this.recipientColumnKeys];

    const present = this.columnHeadersAsColumnKeys;
    return setsToCheck.some(
      (keys) => [...keys].filter((key) => present.has(key)).length >= this.countOfRequiredRecipientColumns
    );
  }

  private validateRecipient(value: string): string | null {
    const result =
      this.templateType === 'email'
        ? validateEmailAddress(value)
        : validatePhoneNumber(value, { allowInternational: this.allowInternationalSms });

    return result.isValid ? null : result.details;
  }

  private getErrorForField(key: string, value: CellValue): string | null {
    if (this.isAddressColumn(key)) {
      return null;
    }

    const columnKey = InsensitiveMap.makeKey(key);

    if (this.recipientColumnKeys.has(columnKey)) {
      if (value === null || value === '' || Array.isArray(value)) {
        // The duplicate column error already explains this
        return this.duplicateRecipientColumnHeaders.length > 0 ? null : Cell.MISSING_FIELD_ERROR;
      }
      const recipientError = this.validateRecipient(value);
      if (recipientError !== null) {
        return recipientError;
      }
    }

    if (!this.placeholderKeys.has(columnKey)) {
      return null;
    }

    if (value === null || value === '') {
      return Cell.MISSING_FIELD_ERROR;
    }

    return null;
  }
}
