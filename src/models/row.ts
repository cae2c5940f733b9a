import { Cell, type CellErrorFn } from './cell.js';
import { InsensitiveMap } from './insensitive-map.js';
import type { MessageTemplate, QrCodeTooLong } from '../providers/template.provider.interface.js';
import type { PostalAddressValidator } from '../providers/postal-address.provider.interface.js';
import type { CellValue, TemplateType } from '../types/csv.types.js';

export interface RowOptions {
  index: number;
  templateType: TemplateType;
  recipientColumnHeaders: readonly string[];
  /** Column keys of placeholders and recipient columns */
  placeholders: ReadonlySet<string>;
  /** Omitted when validation is switched off */
  errorFn: CellErrorFn | null;
  /** Omitted when validation is switched off */
  template: MessageTemplate | null;
  postalAddressValidator: PostalAddressValidator | null;
  allowInternationalLetters: boolean;
  /** Values beyond the last column header, kept here instead of under a null column key */
  extraValues?: string[];
}

/**
 * One data row of a recipient spreadsheet
 *
 * Cells are validated when the row is built. Message length is checked by
 * rendering the template with this row's values, also at construction.
 */
export class Row {
  readonly index: number;
  readonly templateType: TemplateType;
  readonly recipientColumnHeaders: readonly string[];
  readonly placeholders: ReadonlySet<string>;
  /** Values past the last header; no cell is keyed for them */
  readonly extraValues: readonly string[];
  readonly cells: InsensitiveMap<Cell>;

  readonly messageTooLong: boolean = false;
  readonly messageEmpty: boolean = false;
  readonly qrCodeTooLong: QrCodeTooLong | null = null;

  private readonly validated: boolean;
  private readonly allowInternationalLetters: boolean;
  private readonly postalAddressValidator: PostalAddressValidator | null;
  private badPostalAddress: boolean | null = null;

  constructor(values: InsensitiveMap<CellValue>, options: RowOptions) {
    this.index = options.index;
    this.templateType = options.templateType;
    this.recipientColumnHeaders = options.recipientColumnHeaders;
    this.placeholders = options.placeholders;
    this.extraValues = options.extraValues ?? [];
    this.allowInternationalLetters = options.allowInternationalLetters;
    this.postalAddressValidator = options.postalAddressValidator;

    const template = options.template;
    this.validated = template !== null;

    if (template) {
      template.values = values;
      // Email length is not checked per row, rendering every email is too slow
      this.messageTooLong = template.templateType === 'email' ? false : template.isMessageTooLong();
      this.messageEmpty = template.isMessageEmpty();
      this.qrCodeTooLong =
        template.templateType === 'letter' ? template.hasQrCodeWithTooMuchData?.() ?? null : null;
    }

    this.cells = new InsensitiveMap(
      [...values].map(([key, value]): [string, Cell] => [
        key,
        new Cell(key, value, options.errorFn, this.placeholders),
      ])
    );
  }

  /**
   * The cell for a column, or an empty cell if the column is absent
   */
  get(key: string): Cell {
    return this.cells.get(key) ?? new Cell();
  }

  has(key: string): boolean {
    return this.cells.has(key);
  }

  get hasError(): boolean {
    return this.hasErrorSpanningMultipleCells || [...this.cells.values()].some((cell) => cell.error !== null);
  }

  get hasBadRecipient(): boolean {
    if (this.templateType === 'letter') {
      return this.hasBadPostalAddress;
    }
    return this.get(this.recipientColumnHeaders[0]).recipientError;
  }

  get hasBadPostalAddress(): boolean {
    if (this.templateType !== 'letter' || !this.validated || !this.postalAddressValidator) {
      return false;
    }
    if (this.badPostalAddress === null) {
      this.badPostalAddress = !this.postalAddressValidator.isValid(this.recipientAndPersonalisation, {
        allowInternationalLetters: this.allowInternationalLetters,
      });
    }
    return this.badPostalAddress;
  }

  get hasErrorSpanningMultipleCells(): boolean {
    return this.messageTooLong || this.messageEmpty || this.hasBadPostalAddress || this.qrCodeTooLong !== null;
  }

  get hasMissingData(): boolean {
    return [...this.cells.values()].some((cell) => cell.error === Cell.MISSING_FIELD_ERROR);
  }

  /**
   * The recipient value, or every address line for letters
   */
  get recipient(): CellValue | CellValue[] {
    const columns = this.recipientColumnHeaders.map((column) => this.get(column).data);
    return columns.length === 1 ? columns[0] : columns;
  }

  get personalisation(): InsensitiveMap<CellValue> {
    return new InsensitiveMap(
      [...this.cells]
        .filter(([key]) => this.placeholders.has(key))
        .map(([key, cell]): [string, CellValue] => [key, cell.data])
    );
  }

  get recipientAndPersonalisation(): InsensitiveMap<CellValue> {
    return new InsensitiveMap([...this.cells].map(([key, cell]): [string, CellValue] => [key, cell.data]));
  }
}
