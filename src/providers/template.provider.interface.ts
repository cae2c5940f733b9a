import type { InsensitiveMap } from '../models/insensitive-map.js';
import { TEMPLATE_TYPES, type CellValue, type TemplateType } from '../types/csv.types.js';

/**
 * Describes a QR code whose payload will not fit on a letter
 */
export interface QrCodeTooLong {
  numBytes: number;
  maxBytes: number;
  data: string;
}

/**
 * Message template interface
 * Renders a message for one recipient so its length can be checked
 */
export interface MessageTemplate {
  readonly templateType: TemplateType;

  /**
   * Placeholder names in the order they appear in the template
   */
  readonly placeholders: readonly string[];

  /**
   * Personalisation for the next render
   */
  values: InsensitiveMap<CellValue>;

  isMessageTooLong(): boolean;

  isMessageEmpty(): boolean;

  /**
   * Letter templates only
   */
  hasQrCodeWithTooMuchData?(): QrCodeTooLong | null;
}

export function isMessageTemplate(value: unknown): value is MessageTemplate {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('templateType' in value) ||
    !('placeholders' in value) ||
    !('isMessageTooLong' in value) ||
    !('isMessageEmpty' in value)
  ) {
    return false;
  }
  const { templateType } = value;
  return (
    TEMPLATE_TYPES.some((type) => type === templateType) &&
    Array.isArray(value.placeholders) &&
    typeof value.isMessageTooLong === 'function' &&
    typeof value.isMessageEmpty === 'function'
  );
}
