import { InsensitiveMap } from '../../src/models/insensitive-map.js';
import type { MessageTemplate, QrCodeTooLong } from '../../src/providers/template.provider.interface.js';
import type { CellValue, TemplateType } from '../../src/types/csv.types.js';

const PLACEHOLDER = /\(\(([^)]+)\)\)/g;

export interface FakeTemplateOptions {
  maxLength?: number;
  qrCodeTooLong?: QrCodeTooLong | null;
}

/**
 * Renders `((name))` placeholders by plain substitution
 */
export class FakeTemplate implements MessageTemplate {
  values = new InsensitiveMap<CellValue>();
  renders = 0;

  constructor(
    readonly templateType: TemplateType,
    readonly content: string,
    private readonly options: FakeTemplateOptions = {}
  ) {}

  get placeholders(): string[] {
    const names = [...this.content.matchAll(PLACEHOLDER)].map((match) => match[1]);
    return [...new Set(names)];
  }

  render(): string {
    this.renders++;
    return this.content.replace(PLACEHOLDER, (_, name: string) => {
      const value = this.values.get(name);
      return Array.isArray(value) ? value.join(', ') : value ?? '';
    });
  }

  isMessageTooLong(): boolean {
    return this.render().length > (this.options.maxLength ?? 918);
  }

  isMessageEmpty(): boolean {
    return this.render().trim() === '';
  }

  hasQrCodeWithTooMuchData(): QrCodeTooLong | null {
    return this.options.qrCodeTooLong ?? null;
  }
}
