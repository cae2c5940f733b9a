/**
 * Structured Logger Service
 *
 * Provides structured JSON logging for the validation and ingestion pipeline.
 *
 * Fields per event:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: dotted event name (when applicable)
 * - templateType: email, sms or letter (when applicable)
 * - reason: validation failure code (when applicable)
 * - message: human-readable message
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for validation events
 */
export interface ValidationLogContext {
  templateType?: string;
  reason?: string;
  [key: string]: unknown;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  // Base fields included in every log
  base: {
    service: 'recipient-validation',
    environment: config.nodeEnv,
  },

  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

/**
 * Structured Logger
 */
export class StructuredLogger {
  private readonly logger: pino.Logger = baseLogger;

  /**
   * Logs the billing table being loaded
   */
  billingRatesLoaded(context: { prefixes: number; source: string }) {
    this.logger.debug({
      event: 'billing.loaded',
      prefixes: context.prefixes,
      source: context.source,
      message: `Billing rates loaded: ${context.prefixes} prefixes from ${context.source}`,
    });
  }

  /**
   * Logs a recipient file being parsed into rows
   */
  recipientsIngested(context: ValidationLogContext & { totalRows: number; columns: number }) {
    this.logger.info({
      event: 'csv.ingested',
      templateType: context.templateType,
      totalRows: context.totalRows,
      columns: context.columns,
      message: `Recipient file parsed: ${context.totalRows} rows, ${context.columns} columns`,
    });
  }

  /**
   * Logs a phone number accepted only after lenient normalisation
   */
  phoneNumberRescued(context: ValidationLogContext & { normalised: string }) {
    this.logger.debug({
      event: 'phone.rescued',
      reason: context.reason,
      normalised: context.normalised,
      message: `Phone number accepted after thorough normalisation (strict check: ${context.reason})`,
    });
  }

  /**
   * Logs a phone number that could not be formatted and was passed through
   */
  phoneNumberRejected(context: ValidationLogContext & { logMessage: string }) {
    this.logger.warn({
      event: 'phone.rejected',
      reason: context.reason,
      message: `${context.logMessage}: ${context.reason}`,
    });
  }

  /**
   * Logs records the parser could not read as written
   */
  recipientsMalformed(context: ValidationLogContext & { problems: readonly string[] }) {
    this.logger.warn({
      event: 'csv.malformed',
      templateType: context.templateType,
      problems: context.problems,
      message: `Recipient file has ${context.problems.length} malformed record(s)`,
    });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();

