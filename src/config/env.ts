import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from repository root
dotenv.config({ path: resolve(__dirname, '../../.env') });

export interface Config {
  nodeEnv: string;
  logLevel: string;
  csvMaxRows: number;
  csvMaxErrorsShown: number;
  csvMaxInitialRowsShown: number;
  recipientCacheSize: number;
  billingRatesPath: string;
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config: Config = {
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
  csvMaxRows: parseInt(process.env.CSV_MAX_ROWS || '100000', 10),
  csvMaxErrorsShown: parseInt(process.env.CSV_MAX_ERRORS_SHOWN || '20', 10),
  csvMaxInitialRowsShown: parseInt(process.env.CSV_MAX_INITIAL_ROWS_SHOWN || '10', 10),
  recipientCacheSize: parseInt(process.env.RECIPIENT_CACHE_SIZE || '32', 10),
  billingRatesPath:
    process.env.BILLING_RATES_PATH || resolve(__dirname, '../../data/international-billing-rates.yml'),
};
