import { FmpApiConfig } from '../types/models/config';

/**
 * Default configuration for the Financial Modeling Prep repository
 */
export const DEFAULT_FMP_API_CONFIG: FmpApiConfig = {
  baseURL: 'https://financialmodelingprep.com',
  apiKey: '',
  userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  timeout: 10000,
  maxRetries: 3,
  initialRetryDelay: 1000,
  maxRetryDelay: 10000,
  circuitBreakerThreshold: 5,
  circuitBreakerTimeout: 30000
};
