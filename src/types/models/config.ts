import { EmailConfig } from './email';

/**
 * Configuration for the Financial Modeling Prep repository
 */
export interface FmpApiConfig {
  /** Base URL for the API endpoints */
  baseURL: string;
  /** API key, sent as the apikey query parameter */
  apiKey: string;
  /** User-Agent header sent with every request */
  userAgent: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Maximum number of attempts per request */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialRetryDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxRetryDelay: number;
  /** Number of failed requests before opening the circuit breaker */
  circuitBreakerThreshold: number;
  /** Time in milliseconds before the circuit breaker resets */
  circuitBreakerTimeout: number;
}

export interface LlmConfig {
  apiKey?: string;
  baseURL: string;
  primaryModel: string;
  fallbackModel: string;
  temperature: number;
}

export interface SlackConfig {
  botToken?: string;
  channel?: string;
}

/**
 * Wall-clock schedule in the process time zone
 */
export interface Schedule {
  hour: number;
  minute: number;
  /** 0 = Sunday ... 6 = Saturday */
  days: number[];
}

export interface AppConfig {
  fmp: Pick<FmpApiConfig, 'baseURL'> & { apiKey?: string };
  llm: LlmConfig;
  email: EmailConfig;
  slack: SlackConfig;
  reportsDir: string;
  schedule: Schedule;
  runOnStart: boolean;
  cronApiKey?: string;
}
