import axios, { AxiosInstance } from 'axios';
import { FmpApiConfig } from '../types/models/config';
import { DEFAULT_FMP_API_CONFIG } from '../config/fmp-api';
import { MarketDataApiException } from '../utils/errors/market-data-api-error';
import { HTTP_STATUS } from '../constants/http';

export type QueryParams = Record<string, string | number>;

/**
 * Repository for the Financial Modeling Prep (FMP) REST API.
 *
 * Implemented features:
 * - Circuit breaker to prevent hammering an API that is down
 * - Exponential backoff retry for network errors, 429 and 5xx responses
 * - Typed error handling through MarketDataApiException
 *
 * Payloads are returned untyped; callers validate them.
 *
 * @example
 * ```typescript
 * const repo = new FmpApiRepository({ apiKey: process.env.FMP_API_KEY });
 * const quotes = await repo.get('/api/v3/quote/^TNX');
 * ```
 */
export class FmpApiRepository {
  private client: AxiosInstance;
  private config: FmpApiConfig;
  private failureCount: number = 0;
  private lastFailureTime: number = 0;
  private circuitOpen: boolean = false;

  /**
   * @param config Optional overrides of DEFAULT_FMP_API_CONFIG
   * @param client Preconfigured Axios instance, mainly for tests
   */
  constructor(config: Partial<FmpApiConfig> = {}, client?: AxiosInstance) {
    this.config = { ...DEFAULT_FMP_API_CONFIG, ...config };
    this.client = client ?? this.createAxiosClient();
  }

  hasApiKey(): boolean {
    return this.config.apiKey.length > 0;
  }

  private createAxiosClient(): AxiosInstance {
    return axios.create({
      baseURL: this.config.baseURL,
      headers: {
        'User-Agent': this.config.userAgent,
      },
      timeout: this.config.timeout,
    });
  }

  private async delay(attempt: number): Promise<void> {
    const delay = Math.min(
      this.config.initialRetryDelay * Math.pow(2, attempt - 1),
      this.config.maxRetryDelay,
    );
    await new Promise(resolve => setTimeout(resolve, delay));
  }

  /**
   * @throws MarketDataApiException if the circuit breaker is open
   */
  private checkCircuitBreaker(): void {
    const now = Date.now();
    if (this.circuitOpen) {
      if (now - this.lastFailureTime > this.config.circuitBreakerTimeout) {
        this.circuitOpen = false;
        this.failureCount = 0;
      } else {
        throw new MarketDataApiException(
          'Circuit breaker is open',
          HTTP_STATUS.SERVICE_UNAVAILABLE,
          'CIRCUIT_OPEN',
          true,
        );
      }
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();
    if (this.failureCount >= this.config.circuitBreakerThreshold) {
      this.circuitOpen = true;
    }
  }

  private recordSuccess(): void {
    this.failureCount = 0;
  }

  isCircuitOpen(): boolean {
    return this.circuitOpen;
  }

  /**
   * Maps any request failure onto a MarketDataApiException
   */
  private toException(error: unknown, source: string): MarketDataApiException {
    if (error instanceof MarketDataApiException) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;

      if (status === undefined) {
        return new MarketDataApiException(
          `Network error fetching ${source}: ${error.message}`,
          undefined,
          'NETWORK_ERROR',
          true,
        );
      }
      if (status === HTTP_STATUS.TOO_MANY_REQUESTS) {
        return new MarketDataApiException(`Rate limited on ${source}`, status, 'RATE_LIMITED', true);
      }
      if (status === HTTP_STATUS.FORBIDDEN) {
        return new MarketDataApiException(
          `${source} might not be available on your FMP subscription tier`,
          status,
          'FORBIDDEN',
        );
      }
      return new MarketDataApiException(
        `HTTP error fetching ${source}: ${status}`,
        status,
        'HTTP_ERROR',
        status >= HTTP_STATUS.INTERNAL_SERVER_ERROR,
      );
    }

    return new MarketDataApiException(
      `Unexpected error fetching ${source}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      'UNKNOWN_ERROR',
    );
  }

  /**
   * Performs a GET request with retry logic and circuit breaker
   * @param path Endpoint path, relative to the base URL
   * @param params Query parameters; the API key is appended
   * @param source Name used in log lines, defaults to the path
   * @returns The decoded JSON body
   * @throws MarketDataApiException once retries are exhausted or the error is not retryable
   */
  async get(path: string, params: QueryParams = {}, source: string = path): Promise<unknown> {
    this.checkCircuitBreaker();

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      try {
        const response = await this.client.get<unknown>(path, {
          params: { ...params, apikey: this.config.apiKey },
        });

        this.recordSuccess();
        return response.data;
      } catch (error) {
        const exception = this.toException(error, source);
        console.warn(`Attempt ${attempt} failed for ${source}: ${exception.message}`);

        if (exception.retryable && attempt < this.config.maxRetries) {
          await this.delay(attempt);
          continue;
        }

        this.recordFailure();
        throw exception;
      }
    }

    // maxRetries below 1 never enters the loop
    throw new MarketDataApiException(`No attempt made for ${source}`, undefined, 'NO_ATTEMPT');
  }
}
