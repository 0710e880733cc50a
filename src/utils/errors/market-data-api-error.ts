/**
 * Error raised by the Financial Modeling Prep repository
 */
export class MarketDataApiException extends Error {
  constructor(
    message: string,
    public status?: number,
    public code?: string,
    public retryable: boolean = false,
  ) {
    super(message);
    this.name = 'MarketDataApiException';
  }
}
