/**
 * Error raised when a chat completion cannot be produced
 */
export class LlmError extends Error {
  constructor(
    message: string,
    public readonly model?: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'LlmError';
  }
}
