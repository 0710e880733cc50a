/**
 * Interface for chat completion access
 */
export interface ILlmRepository {
  complete(model: string, prompt: string): Promise<string>;
}
