import OpenAI from 'openai';
import { LlmConfig } from '../types/models/config';
import { ILlmRepository } from '../types/services/llm-repository';
import { DEFAULT_LLM_CONFIG } from '../config/llm';
import { LlmError } from '../utils/errors/llm-error';

/**
 * Repository for Groq chat completions, reached through the OpenAI SDK
 * pointed at Groq's OpenAI-compatible endpoint.
 */
export class LlmRepository implements ILlmRepository {
  private client: OpenAI | null;
  private readonly config: LlmConfig;

  /**
   * @param config Optional overrides of DEFAULT_LLM_CONFIG
   * @param client Preconfigured client, mainly for tests
   */
  constructor(config: Partial<LlmConfig> = {}, client?: OpenAI) {
    this.config = { ...DEFAULT_LLM_CONFIG, ...config };
    this.client = client ?? null;
  }

  private getClient(model: string): OpenAI {
    if (this.client) {
      return this.client;
    }
    if (!this.config.apiKey) {
      throw new LlmError('GROQ_API_KEY is not configured', model);
    }
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
    });
    return this.client;
  }

  /**
   * Sends the prompt as a single user message
   * @returns Text of the first choice, empty when the model returned none
   * @throws LlmError carrying the model id
   */
  async complete(model: string, prompt: string): Promise<string> {
    try {
      const completion = await this.getClient(model).chat.completions.create({
        model,
        temperature: this.config.temperature,
        messages: [{ role: 'user', content: prompt }],
      });
      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      if (error instanceof LlmError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LlmError(message, model, error);
    }
  }
}
