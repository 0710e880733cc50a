import { LlmConfig } from '../types/models/config';

/**
 * Groq serves an OpenAI-compatible chat completions API
 */
export const DEFAULT_LLM_CONFIG: LlmConfig = {
  baseURL: 'https://api.groq.com/openai/v1',
  primaryModel: 'openai/gpt-oss-120b',
  fallbackModel: 'llama-3.3-70b-versatile',
  temperature: 0.1
};
