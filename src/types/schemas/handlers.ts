import { z } from 'zod';

export const API_KEY_HEADER = 'x-api-key';

export const apiKeyHeaderSchema = z.object({
  [API_KEY_HEADER]: z
    .string({
      required_error: 'API key is required',
      invalid_type_error: 'API key must be a string',
    })
    .min(1, 'API key is required'),
});

// Scheduled (EventBridge) events carry no headers; API Gateway events do
export const marketResearchEventSchema = z
  .object({
    headers: z.record(z.string().optional()).nullable().optional(),
  })
  .passthrough();
