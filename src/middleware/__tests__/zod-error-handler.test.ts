import { z } from 'zod';
import { formatZodError, handleZodError } from '../zod-error-handler';
import { ValidationError } from '../../utils/errors/app-error';

describe('Zod error handler', () => {
  it('should label issues with the variable they belong to', () => {
    const schema = z.object({ SMTP_PORT: z.number(), EMAIL_PROVIDER: z.enum(['ses', 'smtp']) });
    const result = schema.safeParse({ SMTP_PORT: 'abc', EMAIL_PROVIDER: 'mailgun' });
    if (result.success) {
      throw new Error('expected a validation failure');
    }

    expect(formatZodError(result.error, 'environment')).toEqual([
      { field: 'SMTP_PORT', message: 'Expected number, received string', code: 'invalid_type', received: 'string' },
      {
        field: 'EMAIL_PROVIDER',
        message: "Invalid enum value. Expected 'ses' | 'smtp', received 'mailgun'",
        code: 'invalid_enum_value',
        received: 'mailgun',
      },
    ]);
  });

  it('should use the subject for issues on the whole value', () => {
    const result = z.string({ required_error: 'API key is required' }).safeParse(undefined);
    if (result.success) {
      throw new Error('expected a validation failure');
    }

    const error = handleZodError(result.error, 'headers');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('headers: API key is required');
  });
});
