import { loadConfig } from '../env';
import { ValidationError } from '../../utils/errors/app-error';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.fmp).toEqual({
      apiKey: undefined,
      baseURL: 'https://financialmodelingprep.com',
    });
    expect(config.llm).toEqual({
      apiKey: undefined,
      baseURL: 'https://api.groq.com/openai/v1',
      primaryModel: 'openai/gpt-oss-120b',
      fallbackModel: 'llama-3.3-70b-versatile',
      temperature: 0.1,
    });
    expect(config.email).toEqual({
      provider: null,
      from: undefined,
      recipients: [],
      awsRegion: 'us-east-1',
      smtp: {
        host: 'smtp.gmail.com',
        port: 587,
        username: undefined,
        password: undefined,
      },
    });
    expect(config.reportsDir).toBe('reports');
    expect(config.schedule).toEqual({ hour: 9, minute: 30, days: [1, 2, 3, 4, 5] });
    expect(config.runOnStart).toBe(false);
    expect(config.cronApiKey).toBeUndefined();
  });

  it('should treat empty strings as unset', () => {
    const config = loadConfig({ GROQ_API_KEY: '', SMTP_PORT: '  ', TO_EMAIL: '' });

    expect(config.llm.apiKey).toBeUndefined();
    expect(config.email.smtp.port).toBe(587);
    expect(config.email.recipients).toEqual([]);
  });

  it('should choose SMTP when a password is configured and split recipients', () => {
    const config = loadConfig({
      TO_EMAIL: 'desk@example.com, analyst@example.com,',
      FROM_EMAIL: 'agent@example.com',
      SMTP_PASSWORD: 'test-secret',
      SMTP_PORT: '465',
    });

    expect(config.email.provider).toBe('smtp');
    expect(config.email.recipients).toEqual(['desk@example.com', 'analyst@example.com']);
    expect(config.email.smtp).toEqual({
      host: 'smtp.gmail.com',
      port: 465,
      username: 'agent@example.com',
      password: 'test-secret',
    });
  });

  it('should prefer an explicit EMAIL_PROVIDER', () => {
    const config = loadConfig({ EMAIL_PROVIDER: 'ses', SMTP_PASSWORD: 'test-secret' });
    expect(config.email.provider).toBe('ses');
  });

  it('should choose SendGrid over SMTP when an API key is configured', () => {
    const config = loadConfig({ SENDGRID_API_KEY: 'test-sendgrid-key', SMTP_PASSWORD: 'test-secret' });

    expect(config.email.provider).toBe('sendgrid');
    expect(config.email.sendgridApiKey).toBe('test-sendgrid-key');
  });

  it('should return a frozen configuration', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it('should parse the schedule', () => {
    const config = loadConfig({
      SCHEDULE_TIME: '16:05',
      SCHEDULE_DAYS: '5, 1,3,1',
      RUN_ON_START: 'true',
    });

    expect(config.schedule).toEqual({ hour: 16, minute: 5, days: [1, 3, 5] });
    expect(config.runOnStart).toBe(true);
  });

  it('should reject invalid values with a validation error', () => {
    expect(() => loadConfig({ SCHEDULE_TIME: '9:30' })).toThrow(ValidationError);
    expect(() => loadConfig({ SMTP_PORT: 'abc' })).toThrow('SMTP_PORT');
    expect(() => loadConfig({ EMAIL_PROVIDER: 'mailgun' })).toThrow('EMAIL_PROVIDER');
    expect(() => loadConfig({ SCHEDULE_DAYS: '1,7' })).toThrow(
      'SCHEDULE_DAYS: SCHEDULE_DAYS must be a comma-separated list of 0-6',
    );
  });
});
