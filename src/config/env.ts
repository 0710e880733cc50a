import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig } from '../types/models/config';
import { EmailProvider } from '../types/models/email';
import { handleZodError } from '../middleware/zod-error-handler';
import { DEFAULT_FMP_API_CONFIG } from './fmp-api';
import { DEFAULT_LLM_CONFIG } from './llm';

// Load environment variables
dotenv.config();

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

// Empty strings count as unset, the same way a shell `if [ -n "$VAR" ]` would
const envVar = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);

const optionalString = envVar(z.string().trim().optional());

export const envSchema = z.object({
  GROQ_API_KEY: optionalString,
  GROQ_BASE_URL: envVar(z.string().url().default(DEFAULT_LLM_CONFIG.baseURL)),
  LLM_PRIMARY_MODEL: envVar(z.string().default(DEFAULT_LLM_CONFIG.primaryModel)),
  LLM_FALLBACK_MODEL: envVar(z.string().default(DEFAULT_LLM_CONFIG.fallbackModel)),
  LLM_TEMPERATURE: envVar(z.coerce.number().min(0).max(2).default(DEFAULT_LLM_CONFIG.temperature)),

  FMP_API_KEY: optionalString,
  FMP_API_URL: envVar(z.string().url().default(DEFAULT_FMP_API_CONFIG.baseURL)),

  TO_EMAIL: optionalString,
  FROM_EMAIL: optionalString,
  EMAIL_PROVIDER: envVar(z.enum(['sendgrid', 'ses', 'smtp']).optional()),
  SENDGRID_API_KEY: optionalString,
  SMTP_HOST: envVar(z.string().default('smtp.gmail.com')),
  SMTP_PORT: envVar(z.coerce.number().int().positive().default(587)),
  SMTP_USERNAME: optionalString,
  SMTP_PASSWORD: optionalString,
  AWS_REGION: envVar(z.string().default('us-east-1')),

  SLACK_BOT_TOKEN: optionalString,
  SLACK_CHANNEL: optionalString,

  REPORTS_DIR: envVar(z.string().default('reports')),

  SCHEDULE_TIME: envVar(
    z
      .string()
      .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'SCHEDULE_TIME must use the HH:mm format')
      .default('09:30'),
  ),
  SCHEDULE_DAYS: envVar(
    z
      .string()
      .regex(/^\s*[0-6](\s*,\s*[0-6])*\s*$/, 'SCHEDULE_DAYS must be a comma-separated list of 0-6')
      .default('1,2,3,4,5'),
  ),
  RUN_ON_START: envVar(z.enum(['true', 'false']).default('false')),

  CRON_API_KEY: optionalString,
});

// SendGrid takes precedence; SMTP is the fallback when only a password is set
const defaultEmailProvider = (
  sendgridApiKey: string | undefined,
  smtpPassword: string | undefined,
): EmailProvider | null => {
  if (sendgridApiKey) {
    return 'sendgrid';
  }
  return smtpPassword ? 'smtp' : null;
};

const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

/**
 * Validates the environment and builds the application configuration
 * @param env Environment variables, process.env by default
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw handleZodError(result.error, 'environment');
  }

  const vars = result.data;
  const [hour, minute] = vars.SCHEDULE_TIME.split(':').map(Number);
  const days = [...new Set(splitList(vars.SCHEDULE_DAYS).map(Number))].sort((a, b) => a - b);

  return Object.freeze({
    fmp: {
      apiKey: vars.FMP_API_KEY,
      baseURL: vars.FMP_API_URL,
    },
    llm: {
      apiKey: vars.GROQ_API_KEY,
      baseURL: vars.GROQ_BASE_URL,
      primaryModel: vars.LLM_PRIMARY_MODEL,
      fallbackModel: vars.LLM_FALLBACK_MODEL,
      temperature: vars.LLM_TEMPERATURE,
    },
    email: {
      provider: vars.EMAIL_PROVIDER ?? defaultEmailProvider(vars.SENDGRID_API_KEY, vars.SMTP_PASSWORD),
      sendgridApiKey: vars.SENDGRID_API_KEY,
      from: vars.FROM_EMAIL,
      recipients: splitList(vars.TO_EMAIL),
      awsRegion: vars.AWS_REGION,
      smtp: {
        host: vars.SMTP_HOST,
        port: vars.SMTP_PORT,
        username: vars.SMTP_USERNAME ?? vars.FROM_EMAIL,
        password: vars.SMTP_PASSWORD,
      },
    },
    slack: {
      botToken: vars.SLACK_BOT_TOKEN,
      channel: vars.SLACK_CHANNEL,
    },
    reportsDir: vars.REPORTS_DIR,
    schedule: { hour, minute, days },
    runOnStart: vars.RUN_ON_START === 'true',
    cronApiKey: vars.CRON_API_KEY,
  });
}
