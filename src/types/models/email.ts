export type EmailProvider = 'sendgrid' | 'ses' | 'smtp';

export interface SmtpSettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
}

/**
 * Email delivery settings resolved from the environment
 */
export interface EmailConfig {
  /** null when no provider is configured */
  provider: EmailProvider | null;
  sendgridApiKey?: string;
  from?: string;
  recipients: string[];
  awsRegion: string;
  smtp: SmtpSettings;
}

/**
 * Interface for the email service
 */
export interface IEmailService {
  send(subject: string, htmlContent: string): Promise<boolean>;
}
