import { SES } from '@aws-sdk/client-ses';
import nodemailer from 'nodemailer';
import sgMail from '@sendgrid/mail';
import { EmailConfig } from '../types/models/email';

/**
 * Delivers HTML emails through SendGrid, AWS SES or SMTP, depending on the configured provider
 */
export class EmailRepository {
  private sendgrid: typeof sgMail | null = null;
  private ses: SES | null = null;
  private transporter: nodemailer.Transporter | null = null;

  constructor(private readonly config: EmailConfig) {
    if (config.provider === 'sendgrid') {
      this.initializeSendGrid();
    } else if (config.provider === 'ses') {
      this.initializeSES();
    } else if (config.provider === 'smtp') {
      this.initializeSMTP();
    }
  }

  private initializeSendGrid(): void {
    if (!this.config.sendgridApiKey) {
      console.error('SendGrid selected but SENDGRID_API_KEY is not set');
      return;
    }
    sgMail.setApiKey(this.config.sendgridApiKey);
    this.sendgrid = sgMail;
    console.log('SendGrid client initialized successfully');
  }

  /**
   * Initializes the AWS SES client
   */
  private initializeSES(): void {
    try {
      this.ses = new SES({
        region: this.config.awsRegion,
      });
      console.log('AWS SES client initialized successfully');
    } catch (error) {
      console.error('Error initializing AWS SES client:', error);
    }
  }

  /**
   * Initializes the SMTP transporter. Port 465 uses implicit TLS; any
   * other port must upgrade with STARTTLS or the send fails.
   */
  private initializeSMTP(): void {
    const { host, port, username, password } = this.config.smtp;
    try {
      this.transporter = nodemailer.createTransport({
        host,
        port,
        secure: port === 465,
        requireTLS: port !== 465,
        auth: username && password ? { user: username, pass: password } : undefined,
      });

      console.log(`SMTP client initialized for ${host}:${port}`);
    } catch (error) {
      console.error('Error initializing SMTP client:', error);
    }
  }

  isInitialized(): boolean {
    return this.sendgrid !== null || this.ses !== null || this.transporter !== null;
  }

  /**
   * Sends an HTML email with whichever provider was initialized
   * @throws Error when no provider is available or the transport fails
   */
  async sendEmail(from: string, recipients: string[], subject: string, htmlContent: string): Promise<void> {
    if (this.sendgrid) {
      await this.sendWithSendGrid(from, recipients, subject, htmlContent);
    } else if (this.ses) {
      await this.sendWithSES(from, recipients, subject, htmlContent);
    } else if (this.transporter) {
      await this.sendWithSMTP(from, recipients, subject, htmlContent);
    } else {
      throw new Error('No email provider has been initialized');
    }
  }

  private async sendWithSendGrid(
    from: string,
    recipients: string[],
    subject: string,
    htmlContent: string,
  ): Promise<void> {
    if (!this.sendgrid) {
      throw new Error('SendGrid client not initialized');
    }

    await this.sendgrid.send({
      from,
      to: recipients,
      subject,
      html: htmlContent,
    });
  }

  private async sendWithSES(
    from: string,
    recipients: string[],
    subject: string,
    htmlContent: string,
  ): Promise<void> {
    if (!this.ses) {
      throw new Error('SES client not initialized');
    }

    await this.ses.sendEmail({
      Source: from,
      Destination: {
        ToAddresses: recipients,
      },
      Message: {
        Subject: {
          Data: subject,
          Charset: 'UTF-8',
        },
        Body: {
          Html: {
            Data: htmlContent,
            Charset: 'UTF-8',
          },
        },
      },
    });
  }

  private async sendWithSMTP(
    from: string,
    recipients: string[],
    subject: string,
    htmlContent: string,
  ): Promise<void> {
    if (!this.transporter) {
      throw new Error('SMTP transporter not initialized');
    }

    await this.transporter.sendMail({
      from,
      to: recipients.join(', '),
      subject,
      html: htmlContent,
    });
  }
}
