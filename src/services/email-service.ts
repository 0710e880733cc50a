import { EmailRepository } from '../repositories/email-repository';
import { EmailConfig, IEmailService } from '../types/models/email';

/**
 * Sends the report email. Delivery problems are logged and reported as
 * `false` so the rest of the workflow can continue.
 */
export class EmailService implements IEmailService {
  private readonly emailRepository: EmailRepository;

  constructor(private readonly config: EmailConfig, emailRepository?: EmailRepository) {
    this.emailRepository = emailRepository ?? new EmailRepository(config);
  }

  async send(subject: string, htmlContent: string): Promise<boolean> {
    const { from, recipients, provider } = this.config;

    if (recipients.length === 0) {
      console.warn('TO_EMAIL not set. Skipping email.');
      return false;
    }
    if (!from) {
      console.warn('FROM_EMAIL not set. Skipping email.');
      return false;
    }
    if (!provider || !this.emailRepository.isInitialized()) {
      console.warn('No email configuration found.');
      return false;
    }

    try {
      await this.emailRepository.sendEmail(from, recipients, subject, htmlContent);
      console.log(`Report successfully sent to ${recipients.join(', ')} via ${provider.toUpperCase()}`);
      return true;
    } catch (error) {
      console.error(`Error sending email via ${provider.toUpperCase()}:`, error);
      return false;
    }
  }
}
