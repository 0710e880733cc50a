import { SlackRepository } from '../repositories/slack-repository';
import { SlackConfig } from '../types/models/config';
import { ISlackService } from '../types/services/slack-service';

export class SlackService implements ISlackService {
  private readonly slackRepository: SlackRepository | null;

  constructor(private readonly config: SlackConfig, slackRepository?: SlackRepository) {
    this.slackRepository =
      slackRepository ?? (config.botToken ? new SlackRepository(config.botToken) : null);
  }

  /**
   * A bot token enables Slack; a missing channel then makes send() fail
   */
  isConfigured(): boolean {
    return Boolean(this.config.botToken);
  }

  /**
   * Posts the message to the configured channel
   * @returns false when Slack is not configured or the post fails
   */
  async send(message: string): Promise<boolean> {
    const { channel } = this.config;
    if (!this.slackRepository || !this.config.botToken || !channel) {
      return false;
    }

    try {
      return await this.slackRepository.postMessage(channel, message);
    } catch (error) {
      console.error('Error sending Slack message:', error instanceof Error ? error.message : error);
      return false;
    }
  }
}
