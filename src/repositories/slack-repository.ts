import { WebClient } from '@slack/web-api';

/**
 * Thin wrapper around the Slack Web API client
 */
export class SlackRepository {
  private readonly client: WebClient;

  constructor(token: string) {
    // A run must not wait on Slack's default backoff of several minutes
    this.client = new WebClient(token, { retryConfig: { retries: 0 } });
  }

  /**
   * Posts a mrkdwn message
   * @returns The `ok` flag of the Slack response
   */
  async postMessage(channel: string, text: string): Promise<boolean> {
    const response = await this.client.chat.postMessage({
      channel,
      text,
      mrkdwn: true,
    });
    return response.ok === true;
  }
}
