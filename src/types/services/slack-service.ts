/**
 * Interface for the Slack service
 */
export interface ISlackService {
  isConfigured(): boolean;
  send(message: string): Promise<boolean>;
}
